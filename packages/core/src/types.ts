export interface GridCoord {
  readonly x: number;
  readonly y: number;
  readonly h: number;
}

export interface IsoCoord {
  readonly x: number;
  readonly y: number;
}

export interface IsoConfig {
  readonly tileWidth: number;
  readonly tileHeight: number;
  readonly elevationScale: number;
}

export interface TerrainCost {
  readonly code: string;
  readonly terrain: string;
  readonly baseCost: number;
  readonly ascentCost: number;
  readonly descentCost: number;
  readonly diagonalFactor: number;
  readonly passable: boolean;
}

export interface RouteCell {
  readonly terrain: string;
  readonly elevation: number;
  // Tactical priority P(v); 0 when the caller supplies none
  readonly priority: number;
}

export interface RouteMap {
  readonly width: number;
  readonly height: number;
  readonly cells: ReadonlyArray<RouteCell>;
}

export type MovementRule = 'four' | 'eight';

export type SearchMode = 'dijkstra' | 'astar';

export interface SearchStats {
  expandedNodes: number;
  elapsedMs: number;
}

export type PathFailureReason = 'no_path' | 'aborted';

export type PathResult =
  | {
      success: true;
      mode: SearchMode;
      path: GridCoord[];
      cost: number;
      stats: SearchStats;
    }
  | {
      success: false;
      mode: SearchMode;
      reason: PathFailureReason;
      path: [];
      cost: number;
      stats: SearchStats;
    };
