import type { CellPosition } from './faults.js';
import { PathSearchEngine } from './pathfinding/path-search.js';
import type { SearchOptions } from './pathfinding/path-search.js';
import type { TerrainCostTable } from './terrain/terrain-cost-table.js';
import type { MovementRule, PathResult, RouteMap, SearchMode } from './types.js';

export interface FindPathOptions extends Omit<SearchOptions, 'mode' | 'movement' | 'priorityWeight'> {
  mode: SearchMode;
  movement: MovementRule;
  priorityWeight?: number;
}

export function findPath(
  map: RouteMap,
  start: CellPosition,
  goal: CellPosition,
  table: TerrainCostTable,
  options: FindPathOptions
): PathResult {
  return new PathSearchEngine(table).search(map, start, goal, options);
}

export interface ModeComparison {
  dijkstra: PathResult;
  astar: PathResult;
  costsAgree: boolean;
}

/** Runs both search modes on the same query and reports whether their total costs match. */
export function compareSearchModes(
  map: RouteMap,
  start: CellPosition,
  goal: CellPosition,
  table: TerrainCostTable,
  options: Omit<FindPathOptions, 'mode'>
): ModeComparison {
  const engine = new PathSearchEngine(table);
  const dijkstra = engine.search(map, start, goal, { ...options, mode: 'dijkstra' });
  const astar = engine.search(map, start, goal, { ...options, mode: 'astar' });
  const costsAgree =
    dijkstra.success === astar.success &&
    (dijkstra.cost === astar.cost || Math.abs(dijkstra.cost - astar.cost) <= 1e-9 * Math.max(1, dijkstra.cost));
  return { dijkstra, astar, costsAgree };
}
