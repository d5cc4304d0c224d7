import type { CellPosition } from '../faults.js';
import type { GridCoord, IsoConfig, IsoCoord, RouteMap } from '../types.js';
import { coordAt, gridCoord, isWithinBounds } from '../utils/grid.js';
import { diamondOffset, isInDiamond, toGrid, toIso } from './coordinate-system.js';

export type HitTestResult = { hit: true; cell: GridCoord } | { hit: false };

export interface HitTestOptions {
  // Elevation assumed while inverting the screen point; 0 when unknown
  elevation?: number;
}

// Fallback order when the rounded candidate misses: up, down, left, right
const fallbackOffsets: ReadonlyArray<CellPosition> = [
  { x: 0, y: -1 },
  { x: 0, y: 1 },
  { x: -1, y: 0 },
  { x: 1, y: 0 }
];

const MISS: HitTestResult = Object.freeze({ hit: false });

function containsPoint(p: IsoCoord, cell: GridCoord, cfg: IsoConfig): boolean {
  const { u, v } = diamondOffset(p, toIso(cell, cfg), cfg);
  return isInDiamond(u, v);
}

/**
 * Resolves a screen point to the grid cell whose diamond contains it.
 * Out-of-range and non-finite points are misses, never faults.
 */
export function resolveCell(
  point: IsoCoord,
  map: RouteMap,
  cfg: IsoConfig,
  options: HitTestOptions = {}
): HitTestResult {
  if (!Number.isFinite(point.x) || !Number.isFinite(point.y)) {
    return MISS;
  }

  const elevation = options.elevation ?? 0;
  const candidate = toGrid(point, cfg, elevation);
  const probes = [
    candidate,
    ...fallbackOffsets.map((d) => gridCoord(candidate.x + d.x, candidate.y + d.y, elevation))
  ];

  for (const probe of probes) {
    if (isWithinBounds(map, probe) && containsPoint(point, probe, cfg)) {
      return { hit: true, cell: coordAt(map, probe) };
    }
  }

  return MISS;
}
