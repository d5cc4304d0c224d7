import { configurationFault } from '../faults.js';
import type { TerrainCostTable } from '../terrain/terrain-cost-table.js';
import type { GridCoord, MovementRule, RouteMap } from '../types.js';
import { cellAt } from '../utils/grid.js';

/** Ceiling applied to every single edge before it joins a running total. */
export const MAX_EDGE_COST = 255;

export interface EdgeCostOptions {
  // Weight lambda applied to the target cell's tactical priority
  priorityWeight?: number;
  movement?: MovementRule;
  costCap?: number;
}

export interface ResolvedEdgeCostOptions {
  priorityWeight: number;
  movement: MovementRule;
  costCap: number;
}

export function resolveEdgeCostOptions(options: EdgeCostOptions = {}): ResolvedEdgeCostOptions {
  const priorityWeight = options.priorityWeight ?? 0;
  const costCap = options.costCap ?? MAX_EDGE_COST;
  if (!Number.isFinite(priorityWeight) || priorityWeight < 0) {
    throw configurationFault('priority weight', `must be a finite non-negative number, got ${priorityWeight}`);
  }
  if (Number.isNaN(costCap) || costCap <= 0) {
    throw configurationFault('cost cap', `must be a positive number, got ${costCap}`);
  }
  return { priorityWeight, movement: options.movement ?? 'four', costCap };
}

export function isDiagonalMove(from: GridCoord, to: GridCoord): boolean {
  return Math.abs(to.x - from.x) === 1 && Math.abs(to.y - from.y) === 1;
}

function isAdjacent(from: GridCoord, to: GridCoord): boolean {
  const dx = Math.abs(to.x - from.x);
  const dy = Math.abs(to.y - from.y);
  return dx <= 1 && dy <= 1 && dx + dy > 0;
}

/**
 * Saturated cost of stepping from `from` onto `to`:
 *
 *   c(u,v) = b(v)*k(u,v) + up(v)*max(0, dh) + down(v)*max(0, -dh) + lambda*P(v)
 *
 * clamped to the cost cap. Returns +Infinity for moves that must never be
 * relaxed: impassable targets, diagonals under four-direction movement and
 * non-adjacent pairs. Elevations are read from the map, not from the coords.
 */
export function edgeCost(
  map: RouteMap,
  from: GridCoord,
  to: GridCoord,
  table: TerrainCostTable,
  options: EdgeCostOptions | ResolvedEdgeCostOptions = {}
): number {
  const { priorityWeight, movement, costCap } = resolveEdgeCostOptions(options);
  const source = cellAt(map, from);
  const target = cellAt(map, to);
  const terrain = table.get(target.terrain);

  if (!table.isPassable(target.terrain)) return Number.POSITIVE_INFINITY;
  if (!isAdjacent(from, to)) return Number.POSITIVE_INFINITY;

  const diagonal = isDiagonalMove(from, to);
  if (diagonal && movement === 'four') return Number.POSITIVE_INFINITY;

  const kappa = diagonal ? terrain.diagonalFactor : 1;
  const deltaH = target.elevation - source.elevation;

  const cost =
    terrain.baseCost * kappa +
    terrain.ascentCost * Math.max(0, deltaH) +
    terrain.descentCost * Math.max(0, -deltaH) +
    priorityWeight * target.priority;

  return Math.min(cost, costCap);
}
