import type { CellPosition } from '../faults.js';

export type Heuristic = (cell: CellPosition, goal: CellPosition) => number;

export type HeuristicName = 'manhattan' | 'octile';

export function manhattanDistance(a: CellPosition, b: CellPosition): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

/**
 * Octile distance: max(dx, dy) + (d - 1) * min(dx, dy) with d the diagonal
 * step length (sqrt 2 by default). Below 1 a diagonal is never longer than an
 * axis step, so the bound degrades to d * max(dx, dy).
 */
export function octileDistance(a: CellPosition, b: CellPosition, diagonal = Math.SQRT2): number {
  const dx = Math.abs(a.x - b.x);
  const dy = Math.abs(a.y - b.y);
  if (diagonal < 1) return diagonal * Math.max(dx, dy);
  return Math.max(dx, dy) + (diagonal - 1) * Math.min(dx, dy);
}

export interface HeuristicScale {
  // Cheapest base cost of a single step over passable terrain
  minStepCost: number;
  // Cheapest diagonal factor over passable terrain
  minDiagonalFactor: number;
}

/**
 * Builds an admissible estimate for the named distance. Every real step costs
 * at least `minStepCost` (times its diagonal factor), so scaling the distance
 * by it never overestimates.
 */
export function createHeuristic(name: HeuristicName, scale: HeuristicScale): Heuristic {
  const { minStepCost } = scale;
  switch (name) {
    case 'manhattan':
      return (cell, goal) => manhattanDistance(cell, goal) * minStepCost;
    case 'octile': {
      const diagonal = Math.min(Math.SQRT2, scale.minDiagonalFactor);
      return (cell, goal) => octileDistance(cell, goal, diagonal) * minStepCost;
    }
  }
}
