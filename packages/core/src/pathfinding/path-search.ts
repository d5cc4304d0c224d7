import { configurationFault } from '../faults.js';
import type { CellPosition } from '../faults.js';
import type { TerrainCostTable } from '../terrain/terrain-cost-table.js';
import type {
  GridCoord,
  MovementRule,
  PathFailureReason,
  PathResult,
  RouteMap,
  SearchMode
} from '../types.js';
import { assertWithinBounds, cellAt, coordAt, routeNeighbors, tileIndex } from '../utils/grid.js';
import { edgeCost, resolveEdgeCostOptions } from './cost-function.js';
import type { EdgeCostOptions } from './cost-function.js';
import { FrontierQueue } from './frontier-queue.js';
import { createHeuristic } from './heuristics.js';
import type { Heuristic, HeuristicName } from './heuristics.js';

export interface SearchOptions extends EdgeCostOptions {
  mode?: SearchMode;
  // A* only. Custom heuristics must be admissible and consistent.
  heuristic?: HeuristicName | Heuristic;
  // Cooperative abort checks, evaluated once per frontier extraction;
  // maxExpansions bounds the non-goal cells that get expanded
  maxExpansions?: number;
  deadlineMs?: number;
  now?: () => number;
}

// Unvisited cells keep the zero a fresh Uint8Array starts with
const CellStatus = {
  Unvisited: 0,
  Frontier: 1,
  Settled: 2
} as const;

const zeroHeuristic: Heuristic = () => 0;

/**
 * Grid-native Dijkstra / A* over a {@link RouteMap}. The engine only keeps the
 * shared, read-only terrain table; every query allocates its own frontier and
 * per-cell state, so one engine can serve any number of queries.
 */
export class PathSearchEngine {
  private readonly minBaseCost: number;
  private readonly minDiagonalFactor: number;

  constructor(private readonly table: TerrainCostTable) {
    this.minBaseCost = table.minimumBaseCost();
    this.minDiagonalFactor = table.minimumDiagonalFactor();
  }

  search(map: RouteMap, start: CellPosition, goal: CellPosition, options: SearchOptions = {}): PathResult {
    const now = options.now ?? (() => performance.now());
    const startedAt = now();
    const mode = options.mode ?? 'dijkstra';
    const costOptions = resolveEdgeCostOptions(options);
    const { maxExpansions, deadlineMs } = options;

    if (maxExpansions !== undefined && (!Number.isInteger(maxExpansions) || maxExpansions < 0)) {
      throw configurationFault('search limit', `maxExpansions must be a non-negative integer, got ${maxExpansions}`);
    }
    if (deadlineMs !== undefined && (Number.isNaN(deadlineMs) || deadlineMs < 0)) {
      throw configurationFault('search limit', `deadlineMs must be a non-negative number, got ${deadlineMs}`);
    }

    assertWithinBounds(map, start);
    assertWithinBounds(map, goal);
    // Surface an unknown start terrain as a fault even though no edge enters it
    this.table.get(cellAt(map, start).terrain);

    const stats = { expandedNodes: 0, elapsedMs: 0 };
    const finish = (): void => {
      stats.elapsedMs = now() - startedAt;
    };
    const fail = (reason: PathFailureReason): PathResult => {
      finish();
      return { success: false, mode, reason, path: [], cost: Number.POSITIVE_INFINITY, stats };
    };

    if (start.x === goal.x && start.y === goal.y) {
      finish();
      return { success: true, mode, path: [coordAt(map, start)], cost: 0, stats };
    }

    const heuristic =
      mode === 'astar' ? this.heuristicFor(options.heuristic, costOptions.movement, costOptions.costCap) : zeroHeuristic;

    const cellCount = map.width * map.height;
    const status = new Uint8Array(cellCount);
    const bestCost = new Float64Array(cellCount).fill(Number.POSITIVE_INFINITY);
    const predecessor = new Int32Array(cellCount).fill(-1);
    const frontier = new FrontierQueue();

    const startIndex = tileIndex(map, start);
    const goalIndex = tileIndex(map, goal);
    bestCost[startIndex] = 0;
    status[startIndex] = CellStatus.Frontier;
    frontier.push(startIndex, heuristic(start, goal));

    while (!frontier.isEmpty) {
      if (deadlineMs !== undefined && now() - startedAt > deadlineMs) return fail('aborted');

      const current = frontier.pop();
      if (current === undefined) break;
      status[current] = CellStatus.Settled;

      if (current === goalIndex) {
        const path = this.reconstruct(map, predecessor, goalIndex);
        finish();
        return { success: true, mode, path, cost: bestCost[goalIndex], stats };
      }

      // The budget covers non-goal expansions only
      if (maxExpansions !== undefined && stats.expandedNodes >= maxExpansions) return fail('aborted');
      stats.expandedNodes++;
      const from = coordAt(map, { x: current % map.width, y: Math.floor(current / map.width) });

      for (const neighbor of routeNeighbors(map, from, costOptions.movement)) {
        const index = tileIndex(map, neighbor);
        if (status[index] === CellStatus.Settled) continue;

        const step = edgeCost(map, from, neighbor, this.table, costOptions);
        if (step === Number.POSITIVE_INFINITY) continue;

        const tentative = bestCost[current] + step;
        if (tentative < bestCost[index]) {
          bestCost[index] = tentative;
          predecessor[index] = current;
          status[index] = CellStatus.Frontier;
          frontier.push(index, tentative + heuristic(neighbor, goal));
        }
      }
    }

    return fail('no_path');
  }

  private heuristicFor(choice: SearchOptions['heuristic'], movement: MovementRule, costCap: number): Heuristic {
    if (typeof choice === 'function') return choice;

    const name: HeuristicName = choice ?? (movement === 'eight' ? 'octile' : 'manhattan');
    if (name === 'manhattan' && movement === 'eight') {
      throw configurationFault('heuristic', 'overestimates under eight-direction movement', name);
    }
    // A saturated step may cost less than its base cost, so the cap bounds the scale too
    const minStepCost = Math.min(this.minBaseCost, costCap / Math.SQRT2);
    return createHeuristic(name, { minStepCost, minDiagonalFactor: this.minDiagonalFactor });
  }

  private reconstruct(map: RouteMap, predecessor: Int32Array, goalIndex: number): GridCoord[] {
    const path: GridCoord[] = [];
    for (let cursor = goalIndex; cursor !== -1; cursor = predecessor[cursor]) {
      path.push(coordAt(map, { x: cursor % map.width, y: Math.floor(cursor / map.width) }));
    }
    return path.reverse();
  }
}
