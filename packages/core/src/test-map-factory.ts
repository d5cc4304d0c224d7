import { isRouteFault } from './faults.js';
import type { RouteFault } from './faults.js';
import { TerrainCostTable } from './terrain/terrain-cost-table.js';
import type { RouteMap, TerrainCost } from './types.js';
import { createRouteMap } from './utils/grid.js';

// Synthetic terrain and maps shared by the core tests.

const plain = (code: string): TerrainCost => ({
  code,
  terrain: 'plain',
  baseCost: 1,
  ascentCost: 2,
  descentCost: 0.5,
  diagonalFactor: Math.SQRT2,
  passable: true
});

export const testTerrainRecords: ReadonlyArray<TerrainCost> = [
  plain('.'),
  plain('S'),
  plain('G'),
  { code: 's', terrain: 'sand', baseCost: 2.5, ascentCost: 3, descentCost: 1, diagonalFactor: Math.SQRT2, passable: true },
  { code: '=', terrain: 'paved', baseCost: 0.8, ascentCost: 1.5, descentCost: 0.5, diagonalFactor: Math.SQRT2, passable: true },
  { code: 'F', terrain: 'forest', baseCost: 2, ascentCost: 1.5, descentCost: 1, diagonalFactor: Math.SQRT2, passable: true },
  { code: '~', terrain: 'shallow water', baseCost: 3, ascentCost: 2, descentCost: 1, diagonalFactor: Math.SQRT2, passable: true },
  { code: '^', terrain: 'cliff', baseCost: 5, ascentCost: 10, descentCost: 5, diagonalFactor: Math.SQRT2, passable: true },
  { code: '#', terrain: 'wall', baseCost: 0, ascentCost: 0, descentCost: 0, diagonalFactor: Math.SQRT2, passable: false }
];

export const testTerrainTable = TerrainCostTable.fromRecords(testTerrainRecords);

export interface TestLayers {
  elevation?: number[][];
  priority?: number[][];
}

/** Builds a map from one string per row, one terrain code per character. */
export function mapFromRows(rows: string[], layers: TestLayers = {}): RouteMap {
  const height = rows.length;
  const width = rows[0]?.length ?? 0;
  const cells = rows.flatMap((row, y) =>
    Array.from(row, (terrain, x) => ({
      terrain,
      elevation: layers.elevation?.[y]?.[x] ?? 0,
      priority: layers.priority?.[y]?.[x] ?? 0
    }))
  );
  return createRouteMap(width, height, cells);
}

// mulberry32: small seeded generator so property tests are reproducible
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomMap(random: () => number, width: number, height: number, codes: string): RouteMap {
  const pick = (n: number) => Math.floor(random() * n);
  const rows = Array.from({ length: height }, () =>
    Array.from({ length: width }, () => codes[pick(codes.length)]).join('')
  );
  const elevation = Array.from({ length: height }, () => Array.from({ length: width }, () => pick(4)));
  const priority = Array.from({ length: height }, () => Array.from({ length: width }, () => pick(4)));
  return mapFromRows(rows, { elevation, priority });
}

export function captureFault(fn: () => unknown): RouteFault {
  try {
    fn();
  } catch (error) {
    if (isRouteFault(error)) return error.fault;
    throw error;
  }
  throw new Error('expected a route fault');
}
