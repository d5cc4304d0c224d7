export * from './types.js';
export * from './faults.js';
export * from './utils/grid.js';
export * from './projection/iso-config.js';
export * from './projection/coordinate-system.js';
export * from './projection/hit-test.js';
export * from './terrain/terrain-cost-table.js';
export * from './pathfinding/cost-function.js';
export * from './pathfinding/heuristics.js';
export * from './pathfinding/frontier-queue.js';
export * from './pathfinding/path-search.js';
export { compareSearchModes, findPath } from './query.js';
export type { FindPathOptions, ModeComparison } from './query.js';
