import type { CellPosition, PathResult, RouteMap, TerrainCostTable } from '@isoroute/core';

export const PATH_MARKER = '@';

const KEPT_CODES = new Set(['S', 'G']);

export function terrainRows(map: RouteMap): string[][] {
  return Array.from({ length: map.height }, (_, y) =>
    map.cells.slice(y * map.width, (y + 1) * map.width).map((cell) => cell.terrain)
  );
}

/**
 * Draws the terrain rows with `marker` on every path cell. Start and goal
 * markers and cells the table marks impassable keep their own code.
 */
export function renderPath(
  terrain: ReadonlyArray<ReadonlyArray<string>>,
  path: ReadonlyArray<CellPosition>,
  table?: TerrainCostTable,
  marker = PATH_MARKER
): string {
  const rows = terrain.map((row) => [...row]);
  for (const { x, y } of path) {
    const code = rows[y]?.[x];
    if (code === undefined || KEPT_CODES.has(code)) continue;
    if (table?.has(code) && !table.isPassable(code)) continue;
    rows[y][x] = marker;
  }
  return rows.map((row) => row.join('')).join('\n');
}

export function formatSearchSummary(result: PathResult): string {
  const outcome = result.success ? `cost ${result.cost.toFixed(2)}` : `failed (${result.reason})`;
  return [
    `${result.mode}: ${outcome}`,
    `path ${result.path.length} cells`,
    `expanded ${result.stats.expandedNodes}`,
    `${result.stats.elapsedMs.toFixed(3)} ms`
  ].join(', ');
}
