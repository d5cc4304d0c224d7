import { boundaryFault, configurationFault } from '../faults.js';
import type { CellPosition } from '../faults.js';
import type { GridCoord, MovementRule, RouteCell, RouteMap } from '../types.js';

// Axis-aligned steps first (up, down, left, right), then diagonals.
// Relaxation order follows this table, so it also fixes tie-breaking.
const axisOffsets: ReadonlyArray<CellPosition> = [
  { x: 0, y: -1 },
  { x: 0, y: 1 },
  { x: -1, y: 0 },
  { x: 1, y: 0 }
];

const diagonalOffsets: ReadonlyArray<CellPosition> = [
  { x: -1, y: -1 },
  { x: -1, y: 1 },
  { x: 1, y: -1 },
  { x: 1, y: 1 }
];

const allOffsets: ReadonlyArray<CellPosition> = [...axisOffsets, ...diagonalOffsets];

export function gridCoord(x: number, y: number, h = 0): GridCoord {
  return Object.freeze({ x, y, h });
}

export interface RouteCellInput {
  terrain: string;
  elevation?: number;
  priority?: number;
}

export function createRouteMap(width: number, height: number, cells: ReadonlyArray<RouteCellInput>): RouteMap {
  if (!Number.isInteger(width) || width <= 0 || !Number.isInteger(height) || height <= 0) {
    throw configurationFault('grid', `dimensions must be positive integers, got ${width}x${height}`);
  }
  if (cells.length !== width * height) {
    throw configurationFault('grid', `expected ${width * height} cells for ${width}x${height}, got ${cells.length}`);
  }

  const frozen: RouteCell[] = cells.map((cell, index) => {
    const elevation = cell.elevation ?? 0;
    const priority = cell.priority ?? 0;
    const at = `(${index % width}, ${Math.floor(index / width)})`;
    if (!Number.isInteger(elevation)) {
      throw configurationFault('grid', `elevation at ${at} must be an integer, got ${elevation}`);
    }
    if (!Number.isFinite(priority) || priority < 0) {
      throw configurationFault('grid', `priority at ${at} must be a finite non-negative number, got ${priority}`);
    }
    return Object.freeze({ terrain: cell.terrain, elevation, priority });
  });

  return Object.freeze({ width, height, cells: Object.freeze(frozen) });
}

export function isWithinBounds(map: RouteMap, c: CellPosition): boolean {
  return (
    Number.isInteger(c.x) &&
    Number.isInteger(c.y) &&
    c.x >= 0 &&
    c.x < map.width &&
    c.y >= 0 &&
    c.y < map.height
  );
}

export function assertWithinBounds(map: RouteMap, c: CellPosition): void {
  if (!isWithinBounds(map, c)) {
    throw boundaryFault(c, map.width, map.height);
  }
}

export function tileIndex(map: RouteMap, c: CellPosition): number {
  return c.y * map.width + c.x;
}

export function getCell(map: RouteMap, c: CellPosition): RouteCell | undefined {
  if (!isWithinBounds(map, c)) {
    return undefined;
  }
  return map.cells[tileIndex(map, c)];
}

/** The cell at `c`, or a boundary fault. */
export function cellAt(map: RouteMap, c: CellPosition): RouteCell {
  const cell = getCell(map, c);
  if (!cell) {
    throw boundaryFault(c, map.width, map.height);
  }
  return cell;
}

/** Grid coordinate for an in-bounds cell, carrying the cell's own elevation. */
export function coordAt(map: RouteMap, c: CellPosition): GridCoord {
  return gridCoord(c.x, c.y, cellAt(map, c).elevation);
}

export function neighborOffsets(movement: MovementRule): ReadonlyArray<CellPosition> {
  return movement === 'eight' ? allOffsets : axisOffsets;
}

export function routeNeighbors(map: RouteMap, c: CellPosition, movement: MovementRule): GridCoord[] {
  return neighborOffsets(movement)
    .map((d) => ({ x: c.x + d.x, y: c.y + d.y }))
    .filter((n) => isWithinBounds(map, n))
    .map((n) => coordAt(map, n));
}
