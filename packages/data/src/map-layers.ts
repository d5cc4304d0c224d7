import { configurationFault, createRouteMap, isWithinBounds } from '@isoroute/core';
import type { CellPosition, RouteMap, TerrainCostTable } from '@isoroute/core';

// Text map layers. Every layer is one row per line; terrain rows are one code
// per character, numeric rows are whitespace-separated.

export interface RouteEndpoints {
  start: CellPosition;
  goal: CellPosition;
}

export interface RouteScenario extends RouteEndpoints {
  map: RouteMap;
}

export interface ScenarioLayers {
  terrain: string;
  elevation?: string;
  priority?: string;
  // `S x y` / `G x y` lines; without it the terrain's S and G markers are used
  points?: string;
}

const mapFault = (detail: string) => configurationFault('map', detail);

function layerLines(text: string, layer: string): string[] {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw mapFault(`${layer} layer is empty`);
  }
  return trimmed.split(/\r?\n/);
}

export function parseTerrainLayer(text: string, table: TerrainCostTable): string[][] {
  const lines = layerLines(text, 'terrain');
  const width = lines[0].length;
  return lines.map((line, y) => {
    if (line.length !== width) {
      throw mapFault(`terrain row ${y} has ${line.length} cells, expected ${width}`);
    }
    return Array.from(line, (code, x) => {
      if (!table.has(code)) {
        throw mapFault(`unknown terrain code '${code}' at (${x}, ${y})`);
      }
      return code;
    });
  });
}

function parseNumericLayer(text: string, layer: string, accept: (raw: string) => number | undefined): number[][] {
  const lines = layerLines(text, layer);
  let width: number | undefined;
  return lines.map((line, y) => {
    const values = line
      .trim()
      .split(/\s+/)
      .map((raw, x) => {
        const value = accept(raw);
        if (value === undefined) {
          throw mapFault(`invalid ${layer} value '${raw}' at (${x}, ${y})`);
        }
        return value;
      });
    width ??= values.length;
    if (values.length !== width) {
      throw mapFault(`${layer} row ${y} has ${values.length} values, expected ${width}`);
    }
    return values;
  });
}

export function parseElevationLayer(text: string): number[][] {
  return parseNumericLayer(text, 'elevation', (raw) => (/^[-+]?\d+$/.test(raw) ? Number(raw) : undefined));
}

export function parsePriorityLayer(text: string): number[][] {
  return parseNumericLayer(text, 'priority', (raw) => {
    const value = Number(raw);
    return Number.isFinite(value) && value >= 0 ? value : undefined;
  });
}

function requireEndpoints(start: CellPosition | undefined, goal: CellPosition | undefined): RouteEndpoints {
  if (!start) throw mapFault("start 'S' not found");
  if (!goal) throw mapFault("goal 'G' not found");
  return { start, goal };
}

export function parsePointsLayer(text: string): RouteEndpoints {
  let start: CellPosition | undefined;
  let goal: CellPosition | undefined;
  for (const line of text.split(/\r?\n/)) {
    const parts = line.trim().split(/\s+/);
    if (parts.length < 3) continue;
    const [marker, rawX, rawY] = parts;
    const x = Number(rawX);
    const y = Number(rawY);
    if (!Number.isInteger(x) || !Number.isInteger(y)) {
      throw mapFault(`invalid point '${line.trim()}'`);
    }
    switch (marker.toUpperCase()) {
      case 'S':
        start = { x, y };
        break;
      case 'G':
        goal = { x, y };
        break;
    }
  }
  return requireEndpoints(start, goal);
}

/** Locates the S and G markers in a terrain layer; the last marker of each kind wins. */
export function findMarkers(terrain: ReadonlyArray<ReadonlyArray<string>>): RouteEndpoints {
  let start: CellPosition | undefined;
  let goal: CellPosition | undefined;
  terrain.forEach((row, y) =>
    row.forEach((code, x) => {
      if (code === 'S') start = { x, y };
      if (code === 'G') goal = { x, y };
    })
  );
  return requireEndpoints(start, goal);
}

function checkSize(layer: string, grid: number[][], width: number, height: number): void {
  const layerWidth = grid[0]?.length ?? 0;
  if (grid.length !== height || layerWidth !== width) {
    throw mapFault(`size mismatch: terrain is ${width}x${height}, ${layer} is ${layerWidth}x${grid.length}`);
  }
}

function buildMap(terrain: string[][], elevation?: number[][], priority?: number[][]): RouteMap {
  const height = terrain.length;
  const width = terrain[0].length;
  if (elevation) checkSize('elevation', elevation, width, height);
  if (priority) checkSize('priority', priority, width, height);

  const cells = terrain.flatMap((row, y) =>
    row.map((code, x) => ({
      terrain: code,
      elevation: elevation?.[y][x] ?? 0,
      priority: priority?.[y][x] ?? 0
    }))
  );
  return createRouteMap(width, height, cells);
}

function withEndpoints(map: RouteMap, endpoints: RouteEndpoints): RouteScenario {
  for (const [name, point] of [
    ['start', endpoints.start],
    ['goal', endpoints.goal]
  ] as const) {
    if (!isWithinBounds(map, point)) {
      throw mapFault(`${name} (${point.x}, ${point.y}) is outside the ${map.width}x${map.height} grid`);
    }
  }
  return { map, start: endpoints.start, goal: endpoints.goal };
}

/** Terrain plus optional elevation and priority layers, without endpoints. */
export function loadRouteMap(layers: Omit<ScenarioLayers, 'points'>, table: TerrainCostTable): RouteMap {
  return buildMap(
    parseTerrainLayer(layers.terrain, table),
    layers.elevation === undefined ? undefined : parseElevationLayer(layers.elevation),
    layers.priority === undefined ? undefined : parsePriorityLayer(layers.priority)
  );
}

export function loadRouteScenario(layers: ScenarioLayers, table: TerrainCostTable): RouteScenario {
  const terrain = parseTerrainLayer(layers.terrain, table);
  const elevation = layers.elevation === undefined ? undefined : parseElevationLayer(layers.elevation);
  const priority = layers.priority === undefined ? undefined : parsePriorityLayer(layers.priority);
  const endpoints = layers.points === undefined ? findMarkers(terrain) : parsePointsLayer(layers.points);
  return withEndpoints(buildMap(terrain, elevation, priority), endpoints);
}

/** Single-file map: terrain with S/G markers, flat ground and no priorities. */
export function parseLegacyMap(text: string, table: TerrainCostTable): RouteScenario {
  const terrain = parseTerrainLayer(text, table);
  return withEndpoints(buildMap(terrain), findMarkers(terrain));
}
