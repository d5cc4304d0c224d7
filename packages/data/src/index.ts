export {
  describeIssues,
  loadIsoConfig,
  loadTerrainTable,
  parseTerrainCsv,
  starterTerrainRecords,
  starterTerrainTable,
  terrainRecordSchema
} from './terrain.js';
export type { TerrainRecordInput } from './terrain.js';
export {
  findMarkers,
  loadRouteMap,
  loadRouteScenario,
  parseElevationLayer,
  parseLegacyMap,
  parsePointsLayer,
  parsePriorityLayer,
  parseTerrainLayer
} from './map-layers.js';
export type { RouteEndpoints, RouteScenario, ScenarioLayers } from './map-layers.js';
export { PATH_MARKER, formatSearchSummary, renderPath, terrainRows } from './render.js';
