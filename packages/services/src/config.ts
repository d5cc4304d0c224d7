import { readFileSync } from 'node:fs';

import { configurationFault } from '@isoroute/core';
import type { IsoConfig, TerrainCostTable } from '@isoroute/core';
import { describeIssues, loadIsoConfig, parseTerrainCsv, starterTerrainTable } from '@isoroute/data';
import { z } from 'zod';

// A variable exported with an empty value counts as unset
const dropBlank = (env: unknown) =>
  typeof env === 'object' && env !== null
    ? Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''))
    : env;

const variablesSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ISO_TILE_WIDTH: z.coerce.number().optional(),
  ISO_TILE_HEIGHT: z.coerce.number().optional(),
  ISO_ELEVATION_SCALE: z.coerce.number().optional(),
  TERRAIN_CSV: z.string().min(1).optional()
});

const envSchema = z.preprocess(dropBlank, variablesSchema);

export interface ServiceConfig {
  port: number;
  host: string;
  logLevel: z.infer<typeof variablesSchema>['LOG_LEVEL'];
  iso: IsoConfig;
  terrain: TerrainCostTable;
}

export type ReadTextFile = (path: string) => string;

const readUtf8: ReadTextFile = (path) => readFileSync(path, 'utf8');

function loadTerrain(path: string | undefined, readFile: ReadTextFile): TerrainCostTable {
  if (path === undefined) return starterTerrainTable;
  let text: string;
  try {
    text = readFile(path);
  } catch (error) {
    throw configurationFault('TERRAIN_CSV', error instanceof Error ? error.message : String(error), path);
  }
  return parseTerrainCsv(text);
}

export function loadServiceConfig(
  env: Record<string, string | undefined> = process.env,
  readFile: ReadTextFile = readUtf8
): ServiceConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw configurationFault('environment', describeIssues(result.error));
  }
  const vars = result.data;
  return {
    port: vars.PORT,
    host: vars.HOST,
    logLevel: vars.LOG_LEVEL,
    iso: loadIsoConfig({
      tileWidth: vars.ISO_TILE_WIDTH,
      tileHeight: vars.ISO_TILE_HEIGHT,
      elevationScale: vars.ISO_ELEVATION_SCALE
    }),
    terrain: loadTerrain(vars.TERRAIN_CSV, readFile)
  };
}
