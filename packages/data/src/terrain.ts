import { TerrainCostTable, configurationFault, createIsoConfig } from '@isoroute/core';
import type { IsoConfig, TerrainCost } from '@isoroute/core';
import { z } from 'zod';

const cost = z.number().finite().nonnegative();

export const terrainRecordSchema = z.object({
  code: z.string().min(1),
  terrain: z.string().min(1),
  baseCost: cost,
  ascentCost: cost,
  descentCost: cost,
  diagonalFactor: cost,
  passable: z.boolean()
});

const terrainTableSchema = z.array(terrainRecordSchema).min(1);

const isoConfigSchema = z
  .object({
    tileWidth: z.number().positive(),
    tileHeight: z.number().positive(),
    elevationScale: z.number().nonnegative()
  })
  .partial();

export type TerrainRecordInput = z.infer<typeof terrainRecordSchema>;

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function loadTerrainTable(raw: unknown): TerrainCostTable {
  const result = terrainTableSchema.safeParse(raw);
  if (!result.success) {
    throw configurationFault('terrain cost table', describeIssues(result.error));
  }
  return TerrainCostTable.fromRecords(result.data);
}

export function loadIsoConfig(raw: unknown): IsoConfig {
  const result = isoConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw configurationFault('iso config', describeIssues(result.error));
  }
  return createIsoConfig(result.data);
}

const csvColumns = [
  'code',
  'terrain',
  'base_cost',
  'ascent_cost',
  'descent_cost',
  'diagonal_factor',
  'passable'
] as const;

type CsvColumn = (typeof csvColumns)[number];

/**
 * Reads the terrain cost sheet: a header row naming the columns in any order,
 * then one comma-separated row per terrain code. Blank lines are skipped.
 */
export function parseTerrainCsv(text: string): TerrainCostTable {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  const [header, ...rows] = lines;
  if (header === undefined) {
    throw configurationFault('terrain cost table', 'CSV is empty');
  }

  const names = header.split(',').map((name) => name.trim());
  const columnIndex = new Map<CsvColumn, number>();
  for (const column of csvColumns) {
    const index = names.indexOf(column);
    if (index === -1) {
      throw configurationFault('terrain cost table', `missing column ${column}`);
    }
    columnIndex.set(column, index);
  }

  const records = rows.map((row, rowIndex) => {
    const fields = row.split(',').map((field) => field.trim());
    const read = (column: CsvColumn) => fields[columnIndex.get(column) ?? -1] ?? '';
    const number = (column: CsvColumn) => {
      const raw = read(column);
      const value = Number(raw);
      if (raw.length === 0 || Number.isNaN(value)) {
        throw configurationFault('terrain cost table', `row ${rowIndex + 1}: ${column} is not a number ('${raw}')`);
      }
      return value;
    };
    return {
      code: read('code'),
      terrain: read('terrain'),
      baseCost: number('base_cost'),
      ascentCost: number('ascent_cost'),
      descentCost: number('descent_cost'),
      diagonalFactor: number('diagonal_factor'),
      passable: read('passable').toLowerCase() === 'true'
    };
  });

  return loadTerrainTable(records);
}

const plain = (code: string): TerrainCost => ({
  code,
  terrain: 'plain',
  baseCost: 1,
  ascentCost: 2,
  descentCost: 0.5,
  diagonalFactor: 1.414,
  passable: true
});

export const starterTerrainRecords: TerrainCost[] = [
  plain('.'),
  plain('S'),
  plain('G'),
  { code: '~', terrain: 'shallow water', baseCost: 3, ascentCost: 2, descentCost: 1, diagonalFactor: 1.414, passable: true },
  { code: 'F', terrain: 'forest', baseCost: 2, ascentCost: 1.5, descentCost: 1, diagonalFactor: 1.414, passable: true },
  { code: '^', terrain: 'cliff', baseCost: 5, ascentCost: 10, descentCost: 5, diagonalFactor: 1.414, passable: true },
  { code: 's', terrain: 'sand', baseCost: 2.5, ascentCost: 3, descentCost: 1, diagonalFactor: 1.414, passable: true },
  { code: '=', terrain: 'paved', baseCost: 0.8, ascentCost: 1.5, descentCost: 0.5, diagonalFactor: 1.414, passable: true },
  { code: '#', terrain: 'wall', baseCost: 0, ascentCost: 0, descentCost: 0, diagonalFactor: 1.414, passable: false }
];

export const starterTerrainTable = loadTerrainTable(starterTerrainRecords);
