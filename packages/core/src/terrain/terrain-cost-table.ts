import { configurationFault } from '../faults.js';
import type { TerrainCost } from '../types.js';

const numericFields = ['baseCost', 'ascentCost', 'descentCost', 'diagonalFactor'] as const;

function validateRecord(record: TerrainCost): TerrainCost {
  if (record.code.length === 0) {
    throw configurationFault('terrain cost', 'code must not be empty');
  }
  for (const field of numericFields) {
    const value = record[field];
    if (!Number.isFinite(value) || value < 0) {
      throw configurationFault('terrain cost', `${field} must be a finite non-negative number, got ${value}`, record.code);
    }
  }
  return Object.freeze({
    code: record.code,
    terrain: record.terrain,
    baseCost: record.baseCost,
    ascentCost: record.ascentCost,
    descentCost: record.descentCost,
    diagonalFactor: record.diagonalFactor,
    passable: record.passable
  });
}

// A zero-cost "wall" row is the legacy way of marking a blocking terrain.
function blocksMovement(record: TerrainCost): boolean {
  return !record.passable || (record.terrain === 'wall' && record.baseCost === 0);
}

/**
 * Immutable terrain code -> cost lookup. Built once per session from records
 * supplied by a configuration provider; unknown codes are faults, never a
 * default cost.
 */
export class TerrainCostTable {
  private readonly records: ReadonlyMap<string, TerrainCost>;

  private constructor(records: ReadonlyMap<string, TerrainCost>) {
    this.records = records;
  }

  static fromRecords(records: Iterable<TerrainCost>): TerrainCostTable {
    const byCode = new Map<string, TerrainCost>();
    for (const record of records) {
      const valid = validateRecord(record);
      if (byCode.has(valid.code)) {
        throw configurationFault('terrain cost', 'duplicate terrain code', valid.code);
      }
      byCode.set(valid.code, valid);
    }
    if (byCode.size === 0) {
      throw configurationFault('terrain cost table', 'at least one terrain record is required');
    }
    return new TerrainCostTable(byCode);
  }

  get size(): number {
    return this.records.size;
  }

  codes(): string[] {
    return Array.from(this.records.keys());
  }

  has(code: string): boolean {
    return this.records.has(code);
  }

  get(code: string): TerrainCost {
    const record = this.records.get(code);
    if (!record) {
      throw configurationFault('terrain code', 'no cost record for this code', code);
    }
    return record;
  }

  isPassable(code: string): boolean {
    return !blocksMovement(this.get(code));
  }

  /** Cheapest per-step base cost over passable terrains; scales the search heuristics. */
  minimumBaseCost(): number {
    let min = Number.POSITIVE_INFINITY;
    for (const record of this.records.values()) {
      if (!blocksMovement(record) && record.baseCost < min) min = record.baseCost;
    }
    return Number.isFinite(min) ? min : 0;
  }

  minimumDiagonalFactor(): number {
    let min = Number.POSITIVE_INFINITY;
    for (const record of this.records.values()) {
      if (!blocksMovement(record) && record.diagonalFactor < min) min = record.diagonalFactor;
    }
    return Number.isFinite(min) ? min : Math.SQRT2;
  }
}
