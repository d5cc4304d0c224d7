import { isRouteFault } from '@isoroute/core';
import { describe, expect, it } from 'vitest';

import { loadIsoConfig, loadTerrainTable, parseTerrainCsv, starterTerrainRecords, starterTerrainTable } from './terrain.js';

const sheet = [
  'code,terrain,base_cost,ascent_cost,descent_cost,diagonal_factor,passable',
  '.,plain,1.0,2.0,0.5,1.414,true',
  '=,paved,0.8,1.5,0.5,1.414,True',
  '#,wall,0,0,0,1.414,false'
].join('\n');

describe('starter terrain', () => {
  it('covers every default code', () => {
    expect(starterTerrainTable.codes()).toEqual(['.', 'S', 'G', '~', 'F', '^', 's', '=', '#']);
    expect(starterTerrainTable.size).toBe(starterTerrainRecords.length);
  });

  it('treats start and goal markers as plain ground', () => {
    expect(starterTerrainTable.get('S')).toMatchObject({ terrain: 'plain', baseCost: 1 });
    expect(starterTerrainTable.get('G')).toMatchObject({ terrain: 'plain', baseCost: 1 });
    expect(starterTerrainTable.isPassable('#')).toBe(false);
  });
});

describe('loadTerrainTable', () => {
  it('turns schema violations into configuration faults', () => {
    const bad = [{ ...starterTerrainRecords[0], baseCost: -1 }];
    expect(() => loadTerrainTable(bad)).toThrow("Invalid terrain cost table: 0.baseCost: Number must be greater than or equal to 0");
  });

  it('rejects an empty list', () => {
    let caught: unknown;
    try {
      loadTerrainTable([]);
    } catch (error) {
      caught = error;
    }
    expect(isRouteFault(caught, 'configuration')).toBe(true);
  });
});

describe('parseTerrainCsv', () => {
  it('reads the cost sheet', () => {
    const table = parseTerrainCsv(sheet);
    expect(table.codes()).toEqual(['.', '=', '#']);
    expect(table.get('=')).toEqual({
      code: '=',
      terrain: 'paved',
      baseCost: 0.8,
      ascentCost: 1.5,
      descentCost: 0.5,
      diagonalFactor: 1.414,
      passable: true
    });
    expect(table.isPassable('#')).toBe(false);
  });

  it('accepts columns in any order and skips blank lines', () => {
    const table = parseTerrainCsv(
      'passable,code,terrain,diagonal_factor,descent_cost,ascent_cost,base_cost\n\ntrue,F,forest,1.5,1,1.5,2\n'
    );
    expect(table.get('F')).toMatchObject({ baseCost: 2, ascentCost: 1.5, descentCost: 1, diagonalFactor: 1.5 });
  });

  it('reports a missing column', () => {
    expect(() => parseTerrainCsv('code,terrain,base_cost\n.,plain,1')).toThrow(
      'Invalid terrain cost table: missing column ascent_cost'
    );
  });

  it('reports a value that is not a number', () => {
    expect(() => parseTerrainCsv(sheet.replace('0.8', 'cheap'))).toThrow("row 2: base_cost is not a number ('cheap')");
  });

  it('rejects an empty sheet and a sheet without rows', () => {
    expect(() => parseTerrainCsv('  \n')).toThrow('Invalid terrain cost table: CSV is empty');
    expect(() => parseTerrainCsv(sheet.split('\n')[0])).toThrow(/terrain cost table/);
  });
});

describe('loadIsoConfig', () => {
  it('fills defaults for missing fields', () => {
    expect(loadIsoConfig({ tileWidth: 128 })).toEqual({ tileWidth: 128, tileHeight: 32, elevationScale: 16 });
    expect(loadIsoConfig(undefined)).toEqual({ tileWidth: 64, tileHeight: 32, elevationScale: 16 });
  });

  it('rejects non-numeric sizes', () => {
    expect(() => loadIsoConfig({ tileHeight: 'tall' })).toThrow('Invalid iso config: tileHeight: Expected number, received string');
  });
});
