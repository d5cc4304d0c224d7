import { readFileSync } from 'node:fs';

import { describe, expect, it } from 'vitest';

import { RouteFaultError } from '../faults.js';
import { captureFault } from '../test-map-factory.js';
import { gridCoord } from '../utils/grid.js';
import {
  diamondOffset,
  isInDiamond,
  toGrid,
  toIso,
  toIsoCenter,
  toIsoRounded
} from './coordinate-system.js';
import { createIsoConfig } from './iso-config.js';

const cfg = createIsoConfig({ tileWidth: 64, tileHeight: 32, elevationScale: 16 });

describe('toIso', () => {
  it('maps the origin to the screen origin', () => {
    expect(toIso(gridCoord(0, 0), cfg)).toEqual({ x: 0, y: 0 });
  });

  it('applies the half-tile axes and lifts by elevation', () => {
    // X = 32 * (3 - 2), Y = 16 * (3 + 2) - 16 * 1
    expect(toIso(gridCoord(3, 2, 1), cfg)).toEqual({ x: 32, y: 64 });
  });

  it('moves right-down along +x and left-down along +y', () => {
    expect(toIso(gridCoord(1, 0), cfg)).toEqual({ x: 32, y: 16 });
    expect(toIso(gridCoord(0, 1), cfg)).toEqual({ x: -32, y: 16 });
  });
});

describe('toGrid', () => {
  it('inverts a lifted tile when its elevation is known', () => {
    expect(toGrid({ x: 32, y: 64 }, cfg, 1)).toEqual({ x: 3, y: 2, h: 1 });
  });

  it('assumes the ground plane when elevation is not supplied', () => {
    // (2, 2) at h = 3 projects to (0, 16), which on the ground plane is (1, 1)
    const lifted = toIso(gridCoord(2, 2, 3), cfg);
    expect(lifted).toEqual({ x: 0, y: 16 });
    expect(toGrid(lifted, cfg)).toEqual({ x: 1, y: 1, h: 0 });
  });

  it('never returns negative zero', () => {
    const cell = toGrid({ x: -1, y: 0 }, cfg);
    expect(Object.is(cell.x, 0)).toBe(true);
    expect(Object.is(cell.y, 0)).toBe(true);
  });

  it.each([
    { tileWidth: 64, tileHeight: 32, elevationScale: 16 },
    { tileWidth: 65, tileHeight: 33, elevationScale: 7.5 },
    { tileWidth: 10, tileHeight: 10, elevationScale: 0 },
    { tileWidth: 0.5, tileHeight: 0.25, elevationScale: 3 },
    { tileWidth: 128, tileHeight: 37, elevationScale: 23.3 }
  ])('round-trips every cell for %o', (input) => {
    const config = createIsoConfig(input);
    for (let x = 0; x < 12; x++) {
      for (let y = 0; y < 12; y++) {
        for (let h = 0; h < 4; h++) {
          const g = gridCoord(x, y, h);
          expect(toGrid(toIso(g, config), config, h)).toEqual(g);
        }
      }
    }
  });
});

describe('toIsoCenter and toIsoRounded', () => {
  it('anchors sprites a quarter tile below the diamond center', () => {
    expect(toIsoCenter(gridCoord(0, 0), cfg)).toEqual({ x: 0, y: 8 });
  });

  it('rounds half-pixel positions to whole pixels', () => {
    const odd = createIsoConfig({ tileWidth: 65, tileHeight: 33, elevationScale: 16 });
    expect(toIsoRounded(gridCoord(1, 0), odd)).toEqual({ x: 33, y: 17 });
  });
});

describe('createIsoConfig', () => {
  it('fills in the default 64x32 projection', () => {
    expect(createIsoConfig()).toEqual({ tileWidth: 64, tileHeight: 32, elevationScale: 16 });
  });

  it('accepts a zero elevation scale', () => {
    expect(createIsoConfig({ elevationScale: 0 }).elevationScale).toBe(0);
  });

  it.each([
    { input: { tileWidth: 0 }, message: /tileWidth must be a positive number/ },
    { input: { tileWidth: -10 }, message: /tileWidth must be a positive number/ },
    { input: { tileHeight: 0 }, message: /tileHeight must be a positive number/ },
    { input: { tileHeight: Number.NaN }, message: /tileHeight must be a positive number/ },
    { input: { elevationScale: -1 }, message: /elevationScale must be a non-negative number/ }
  ])('rejects $input', ({ input, message }) => {
    expect(() => createIsoConfig(input)).toThrow(RouteFaultError);
    expect(() => createIsoConfig(input)).toThrow(message);
  });

  it('reports the fault as a configuration fault', () => {
    expect(captureFault(() => createIsoConfig({ tileWidth: 0 }))).toEqual({
      kind: 'configuration',
      subject: 'iso config',
      detail: 'tileWidth must be a positive number, got 0'
    });
  });
});

describe('diamond test', () => {
  it('includes the center and the four corners', () => {
    expect(isInDiamond(0, 0)).toBe(true);
    expect(isInDiamond(1, 0)).toBe(true);
    expect(isInDiamond(-1, 0)).toBe(true);
    expect(isInDiamond(0, 1)).toBe(true);
    expect(isInDiamond(0, -1)).toBe(true);
  });

  it('excludes points past the edges', () => {
    expect(isInDiamond(0.6, 0.6)).toBe(false);
    expect(isInDiamond(1.1, 0)).toBe(false);
    expect(isInDiamond(0, -1.1)).toBe(false);
  });

  it('is symmetric about the cell center in u and v', () => {
    const center = toIso(gridCoord(4, 2, 1), cfg);
    for (let dx = -40; dx <= 40; dx += 2.5) {
      for (let dy = -20; dy <= 20; dy += 1.5) {
        const inside = (sx: number, sy: number) => {
          const { u, v } = diamondOffset({ x: center.x + sx * dx, y: center.y + sy * dy }, center, cfg);
          return isInDiamond(u, v);
        };
        expect(inside(-1, 1)).toBe(inside(1, 1));
        expect(inside(1, -1)).toBe(inside(1, 1));
        expect(inside(-1, -1)).toBe(inside(1, 1));
      }
    }
  });

  it('scales offsets by the half tile size', () => {
    expect(diamondOffset({ x: 16, y: -8 }, { x: 0, y: 0 }, cfg)).toEqual({ u: 0.5, v: -0.5 });
  });
});

describe('module boundaries', () => {
  it('keeps the projection free of terrain and search imports', () => {
    const source = readFileSync(new URL('./coordinate-system.ts', import.meta.url), 'utf8');
    const imports = source.split('\n').filter((line) => line.startsWith('import'));
    expect(imports).toEqual(["import type { GridCoord, IsoConfig, IsoCoord } from '../types.js';"]);
  });
});
