import { describe, expect, it } from 'vitest';

import { captureFault, mapFromRows } from '../test-map-factory.js';
import { cellAt, coordAt, createRouteMap, getCell, isWithinBounds, routeNeighbors } from './grid.js';

describe('createRouteMap', () => {
  it('fills missing elevation and priority with zero', () => {
    const map = createRouteMap(2, 1, [{ terrain: '.' }, { terrain: 'F', elevation: 2, priority: 1.5 }]);
    expect(map.cells).toEqual([
      { terrain: '.', elevation: 0, priority: 0 },
      { terrain: 'F', elevation: 2, priority: 1.5 }
    ]);
    expect(Object.isFrozen(map.cells)).toBe(true);
  });

  it('rejects inconsistent dimensions', () => {
    expect(captureFault(() => createRouteMap(2, 2, [{ terrain: '.' }]))).toEqual({
      kind: 'configuration',
      subject: 'grid',
      detail: 'expected 4 cells for 2x2, got 1'
    });
    expect(captureFault(() => createRouteMap(0, 1, []))).toMatchObject({ subject: 'grid' });
  });

  it('rejects fractional elevation and negative priority', () => {
    expect(captureFault(() => createRouteMap(1, 1, [{ terrain: '.', elevation: 0.5 }]))).toMatchObject({
      detail: 'elevation at (0, 0) must be an integer, got 0.5'
    });
    expect(captureFault(() => createRouteMap(2, 1, [{ terrain: '.' }, { terrain: '.', priority: -2 }]))).toMatchObject({
      detail: 'priority at (1, 0) must be a finite non-negative number, got -2'
    });
  });
});

describe('grid lookups', () => {
  const map = mapFromRows(['.F', '^.'], {
    elevation: [
      [0, 1],
      [2, 3]
    ]
  });

  it('checks bounds on whole cells only', () => {
    expect(isWithinBounds(map, { x: 1, y: 1 })).toBe(true);
    expect(isWithinBounds(map, { x: 2, y: 0 })).toBe(false);
    expect(isWithinBounds(map, { x: 0.5, y: 0 })).toBe(false);
    expect(getCell(map, { x: -1, y: 0 })).toBeUndefined();
  });

  it('addresses cells in row-major order', () => {
    expect(cellAt(map, { x: 1, y: 0 }).terrain).toBe('F');
    expect(cellAt(map, { x: 0, y: 1 }).terrain).toBe('^');
    expect(coordAt(map, { x: 1, y: 1 })).toEqual({ x: 1, y: 1, h: 3 });
    expect(() => cellAt(map, { x: 0, y: 2 })).toThrow('Cell (0, 2) is outside the 2x2 grid');
  });

  it('lists neighbours in a fixed order', () => {
    const open = mapFromRows(['...', '...', '...']);
    const four = routeNeighbors(open, { x: 1, y: 1 }, 'four').map(({ x, y }) => [x, y]);
    expect(four).toEqual([
      [1, 0],
      [1, 2],
      [0, 1],
      [2, 1]
    ]);
    const eight = routeNeighbors(open, { x: 1, y: 1 }, 'eight').map(({ x, y }) => [x, y]);
    expect(eight.slice(4)).toEqual([
      [0, 0],
      [0, 2],
      [2, 0],
      [2, 2]
    ]);
    expect(routeNeighbors(open, { x: 0, y: 0 }, 'eight')).toHaveLength(3);
  });
});
