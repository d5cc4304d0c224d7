import type { GridCoord, IsoConfig, IsoCoord } from '../types.js';

// Grid <-> isometric screen transforms. Pure math: nothing here may depend on
// terrain, costs or search state.
//
//   X = (tw/2)(x - y)
//   Y = (th/2)(x + y) - beta * h

const isoCoord = (x: number, y: number): IsoCoord => Object.freeze({ x, y });

// Math.round yields -0 for inputs in (-0.5, 0)
const roundCell = (value: number) => {
  const rounded = Math.round(value);
  return rounded === 0 ? 0 : rounded;
};

export function toIso(g: GridCoord, cfg: IsoConfig): IsoCoord {
  const halfW = cfg.tileWidth / 2;
  const halfH = cfg.tileHeight / 2;
  return isoCoord(halfW * (g.x - g.y), halfH * (g.x + g.y) - cfg.elevationScale * g.h);
}

/**
 * Inverse of {@link toIso}. The elevation cannot be recovered from a screen
 * position, so it has to be supplied; with none the ground plane (h = 0) is
 * assumed and the result is only exact for cells at elevation 0.
 */
export function toGrid(p: IsoCoord, cfg: IsoConfig, elevation = 0): GridCoord {
  const yAdjusted = p.y + cfg.elevationScale * elevation;
  const xTerm = p.x / (cfg.tileWidth / 2);
  const yTerm = yAdjusted / (cfg.tileHeight / 2);

  return Object.freeze({
    x: roundCell((xTerm + yTerm) / 2),
    y: roundCell((yTerm - xTerm) / 2),
    h: elevation
  });
}

// Sprite anchor, a quarter tile below the diamond center
export function toIsoCenter(g: GridCoord, cfg: IsoConfig): IsoCoord {
  const base = toIso(g, cfg);
  return isoCoord(base.x, base.y + cfg.tileHeight / 4);
}

/** Whole-pixel variant of {@link toIso} for consumers that draw on integer pixels. */
export function toIsoRounded(g: GridCoord, cfg: IsoConfig): IsoCoord {
  const p = toIso(g, cfg);
  return isoCoord(roundCell(p.x), roundCell(p.y));
}

/** Offset of `p` from a diamond center, normalized so the diamond's corners sit at |u| + |v| = 1. */
export function diamondOffset(p: IsoCoord, center: IsoCoord, cfg: IsoConfig): { u: number; v: number } {
  return {
    u: (2 / cfg.tileWidth) * (p.x - center.x),
    v: (2 / cfg.tileHeight) * (p.y - center.y)
  };
}

export function isInDiamond(u: number, v: number): boolean {
  return Math.abs(u) + Math.abs(v) <= 1;
}
