import { configurationFault } from '../faults.js';
import type { IsoConfig } from '../types.js';

export const DEFAULT_TILE_WIDTH = 64;
export const DEFAULT_TILE_HEIGHT = 32;
export const DEFAULT_ELEVATION_SCALE = 16;

/**
 * Validates and freezes an isometric projection config. This is the only place
 * tile dimensions are checked; the transforms trust any `IsoConfig` they get.
 */
export function createIsoConfig(input: Partial<IsoConfig> = {}): IsoConfig {
  const tileWidth = input.tileWidth ?? DEFAULT_TILE_WIDTH;
  const tileHeight = input.tileHeight ?? DEFAULT_TILE_HEIGHT;
  const elevationScale = input.elevationScale ?? DEFAULT_ELEVATION_SCALE;

  if (!Number.isFinite(tileWidth) || tileWidth <= 0) {
    throw configurationFault('iso config', `tileWidth must be a positive number, got ${tileWidth}`);
  }
  if (!Number.isFinite(tileHeight) || tileHeight <= 0) {
    throw configurationFault('iso config', `tileHeight must be a positive number, got ${tileHeight}`);
  }
  if (!Number.isFinite(elevationScale) || elevationScale < 0) {
    throw configurationFault('iso config', `elevationScale must be a non-negative number, got ${elevationScale}`);
  }

  return Object.freeze({ tileWidth, tileHeight, elevationScale });
}
