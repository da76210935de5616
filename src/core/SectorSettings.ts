/**
 * Sector format constants and layout defaults.
 *
 * This is the SINGLE SOURCE OF TRUTH for the csdat layout.
 * Do not duplicate these values elsewhere - always import from this file.
 */

import type { MosaicLayout } from '../types';

/**
 * Opaque header preceding the elevation region
 */
export const SECTOR_HEADER_SIZE = 708;

/**
 * Each cell is a little-endian u16 sample followed by 2 opaque payload bytes.
 * Only the sample is read or written; the payload is carried through untouched.
 */
export const ELEVATION_SAMPLE_SIZE = 2;
export const CELL_PAYLOAD_SIZE = 2;
export const CELL_STRIDE = ELEVATION_SAMPLE_SIZE + CELL_PAYLOAD_SIZE;

/**
 * Fixed-point scale: decoded value = raw / ELEVATION_SCALE
 */
export const ELEVATION_SCALE = 128;
export const MAX_RAW_ELEVATION = 0xffff;

export const DEFAULT_GRID_SIZE = 65;
export const DEFAULT_SECTORS_X = 8;
export const DEFAULT_SECTORS_Y = 8;
export const MIN_SECTORS_PER_AXIS = 1;
export const MAX_SECTORS_PER_AXIS = 100;

export const SECTOR_FILE_PREFIX = 'sd';
export const SECTOR_FILE_EXTENSION = '.csdat';

function assertIntegerInRange(name: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(`${name} must be an integer in [${min}, ${max}], got ${value}`);
  }
}

/**
 * Fill in layout defaults and validate every field.
 */
export function resolveLayout(layout: Partial<MosaicLayout> = {}): MosaicLayout {
  const resolved: MosaicLayout = {
    sectorsX: layout.sectorsX ?? DEFAULT_SECTORS_X,
    sectorsY: layout.sectorsY ?? DEFAULT_SECTORS_Y,
    gridSize: layout.gridSize ?? DEFAULT_GRID_SIZE,
  };

  assertIntegerInRange('sectorsX', resolved.sectorsX, MIN_SECTORS_PER_AXIS, MAX_SECTORS_PER_AXIS);
  assertIntegerInRange('sectorsY', resolved.sectorsY, MIN_SECTORS_PER_AXIS, MAX_SECTORS_PER_AXIS);
  assertIntegerInRange('gridSize', resolved.gridSize, 1, Number.MAX_SAFE_INTEGER);

  return resolved;
}
