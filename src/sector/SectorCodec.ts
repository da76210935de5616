/**
 * Binary codec for the elevation region of a csdat sector file.
 *
 * Layout (see SectorSettings):
 * - bytes [0, 708): opaque header
 * - cell i at 708 + i * CELL_STRIDE: u16 LE sample, then 2 opaque payload bytes
 * - everything after the last cell: opaque trailer
 *
 * Encoding only ever touches sample bytes, so decode -> encode is bit-exact.
 */

import { MathUtils } from 'three';
import { DecodeError, EncodeError } from '../core/errors';
import {
  CELL_STRIDE,
  DEFAULT_GRID_SIZE,
  ELEVATION_SAMPLE_SIZE,
  ELEVATION_SCALE,
  MAX_RAW_ELEVATION,
  SECTOR_HEADER_SIZE,
} from '../core/SectorSettings';
import { createGrid } from '../mosaic/gridTransforms';
import type { ElevationGrid } from '../types';

/**
 * Bytes from the start of the elevation region to its end
 */
export function getElevationRegionLength(gridSize: number): number {
  return gridSize * gridSize * CELL_STRIDE;
}

/**
 * Absolute byte offset of the sample for cell (row, col)
 */
export function getSampleOffset(row: number, col: number, gridSize: number): number {
  return SECTOR_HEADER_SIZE + (row * gridSize + col) * CELL_STRIDE;
}

function viewOf(bytes: Uint8Array): DataView {
  // Node Buffers may be slices of a larger pooled ArrayBuffer
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Decode the elevation grid of one sector file.
 *
 * @throws DecodeError('truncated') when the file ends before the last sample
 */
export function decodeSector(bytes: Uint8Array, gridSize: number = DEFAULT_GRID_SIZE): ElevationGrid {
  const view = viewOf(bytes);
  const grid = createGrid(gridSize, gridSize);

  for (let row = 0; row < gridSize; row++) {
    for (let col = 0; col < gridSize; col++) {
      const offset = getSampleOffset(row, col, gridSize);
      if (offset + ELEVATION_SAMPLE_SIZE > bytes.byteLength) {
        throw new DecodeError(
          'truncated',
          `Sector data ends at byte ${bytes.byteLength}, sample (${row}, ${col}) needs bytes ${offset}-${offset + ELEVATION_SAMPLE_SIZE - 1}`,
          row,
          col
        );
      }
      grid.data[row * gridSize + col] = view.getUint16(offset, true) / ELEVATION_SCALE;
    }
  }

  return grid;
}

/**
 * Convert a decoded elevation back to its stored integer
 */
export function toRawElevation(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return MathUtils.clamp(Math.round(value * ELEVATION_SCALE), 0, MAX_RAW_ELEVATION);
}

/**
 * Write grid samples into a copy of the original sector bytes.
 * Header, per-cell payload and trailer are preserved byte-for-byte.
 *
 * @throws EncodeError('grid-mismatch') when the grid is not gridSize × gridSize
 * @throws EncodeError('too-small') when the original cannot hold the elevation region
 */
export function encodeSector(
  originalBytes: Uint8Array,
  grid: ElevationGrid,
  gridSize: number = grid.width
): Uint8Array {
  if (grid.width !== gridSize || grid.height !== gridSize) {
    throw new EncodeError(
      'grid-mismatch',
      `Expected a ${gridSize}x${gridSize} grid, got ${grid.width}x${grid.height}`
    );
  }

  const required = SECTOR_HEADER_SIZE + getElevationRegionLength(gridSize);
  if (originalBytes.byteLength < required) {
    throw new EncodeError(
      'too-small',
      `Sector file has ${originalBytes.byteLength} bytes, at least ${required} are needed for a ${gridSize}x${gridSize} grid`
    );
  }

  const output = new Uint8Array(originalBytes);
  const view = viewOf(output);

  for (let row = 0; row < gridSize; row++) {
    for (let col = 0; col < gridSize; col++) {
      view.setUint16(
        getSampleOffset(row, col, gridSize),
        toRawElevation(grid.data[row * gridSize + col]),
        true
      );
    }
  }

  return output;
}
