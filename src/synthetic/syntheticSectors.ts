/**
 * Seeded sector file generation for tests and benchmarks.
 *
 * Terrain comes from multi-octave simplex noise sampled in mosaic-wide
 * coordinates, so neighbouring sectors join without seams. Header, per-cell
 * payload and trailer bytes are alea noise, which makes any byte that an
 * encoder fails to preserve easy to spot.
 */

import alea from 'alea';
import { createNoise2D, type NoiseFunction2D } from 'simplex-noise';
import { MathUtils } from 'three';
import {
  CELL_STRIDE,
  DEFAULT_GRID_SIZE,
  ELEVATION_SAMPLE_SIZE,
  MAX_RAW_ELEVATION,
  SECTOR_HEADER_SIZE,
} from '../core/SectorSettings';
import { getElevationRegionLength, getSampleOffset } from '../sector/SectorCodec';
import type { MosaicLayout, SectorIndex } from '../types';

export type ElevationNoiseArgs = {
  seed: number,
  octaves: number,
  frequency: number,
  amplitude: number,   // Raw units at the first octave
  gain: number,
  lacunarity: number,
  base: number,        // Raw units added to every sample
}

const defaultNoiseArgs: ElevationNoiseArgs = {
  seed: 5,
  octaves: 5,
  frequency: 0.01,
  amplitude: 12000,
  gain: 0.5,
  lacunarity: 2,
  base: 20000,
};

/**
 * Fractal noise returning raw u16 elevations for (x, y) sample coordinates
 */
export function createElevationNoise(overrides: Partial<ElevationNoiseArgs> = {}): (x: number, y: number) => number {
  const args = { ...defaultNoiseArgs, ...overrides };
  const noises: NoiseFunction2D[] = [];
  for (let i = 0; i < args.octaves; i++) {
    noises.push(createNoise2D(alea(i + args.seed)));
  }

  return (x: number, y: number) => {
    let value = 0;
    let amp = args.amplitude;
    let freq = args.frequency;
    for (let i = 0; i < args.octaves; i++) {
      value += amp * noises[i](freq * x, freq * y);
      freq *= args.lacunarity;
      amp *= args.gain;
    }
    return MathUtils.clamp(Math.round(value + args.base), 0, MAX_RAW_ELEVATION);
  };
}

export interface SectorBytesOptions {
  gridSize?: number;
  seed?: number;
  trailerLength?: number;
  /** Raw u16 sample for a cell (default: 0) */
  elevation?: (row: number, col: number) => number;
}

/**
 * Build a complete sector file with random opaque bytes around the given samples
 */
export function createSectorBytes(options: SectorBytesOptions = {}): Uint8Array {
  const gridSize = options.gridSize ?? DEFAULT_GRID_SIZE;
  const trailerLength = options.trailerLength ?? 0;
  const random = alea(options.seed ?? 1);

  const bytes = new Uint8Array(SECTOR_HEADER_SIZE + getElevationRegionLength(gridSize) + trailerLength);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = Math.floor(random() * 256);
  }

  const view = new DataView(bytes.buffer);
  for (let row = 0; row < gridSize; row++) {
    for (let col = 0; col < gridSize; col++) {
      const raw = options.elevation ? options.elevation(row, col) : 0;
      view.setUint16(getSampleOffset(row, col, gridSize), raw, true);
    }
  }

  return bytes;
}

export interface SectorSetOptions {
  seed?: number;
  trailerLength?: number;
  noise?: Partial<ElevationNoiseArgs>;
}

/**
 * Generate every sector of a layout, keyed by sector index.
 * Sector (row, col) samples noise at (col * gridSize + x, row * gridSize + y).
 */
export function createSectorSet(layout: MosaicLayout, options: SectorSetOptions = {}): Map<SectorIndex, Uint8Array> {
  const { sectorsX, sectorsY, gridSize } = layout;
  const seed = options.seed ?? 1;
  const noise = createElevationNoise({ seed, ...options.noise });
  const sectors = new Map<SectorIndex, Uint8Array>();

  for (let sectorRow = 0; sectorRow < sectorsY; sectorRow++) {
    for (let sectorCol = 0; sectorCol < sectorsX; sectorCol++) {
      const sectorIndex = sectorRow * sectorsX + sectorCol;
      sectors.set(sectorIndex, createSectorBytes({
        gridSize,
        seed: seed * 7919 + sectorIndex,
        trailerLength: options.trailerLength,
        elevation: (row, col) => noise(sectorCol * gridSize + col, sectorRow * gridSize + row),
      }));
    }
  }

  return sectors;
}

/**
 * Length of a sector file with no trailer
 */
export function getMinimumSectorLength(gridSize: number): number {
  return SECTOR_HEADER_SIZE + gridSize * gridSize * CELL_STRIDE;
}

/**
 * Shortest byte count that still decodes (last payload missing)
 */
export function getShortestDecodableLength(gridSize: number): number {
  return getMinimumSectorLength(gridSize) - CELL_STRIDE + ELEVATION_SAMPLE_SIZE;
}
