import { describe, it, expect } from 'vitest';
import {
  createElevationNoise,
  createSectorBytes,
  createSectorSet,
  getMinimumSectorLength,
  getShortestDecodableLength,
} from './syntheticSectors';
import { decodeSector } from '../sector/SectorCodec';

describe(createElevationNoise.name, () => {
  it('should produce deterministic results with same seed', () => {
    const noise1 = createElevationNoise({ seed: 42 });
    const noise2 = createElevationNoise({ seed: 42 });

    expect(noise1(10, 20)).toBe(noise2(10, 20));
    expect(noise1(3, 7)).toBe(noise2(3, 7));
  });

  it('should return integers inside the u16 range', () => {
    const noise = createElevationNoise({ seed: 1, amplitude: 60000, base: 30000 });

    for (let x = 0; x < 50; x++) {
      const value = noise(x * 7, x * 3);
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(65535);
    }
  });

  it('should return the base when amplitude is zero', () => {
    expect(createElevationNoise({ amplitude: 0, base: 512 })(4, 4)).toBe(512);
  });
});

describe(createSectorBytes.name, () => {
  it('should size the file as header + cells + trailer', () => {
    expect(createSectorBytes({ gridSize: 4, trailerLength: 9 }).length).toBe(708 + 64 + 9);
    expect(getMinimumSectorLength(65)).toBe(17608);
    expect(getShortestDecodableLength(65)).toBe(17606);
  });

  it('should store the requested samples', () => {
    const bytes = createSectorBytes({ gridSize: 3, elevation: (row, col) => (row * 3 + col) * 128 });

    expect(Array.from(decodeSector(bytes, 3).data)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
  });

  it('should fill opaque bytes from the seed', () => {
    const a = createSectorBytes({ gridSize: 2, seed: 3 });
    const b = createSectorBytes({ gridSize: 2, seed: 3 });
    const c = createSectorBytes({ gridSize: 2, seed: 4 });

    expect(a).toEqual(b);
    expect(a).not.toEqual(c);
  });
});

describe(createSectorSet.name, () => {
  it('should create one file per sector of the layout', () => {
    const sectors = createSectorSet({ sectorsX: 3, sectorsY: 2, gridSize: 5 }, { seed: 2 });

    expect([...sectors.keys()]).toEqual([0, 1, 2, 3, 4, 5]);
    expect(sectors.get(5)?.length).toBe(getMinimumSectorLength(5));
  });

  it('should sample one continuous noise field across sectors', () => {
    const layout = { sectorsX: 2, sectorsY: 1, gridSize: 4 };
    const noise = createElevationNoise({ seed: 9 });
    const sectors = createSectorSet(layout, { seed: 9 });

    const right = decodeSector(sectors.get(1) ?? new Uint8Array(0), 4);

    // Sector 1 starts at noise x = gridSize
    expect(right.data[0]).toBe(noise(4, 0) / 128);
    expect(right.data[4 * 2 + 3]).toBe(noise(7, 2) / 128);
  });
});
