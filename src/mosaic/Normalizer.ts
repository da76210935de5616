/**
 * Mapping between raw elevations and the [0, 1] range used for image editing
 */

import { MathUtils } from 'three';
import type { ElevationRange, HeightGrid, Mosaic, NormalizedImage } from '../types';
import { createGrid, getElevationRange } from './gridTransforms';

export { getElevationRange };

const RGBA_CHANNELS = 4;
const BYTE_CHANNEL_MAX = 255;

/**
 * Rescale a mosaic so its minimum becomes 0 and its maximum 1.
 * A flat mosaic (max === min) maps to all zeros.
 */
export function toDisplay(mosaic: Mosaic): NormalizedImage {
  const range = getElevationRange([mosaic]);
  const { min, max } = range;
  const image = createGrid(mosaic.width, mosaic.height);

  if (max > min) {
    for (let i = 0; i < mosaic.data.length; i++) {
      image.data[i] = MathUtils.mapLinear(mosaic.data[i], min, max, 0, 1);
    }
  }

  return { ...image, range };
}

/**
 * Restore elevations from normalized samples.
 *
 * For a flat source range the unedited value 0 restores originalMax, and
 * edits scale with that level: value = originalMin + pixel * originalMax.
 */
export function fromDisplay(image: HeightGrid, originalMin: number, originalMax: number): Mosaic {
  const mosaic = createGrid(image.width, image.height);
  const { data } = image;

  if (originalMax > originalMin) {
    for (let i = 0; i < data.length; i++) {
      mosaic.data[i] = MathUtils.mapLinear(data[i], 0, 1, originalMin, originalMax);
    }
  } else {
    for (let i = 0; i < data.length; i++) {
      mosaic.data[i] = originalMin + data[i] * originalMax;
    }
  }

  return mosaic;
}

export function fromDisplayRange(image: HeightGrid, range: ElevationRange): Mosaic {
  return fromDisplay(image, range.min, range.max);
}

/**
 * Pack samples as float RGBA (R = G = B = sample, A = 1)
 */
export function toRgbaPixels(image: HeightGrid): Float32Array {
  const pixels = new Float32Array(image.data.length * RGBA_CHANNELS);
  for (let i = 0; i < image.data.length; i++) {
    const value = image.data[i];
    const p = i * RGBA_CHANNELS;
    pixels[p] = value;
    pixels[p + 1] = value;
    pixels[p + 2] = value;
    pixels[p + 3] = 1;
  }
  return pixels;
}

/**
 * Pack samples as 8-bit RGBA (sample * 255, A = 255)
 */
export function toRgba8Pixels(image: HeightGrid): Uint8ClampedArray {
  const pixels = new Uint8ClampedArray(image.data.length * RGBA_CHANNELS);
  for (let i = 0; i < image.data.length; i++) {
    const value = Math.round(image.data[i] * BYTE_CHANNEL_MAX);
    const p = i * RGBA_CHANNELS;
    pixels[p] = value;
    pixels[p + 1] = value;
    pixels[p + 2] = value;
    pixels[p + 3] = BYTE_CHANNEL_MAX;
  }
  return pixels;
}

/**
 * Read an edited RGBA image back into scalar samples (R channel).
 *
 * @param channelMax - 1 for float pixels, 255 for 8-bit pixels
 */
export function fromRgbaPixels(
  pixels: ArrayLike<number>,
  width: number,
  height: number,
  channelMax: number = 1
): HeightGrid {
  if (pixels.length !== width * height * RGBA_CHANNELS) {
    throw new RangeError(
      `Expected ${width * height * RGBA_CHANNELS} RGBA values for ${width}x${height}, got ${pixels.length}`
    );
  }

  const grid = createGrid(width, height);
  for (let i = 0; i < grid.data.length; i++) {
    grid.data[i] = pixels[i * RGBA_CHANNELS] / channelMax;
  }
  return grid;
}
