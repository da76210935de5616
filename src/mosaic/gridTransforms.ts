/**
 * Pure row-major grid operations used to move between file space and display space.
 * Every function returns a new grid; inputs are never mutated unless the name says so.
 */

import type { ElevationRange, HeightGrid } from '../types';

export function createGrid(width: number, height: number, fill: number = 0): HeightGrid {
  const data = new Float64Array(width * height);
  if (fill !== 0) {
    data.fill(fill);
  }
  return { width, height, data };
}

/**
 * Build a grid from nested rows (all rows must share a length)
 */
export function gridFromRows(rows: readonly (readonly number[])[]): HeightGrid {
  const height = rows.length;
  const width = height > 0 ? rows[0].length : 0;
  const grid = createGrid(width, height);

  rows.forEach((row, y) => {
    if (row.length !== width) {
      throw new RangeError(`Row ${y} has ${row.length} samples, expected ${width}`);
    }
    grid.data.set(row, y * width);
  });

  return grid;
}

export function gridToRows(grid: HeightGrid): number[][] {
  const rows: number[][] = [];
  for (let y = 0; y < grid.height; y++) {
    rows.push(Array.from(grid.data.subarray(y * grid.width, (y + 1) * grid.width)));
  }
  return rows;
}

export function getCell(grid: HeightGrid, row: number, col: number): number {
  return grid.data[row * grid.width + col];
}

/**
 * Reverse row order (numpy flipud)
 */
export function flipVertical(grid: HeightGrid): HeightGrid {
  const { width, height } = grid;
  const out = createGrid(width, height);
  for (let y = 0; y < height; y++) {
    const src = (height - 1 - y) * width;
    out.data.set(grid.data.subarray(src, src + width), y * width);
  }
  return out;
}

/**
 * Reverse column order (numpy fliplr)
 */
export function flipHorizontal(grid: HeightGrid): HeightGrid {
  const { width, height } = grid;
  const out = createGrid(width, height);
  for (let y = 0; y < height; y++) {
    const rowStart = y * width;
    for (let x = 0; x < width; x++) {
      out.data[rowStart + x] = grid.data[rowStart + width - 1 - x];
    }
  }
  return out;
}

/**
 * Rotate 90° counter-clockwise (numpy rot90, k=1).
 * out[i][j] = in[j][width - 1 - i]; the result is height × width.
 */
export function rotate90CounterClockwise(grid: HeightGrid): HeightGrid {
  const { width, height } = grid;
  const out = createGrid(height, width);
  for (let i = 0; i < width; i++) {
    for (let j = 0; j < height; j++) {
      out.data[i * height + j] = grid.data[j * width + (width - 1 - i)];
    }
  }
  return out;
}

/**
 * Rotate 90° clockwise (numpy rot90, k=-1).
 * out[i][j] = in[height - 1 - j][i]; the result is height × width.
 */
export function rotate90Clockwise(grid: HeightGrid): HeightGrid {
  const { width, height } = grid;
  const out = createGrid(height, width);
  for (let i = 0; i < width; i++) {
    for (let j = 0; j < height; j++) {
      out.data[i * height + j] = grid.data[(height - 1 - j) * width + i];
    }
  }
  return out;
}

/**
 * Copy a width × height block starting at (row, col)
 */
export function extractBlock(
  grid: HeightGrid,
  row: number,
  col: number,
  width: number,
  height: number
): HeightGrid {
  if (row < 0 || col < 0 || row + height > grid.height || col + width > grid.width) {
    throw new RangeError(`Block ${width}x${height} at (${row}, ${col}) exceeds ${grid.width}x${grid.height} grid`);
  }

  const out = createGrid(width, height);
  for (let y = 0; y < height; y++) {
    const src = (row + y) * grid.width + col;
    out.data.set(grid.data.subarray(src, src + width), y * width);
  }
  return out;
}

/**
 * Write block into target at (row, col), in place
 */
export function placeBlock(target: HeightGrid, block: HeightGrid, row: number, col: number): void {
  if (row < 0 || col < 0 || row + block.height > target.height || col + block.width > target.width) {
    throw new RangeError(`Block ${block.width}x${block.height} at (${row}, ${col}) exceeds ${target.width}x${target.height} grid`);
  }

  for (let y = 0; y < block.height; y++) {
    target.data.set(
      block.data.subarray(y * block.width, (y + 1) * block.width),
      (row + y) * target.width + col
    );
  }
}

/**
 * Min/max over the samples of every grid.
 * Loops instead of Math.min(...data): mosaics exceed the argument limit.
 */
export function getElevationRange(grids: Iterable<HeightGrid>): ElevationRange {
  let min = Infinity;
  let max = -Infinity;

  for (const grid of grids) {
    const { data } = grid;
    for (let i = 0; i < data.length; i++) {
      const value = data[i];
      if (value < min) min = value;
      if (value > max) max = value;
    }
  }

  if (min > max) {
    throw new RangeError('Cannot compute elevation range of an empty grid set');
  }

  return { min, max };
}
