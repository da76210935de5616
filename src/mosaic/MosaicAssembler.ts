/**
 * Composition of sector grids into one display-space mosaic, and the inverse split.
 *
 * File space -> display space:
 * 1. Sector rows are stacked bottom-up (sector row 0 is the last display row)
 * 2. Each sector grid is flipped vertically before placement
 * 3. The placed array is rotated 90° counter-clockwise, then mirrored left-right
 *
 * split() undoes these steps in reverse order, so compose -> split is exact.
 */

import { resolveLayout } from '../core/SectorSettings';
import type { ElevationGrid, GridOrigin, Mosaic, MosaicLayout, SectorIndex } from '../types';
import {
  createGrid,
  extractBlock,
  flipHorizontal,
  flipVertical,
  placeBlock,
  rotate90Clockwise,
  rotate90CounterClockwise,
} from './gridTransforms';

/**
 * Mosaic dimensions for a layout (after rotation rows and columns swap)
 */
export function getMosaicShape(layout: MosaicLayout): { width: number; height: number } {
  return {
    width: layout.sectorsY * layout.gridSize,
    height: layout.sectorsX * layout.gridSize,
  };
}

/**
 * Sector index shown at a display row/column of the placement array
 */
function getSectorIndexForSlot(displayRow: number, col: number, layout: MosaicLayout): SectorIndex {
  const sectorRow = layout.sectorsY - 1 - displayRow;
  return sectorRow * layout.sectorsX + col;
}

/**
 * Top-left mosaic cell covered by a sector.
 *
 * @param sectorIndex - Row-major sector index
 * @returns Origin of the gridSize × gridSize block holding that sector
 */
export function getSectorDisplayOrigin(sectorIndex: SectorIndex, layout: MosaicLayout): GridOrigin {
  const sectorRow = Math.floor(sectorIndex / layout.sectorsX);
  const sectorCol = sectorIndex % layout.sectorsX;
  return {
    row: (layout.sectorsX - 1 - sectorCol) * layout.gridSize,
    col: sectorRow * layout.gridSize,
  };
}

/**
 * Assemble sectors into a display-space mosaic.
 * Missing sectors become zero patches; indices outside the layout are ignored.
 */
export function composeMosaic(
  sectorGrids: ReadonlyMap<SectorIndex, ElevationGrid>,
  layout: MosaicLayout
): Mosaic {
  const { sectorsX, sectorsY, gridSize } = resolveLayout(layout);
  const placed = createGrid(sectorsX * gridSize, sectorsY * gridSize);

  for (let displayRow = 0; displayRow < sectorsY; displayRow++) {
    for (let col = 0; col < sectorsX; col++) {
      const sectorIndex = getSectorIndexForSlot(displayRow, col, layout);
      const grid = sectorGrids.get(sectorIndex);
      if (!grid) continue;

      if (grid.width !== gridSize || grid.height !== gridSize) {
        throw new RangeError(
          `Sector ${sectorIndex} is ${grid.width}x${grid.height}, expected ${gridSize}x${gridSize}`
        );
      }

      placeBlock(placed, flipVertical(grid), displayRow * gridSize, col * gridSize);
    }
  }

  return flipHorizontal(rotate90CounterClockwise(placed));
}

/**
 * Split a display-space mosaic back into file-space sector grids.
 *
 * @param include - Only produce these sectors (default: every slot in the layout)
 */
export function splitMosaic(
  mosaic: Mosaic,
  layout: MosaicLayout,
  include?: Iterable<SectorIndex>
): Map<SectorIndex, ElevationGrid> {
  const resolved = resolveLayout(layout);
  const { sectorsX, sectorsY, gridSize } = resolved;
  const shape = getMosaicShape(resolved);

  if (mosaic.width !== shape.width || mosaic.height !== shape.height) {
    throw new RangeError(
      `Mosaic is ${mosaic.width}x${mosaic.height}, layout ${sectorsX}x${sectorsY}@${gridSize} needs ${shape.width}x${shape.height}`
    );
  }

  const wanted = include ? new Set(include) : null;
  const placed = rotate90Clockwise(flipHorizontal(mosaic));
  const sectors = new Map<SectorIndex, ElevationGrid>();

  for (let displayRow = 0; displayRow < sectorsY; displayRow++) {
    for (let col = 0; col < sectorsX; col++) {
      const sectorIndex = getSectorIndexForSlot(displayRow, col, resolved);
      if (wanted && !wanted.has(sectorIndex)) continue;

      const block = extractBlock(placed, displayRow * gridSize, col * gridSize, gridSize, gridSize);
      sectors.set(sectorIndex, flipVertical(block));
    }
  }

  return sectors;
}

/**
 * Extra on-screen orientation: 90° counter-clockwise
 */
export function applyDisplayRotation(mosaic: Mosaic): Mosaic {
  return rotate90CounterClockwise(mosaic);
}

/**
 * Undo applyDisplayRotation
 */
export function removeDisplayRotation(image: Mosaic): Mosaic {
  return rotate90Clockwise(image);
}
