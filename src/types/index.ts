// ============================================
// Grid Types
// ============================================

/**
 * Row-major 2-D array of scalar samples.
 * Cell (row, col) lives at data[row * width + col].
 */
export interface HeightGrid {
  width: number;
  height: number;
  data: Float64Array;
}

/**
 * Square grid of decoded elevation samples for one sector
 * (width === height === gridSize). Unit is raw file units / 128.
 */
export type ElevationGrid = HeightGrid;

/**
 * All sectors assembled in display space
 */
export type Mosaic = HeightGrid;

/**
 * Row-major position of a sector: sectorRow * sectorsX + sectorCol
 */
export type SectorIndex = number;

export interface ElevationRange {
  min: number;
  max: number;
}

/**
 * Mosaic rescaled to [0, 1], remembering the range it came from
 */
export interface NormalizedImage extends HeightGrid {
  range: ElevationRange;
}

// ============================================
// Layout Types
// ============================================

/**
 * Shape of the sector grid.
 * Mosaic dimensions are (sectorsX * gridSize) rows by (sectorsY * gridSize) columns.
 */
export interface MosaicLayout {
  sectorsX: number;   // Sectors per row in file space
  sectorsY: number;   // Sector rows in file space
  gridSize: number;   // Samples per sector edge
}

/**
 * Top-left mosaic cell of a sector block
 */
export interface GridOrigin {
  row: number;
  col: number;
}

// ============================================
// Directory Types
// ============================================

export interface SectorFileEntry {
  sectorIndex: SectorIndex;
  fileName: string;
  filePath: string;
}

/**
 * Several files mapped to the same sector index
 */
export interface DuplicateSector {
  sectorIndex: SectorIndex;
  kept: string;
  discarded: string[];
}

export interface SectorDirectoryListing {
  directory: string;
  entries: SectorFileEntry[];   // Ascending sector index
  duplicates: DuplicateSector[];
}

// ============================================
// Batch Report Types
// ============================================

export type ImportFailureReason = 'truncated' | 'io' | 'cancelled';
export type ExportFailureReason = 'too-small' | 'grid-mismatch' | 'io' | 'cancelled';

export interface SectorFailure<Reason extends string> {
  sectorIndex: SectorIndex;
  filePath: string;
  reason: Reason;
  message: string;
}

export interface ImportReport {
  loaded: number;
  failed: number;
  failures: SectorFailure<ImportFailureReason>[];
  duplicates: DuplicateSector[];
}

export interface ExportReport {
  written: number;
  failed: number;
  failures: SectorFailure<ExportFailureReason>[];
}

/**
 * Minimal console surface used for progress and warnings
 */
export interface SectorLogger {
  log: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string, error?: unknown) => void;
}
