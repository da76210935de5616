/**
 * TerrainSession owns one edit cycle over a sector directory:
 * - import: list, read and decode sectors, compose the mosaic
 * - display: normalized image for external editing
 * - export: denormalize, split and write sectors back in place
 *
 * Per-sector problems are collected in reports; only "nothing to import" is fatal.
 */

import { DecodeError, DirectoryError, EncodeError, SessionError, describeError } from '../core/errors';
import { resolveLayout } from '../core/SectorSettings';
import {
  applyDisplayRotation,
  composeMosaic,
  getMosaicShape,
  removeDisplayRotation,
  splitMosaic,
} from '../mosaic/MosaicAssembler';
import { fromDisplay, getElevationRange, toDisplay } from '../mosaic/Normalizer';
import { decodeSector, encodeSector } from '../sector/SectorCodec';
import { listSectorFiles } from '../sector/SectorDirectory';
import { nodeFileSystem, type SectorFileSystem } from '../sector/sectorFileSystem';
import { SectorTaskPool, type SectorTask } from '../sector/SectorTaskPool';
import type {
  ElevationGrid,
  ElevationRange,
  ExportFailureReason,
  ExportReport,
  HeightGrid,
  ImportFailureReason,
  ImportReport,
  Mosaic,
  MosaicLayout,
  NormalizedImage,
  SectorFailure,
  SectorIndex,
  SectorLogger,
} from '../types';

export interface TerrainImportOptions extends Partial<MosaicLayout> {
  directory: string;
  /** Parallel sector reads/writes (default: available cores, at most 8) */
  concurrency?: number;
  signal?: AbortSignal;
}

export interface DisplayOptions {
  /** Apply the extra 90° counter-clockwise on-screen rotation (default: true) */
  rotateForDisplay?: boolean;
}

export interface TerrainExportOptions extends DisplayOptions {
  /** Range the image was normalized from (default: getElevationRange() at export time) */
  range?: ElevationRange;
  signal?: AbortSignal;
}

/**
 * Dependencies for TerrainSession (for testability)
 */
export interface TerrainSessionDependencies {
  fileSystem: SectorFileSystem;
  logger: SectorLogger;
  pool?: SectorTaskPool;
}

const defaultDependencies: TerrainSessionDependencies = {
  fileSystem: nodeFileSystem,
  logger: console,
};

function classifyImportFailure(error: unknown): ImportFailureReason {
  return error instanceof DecodeError ? 'truncated' : 'io';
}

function classifyExportFailure(error: unknown): ExportFailureReason {
  return error instanceof EncodeError ? error.kind : 'io';
}

export class TerrainSession {
  readonly directory: string;
  readonly layout: MosaicLayout;
  /** Every discovered sector file, loaded or not */
  readonly sectorFiles: ReadonlyMap<SectorIndex, string>;
  readonly importReport: ImportReport;
  private sectorGrids: Map<SectorIndex, ElevationGrid>;
  private fileSystem: SectorFileSystem;
  private logger: SectorLogger;
  private pool: SectorTaskPool;

  private constructor(
    directory: string,
    layout: MosaicLayout,
    sectorFiles: Map<SectorIndex, string>,
    sectorGrids: Map<SectorIndex, ElevationGrid>,
    importReport: ImportReport,
    dependencies: Required<TerrainSessionDependencies>
  ) {
    this.directory = directory;
    this.layout = layout;
    this.sectorFiles = sectorFiles;
    this.sectorGrids = sectorGrids;
    this.importReport = importReport;
    this.fileSystem = dependencies.fileSystem;
    this.logger = dependencies.logger;
    this.pool = dependencies.pool;
  }

  /**
   * Load every sector of a directory.
   *
   * @throws DirectoryError('no-matches' | 'unreadable') when there is nothing to read
   * @throws DirectoryError('no-valid-sectors') when every sector failed to load
   */
  static async import(
    options: TerrainImportOptions,
    dependencyOverrides?: Partial<TerrainSessionDependencies>
  ): Promise<TerrainSession> {
    const { directory, concurrency, signal } = options;
    const layout = resolveLayout(options);
    const merged = { ...defaultDependencies, ...dependencyOverrides };
    const dependencies: Required<TerrainSessionDependencies> = {
      ...merged,
      pool: merged.pool ?? new SectorTaskPool(concurrency),
    };
    const { fileSystem, logger, pool } = dependencies;

    logger.log(`[TerrainSession] Loading sectors from ${directory}`);
    const listing = await listSectorFiles(directory, { fileSystem, logger });

    const tasks: SectorTask<ElevationGrid>[] = listing.entries.map((entry) => ({
      key: entry.filePath,
      sectorIndex: entry.sectorIndex,
      run: async () => decodeSector(await fileSystem.readFile(entry.filePath), layout.gridSize),
    }));
    const outcomes = await pool.run(tasks, signal);

    const sectorFiles = new Map(listing.entries.map((entry) => [entry.sectorIndex, entry.filePath]));
    const sectorGrids = new Map<SectorIndex, ElevationGrid>();
    const failures: SectorFailure<ImportFailureReason>[] = [];

    for (const outcome of outcomes) {
      if (outcome.status === 'fulfilled') {
        sectorGrids.set(outcome.sectorIndex, outcome.value);
        continue;
      }

      const failure: SectorFailure<ImportFailureReason> = outcome.status === 'rejected'
        ? {
          sectorIndex: outcome.sectorIndex,
          filePath: outcome.key,
          reason: classifyImportFailure(outcome.error),
          message: describeError(outcome.error),
        }
        : {
          sectorIndex: outcome.sectorIndex,
          filePath: outcome.key,
          reason: 'cancelled',
          message: 'Import cancelled before this sector was read',
        };
      failures.push(failure);
      logger.warn(`[TerrainSession] Skipping sector ${failure.sectorIndex} (${failure.reason}): ${failure.message}`);
    }

    if (sectorGrids.size === 0) {
      throw new DirectoryError('no-valid-sectors', directory, `No valid sector files could be loaded from ${directory}`);
    }

    const slotCount = layout.sectorsX * layout.sectorsY;
    const unplaced = [...sectorGrids.keys()].filter((index) => index >= slotCount);
    if (unplaced.length > 0) {
      logger.warn(
        `[TerrainSession] Sectors ${unplaced.join(', ')} lie outside the ${layout.sectorsX}x${layout.sectorsY} layout and will not appear in the mosaic`
      );
    }

    logger.log(`[TerrainSession] Loaded ${sectorGrids.size} sectors (${failures.length} failed)`);

    const importReport: ImportReport = {
      loaded: sectorGrids.size,
      failed: failures.length,
      failures,
      duplicates: listing.duplicates,
    };

    return new TerrainSession(directory, layout, sectorFiles, sectorGrids, importReport, dependencies);
  }

  /**
   * Loaded sector grids in file space
   */
  get sectors(): ReadonlyMap<SectorIndex, ElevationGrid> {
    return this.sectorGrids;
  }

  getMosaic(): Mosaic {
    return composeMosaic(this.sectorGrids, this.layout);
  }

  /**
   * Min/max of the current mosaic (loaded sectors plus zero patches for
   * missing slots). Recomputed on every call so it tracks written exports.
   * Differs from the min/max over loaded sectors alone whenever a slot is missing.
   */
  getElevationRange(): ElevationRange {
    return getElevationRange([this.getMosaic()]);
  }

  getSectorRanges(): Map<SectorIndex, ElevationRange> {
    const ranges = new Map<SectorIndex, ElevationRange>();
    for (const [sectorIndex, grid] of this.sectorGrids) {
      ranges.set(sectorIndex, getElevationRange([grid]));
    }
    return ranges;
  }

  /**
   * Normalized mosaic for external editing; keep image.range for export.
   */
  toDisplayImage(options: DisplayOptions = {}): NormalizedImage {
    const mosaic = this.getMosaic();
    return toDisplay((options.rotateForDisplay ?? true) ? applyDisplayRotation(mosaic) : mosaic);
  }

  /**
   * Write an edited normalized image back to the sector files.
   *
   * @throws SessionError('image-mismatch') if the image shape does not fit the layout
   */
  async exportImage(image: HeightGrid, options: TerrainExportOptions = {}): Promise<ExportReport> {
    const rotated = options.rotateForDisplay ?? true;
    const shape = getMosaicShape(this.layout);
    const expectedWidth = rotated ? shape.height : shape.width;
    const expectedHeight = rotated ? shape.width : shape.height;

    if (image.width !== expectedWidth || image.height !== expectedHeight) {
      throw new SessionError(
        'image-mismatch',
        `Image is ${image.width}x${image.height}, expected ${expectedWidth}x${expectedHeight}`
      );
    }

    const range = options.range ?? this.getElevationRange();
    const denormalized = fromDisplay(image, range.min, range.max);
    const mosaic = rotated ? removeDisplayRotation(denormalized) : denormalized;

    return this.exportMosaic(mosaic, { signal: options.signal });
  }

  /**
   * Write a file-orientation mosaic of raw elevations back to the loaded sectors.
   * Sectors that failed to import are left untouched.
   */
  async exportMosaic(mosaic: Mosaic, options: { signal?: AbortSignal } = {}): Promise<ExportReport> {
    const shape = getMosaicShape(this.layout);
    if (mosaic.width !== shape.width || mosaic.height !== shape.height) {
      throw new SessionError(
        'image-mismatch',
        `Mosaic is ${mosaic.width}x${mosaic.height}, expected ${shape.width}x${shape.height}`
      );
    }

    const grids = splitMosaic(mosaic, this.layout, this.sectorGrids.keys());
    const tasks: SectorTask<ElevationGrid>[] = [];

    for (const [sectorIndex, grid] of grids) {
      const filePath = this.sectorFiles.get(sectorIndex);
      if (filePath === undefined) continue;

      tasks.push({
        key: filePath,
        sectorIndex,
        run: async () => {
          const original = await this.fileSystem.readFile(filePath);
          const encoded = encodeSector(original, grid, this.layout.gridSize);
          await this.fileSystem.writeFile(filePath, encoded);
          // Keep memory equal to disk (rounded, clamped samples)
          return decodeSector(encoded, this.layout.gridSize);
        },
      });
    }

    const outcomes = await this.pool.run(tasks, options.signal);
    const failures: SectorFailure<ExportFailureReason>[] = [];
    let written = 0;

    for (const outcome of outcomes) {
      if (outcome.status === 'fulfilled') {
        this.sectorGrids.set(outcome.sectorIndex, outcome.value);
        written++;
        continue;
      }

      const failure: SectorFailure<ExportFailureReason> = outcome.status === 'rejected'
        ? {
          sectorIndex: outcome.sectorIndex,
          filePath: outcome.key,
          reason: classifyExportFailure(outcome.error),
          message: describeError(outcome.error),
        }
        : {
          sectorIndex: outcome.sectorIndex,
          filePath: outcome.key,
          reason: 'cancelled',
          message: 'Export cancelled before this sector was written',
        };
      failures.push(failure);
      this.logger.error(
        `[TerrainSession] Failed to write sector ${failure.sectorIndex} (${failure.reason}): ${failure.message}`,
        outcome.status === 'rejected' ? outcome.error : undefined
      );
    }

    this.logger.log(`[TerrainSession] Export complete! Written: ${written}, Failed: ${failures.length}`);

    return { written, failed: failures.length, failures };
  }

  /**
   * Cancel queued sector work (running reads/writes finish)
   */
  dispose(): void {
    this.pool.dispose();
  }
}
