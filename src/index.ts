export * from './types';
export * from './core/SectorSettings';
export * from './core/errors';
export * from './mosaic/gridTransforms';
export {
  composeMosaic,
  splitMosaic,
  getMosaicShape,
  getSectorDisplayOrigin,
  applyDisplayRotation,
  removeDisplayRotation,
} from './mosaic/MosaicAssembler';
export {
  toDisplay,
  fromDisplay,
  fromDisplayRange,
  toRgbaPixels,
  toRgba8Pixels,
  fromRgbaPixels,
} from './mosaic/Normalizer';
export {
  decodeSector,
  encodeSector,
  getElevationRegionLength,
  getSampleOffset,
  toRawElevation,
} from './sector/SectorCodec';
export {
  listSectorFiles,
  parseSectorFileName,
  getSectorFileName,
  type SectorDirectoryDependencies,
} from './sector/SectorDirectory';
export { nodeFileSystem, type SectorFileSystem } from './sector/sectorFileSystem';
export { SectorRequestQueue, type QueuedSectorRequest } from './sector/SectorRequestQueue';
export {
  SectorTaskPool,
  getDefaultConcurrency,
  type SectorTask,
  type SectorTaskOutcome,
} from './sector/SectorTaskPool';
export {
  TerrainSession,
  type TerrainImportOptions,
  type TerrainExportOptions,
  type TerrainSessionDependencies,
  type DisplayOptions,
} from './session/TerrainSession';
export {
  createElevationNoise,
  createSectorBytes,
  createSectorSet,
  type ElevationNoiseArgs,
  type SectorBytesOptions,
  type SectorSetOptions,
} from './synthetic/syntheticSectors';
