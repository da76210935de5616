/**
 * Discovery of sd<index>.csdat sector files in a directory
 */

import { join } from 'node:path';
import { DirectoryError, describeError } from '../core/errors';
import { SECTOR_FILE_EXTENSION, SECTOR_FILE_PREFIX } from '../core/SectorSettings';
import type {
  DuplicateSector,
  SectorDirectoryListing,
  SectorFileEntry,
  SectorIndex,
  SectorLogger,
} from '../types';
import { nodeFileSystem, type SectorFileSystem } from './sectorFileSystem';

const SECTOR_FILE_PATTERN = new RegExp(
  `^${SECTOR_FILE_PREFIX}(\\d+)${SECTOR_FILE_EXTENSION.replace('.', '\\.')}$`
);

/**
 * Dependencies for listSectorFiles (for testability)
 */
export interface SectorDirectoryDependencies {
  fileSystem: SectorFileSystem;
  logger: SectorLogger;
}

const defaultDependencies: SectorDirectoryDependencies = {
  fileSystem: nodeFileSystem,
  logger: console,
};

/**
 * Parse the sector index out of a file name.
 *
 * @returns The index, or null when the name is not sd<digits>.csdat
 */
export function parseSectorFileName(fileName: string): SectorIndex | null {
  const match = SECTOR_FILE_PATTERN.exec(fileName);
  if (!match) {
    return null;
  }
  const index = Number.parseInt(match[1], 10);
  return Number.isSafeInteger(index) ? index : null;
}

export function getSectorFileName(sectorIndex: SectorIndex): string {
  return `${SECTOR_FILE_PREFIX}${sectorIndex}${SECTOR_FILE_EXTENSION}`;
}

/**
 * Choose which of several same-index files to keep:
 * the canonical name if present, otherwise the lexicographically first.
 */
function pickCanonical(sectorIndex: SectorIndex, fileNames: string[]): string {
  const canonical = getSectorFileName(sectorIndex);
  return fileNames.includes(canonical) ? canonical : fileNames[0];
}

/**
 * List sector files in ascending index order.
 *
 * @throws DirectoryError('unreadable') if the directory cannot be read
 * @throws DirectoryError('no-matches') if no sector file is present
 */
export async function listSectorFiles(
  directory: string,
  dependencyOverrides?: Partial<SectorDirectoryDependencies>
): Promise<SectorDirectoryListing> {
  const { fileSystem, logger } = { ...defaultDependencies, ...dependencyOverrides };

  let fileNames: string[];
  try {
    fileNames = await fileSystem.listFiles(directory);
  } catch (error) {
    throw new DirectoryError(
      'unreadable',
      directory,
      `Cannot read sector directory ${directory}: ${describeError(error)}`,
      { cause: error }
    );
  }

  const byIndex = new Map<SectorIndex, string[]>();
  for (const fileName of [...fileNames].sort()) {
    const sectorIndex = parseSectorFileName(fileName);
    if (sectorIndex === null) continue;

    const names = byIndex.get(sectorIndex);
    if (names) {
      names.push(fileName);
    } else {
      byIndex.set(sectorIndex, [fileName]);
    }
  }

  if (byIndex.size === 0) {
    throw new DirectoryError(
      'no-matches',
      directory,
      `No ${SECTOR_FILE_PREFIX}*${SECTOR_FILE_EXTENSION} files found in ${directory}`
    );
  }

  const entries: SectorFileEntry[] = [];
  const duplicates: DuplicateSector[] = [];

  const indices = [...byIndex.keys()].sort((a, b) => a - b);
  for (const sectorIndex of indices) {
    const names = byIndex.get(sectorIndex) ?? [];
    const kept = pickCanonical(sectorIndex, names);

    if (names.length > 1) {
      const discarded = names.filter((name) => name !== kept);
      duplicates.push({ sectorIndex, kept, discarded });
      logger.warn(
        `[SectorDirectory] Sector ${sectorIndex} has ${names.length} files; using ${kept}, ignoring ${discarded.join(', ')}`
      );
    }

    entries.push({ sectorIndex, fileName: kept, filePath: join(directory, kept) });
  }

  return { directory, entries, duplicates };
}
