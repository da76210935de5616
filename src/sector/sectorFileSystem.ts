import { readdir, readFile, writeFile } from 'node:fs/promises';

/**
 * File access used by directory scans and sector reads/writes.
 * Swappable for tests that need to fail specific operations.
 */
export interface SectorFileSystem {
  /** Names of regular files (and symlinks) directly inside directory */
  listFiles: (directory: string) => Promise<string[]>;
  readFile: (filePath: string) => Promise<Uint8Array>;
  writeFile: (filePath: string, data: Uint8Array) => Promise<void>;
}

export const nodeFileSystem: SectorFileSystem = {
  listFiles: async (directory) => {
    const entries = await readdir(directory, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() || entry.isSymbolicLink())
      .map((entry) => entry.name);
  },
  readFile: (filePath) => readFile(filePath),
  writeFile: (filePath, data) => writeFile(filePath, data),
};
