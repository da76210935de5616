import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { getSectorFileName, listSectorFiles, parseSectorFileName } from './SectorDirectory';
import { DirectoryError } from '../core/errors';
import type { SectorLogger } from '../types';

function createLogger(): SectorLogger {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

async function touch(directory: string, ...names: string[]): Promise<void> {
  for (const name of names) {
    await writeFile(join(directory, name), new Uint8Array([1, 2, 3]));
  }
}

describe(parseSectorFileName.name, () => {
  it.each([
    { name: 'sd0.csdat', expected: 0 },
    { name: 'sd63.csdat', expected: 63 },
    { name: 'sd007.csdat', expected: 7 },
    { name: 'sd.csdat', expected: null },
    { name: 'sd-1.csdat', expected: null },
    { name: 'sd1a.csdat', expected: null },
    { name: 'sd1.csdat.bak', expected: null },
    { name: 'xsd1.csdat', expected: null },
    { name: 'sd1.CSDAT', expected: null },
  ])('parses $name as $expected', ({ name, expected }) => {
    expect(parseSectorFileName(name)).toBe(expected);
  });
});

describe(getSectorFileName.name, () => {
  it('formats the canonical name', () => {
    expect(getSectorFileName(42)).toBe('sd42.csdat');
  });
});

describe(listSectorFiles.name, () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'sector-directory-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('lists matching files in ascending index order', async () => {
    await touch(directory, 'sd12.csdat', 'sd0.csdat', 'sd3.csdat', 'readme.txt', 'sdx.csdat', 'sd5.csdat.bak', 'SD4.csdat');
    await mkdir(join(directory, 'sd9.csdat'));

    const listing = await listSectorFiles(directory, { logger: createLogger() });

    expect(listing.directory).toBe(directory);
    expect(listing.entries).toEqual([
      { sectorIndex: 0, fileName: 'sd0.csdat', filePath: join(directory, 'sd0.csdat') },
      { sectorIndex: 3, fileName: 'sd3.csdat', filePath: join(directory, 'sd3.csdat') },
      { sectorIndex: 12, fileName: 'sd12.csdat', filePath: join(directory, 'sd12.csdat') },
    ]);
    expect(listing.duplicates).toEqual([]);
  });

  it('keeps one file per index and reports duplicates', async () => {
    await touch(directory, 'sd007.csdat', 'sd7.csdat', 'sd010.csdat', 'sd0010.csdat', 'sd1.csdat');
    const logger = createLogger();

    const listing = await listSectorFiles(directory, { logger });

    expect(listing.entries.map((entry) => entry.fileName)).toEqual(['sd1.csdat', 'sd7.csdat', 'sd0010.csdat']);
    expect(listing.duplicates).toEqual([
      { sectorIndex: 7, kept: 'sd7.csdat', discarded: ['sd007.csdat'] },
      { sectorIndex: 10, kept: 'sd0010.csdat', discarded: ['sd010.csdat'] },
    ]);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it('throws no-matches for a directory without sector files', async () => {
    await touch(directory, 'notes.txt', 'sdabc.csdat');

    await expect(listSectorFiles(directory, { logger: createLogger() })).rejects.toMatchObject({
      name: 'DirectoryError',
      kind: 'no-matches',
      directory,
    });
  });

  it('throws no-matches for an empty directory', async () => {
    await expect(listSectorFiles(directory)).rejects.toBeInstanceOf(DirectoryError);
  });

  it('throws unreadable when the directory cannot be listed', async () => {
    const missing = join(directory, 'missing');

    await expect(listSectorFiles(missing)).rejects.toMatchObject({ kind: 'unreadable', directory: missing });
  });

  it('uses the injected file system', async () => {
    const listFiles = vi.fn(async () => ['sd2.csdat', 'sd1.csdat']);

    const listing = await listSectorFiles('/virtual', {
      fileSystem: { listFiles, readFile: vi.fn(), writeFile: vi.fn() },
    });

    expect(listFiles).toHaveBeenCalledWith('/virtual');
    expect(listing.entries.map((entry) => entry.sectorIndex)).toEqual([1, 2]);
  });
});
