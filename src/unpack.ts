/**
 * Unpack orchestrator - restores the file tree stored in a PBO archive.
 */

import { mkdir, utimes, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'node:path';
import { PboBinary } from './pbo-binary.js';
import type { ExtractArchiveOptions, PboLogger } from './types/operation.js';
import { PboIoError, UnsafeEntryPathError } from './types/errors.js';
import { ArchiveOperation } from './utils/archive-operation.js';

/**
 * Maps a stored name onto a path under `destDir`, translating `\` (and `/`)
 * to the host separator.
 *
 * @throws {UnsafeEntryPathError} If the name is empty or resolves outside `destDir`
 */
export function resolveEntryPath(destDir: string, name: string): string {
  const segments = name.split(/[\\/]/).filter((segment) => segment.length > 0);
  const target = resolve(destDir, ...segments);
  const fromDest = relative(destDir, target);
  if (fromDest.length === 0 || fromDest === '..' || fromDest.startsWith(`..${sep}`) || isAbsolute(fromDest)) {
    throw new UnsafeEntryPathError(name);
  }
  return target;
}

/**
 * Ensure the output directory exists, creating it if necessary.
 */
async function ensureOutputDirectory(outputDir: string): Promise<void> {
  try {
    await mkdir(outputDir, { recursive: true });
  } catch (error) {
    throw new PboIoError(
      `Failed to create output directory "${outputDir}": ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
}

/**
 * Sets atime and mtime to `timestamp`. Failure is logged and ignored.
 */
async function restoreTimestamp(filePath: string, timestamp: number, logger: PboLogger): Promise<void> {
  try {
    await utimes(filePath, timestamp, timestamp);
  } catch (error) {
    logger.warn(`⚠️  Could not restore timestamp of ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Extracts every entry of `archiveFile` into `destDir`.
 *
 * The archive is read fully into memory. Entries are written in header order;
 * existing files are overwritten. An entry whose declared size exceeds the
 * remaining bytes fails the run before its file is created, leaving the
 * entries before it in place.
 *
 * @param archiveFile - Archive to read
 * @param destDir - Destination directory, created with its parents if absent
 * @returns Number of files extracted
 * @throws {NoEntriesError} If the archive has no entries
 * @throws {TruncatedArchiveError} If an entry's payload is cut short
 * @throws {UnsafeEntryPathError} If an entry would land outside `destDir`
 * @throws {PboIoError} On any filesystem failure
 */
export async function extractArchive(archiveFile: string, destDir: string, options: ExtractArchiveOptions = {}): Promise<number> {
  const operation = new ArchiveOperation('Extract', options);
  const { logger } = operation;

  const resolvedArchiveFile = resolve(archiveFile);
  const resolvedDestDir = resolve(destDir);

  return operation.run(async () => {
    logger.log(`Extracting archive: ${resolvedArchiveFile}`);
    operation.enter('scanning');

    const { buffer, structure } = await PboBinary.read({ archiveFile: resolvedArchiveFile });
    const total = structure.entries.length;
    logger.log(`Archive contains ${total} entries`);

    await ensureOutputDirectory(resolvedDestDir);

    operation.enter('writing');
    for (const { entry, index, data } of PboBinary.payloads({ buffer, structure })) {
      operation.throwIfCancelled();
      const targetPath = resolveEntryPath(resolvedDestDir, entry.name);
      await mkdir(dirname(targetPath), { recursive: true });
      await writeFile(targetPath, data);
      await restoreTimestamp(targetPath, entry.timestamp, logger);
      operation.report('Extracting', entry.name, index, total);
    }

    operation.enter('finalizing');
    logger.log(`Extracted ${total} files to: ${resolvedDestDir}`);
    return total;
  });
}
