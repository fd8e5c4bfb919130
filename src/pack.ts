/**
 * Pack orchestrator - bundles a directory tree into a stored PBO archive.
 */

import { mkdir, open, readdir, readFile, stat } from 'node:fs/promises';
import { dirname, join, relative, resolve, sep } from 'node:path';
import { PboBinary } from './pbo-binary.js';
import type { PboEntryHeader } from './types/entry-header.js';
import type { CreateArchiveOptions } from './types/operation.js';
import { EmptySourceError, EntryTooLargeError, InvalidEntryNameError, PboIoError } from './types/errors.js';
import { ArchiveOperation } from './utils/archive-operation.js';
import { toAscii } from './utils/pbo-primitives.js';
import { MAX_U32, PACKING_METHOD_STORED, PBO_PATH_SEPARATOR } from './constants/pbo-format.js';

/**
 * A regular file found under the source directory.
 */
export interface SourceFile {
  readonly absolutePath: string;
  /** Path relative to the source root, `\`-separated, ASCII only. */
  readonly name: string;
}

/**
 * Converts a host-relative path to the stored form.
 */
export function toStoredName(relativePath: string): string {
  return relativePath.split(sep).join(PBO_PATH_SEPARATOR);
}

function compareNames(a: SourceFile, b: SourceFile): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Recursively lists every regular file under `sourceDir`, sorted by stored name.
 * Symbolic links and other special files are skipped.
 *
 * @param exclude - Absolute paths to leave out (the archive being written)
 * @throws {InvalidEntryNameError} If a file or directory name contains `\`
 */
export async function enumerateSourceFiles(sourceDir: string, exclude: ReadonlySet<string> = new Set()): Promise<SourceFile[]> {
  const root = resolve(sourceDir);
  const files: SourceFile[] = [];

  const walk = async (directory: string): Promise<void> => {
    const entries = await readdir(directory, { withFileTypes: true });
    for (const entry of entries) {
      const absolutePath = join(directory, entry.name);
      if (entry.isDirectory()) {
        await walk(absolutePath);
      } else if (entry.isFile() && !exclude.has(absolutePath)) {
        const relativePath = relative(root, absolutePath);
        if (relativePath.split(sep).some((segment) => segment.includes(PBO_PATH_SEPARATOR))) {
          throw new InvalidEntryNameError(relativePath, toStoredName(relativePath), 'a path segment contains a backslash');
        }
        files.push({ absolutePath, name: toStoredName(relativePath) });
      }
    }
  };

  await walk(root);
  return files.sort(compareNames);
}

/**
 * Builds the header for one file from its size and mtime.
 *
 * @throws {EntryTooLargeError} If the size does not fit a u32
 */
async function describeSourceFile(file: SourceFile): Promise<PboEntryHeader> {
  const stats = await stat(file.absolutePath);
  if (stats.size > MAX_U32) {
    throw new EntryTooLargeError(file.name, stats.size);
  }
  const timestamp = Math.min(MAX_U32, Math.max(0, Math.floor(stats.mtimeMs / 1000)));
  return {
    name: toAscii(file.name),
    packingMethod: PACKING_METHOD_STORED,
    originalSize: stats.size,
    reserved: 0,
    timestamp,
    dataSize: stats.size,
  };
}

/**
 * Rejects a stored name that would read back as the terminator, land on a
 * directory, or overwrite another entry on extraction.
 *
 * @param seen - Stored names already claimed, mapped to their source names
 * @throws {InvalidEntryNameError}
 */
function claimEntryName(file: SourceFile, entryName: string, seen: Map<string, string>): void {
  if (entryName.length === 0) {
    throw new InvalidEntryNameError(file.name, entryName, 'no ASCII characters remain');
  }
  if (entryName.split(PBO_PATH_SEPARATOR).some((segment) => segment.length === 0)) {
    throw new InvalidEntryNameError(file.name, entryName, 'a path segment has no ASCII characters left');
  }
  const claimedBy = seen.get(entryName);
  if (claimedBy !== undefined) {
    throw new InvalidEntryNameError(file.name, entryName, `already the stored name of ${JSON.stringify(claimedBy)}`);
  }
  seen.set(entryName, file.name);
}

/**
 * Packs every regular file under `sourceDir` into `outputFile`.
 *
 * The output is written in one pass: preamble, headers, terminator, payloads
 * in header order, then the checksum placeholder. A failure part-way leaves
 * the partial file on disk; write to a temporary path and rename it to get an
 * all-or-nothing result.
 *
 * @param sourceDir - Directory to pack
 * @param outputFile - Archive path; parent directories are created
 * @returns Number of files packed
 * @throws {EmptySourceError} If no regular files exist under the source
 * @throws {InvalidEntryNameError} If two files share a stored name or one has none
 * @throws {PboIoError} On any filesystem failure
 */
export async function createArchive(sourceDir: string, outputFile: string, options: CreateArchiveOptions = {}): Promise<number> {
  const operation = new ArchiveOperation('Pack', options);
  const { logger } = operation;

  const resolvedSourceDir = resolve(sourceDir);
  const resolvedOutputFile = resolve(outputFile);

  return operation.run(async () => {
    logger.log(`Packing directory: ${resolvedSourceDir}`);
    operation.enter('scanning');

    const files = await enumerateSourceFiles(resolvedSourceDir, new Set([resolvedOutputFile]));
    if (files.length === 0) {
      throw new EmptySourceError(resolvedSourceDir);
    }

    const entries: PboEntryHeader[] = [];
    const claimedNames = new Map<string, string>();
    for (const file of files) {
      const entry = await describeSourceFile(file);
      claimEntryName(file, entry.name, claimedNames);
      if (entry.name !== file.name) {
        logger.warn(`⚠️  Non-ASCII characters dropped from entry name: ${file.name} -> ${entry.name}`);
      }
      entries.push(entry);
    }
    logger.log(`Found ${files.length} files to pack`);

    await mkdir(dirname(resolvedOutputFile), { recursive: true });
    const handle = await open(resolvedOutputFile, 'w');
    try {
      operation.enter('writing');
      await handle.write(PboBinary.encodeHeaderTable({ entries, properties: options.properties }));

      for (let index = 0; index < files.length; index++) {
        operation.throwIfCancelled();
        const entry = entries[index];
        const data = await readFile(files[index].absolutePath);
        if (data.length !== entry.dataSize) {
          throw new PboIoError(`File ${entry.name} changed size while packing: expected ${entry.dataSize} bytes, read ${data.length}`);
        }
        await handle.write(data);
        operation.report('Packing', entry.name, index, files.length);
      }

      operation.enter('finalizing');
      await handle.write(PboBinary.checksumPlaceholder());
    } finally {
      await handle.close();
    }

    logger.log(`Archive written to: ${resolvedOutputFile} (${files.length} files)`);
    return files.length;
  });
}
