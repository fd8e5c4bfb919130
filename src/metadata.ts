/**
 * Archive inspection: reads the header table without extracting anything.
 */

import { resolve } from 'node:path';
import { PboBinary } from './pbo-binary.js';
import type { PboArchiveInfo } from './types/pbo-archive-structure.js';

/**
 * Load an archive and describe its preamble and entries.
 *
 * @param archiveFile - Path to the .pbo file
 * @returns Header properties, entries in stored order and payload bounds
 * @throws {NoEntriesError} If the archive has no entries
 * @throws {TruncatedArchiveError} If the declared sizes exceed the bytes after the header table
 */
export async function listArchive(archiveFile: string): Promise<PboArchiveInfo> {
  const filePath = resolve(archiveFile);
  const { buffer, structure } = await PboBinary.read({ archiveFile: filePath });

  // Walking the payloads runs the same per-entry bounds check as extraction.
  let payloadSize = 0;
  for (const { data } of PboBinary.payloads({ buffer, structure })) {
    payloadSize += data.length;
  }

  return {
    ...structure,
    filePath,
    totalSize: buffer.length,
    payloadSize,
  };
}
