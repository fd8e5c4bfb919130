/**
 * pbo-tools - Main entry point
 *
 * Reads and writes stored (uncompressed) PBO archives.
 */

// Pack / unpack
export { createArchive, enumerateSourceFiles, toStoredName } from './pack.js';
export type { SourceFile } from './pack.js';
export { extractArchive, resolveEntryPath } from './unpack.js';
export { listArchive } from './metadata.js';

// Codec
export { PboBinary } from './pbo-binary.js';
export type { PboEntryPayload } from './pbo-binary.js';
export { encodeString, decodeString, encodeU32LE, decodeU32LE, toAscii, PboBinaryReader, PboBinaryWriter } from './utils/pbo-primitives.js';
export { progressPercent } from './utils/archive-operation.js';

// Types and errors
export type { PboEntryHeader } from './types/entry-header.js';
export type { PboArchiveStructure, PboArchiveInfo, PboHeaderProperties } from './types/pbo-archive-structure.js';
export type {
  ArchiveOperationOptions,
  CreateArchiveOptions,
  ExtractArchiveOptions,
  OperationPhase,
  PboLogger,
  ProgressReporter,
} from './types/operation.js';
export {
  PboError,
  EmptySourceError,
  NoEntriesError,
  TruncatedArchiveError,
  EntryTooLargeError,
  InvalidEntryNameError,
  UnsafeEntryPathError,
  CancelledError,
  PboIoError,
} from './types/errors.js';
export type { PboErrorKind } from './types/errors.js';
export * from './constants/pbo-format.js';
