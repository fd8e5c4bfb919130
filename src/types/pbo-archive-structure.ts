/**
 * Parsed view of a PBO archive: preamble, header table and payload bounds.
 */
import type { PboEntryHeader } from './entry-header.js';

/** Key/value strings stored after the `sreV` marker (e.g. `prefix`). */
export type PboHeaderProperties = Readonly<Record<string, string>>;

export interface PboArchiveStructure {
  /** Text before the first null byte; empty for archives this tool writes. */
  readonly productName: string;
  /** Whether the `sreV` marker was present after the product name. */
  readonly hasVersionSignature: boolean;
  readonly properties: PboHeaderProperties;
  readonly entries: readonly PboEntryHeader[];
  /** Offset of the first payload byte (just past the terminator header). */
  readonly dataOffset: number;
}

/**
 * Summary returned by `listArchive`.
 */
export interface PboArchiveInfo extends PboArchiveStructure {
  readonly filePath: string;
  readonly totalSize: number;
  /** Sum of every entry's `dataSize`. */
  readonly payloadSize: number;
}
