/**
 * Error types raised by archive operations.
 */

/** Programmatic failure kinds; the message is for humans only. */
export type PboErrorKind =
  | 'EmptySource'
  | 'NoEntries'
  | 'TruncatedArchive'
  | 'EntryTooLarge'
  | 'InvalidEntryName'
  | 'UnsafeEntryPath'
  | 'Cancelled'
  | 'IOError';

/**
 * Base class for every failure surfaced by `createArchive`, `extractArchive` and `listArchive`.
 */
export class PboError extends Error {
  constructor(public readonly kind: PboErrorKind, message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'PboError';
  }
}

/** Pack: no regular files under the source directory. */
export class EmptySourceError extends PboError {
  constructor(public readonly sourceDir: string) {
    super('EmptySource', `No files to pack in directory: ${sourceDir}`);
    this.name = 'EmptySourceError';
  }
}

/** Unpack: the header table holds no entries. */
export class NoEntriesError extends PboError {
  constructor(public readonly archiveFile: string) {
    super('NoEntries', `No entries found in archive: ${archiveFile}`);
    this.name = 'NoEntriesError';
  }
}

/** Unpack: an entry declares more bytes than remain in the archive. */
export class TruncatedArchiveError extends PboError {
  constructor(
    public readonly entryName: string,
    public readonly declaredSize: number,
    public readonly availableSize: number
  ) {
    super(
      'TruncatedArchive',
      `Insufficient data for entry ${entryName}: declared ${declaredSize} bytes, ${availableSize} available`
    );
    this.name = 'TruncatedArchiveError';
  }
}

/** Pack: a file is too large for a u32 size field. */
export class EntryTooLargeError extends PboError {
  constructor(public readonly entryName: string, public readonly size: number) {
    super('EntryTooLarge', `File ${entryName} is ${size} bytes; entries are limited to 4294967295 bytes`);
    this.name = 'EntryTooLargeError';
  }
}

/**
 * Pack: a source path has no distinct stored name. Either its ASCII form is
 * empty, has an empty segment or matches another file's, or a name in it holds
 * a literal `\` that extraction would read as a separator.
 */
export class InvalidEntryNameError extends PboError {
  constructor(public readonly sourcePath: string, public readonly entryName: string, reason: string) {
    super('InvalidEntryName', `Cannot store ${JSON.stringify(sourcePath)} as ${JSON.stringify(entryName)}: ${reason}`);
    this.name = 'InvalidEntryNameError';
  }
}

/** Unpack: an entry name would be written outside the destination directory. */
export class UnsafeEntryPathError extends PboError {
  constructor(public readonly entryName: string) {
    super('UnsafeEntryPath', `Refusing to extract entry outside the destination: ${JSON.stringify(entryName)}`);
    this.name = 'UnsafeEntryPathError';
  }
}

export class CancelledError extends PboError {
  constructor(operation: string) {
    super('Cancelled', `${operation} cancelled`);
    this.name = 'CancelledError';
  }
}

/** Wraps a filesystem failure; the original error is kept as `cause`. */
export class PboIoError extends PboError {
  constructor(message: string, cause?: unknown) {
    super('IOError', message, cause);
    this.name = 'PboIoError';
  }
}
