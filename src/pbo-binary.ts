/**
 * PBO binary codec: preamble, header table, payload slicing and checksum placeholder.
 */
import { readFile } from 'node:fs/promises';
import type { PboEntryHeader } from './types/entry-header.js';
import type { PboArchiveStructure, PboHeaderProperties } from './types/pbo-archive-structure.js';
import { NoEntriesError, PboIoError, TruncatedArchiveError } from './types/errors.js';
import { PboBinaryReader, PboBinaryWriter } from './utils/pbo-primitives.js';
import {
  CHECKSUM_PLACEHOLDER_LENGTH,
  ENTRY_FIELDS_LENGTH,
  RESERVED_LENGTH,
  VERSION_SIGNATURE,
} from './constants/pbo-format.js';

/**
 * An entry paired with its slice of the payload region.
 */
export interface PboEntryPayload {
  readonly entry: PboEntryHeader;
  readonly index: number;
  readonly data: Buffer;
}

/**
 * Writes the preamble. Header properties follow the reserved bytes as
 * key/value strings closed by an empty key; with none, the closing null makes
 * the preamble the 22 bytes `00 "sreV" 00 00*16`.
 */
function writePreamble(writer: PboBinaryWriter, properties: PboHeaderProperties): void {
  writer.writeString('');
  writer.writeBytes(Buffer.from(VERSION_SIGNATURE, 'ascii'));
  writer.writeZeros(RESERVED_LENGTH);
  for (const [key, value] of Object.entries(properties)) {
    if (key.length === 0) continue;
    writer.writeString(key).writeString(value);
  }
  writer.writeString('');
}

function writeEntryHeader(writer: PboBinaryWriter, entry: PboEntryHeader): void {
  writer
    .writeString(entry.name)
    .writeUint32(entry.packingMethod)
    .writeUint32(entry.originalSize)
    .writeUint32(entry.reserved)
    .writeUint32(entry.timestamp)
    .writeUint32(entry.dataSize);
}

function readProperties(reader: PboBinaryReader): Record<string, string> {
  const properties: Record<string, string> = {};
  while (!reader.exhausted) {
    const key = reader.readString();
    if (key.length === 0) break;
    properties[key] = reader.readString();
  }
  return properties;
}

/** True when the table holds entries whose payloads all lie within the buffer. */
function fitsBuffer(buffer: Buffer, entries: readonly PboEntryHeader[], dataOffset: number): boolean {
  const payloadSize = entries.reduce((total, entry) => total + entry.dataSize, 0);
  return entries.length > 0 && dataOffset + payloadSize <= buffer.length;
}

/**
 * Decodes entry headers until the terminator. A name scan that runs off the end
 * of the buffer reads as the terminator; a named header without room for its
 * five fields ends the table and is dropped.
 */
function readEntryHeaders(reader: PboBinaryReader): PboEntryHeader[] {
  const entries: PboEntryHeader[] = [];
  while (!reader.exhausted) {
    const name = reader.readString();
    if (name.length === 0) {
      reader.skip(ENTRY_FIELDS_LENGTH);
      break;
    }
    if (reader.remaining < ENTRY_FIELDS_LENGTH) {
      break;
    }
    entries.push({
      name,
      packingMethod: reader.readUint32(),
      originalSize: reader.readUint32(),
      reserved: reader.readUint32(),
      timestamp: reader.readUint32(),
      dataSize: reader.readUint32(),
    });
  }
  return entries;
}

/**
 * Low-level operations for building and parsing PBO archives.
 */
export class PboBinary {
  /**
   * Encodes everything that precedes the payload: preamble, one header per
   * entry in order, and the terminator header.
   */
  static encodeHeaderTable({
    entries,
    properties = {},
  }: {
    readonly entries: readonly PboEntryHeader[];
    readonly properties?: PboHeaderProperties;
  }): Buffer {
    const writer = new PboBinaryWriter();
    writePreamble(writer, properties);
    for (const entry of entries) {
      writeEntryHeader(writer, entry);
    }
    writeEntryHeader(writer, {
      name: '',
      packingMethod: 0,
      originalSize: 0,
      reserved: 0,
      timestamp: 0,
      dataSize: 0,
    });
    return writer.toBuffer();
  }

  /** The 21 zero bytes closing every archive. Never verified on read. */
  static checksumPlaceholder(): Buffer {
    return Buffer.alloc(CHECKSUM_PLACEHOLDER_LENGTH, 0);
  }

  /**
   * Parses the preamble and header table.
   *
   * @param archiveFile - Used in error messages only
   * @throws {NoEntriesError} If the header table holds no entries
   */
  static parse({ buffer, archiveFile }: { readonly buffer: Buffer; readonly archiveFile: string }): PboArchiveStructure {
    const reader = new PboBinaryReader(buffer);

    const productName = reader.readString();
    const hasVersionSignature = reader.startsWith(VERSION_SIGNATURE);
    let properties: Record<string, string> = {};
    let reservedEnd = reader.offset;
    if (hasVersionSignature) {
      reader.skip(VERSION_SIGNATURE.length + RESERVED_LENGTH);
      reservedEnd = reader.offset;
      properties = readProperties(reader);
    }

    let entries = readEntryHeaders(reader);
    let dataOffset = reader.offset;

    // Properties start where a fixed 17-byte reserved region would have its
    // last byte. When they leave a table the buffer cannot hold, read that
    // byte as reserved instead.
    if (Object.keys(properties).length > 0 && !fitsBuffer(buffer, entries, dataOffset)) {
      const fixed = new PboBinaryReader(buffer);
      fixed.skip(reservedEnd + 1);
      const fixedEntries = readEntryHeaders(fixed);
      if (fitsBuffer(buffer, fixedEntries, fixed.offset)) {
        properties = {};
        entries = fixedEntries;
        dataOffset = fixed.offset;
      }
    }

    if (entries.length === 0) {
      throw new NoEntriesError(archiveFile);
    }

    return { productName, hasVersionSignature, properties, entries, dataOffset };
  }

  /**
   * Reads an archive fully into memory and parses its header table.
   *
   * @throws {PboIoError} If the file cannot be read
   * @throws {NoEntriesError} If the header table holds no entries
   */
  static async read({ archiveFile }: { readonly archiveFile: string }): Promise<{ buffer: Buffer; structure: PboArchiveStructure }> {
    let buffer: Buffer;
    try {
      buffer = await readFile(archiveFile);
    } catch (error) {
      throw new PboIoError(
        `Failed to read archive "${archiveFile}": ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
    return { buffer, structure: PboBinary.parse({ buffer, archiveFile }) };
  }

  /**
   * Yields each entry with its payload bytes, accumulating offsets from
   * `dataOffset` in header order. The bounds check for an entry happens when it
   * is reached, so earlier entries are yielded before a truncation is reported.
   *
   * @throws {TruncatedArchiveError} When an entry declares more bytes than remain
   */
  static *payloads({ buffer, structure }: { readonly buffer: Buffer; readonly structure: PboArchiveStructure }): Generator<PboEntryPayload> {
    const reader = new PboBinaryReader(buffer);
    reader.skip(structure.dataOffset);

    for (let index = 0; index < structure.entries.length; index++) {
      const entry = structure.entries[index];
      if (entry.dataSize > reader.remaining) {
        throw new TruncatedArchiveError(entry.name, entry.dataSize, reader.remaining);
      }
      yield { entry, index, data: reader.readBytes(entry.dataSize) };
    }
  }
}
