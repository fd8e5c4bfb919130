/**
 * Binary primitives for the PBO layout: null-terminated ASCII strings and
 * little-endian u32 fields, plus a growable writer and a cursor reader built on them.
 */

const NUL = 0x00;
const ASCII_LIMIT = 0x80;

/**
 * Drops every code point outside ASCII, and embedded nulls.
 */
export function toAscii(value: string): string {
  let ascii = '';
  for (const char of value) {
    const codePoint = char.codePointAt(0) ?? NUL;
    if (codePoint !== NUL && codePoint < ASCII_LIMIT) {
      ascii += char;
    }
  }
  return ascii;
}

/**
 * Encodes a string as ASCII followed by one null byte. Lossy, never throws.
 */
export function encodeString(value: string): Buffer {
  const ascii = toAscii(value);
  const buffer = Buffer.alloc(ascii.length + 1, NUL);
  buffer.write(ascii, 0, 'ascii');
  return buffer;
}

/**
 * Reads the null-terminated string starting at `offset`.
 * Without a terminator before the end of the buffer, returns an empty string
 * and `nextOffset === buffer.length` so the caller can stop.
 */
export function decodeString(buffer: Buffer, offset: number): { value: string; nextOffset: number } {
  const end = buffer.indexOf(NUL, offset);
  if (end === -1) {
    return { value: '', nextOffset: buffer.length };
  }
  const bytes = buffer.subarray(offset, end).filter((byte) => byte < ASCII_LIMIT);
  return { value: Buffer.from(bytes).toString('ascii'), nextOffset: end + 1 };
}

export function encodeU32LE(value: number): Buffer {
  const buffer = Buffer.alloc(4);
  buffer.writeUInt32LE(value, 0);
  return buffer;
}

export function decodeU32LE(buffer: Buffer, offset: number): number {
  return buffer.readUInt32LE(offset);
}

/**
 * Append-only byte sink that grows as needed.
 */
export class PboBinaryWriter {
  private buffer: Buffer;
  private offset: number;

  constructor(initialSize = 1024) {
    this.buffer = Buffer.alloc(initialSize);
    this.offset = 0;
  }

  writeString(value: string): this {
    return this.writeBytes(encodeString(value));
  }

  writeUint32(value: number): this {
    this.ensureCapacity(4);
    this.buffer.writeUInt32LE(value, this.offset);
    this.offset += 4;
    return this;
  }

  writeBytes(bytes: Uint8Array): this {
    this.ensureCapacity(bytes.length);
    this.buffer.set(bytes, this.offset);
    this.offset += bytes.length;
    return this;
  }

  writeZeros(count: number): this {
    this.ensureCapacity(count);
    this.buffer.fill(NUL, this.offset, this.offset + count);
    this.offset += count;
    return this;
  }

  toBuffer(): Buffer {
    return Buffer.from(this.buffer.subarray(0, this.offset));
  }

  private ensureCapacity(additionalBytes: number): void {
    const requiredSize = this.offset + additionalBytes;
    if (requiredSize > this.buffer.length) {
      const newSize = Math.max(requiredSize, this.buffer.length * 2);
      const newBuffer = Buffer.alloc(newSize);
      this.buffer.copy(newBuffer, 0, 0, this.offset);
      this.buffer = newBuffer;
    }
  }
}

/**
 * Forward-only cursor over an archive buffer.
 */
export class PboBinaryReader {
  private cursor = 0;

  constructor(private readonly buffer: Buffer) {}

  get offset(): number {
    return this.cursor;
  }

  get remaining(): number {
    return Math.max(0, this.buffer.length - this.cursor);
  }

  get exhausted(): boolean {
    return this.cursor >= this.buffer.length;
  }

  readString(): string {
    const { value, nextOffset } = decodeString(this.buffer, this.cursor);
    this.cursor = nextOffset;
    return value;
  }

  readUint32(): number {
    const value = decodeU32LE(this.buffer, this.cursor);
    this.cursor += 4;
    return value;
  }

  /** True when the next bytes are exactly `ascii`; does not move the cursor. */
  startsWith(ascii: string): boolean {
    const end = this.cursor + ascii.length;
    return end <= this.buffer.length && this.buffer.toString('ascii', this.cursor, end) === ascii;
  }

  skip(count: number): void {
    this.cursor += count;
  }

  /** Returns a view of the next `count` bytes and advances past them. */
  readBytes(count: number): Buffer {
    const bytes = this.buffer.subarray(this.cursor, this.cursor + count);
    this.cursor += count;
    return bytes;
  }
}
