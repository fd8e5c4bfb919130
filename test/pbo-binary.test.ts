import { describe, it, expect } from 'vitest';
import { PboBinary } from '../src/pbo-binary.js';
import { NoEntriesError, TruncatedArchiveError } from '../src/types/errors.js';
import type { PboEntryHeader } from '../src/types/entry-header.js';
import { CHECKSUM, PREAMBLE, TERMINATOR, cstr, header } from './fixtures.js';

function captureError(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  return undefined;
}

function entry(name: string, dataSize: number, timestamp: number): PboEntryHeader {
  return { name, packingMethod: 0, originalSize: dataSize, reserved: 0, timestamp, dataSize };
}

describe('PboBinary', () => {
  describe('encodeHeaderTable', () => {
    it('writes preamble, headers and terminator byte for byte', () => {
      const table = PboBinary.encodeHeaderTable({
        entries: [entry('a\\c.txt', 1, 1_600_000_000), entry('b.txt', 2, 1_600_000_100)],
      });

      expect(table).toEqual(
        Buffer.concat([PREAMBLE, header('a\\c.txt', 1, 1_600_000_000), header('b.txt', 2, 1_600_000_100), TERMINATOR])
      );
      expect(table.length).toBe(22 + 28 + 26 + 21);
    });

    it('starts with the fixed 22-byte preamble', () => {
      const table = PboBinary.encodeHeaderTable({ entries: [entry('x', 0, 0)] });
      expect([...table.subarray(0, 6)]).toEqual([0x00, 0x73, 0x72, 0x65, 0x56, 0x00]);
      expect(table.subarray(6, 22).every((byte) => byte === 0)).toBe(true);
    });

    it('writes header properties between the reserved bytes and the entries', () => {
      const table = PboBinary.encodeHeaderTable({
        entries: [entry('x', 0, 0)],
        properties: { prefix: 'my_addon' },
      });

      expect(table).toEqual(
        Buffer.concat([
          Buffer.from([0x00]),
          Buffer.from('sreV', 'ascii'),
          Buffer.alloc(16, 0),
          cstr('prefix'),
          cstr('my_addon'),
          Buffer.from([0x00]),
          header('x', 0, 0),
          TERMINATOR,
        ])
      );
    });

    it('produces a 21-byte zero checksum placeholder', () => {
      expect(PboBinary.checksumPlaceholder()).toEqual(Buffer.alloc(21, 0));
    });
  });

  describe('parse', () => {
    it('reads back the entries it wrote', () => {
      const entries = [entry('data\\config.cpp', 12, 1_700_000_000), entry('readme.txt', 0, 42)];
      const table = PboBinary.encodeHeaderTable({ entries });

      const structure = PboBinary.parse({ buffer: Buffer.concat([table, CHECKSUM]), archiveFile: 'test.pbo' });

      expect(structure.entries).toEqual(entries);
      expect(structure.productName).toBe('');
      expect(structure.hasVersionSignature).toBe(true);
      expect(structure.properties).toEqual({});
      expect(structure.dataOffset).toBe(table.length);
    });

    it('reads header properties', () => {
      const table = PboBinary.encodeHeaderTable({
        entries: [entry('x', 0, 0)],
        properties: { prefix: 'my_addon', version: '3' },
      });

      const structure = PboBinary.parse({ buffer: table, archiveFile: 'test.pbo' });

      expect(structure.properties).toEqual({ prefix: 'my_addon', version: '3' });
      expect(structure.entries.map((e) => e.name)).toEqual(['x']);
      expect(structure.dataOffset).toBe(table.length);
    });

    it('reads a non-zero last reserved byte as reserved when properties would not fit', () => {
      const buffer = Buffer.concat([
        Buffer.from([0x00]),
        Buffer.from('sreV', 'ascii'),
        Buffer.alloc(16, 0),
        Buffer.from([0x01]),
        header('a.txt', 5, 0),
        TERMINATOR,
        Buffer.from('hello', 'ascii'),
        CHECKSUM,
      ]);

      const structure = PboBinary.parse({ buffer, archiveFile: 'test.pbo' });

      expect(structure.properties).toEqual({});
      expect(structure.entries).toEqual([entry('a.txt', 5, 0)]);
      expect(structure.dataOffset).toBe(69);
    });

    it('skips a non-empty product name', () => {
      const buffer = Buffer.concat([
        cstr('SomeProduct'),
        Buffer.from('sreV', 'ascii'),
        Buffer.alloc(17, 0),
        header('a.txt', 3, 5),
        TERMINATOR,
      ]);

      const structure = PboBinary.parse({ buffer, archiveFile: 'test.pbo' });

      expect(structure.productName).toBe('SomeProduct');
      expect(structure.entries).toEqual([entry('a.txt', 3, 5)]);
    });

    it('reads entries directly after the product name when the signature is absent', () => {
      const buffer = Buffer.concat([Buffer.from([0x00]), header('a.txt', 3, 5), TERMINATOR]);

      const structure = PboBinary.parse({ buffer, archiveFile: 'test.pbo' });

      expect(structure.hasVersionSignature).toBe(false);
      expect(structure.entries).toEqual([entry('a.txt', 3, 5)]);
      expect(structure.dataOffset).toBe(buffer.length);
    });

    it('accepts packing methods other than stored', () => {
      const buffer = Buffer.concat([PREAMBLE, header('a.bin', 4, 9, 0x43707273), TERMINATOR]);

      const structure = PboBinary.parse({ buffer, archiveFile: 'test.pbo' });

      expect(structure.entries[0].packingMethod).toBe(0x43707273);
      expect(structure.entries[0].dataSize).toBe(4);
    });

    it('rejects a header table with only the terminator', () => {
      const buffer = Buffer.concat([PREAMBLE, TERMINATOR, CHECKSUM]);

      expect(() => PboBinary.parse({ buffer, archiveFile: 'empty.pbo' })).toThrow(NoEntriesError);
    });

    it('rejects an empty buffer', () => {
      const error = captureError(() => PboBinary.parse({ buffer: Buffer.alloc(0), archiveFile: 'empty.pbo' }));

      expect(error).toBeInstanceOf(NoEntriesError);
      expect(error).toMatchObject({ kind: 'NoEntries', archiveFile: 'empty.pbo' });
    });

    it('drops a header cut off before its numeric fields', () => {
      const buffer = Buffer.concat([PREAMBLE, cstr('a.txt'), Buffer.alloc(8, 0)]);

      expect(() => PboBinary.parse({ buffer, archiveFile: 'cut.pbo' })).toThrow(NoEntriesError);
    });
  });

  describe('payloads', () => {
    it('slices consecutive payloads in header order', () => {
      const buffer = Buffer.concat([
        PREAMBLE,
        header('a', 2, 0),
        header('b', 3, 0),
        TERMINATOR,
        Buffer.from('xxyyy', 'ascii'),
        CHECKSUM,
      ]);
      const structure = PboBinary.parse({ buffer, archiveFile: 'test.pbo' });

      const payloads = [...PboBinary.payloads({ buffer, structure })];

      expect(payloads.map((p) => [p.index, p.entry.name, p.data.toString('ascii')])).toEqual([
        [0, 'a', 'xx'],
        [1, 'b', 'yyy'],
      ]);
    });

    it('reports the entry whose declared size exceeds the remaining bytes', () => {
      const buffer = Buffer.concat([
        PREAMBLE,
        header('one.txt', 3, 0),
        header('two.txt', 10, 0),
        TERMINATOR,
        Buffer.from('abcxyz', 'ascii'),
      ]);
      const structure = PboBinary.parse({ buffer, archiveFile: 'test.pbo' });
      const yielded: string[] = [];

      const error = captureError(() => {
        for (const { entry } of PboBinary.payloads({ buffer, structure })) {
          yielded.push(entry.name);
        }
      });

      expect(error).toBeInstanceOf(TruncatedArchiveError);
      expect(error).toMatchObject({
        kind: 'TruncatedArchive',
        entryName: 'two.txt',
        declaredSize: 10,
        availableSize: 3,
      });
      expect(yielded).toEqual(['one.txt']);
    });
  });
});
