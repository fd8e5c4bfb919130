import { vi, type Mock } from 'vitest';
import type { PboLogger } from '../src/types/operation.js';

/** The 22 bytes every archive written by this tool starts with. */
export const PREAMBLE = Buffer.concat([
  Buffer.from([0x00]),
  Buffer.from('sreV', 'ascii'),
  Buffer.alloc(17, 0),
]);

export const TERMINATOR = Buffer.alloc(21, 0);

export const CHECKSUM = Buffer.alloc(21, 0);

export function cstr(value: string): Buffer {
  return Buffer.concat([Buffer.from(value, 'ascii'), Buffer.from([0x00])]);
}

export function u32(value: number): Buffer {
  const buffer = Buffer.alloc(4);
  buffer.writeUInt32LE(value, 0);
  return buffer;
}

/** Hand-encoded stored entry header. */
export function header(name: string, size: number, timestamp: number, packingMethod = 0): Buffer {
  return Buffer.concat([cstr(name), u32(packingMethod), u32(size), u32(0), u32(timestamp), u32(size)]);
}

export function silentLogger(): PboLogger & { log: Mock; warn: Mock; error: Mock } {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}
