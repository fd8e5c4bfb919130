/**
 * Per-file record of the PBO header table.
 */
export interface PboEntryHeader {
  /** Relative path with `\` separators. Empty only for the terminator. */
  readonly name: string;
  /** 0 for stored entries. Other values are carried through untouched. */
  readonly packingMethod: number;
  readonly originalSize: number;
  readonly reserved: number;
  /** Modification time in whole POSIX seconds. */
  readonly timestamp: number;
  /** Number of payload bytes belonging to this entry. */
  readonly dataSize: number;
}
