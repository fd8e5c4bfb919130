/**
 * Fixed values of the stored PBO layout.
 */

/** Four-byte marker following the empty product name: "Vers" read as a little-endian u32. */
export const VERSION_SIGNATURE = 'sreV';

/** Reserved bytes after the signature; zero on write. */
export const RESERVED_LENGTH = 16;

/** Five u32 fields follow every entry name. */
export const ENTRY_FIELDS_LENGTH = 20;

/** Zero-filled checksum placeholder appended after the payload. */
export const CHECKSUM_PLACEHOLDER_LENGTH = 21;

/** Packing method 0: bytes are copied verbatim. */
export const PACKING_METHOD_STORED = 0;

/** Separator used for stored entry names on every host. */
export const PBO_PATH_SEPARATOR = '\\';

/** Largest value a u32 header field can carry. */
export const MAX_U32 = 0xffffffff;
