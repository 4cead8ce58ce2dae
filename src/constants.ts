/**
 * The identification line every SPHERE file starts with, including its newline.
 * @constant
 */
export const NIST_MAGIC = 'NIST_1A\n' as const;

/**
 * Size in bytes of the fixed preamble: the magic line followed by the
 * right-aligned header length line (`"   1024\n"`).
 * @constant
 */
export const PREAMBLE_SIZE = 16 as const;

/**
 * Width of the header length column inside the preamble, newline excluded.
 * @constant
 */
export const HEADER_SIZE_COLUMNS = 7 as const;

/**
 * Header block size written when nothing else is requested.
 * @constant
 */
export const DEFAULT_HEADER_SIZE = 1024 as const;

/**
 * Header blocks are always a whole number of these.
 * @constant
 */
export const HEADER_BLOCK_SIZE = 1024 as const;

/**
 * Largest header size that still fits in the preamble's length column.
 * @constant
 */
export const MAX_HEADER_SIZE = 9_999_999 as const;

/** Line that closes the field section of the header. */
export const END_HEAD = 'end_head' as const;

/** Blank lines written after `end_head`, before the space padding. */
export const END_HEAD_TRAILER = '\n\n\n\n' as const;

/** Filler byte used to pad the header block (ASCII space). */
export const HEADER_FILLER = 0x20 as const;

export const TYPE_FLAG_INTEGER = '-i' as const;
export const TYPE_FLAG_REAL = '-r' as const;
/** Prefix of the string flag; the declared length follows directly (`-s11`). */
export const TYPE_FLAG_STRING = '-s' as const;

/** Compression type reported by the wave-like view. */
export const COMPTYPE_NONE = 'NONE' as const;
export const COMPNAME_NONE = 'not compressed' as const;

/** `sample_coding` values for which `sample_rate` is mandatory when writing. */
export const RATE_REQUIRED_CODINGS: ReadonlySet<string> = new Set(['pcm', 'ulaw']);
