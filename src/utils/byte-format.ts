import { InvalidParameterError, UnsupportedWidthError } from '../errors';
import type { SampleWidth } from '../types';

/**
 * How the bytes of one stored sample map onto the integer value.
 * `significance[i]` is the byte rank (0 = least significant) of the byte at file position `i`.
 */
export interface ByteOrder {
  significance: number[];
  /** Plain little-endian layout (`01`, `0123`, or any single byte). */
  isLittleEndian: boolean;
  /** Plain big-endian layout (`10`, `3210`). */
  isBigEndian: boolean;
}

export function isSupportedWidth(width: number): width is SampleWidth {
  return width === 1 || width === 2 || width === 4;
}

export function assertSupportedWidth(width: number): asserts width is SampleWidth {
  if (!isSupportedWidth(width)) throw new UnsupportedWidthError(width);
}

/** Little-endian byte format for a width: `1`, `01` or `0123`. */
export function defaultByteFormat(width: SampleWidth): string {
  if (width === 1) return '1';
  return Array.from({ length: width }, (_, i) => String(i)).join('');
}

/**
 * Resolves a `sample_byte_format` code into a byte order.
 * Single-byte samples accept `0` or `1`; wider ones need a permutation of `0..width-1`.
 */
export function resolveByteOrder(byteFormat: string, width: number): ByteOrder {
  assertSupportedWidth(width);

  if (width === 1) {
    if (byteFormat !== '0' && byteFormat !== '1') {
      throw new InvalidParameterError(`Unsupported sample_byte_format "${byteFormat}" for 1-byte samples`);
    }
    return { significance: [0], isLittleEndian: true, isBigEndian: false };
  }

  const significance: number[] = [];
  if (byteFormat.length === width) {
    for (const ch of byteFormat) {
      const rank = ch.charCodeAt(0) - 0x30;
      if (rank < 0 || rank >= width || significance.includes(rank)) break;
      significance.push(rank);
    }
  }
  if (significance.length !== width) {
    throw new InvalidParameterError(`Unsupported sample_byte_format "${byteFormat}" for ${width}-byte samples`);
  }

  return {
    significance,
    isLittleEndian: significance.every((rank, i) => rank === i),
    isBigEndian: significance.every((rank, i) => rank === width - 1 - i),
  };
}
