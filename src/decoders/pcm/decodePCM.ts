import { InvalidParameterError, TruncatedDataError } from '../../errors';
import { assertSupportedWidth, resolveByteOrder } from '../../utils/byte-format';

/**
 * Decodes interleaved integer PCM into signed samples.
 *
 * @param raw - Sample bytes as stored in the file.
 * @param sampleWidth - Bytes per sample (1, 2 or 4).
 * @param byteFormat - `sample_byte_format` code describing the byte order.
 * @param channels - Samples per frame.
 * @param frames - Number of frames to decode from the start of `raw`.
 * @returns `frames * channels` samples, frame by frame (ch0, ch1, …, ch0, ch1, …).
 * @throws {UnsupportedWidthError} for widths other than 1, 2 or 4.
 * @throws {TruncatedDataError} when `raw` holds fewer bytes than requested.
 */
export function decodePCM(
  raw: Uint8Array,
  sampleWidth: number,
  byteFormat: string,
  channels: number,
  frames: number
): Int32Array {
  assertSupportedWidth(sampleWidth);
  const order = resolveByteOrder(byteFormat, sampleWidth);
  assertLayout(channels, frames);

  const count = frames * channels;
  const needed = count * sampleWidth;
  if (raw.length < needed) throw new TruncatedDataError(needed, raw.length);

  const out = new Int32Array(count);
  if (sampleWidth === 1) {
    for (let i = 0; i < count; ++i) out[i] = (raw[i] << 24) >> 24;
    return out;
  }

  const view = new DataView(raw.buffer, raw.byteOffset, needed);
  if (order.isLittleEndian || order.isBigEndian) {
    const le = order.isLittleEndian;
    if (sampleWidth === 2) {
      for (let i = 0, ofs = 0; i < count; ++i, ofs += 2) out[i] = view.getInt16(ofs, le);
    } else {
      for (let i = 0, ofs = 0; i < count; ++i, ofs += 4) out[i] = view.getInt32(ofs, le);
    }
    return out;
  }

  // Two-byte orders are always plain LE or BE, so only mixed 4-byte orders get here.
  const shifts = order.significance.map((rank) => rank * 8);
  for (let i = 0, ofs = 0; i < count; ++i, ofs += 4) {
    out[i] = (raw[ofs] << shifts[0]) | (raw[ofs + 1] << shifts[1]) | (raw[ofs + 2] << shifts[2]) | (raw[ofs + 3] << shifts[3]);
  }
  return out;
}

export function assertLayout(channels: number, frames: number): void {
  if (!Number.isInteger(channels) || channels < 1) {
    throw new InvalidParameterError(`Channel count must be a positive integer, got ${channels}`);
  }
  if (!Number.isInteger(frames) || frames < 0) {
    throw new InvalidParameterError(`Frame count must be a non-negative integer, got ${frames}`);
  }
}
