import { assertLayout } from '../../decoders/pcm/decodePCM';
import { InvalidParameterError } from '../../errors';
import { assertSupportedWidth, resolveByteOrder } from '../../utils/byte-format';

/**
 * Encodes interleaved signed samples into PCM bytes laid out per `byteFormat`.
 * Inverse of `decodePCM`.
 */
export function encodePCM(
  samples: ArrayLike<number>,
  sampleWidth: number,
  byteFormat: string,
  channels: number
): Uint8Array {
  assertSupportedWidth(sampleWidth);
  const order = resolveByteOrder(byteFormat, sampleWidth);
  assertLayout(channels, 0);

  const count = samples.length;
  if (count % channels !== 0) {
    throw new InvalidParameterError(`${count} samples do not make whole frames of ${channels} channels`);
  }

  const max = 2 ** (sampleWidth * 8 - 1) - 1;
  const min = -max - 1;
  const out = new Uint8Array(count * sampleWidth);
  const view = new DataView(out.buffer);
  const le = order.isLittleEndian;
  const shifts = order.significance.map((rank) => rank * 8);

  for (let i = 0, ofs = 0; i < count; ++i, ofs += sampleWidth) {
    const v = samples[i];
    if (!Number.isInteger(v) || v < min || v > max) {
      throw new InvalidParameterError(`Sample ${i} (${v}) does not fit in ${sampleWidth * 8} bits`);
    }

    if (sampleWidth === 1) {
      view.setInt8(ofs, v);
    } else if (le || order.isBigEndian) {
      if (sampleWidth === 2) view.setInt16(ofs, v, le);
      else view.setInt32(ofs, v, le);
    } else {
      for (let b = 0; b < sampleWidth; ++b) out[ofs + b] = (v >> shifts[b]) & 0xff;
    }
  }

  return out;
}
