import { WaveFile } from 'wavefile';
import type { SessionOptions, SphereParamsInput } from './types';
import { InvalidParameterError } from './errors';
import { MemoryStream } from './io/MemoryStream';
import { withSphere } from './open';
import { assertSupportedWidth, defaultByteFormat } from './utils/byte-format';
import { logger } from './logger';

const WAVE_FORMAT_PCM = 0x0001;
const log = logger.child({ component: 'convert' });

function fmtNumber(wav: WaveFile, key: string): number {
  const value: unknown = Reflect.get(wav.fmt, key);
  if (typeof value !== 'number') {
    throw new InvalidParameterError(`WAV fmt chunk has no numeric "${key}"`);
  }
  return value;
}

/**
 * Converts a SPHERE file holding linear PCM into a RIFF/WAVE file.
 * 8-bit samples are shifted into the unsigned range WAV uses for that width.
 */
export function sphereToWav(sphere: Uint8Array, options: SessionOptions = {}): Uint8Array {
  return withSphere(
    new MemoryStream(sphere),
    'r',
    (session) => {
      const params = session.getparams();
      const coding = params.sample_coding;
      if (coding !== undefined && coding !== 'pcm') {
        throw new InvalidParameterError(`Cannot convert "${coding}" coded samples to WAV`);
      }
      const rate = params.sample_rate;
      if (typeof rate !== 'number') {
        throw new InvalidParameterError('sample_rate is required to build a WAV file');
      }

      const width = params.sample_n_bytes;
      const samples = session.readsamples(params.sample_count);
      const data = width === 1 ? Array.from(samples, (v) => v + 128) : Array.from(samples);

      const wav = new WaveFile();
      wav.fromScratch(params.channel_count, rate, String(width * 8), data);
      log.debug({ frames: params.sample_count, channels: params.channel_count }, 'converted SPHERE to WAV');
      return wav.toBuffer();
    },
    options
  );
}

/**
 * Converts an 8, 16 or 32-bit PCM RIFF/WAVE file into a SPHERE file.
 *
 * @param extraParams - Additional header fields, such as `database_id`. The
 * sample layout fields are always taken from the WAV file.
 * @throws {InvalidParameterError} for anything but little-endian integer PCM.
 * @throws {UnsupportedWidthError} for sample widths other than 1, 2 or 4 bytes.
 */
export function wavToSphere(
  wavBytes: Uint8Array,
  extraParams: SphereParamsInput = {},
  options: SessionOptions = {}
): Uint8Array {
  const wav = new WaveFile();
  try {
    wav.fromBuffer(wavBytes);
  } catch (err) {
    throw new InvalidParameterError(`Not a readable WAV file: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (wav.container !== 'RIFF') {
    throw new InvalidParameterError(`Unsupported WAV container "${wav.container}"`);
  }
  const formatTag = fmtNumber(wav, 'audioFormat');
  if (formatTag !== WAVE_FORMAT_PCM) {
    throw new InvalidParameterError(`Only PCM WAV data can be converted (format tag ${formatTag})`);
  }

  const channels = fmtNumber(wav, 'numChannels');
  const rate = fmtNumber(wav, 'sampleRate');
  const bits = fmtNumber(wav, 'bitsPerSample');
  const width = Math.ceil(bits / 8);
  assertSupportedWidth(width);

  const samples: unknown = wav.getSamples(true);
  if (!(samples instanceof Float64Array)) {
    throw new InvalidParameterError('WAV samples could not be read');
  }
  const signed = width === 1 ? Array.from(samples, (v) => v - 128) : samples;

  const out = new MemoryStream();
  withSphere(
    out,
    'w',
    (session) => {
      session.setparams({
        ...extraParams,
        channel_count: channels,
        sample_rate: rate,
        sample_n_bytes: width,
        sample_sig_bits: bits,
        sample_byte_format: defaultByteFormat(width),
        sample_coding: 'pcm',
      });
      session.writesamples(signed);
    },
    options
  );
  log.debug({ frames: signed.length / channels, channels }, 'converted WAV to SPHERE');
  return out.toUint8Array();
}
