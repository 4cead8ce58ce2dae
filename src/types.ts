import type { Logger } from 'pino';

/**
 * Type of a header field, as declared by its flag:
 * - `integer`: `-i`
 * - `real`: `-r`
 * - `string`: `-sN`, N being the byte length of the value
 */
export type HeaderFieldType = 'integer' | 'real' | 'string';

/** A value stored in the header. */
export type HeaderValue = number | string;

/**
 * A single `name flag value` entry of a SPHERE header.
 */
export type HeaderField =
  | { readonly name: string; readonly type: 'integer'; readonly value: number }
  | { readonly name: string; readonly type: 'real'; readonly value: number }
  | { readonly name: string; readonly type: 'string'; readonly value: string };

/** Header fields keyed by name, in header order. */
export type HeaderFieldMap = Map<string, HeaderField>;

/**
 * The result of parsing a header block.
 * @property headerSize - Size of the header block in bytes, as declared in the preamble.
 * @property fields - The parsed fields in header order.
 * @property warnings - Non-fatal irregularities found while parsing.
 */
export interface SphereHeader {
  headerSize: number;
  fields: HeaderFieldMap;
  warnings: string[];
}

/** Number of bytes per sample. */
export type SampleWidth = 1 | 2 | 4;

/**
 * Decoded header, one property per field, in header order. Fields other than
 * the three every session needs show up under their own names.
 */
export interface SphereParams {
  readonly [field: string]: HeaderValue;
  readonly channel_count: number;
  readonly sample_count: number;
  readonly sample_n_bytes: number;
}

/** Values accepted by `setparams`: plain values or fully typed fields. */
export type SphereParamsInput = Readonly<Record<string, HeaderValue | HeaderField | undefined>>;

/**
 * Parameters in the shape of a conventional PCM waveform container.
 */
export interface WaveParams {
  nchannels: number;
  sampwidth: number;
  framerate: number;
  nframes: number;
  comptype: string;
  compname: string;
}

/** Accepted `open` modes. `r`/`rb` read, `w`/`wb` write. */
export type OpenMode = 'r' | 'rb' | 'w' | 'wb';

/** What to do when the header declares more samples than the file holds. */
export type SampleCountPolicy = 'truncate' | 'strict';

/**
 * Configuration of a session.
 * @property sampleCountPolicy - Reaction to a declared `sample_count` larger than the data present. Defaults to `truncate`.
 * @property headerSize - Header block size used when writing. Multiple of 1024, defaults to 1024.
 * @property logger - pino logger to log through instead of the library's own.
 */
export interface SessionOptions {
  sampleCountPolicy?: SampleCountPolicy;
  headerSize?: number;
  logger?: Logger;
}
