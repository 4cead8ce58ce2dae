/** Header lines of a mono 16-bit speech file, in file order. */
export const RM1_HEADER_LINES = [
  'NIST_1A',
  '   1024',
  'database_id -s3 RM1',
  'database_version -s3 1.0',
  'utterance_id -s11 aks0_st0783',
  'channel_count -i 1',
  'sample_count -i 48743',
  'sample_rate -i 16000',
  'sample_min -i -4326',
  'sample_max -i 5772',
  'sample_n_bytes -i 2',
  'sample_byte_format -s2 01',
  'sample_sig_bits -i 16',
  'end_head',
];

export const RM1_FRAMES = 48743;

/**
 * Builds a header block from its text lines, space-padded to `size`.
 */
export function headerBlock(lines: string[], size = 1024): Uint8Array {
  const text = lines.join('\n') + '\n';
  const block = new Uint8Array(size).fill(0x20);
  for (let i = 0; i < text.length; i++) block[i] = text.charCodeAt(i);
  return block;
}

/** A 1024-byte header with the standard preamble and the given field lines. */
export function fieldsHeader(fieldLines: string[]): Uint8Array {
  return headerBlock(['NIST_1A', '   1024', ...fieldLines, 'end_head']);
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((sum, p) => sum + p.length, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * 16-bit little-endian samples.
 */
export function int16le(values: number[]): Uint8Array {
  const out = new Uint8Array(values.length * 2);
  const view = new DataView(out.buffer);
  values.forEach((v, i) => view.setInt16(i * 2, v, true));
  return out;
}

export function int16be(values: number[]): Uint8Array {
  const out = new Uint8Array(values.length * 2);
  const view = new DataView(out.buffer);
  values.forEach((v, i) => view.setInt16(i * 2, v, false));
  return out;
}

/**
 * Deterministic samples cycling through [-amplitude, amplitude].
 */
export function sawtooth(count: number, amplitude: number): number[] {
  const period = 2 * amplitude + 1;
  return Array.from({ length: count }, (_, i) => ((i * 37) % period) - amplitude);
}

/** The RM1 header followed by `frames` frames of 16-bit mono data. */
export function rm1File(frames = RM1_FRAMES): Uint8Array {
  return concatBytes(headerBlock(RM1_HEADER_LINES), int16le(sawtooth(frames, 4000)));
}
