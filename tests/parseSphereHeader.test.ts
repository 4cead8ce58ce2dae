import { describe, expect, it } from 'vitest';
import { bytesToText, parseSphereHeader, readHeaderSize } from '../src/parseSphereHeader';
import { MalformedHeaderError } from '../src/errors';
import { RM1_HEADER_LINES, fieldsHeader, headerBlock } from './utils/fixtures';
import { captureError } from './utils/helpers';

function textBytes(text: string): Uint8Array {
  return Uint8Array.from(text, (ch) => ch.charCodeAt(0));
}

describe('readHeaderSize', () => {
  it('reads the right-aligned header length', () => {
    expect(readHeaderSize(textBytes('NIST_1A\n   1024\n'))).toBe(1024);
    expect(readHeaderSize(textBytes('NIST_1A\n   2048\n'))).toBe(2048);
  });

  it('rejects input shorter than the preamble', () => {
    expect(() => readHeaderSize(new Uint8Array(10))).toThrow(
      'File is too small to be a SPHERE file (expected at least 16 bytes, got 10)'
    );
  });

  it('rejects a wrong signature', () => {
    expect(() => readHeaderSize(textBytes('NIST_1B\n   1024\n'))).toThrow('Missing NIST_1A signature at byte 0');
  });

  it('rejects a non-numeric length', () => {
    expect(() => readHeaderSize(textBytes('NIST_1A\n    abc\n'))).toThrow('Invalid header length "abc"');
  });

  it('rejects a length smaller than the preamble', () => {
    expect(() => readHeaderSize(textBytes('NIST_1A\n      8\n'))).toThrow(MalformedHeaderError);
  });
});

describe('parseSphereHeader', () => {
  it('parses a complete header', () => {
    const header = parseSphereHeader(headerBlock(RM1_HEADER_LINES));

    expect(header.headerSize).toBe(1024);
    expect(header.warnings).toEqual([]);
    expect([...header.fields.keys()]).toEqual([
      'database_id',
      'database_version',
      'utterance_id',
      'channel_count',
      'sample_count',
      'sample_rate',
      'sample_min',
      'sample_max',
      'sample_n_bytes',
      'sample_byte_format',
      'sample_sig_bits',
    ]);
    expect(header.fields.get('database_id')).toEqual({ name: 'database_id', type: 'string', value: 'RM1' });
    expect(header.fields.get('database_version')).toEqual({ name: 'database_version', type: 'string', value: '1.0' });
    expect(header.fields.get('sample_min')).toEqual({ name: 'sample_min', type: 'integer', value: -4326 });
    expect(header.fields.get('sample_count')).toEqual({ name: 'sample_count', type: 'integer', value: 48743 });
  });

  it('ignores bytes after the header block', () => {
    const block = headerBlock(RM1_HEADER_LINES);
    const withData = new Uint8Array(block.length + 4);
    withData.set(block);
    withData.set([1, 2, 3, 4], block.length);
    expect(parseSphereHeader(withData).fields.size).toBe(11);
  });

  it('takes exactly the declared number of string bytes', () => {
    const header = parseSphereHeader(fieldsHeader(['utterance_id -s11 aks0 st0783', 'prompt -s7 a;b c;d ; note']));
    expect(header.fields.get('utterance_id')).toEqual({ name: 'utterance_id', type: 'string', value: 'aks0 st0783' });
    expect(header.fields.get('prompt')).toEqual({ name: 'prompt', type: 'string', value: 'a;b c;d' });
  });

  it('accepts an empty string field without a payload', () => {
    const header = parseSphereHeader(fieldsHeader(['speaker -s0']));
    expect(header.fields.get('speaker')).toEqual({ name: 'speaker', type: 'string', value: '' });
  });

  it('parses reals and strips comments from numbers', () => {
    const header = parseSphereHeader(fieldsHeader(['sample_rate -i 16000 ; Hz', 'gain -r 1.5e2', 'offset -r -.25;x']));
    expect(header.fields.get('sample_rate')).toEqual({ name: 'sample_rate', type: 'integer', value: 16000 });
    expect(header.fields.get('gain')).toEqual({ name: 'gain', type: 'real', value: 150 });
    expect(header.fields.get('offset')).toEqual({ name: 'offset', type: 'real', value: -0.25 });
  });

  it('accepts CRLF line endings and blank lines', () => {
    const text = 'NIST_1A\n   1024\nchannel_count -i 2\r\n\r\nsample_n_bytes -i 2\r\nend_head\r\n';
    const block = new Uint8Array(1024).fill(0x20);
    block.set(textBytes(text));

    const header = parseSphereHeader(block);
    expect([...header.fields.values()]).toEqual([
      { name: 'channel_count', type: 'integer', value: 2 },
      { name: 'sample_n_bytes', type: 'integer', value: 2 },
    ]);
  });

  it('keeps the later value of a duplicate field and warns', () => {
    const header = parseSphereHeader(fieldsHeader(['channel_count -i 1', 'sample_rate -i 8000', 'channel_count -i 2']));

    expect([...header.fields.keys()]).toEqual(['channel_count', 'sample_rate']);
    expect(header.fields.get('channel_count')).toEqual({ name: 'channel_count', type: 'integer', value: 2 });
    expect(header.warnings).toEqual(['Duplicate field "channel_count" on header line 5; the later value is used']);
  });

  it('fails when the buffer is shorter than the declared header', () => {
    expect(() => parseSphereHeader(headerBlock(RM1_HEADER_LINES).subarray(0, 512))).toThrow(
      'Header declares 1024 bytes but only 512 are available'
    );
  });

  it('fails without an end_head line', () => {
    const block = headerBlock(['NIST_1A', '   1024', 'channel_count -i 1']);
    expect(() => parseSphereHeader(block)).toThrow('Header is missing the "end_head" line');
  });

  it.each([
    ['channel_count', 'Expected "name flag value", got "channel_count" (header line 3)'],
    ['channel_count -x 1', 'Invalid type flag "-x" for field "channel_count" (header line 3)'],
    ['channel_count -i', 'Field "channel_count" has no value (header line 3)'],
    ['channel_count -i one', 'Field "channel_count" is flagged integer but holds "one" (header line 3)'],
    ['gain -r 1.2.3', 'Field "gain" is flagged real but holds "1.2.3" (header line 3)'],
    ['utterance_id -s11 short', 'Field "utterance_id" declares 11 bytes but only 5 are present (header line 3)'],
    ['database_id -s3 RM1X', 'Field "database_id" declares 3 bytes but the value is longer: "RM1X" (header line 3)'],
    ['a\tb -i 1', 'Invalid field name "a\\tb" (header line 3)'],
    ['gain;x -i 1', 'Invalid field name "gain;x" (header line 3)'],
  ])('rejects the line %j', (line, message) => {
    const err = captureError(() => parseSphereHeader(fieldsHeader([line])));
    expect(err).toBeInstanceOf(MalformedHeaderError);
    expect(err).toMatchObject({ message, line: 3, name: 'MalformedHeaderError' });
  });
});

describe('bytesToText', () => {
  it('maps each byte to one character', () => {
    expect(bytesToText(new Uint8Array([0x4e, 0x49, 0xe9]))).toBe('NIé');
  });
});
