import type { HeaderField, HeaderFieldMap, SphereHeader } from './types';
import {
  END_HEAD,
  NIST_MAGIC,
  PREAMBLE_SIZE,
  TYPE_FLAG_INTEGER,
  TYPE_FLAG_REAL,
} from './constants';
import { MalformedHeaderError } from './errors';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const REAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const STRING_FLAG_PATTERN = /^-s(\d+)$/;
const STRING_TAIL_PATTERN = /^\s*(?:;.*)?$/;
const FIELD_NAME_PATTERN = /^[^\s;]+$/;

/**
 * Header bytes as text, one character per byte, so string lengths count bytes.
 */
export function bytesToText(bytes: Uint8Array): string {
  let text = '';
  for (let i = 0; i < bytes.length; i += 4096) {
    text += String.fromCharCode(...bytes.subarray(i, i + 4096));
  }
  return text;
}

/**
 * Reads the header length out of the 16-byte preamble.
 * @throws {MalformedHeaderError} if the magic is wrong or the length is not a positive integer.
 */
export function readHeaderSize(preamble: Uint8Array): number {
  if (preamble.length < PREAMBLE_SIZE) {
    throw new MalformedHeaderError(
      `File is too small to be a SPHERE file (expected at least ${PREAMBLE_SIZE} bytes, got ${preamble.length})`
    );
  }

  const magic = bytesToText(preamble.subarray(0, NIST_MAGIC.length));
  if (magic !== NIST_MAGIC) {
    throw new MalformedHeaderError('Missing NIST_1A signature at byte 0');
  }

  const declared = bytesToText(preamble.subarray(NIST_MAGIC.length, PREAMBLE_SIZE)).trim();
  const headerSize = INTEGER_PATTERN.test(declared) ? Number(declared) : NaN;
  if (!Number.isSafeInteger(headerSize) || headerSize < PREAMBLE_SIZE) {
    throw new MalformedHeaderError(`Invalid header length "${declared}"`);
  }
  return headerSize;
}

/**
 * Parses a complete SPHERE header block. `buffer` may extend past the header;
 * only the declared header bytes are looked at.
 */
export function parseSphereHeader(buffer: Uint8Array): SphereHeader {
  const headerSize = readHeaderSize(buffer);
  if (buffer.length < headerSize) {
    throw new MalformedHeaderError(`Header declares ${headerSize} bytes but only ${buffer.length} are available`);
  }

  const fields: HeaderFieldMap = new Map();
  const warnings: string[] = [];
  const lines = bytesToText(buffer.subarray(PREAMBLE_SIZE, headerSize)).split(/\r\n|\n|\r/);

  // The preamble takes lines 1 and 2.
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const lineNo = i + 3;

    if (line.trimEnd() === END_HEAD) {
      return { headerSize, fields, warnings };
    }
    if (line.trim() === '') continue;

    const field = parseFieldLine(line, lineNo);
    if (fields.has(field.name)) {
      warnings.push(`Duplicate field "${field.name}" on header line ${lineNo}; the later value is used`);
    }
    fields.set(field.name, field);
  }

  throw new MalformedHeaderError(`Header is missing the "${END_HEAD}" line`);
}

function parseFieldLine(line: string, lineNo: number): HeaderField {
  const nameEnd = line.indexOf(' ');
  if (nameEnd <= 0) {
    throw new MalformedHeaderError(`Expected "name flag value", got "${line}"`, lineNo);
  }
  const name = line.slice(0, nameEnd);
  if (!FIELD_NAME_PATTERN.test(name)) {
    throw new MalformedHeaderError(`Invalid field name ${JSON.stringify(name)}`, lineNo);
  }
  const rest = line.slice(nameEnd + 1);
  const flagEnd = rest.indexOf(' ');
  const flag = flagEnd < 0 ? rest : rest.slice(0, flagEnd);
  const payload = flagEnd < 0 ? undefined : rest.slice(flagEnd + 1);

  const stringFlag = STRING_FLAG_PATTERN.exec(flag);
  if (stringFlag) {
    const length = Number(stringFlag[1]);
    const text = payload ?? '';
    if (payload === undefined && length > 0) {
      throw new MalformedHeaderError(`Field "${name}" has no value`, lineNo);
    }
    if (text.length < length) {
      throw new MalformedHeaderError(
        `Field "${name}" declares ${length} bytes but only ${text.length} are present`,
        lineNo
      );
    }
    if (!STRING_TAIL_PATTERN.test(text.slice(length))) {
      throw new MalformedHeaderError(
        `Field "${name}" declares ${length} bytes but the value is longer: "${text}"`,
        lineNo
      );
    }
    return { name, type: 'string', value: text.slice(0, length) };
  }

  if (flag !== TYPE_FLAG_INTEGER && flag !== TYPE_FLAG_REAL) {
    if (flag === '' || payload === undefined) {
      throw new MalformedHeaderError(`Expected "name flag value", got "${line}"`, lineNo);
    }
    throw new MalformedHeaderError(`Invalid type flag "${flag}" for field "${name}"`, lineNo);
  }
  if (payload === undefined) {
    throw new MalformedHeaderError(`Field "${name}" has no value`, lineNo);
  }

  const numeric = stripComment(payload);
  if (flag === TYPE_FLAG_INTEGER) {
    const value = INTEGER_PATTERN.test(numeric) ? Number(numeric) : NaN;
    if (!Number.isSafeInteger(value)) {
      throw new MalformedHeaderError(`Field "${name}" is flagged integer but holds "${numeric}"`, lineNo);
    }
    return { name, type: 'integer', value };
  }

  const value = REAL_PATTERN.test(numeric) ? Number(numeric) : NaN;
  if (!Number.isFinite(value)) {
    throw new MalformedHeaderError(`Field "${name}" is flagged real but holds "${numeric}"`, lineNo);
  }
  return { name, type: 'real', value };
}

function stripComment(payload: string): string {
  const semicolon = payload.indexOf(';');
  return (semicolon < 0 ? payload : payload.slice(0, semicolon)).trim();
}
