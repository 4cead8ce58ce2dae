import type { HeaderField } from './types';
import {
  DEFAULT_HEADER_SIZE,
  END_HEAD,
  END_HEAD_TRAILER,
  HEADER_FILLER,
  HEADER_SIZE_COLUMNS,
  NIST_MAGIC,
  TYPE_FLAG_INTEGER,
  TYPE_FLAG_REAL,
  TYPE_FLAG_STRING,
} from './constants';
import { HeaderOverflowError, InvalidParameterError } from './errors';
import { assertHeaderSize } from './format-validation';

/** Integral reals keep a decimal point so they still read as reals. */
function formatReal(value: number): string {
  const text = String(value);
  return Number.isInteger(value) && !text.includes('e') ? `${text}.0` : text;
}

/**
 * Renders one field as a header line, without the newline.
 * @throws {InvalidParameterError} if the field cannot be represented in a header.
 */
export function formatHeaderField(field: HeaderField): string {
  if (!/^[^\s;]+$/.test(field.name)) {
    throw new InvalidParameterError(`Invalid header field name "${field.name}"`);
  }

  switch (field.type) {
    case 'integer':
      if (!Number.isSafeInteger(field.value)) {
        throw new InvalidParameterError(`Field "${field.name}" is an integer field but holds ${field.value}`);
      }
      return `${field.name} ${TYPE_FLAG_INTEGER} ${field.value}`;
    case 'real':
      if (!Number.isFinite(field.value)) {
        throw new InvalidParameterError(`Field "${field.name}" holds a non-finite real ${field.value}`);
      }
      return `${field.name} ${TYPE_FLAG_REAL} ${formatReal(field.value)}`;
    case 'string':
      if (/[\r\n]|[^\u0000-\u00ff]/.test(field.value)) {
        throw new InvalidParameterError(
          `Field "${field.name}" contains a line break or a character outside the single-byte range`
        );
      }
      return `${field.name} ${TYPE_FLAG_STRING}${field.value.length} ${field.value}`;
  }
}

/**
 * Serializes header fields into a complete, padded header block.
 *
 * @param fields - Fields in the order they should appear.
 * @param headerSize - Size of the block to produce.
 * @throws {HeaderOverflowError} if the fields do not fit in `headerSize` bytes.
 */
export function serializeSphereHeader(
  fields: Iterable<HeaderField>,
  headerSize: number = DEFAULT_HEADER_SIZE
): Uint8Array {
  assertHeaderSize(headerSize);

  const lines = [NIST_MAGIC.trimEnd(), String(headerSize).padStart(HEADER_SIZE_COLUMNS)];
  for (const field of fields) lines.push(formatHeaderField(field));
  lines.push(END_HEAD);

  let text = lines.join('\n') + '\n';
  if (text.length > headerSize) throw new HeaderOverflowError(text.length, headerSize);
  text += END_HEAD_TRAILER.slice(0, headerSize - text.length);

  const block = new Uint8Array(headerSize).fill(HEADER_FILLER);
  for (let i = 0; i < text.length; i++) block[i] = text.charCodeAt(i);
  return block;
}
