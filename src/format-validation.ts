import { z } from 'zod';
import type { Logger } from 'pino';
import type { HeaderField, HeaderFieldMap, HeaderFieldType, HeaderValue, SampleCountPolicy } from './types';
import { DEFAULT_HEADER_SIZE, HEADER_BLOCK_SIZE, MAX_HEADER_SIZE } from './constants';
import { InvalidParameterError, SphereError } from './errors';
import { resolveByteOrder } from './utils/byte-format';

/**
 * Header field types fixed by the SPHERE conventions. Fields not listed here keep
 * whatever type they are given.
 */
export const KNOWN_FIELD_TYPES: ReadonlyMap<string, HeaderFieldType> = new Map([
  ['database_id', 'string'],
  ['database_version', 'string'],
  ['utterance_id', 'string'],
  ['channel_count', 'integer'],
  ['sample_count', 'integer'],
  ['sample_rate', 'integer'],
  ['sample_min', 'integer'],
  ['sample_max', 'integer'],
  ['sample_n_bytes', 'integer'],
  ['sample_byte_format', 'string'],
  ['sample_sig_bits', 'integer'],
  ['sample_coding', 'string'],
  ['sample_checksum', 'integer'],
]);

/**
 * Constraints on a parameter set. Every field is optional here; which ones
 * must be present depends on the operation.
 */
export const sphereParamsSchema = z
  .object({
    channel_count: z.number().int().min(1),
    sample_count: z.number().int().min(0),
    sample_rate: z.number().int().min(1),
    sample_n_bytes: z.union([z.literal(1), z.literal(2), z.literal(4)], {
      errorMap: () => ({ message: 'sample_n_bytes must be 1, 2 or 4' }),
    }),
    sample_sig_bits: z.number().int().min(1),
    sample_min: z.number().int(),
    sample_max: z.number().int(),
    sample_byte_format: z.string(),
  })
  .partial()
  .catchall(z.union([z.number().finite(), z.string()]))
  .superRefine((params, ctx) => {
    const width = params.sample_n_bytes;
    if (width === undefined) return;

    const bits = params.sample_sig_bits ?? width * 8;
    if (bits > width * 8) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sample_sig_bits'],
        message: `sample_sig_bits ${bits} exceeds the ${width * 8} bits of a ${width}-byte sample`,
      });
      return;
    }

    const lowest = -(2 ** (bits - 1));
    const highest = 2 ** (bits - 1) - 1;
    for (const key of ['sample_min', 'sample_max'] as const) {
      const value = params[key];
      if (value !== undefined && (value < lowest || value > highest)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} ${value} is outside the ${bits}-bit range [${lowest}, ${highest}]`,
        });
      }
    }
    if (params.sample_min !== undefined && params.sample_max !== undefined && params.sample_min > params.sample_max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sample_min'],
        message: 'sample_min is greater than sample_max',
      });
    }

    if (params.sample_byte_format !== undefined) {
      try {
        resolveByteOrder(params.sample_byte_format, width);
      } catch (err) {
        if (!(err instanceof SphereError)) throw err;
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['sample_byte_format'], message: err.message });
      }
    }
  });

export const sessionOptionsSchema = z.object({
  sampleCountPolicy: z.enum(['truncate', 'strict']).default('truncate'),
  headerSize: z.number().default(DEFAULT_HEADER_SIZE),
  logger: z.custom<Logger>((value) => typeof value === 'object' && value !== null).optional(),
});

export interface ResolvedSessionOptions {
  sampleCountPolicy: SampleCountPolicy;
  headerSize: number;
  logger?: Logger;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Applies defaults to session options and checks them.
 * @throws {InvalidParameterError} on an unknown policy or an unusable header size.
 */
export function resolveSessionOptions(options: unknown): ResolvedSessionOptions {
  const result = sessionOptionsSchema.safeParse(options ?? {});
  if (!result.success) {
    throw new InvalidParameterError(`Invalid session options: ${formatIssues(result.error)}`);
  }
  assertHeaderSize(result.data.headerSize);
  return result.data;
}

export function assertHeaderSize(headerSize: number): void {
  if (
    !Number.isInteger(headerSize) ||
    headerSize < HEADER_BLOCK_SIZE ||
    headerSize > MAX_HEADER_SIZE ||
    headerSize % HEADER_BLOCK_SIZE !== 0
  ) {
    throw new InvalidParameterError(
      `Header size must be a multiple of ${HEADER_BLOCK_SIZE} no larger than ${MAX_HEADER_SIZE}, got ${headerSize}`
    );
  }
}

/** Field values keyed by name, in header order. */
export function fieldsToRecord(fields: Iterable<HeaderField>): Record<string, HeaderValue> {
  const record: Record<string, HeaderValue> = {};
  for (const field of fields) record[field.name] = field.value;
  return record;
}

/**
 * Checks a complete parameter set against the format's constraints and the
 * types the well-known fields must have.
 * @throws {InvalidParameterError} listing every violation found.
 */
export function validateSphereParams(fields: HeaderFieldMap): void {
  const problems: string[] = [];
  for (const field of fields.values()) {
    const expected = KNOWN_FIELD_TYPES.get(field.name);
    if (expected !== undefined && expected !== field.type) {
      problems.push(`${field.name}: must be of type ${expected}, got ${field.type}`);
    }
  }

  const result = sphereParamsSchema.safeParse(fieldsToRecord(fields.values()));
  if (!result.success) problems.push(formatIssues(result.error));

  if (problems.length > 0) {
    throw new InvalidParameterError(`Invalid parameters: ${problems.join('; ')}`);
  }
}

/**
 * Turns a `setparams` value into a typed header field. Numbers become integer
 * fields when integral, unless the field is known or already set as real.
 */
export function toHeaderField(name: string, input: HeaderValue | HeaderField, existing?: HeaderField): HeaderField {
  if (typeof input === 'object') {
    if (input.name !== name) {
      throw new InvalidParameterError(`Field "${input.name}" was supplied under the name "${name}"`);
    }
    return { ...input };
  }
  if (typeof input === 'string') return { name, type: 'string', value: input };

  const declared = KNOWN_FIELD_TYPES.get(name) ?? existing?.type;
  if (declared === 'real' || !Number.isInteger(input)) return { name, type: 'real', value: input };
  return { name, type: 'integer', value: input };
}
