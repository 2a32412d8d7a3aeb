/**
 * Conversion options - validated once, frozen, then passed down unchanged
 */

import { z } from 'zod';
import { InvalidOptionError } from './errors.js';

export const ORIENTS = ['records', 'values', 'split'] as const;
export type Orient = (typeof ORIENTS)[number];

export const DEFAULT_DELIMITER = ',';
export const DEFAULT_ENCODING = 'utf-8';

/**
 * Whether the runtime's TextDecoder knows `label`
 */
export function isSupportedEncoding(label: string): boolean {
  try {
    new TextDecoder(label);
    return true;
  } catch {
    return false;
  }
}

export const ConversionOptionsSchema = z
  .object({
    delimiter: z
      .string()
      .length(1, 'delimiter must be a single character')
      .refine((value) => !['"', '\r', '\n'].includes(value), {
        message: 'delimiter cannot be a quote or line break',
      })
      .default(DEFAULT_DELIMITER),
    encoding: z
      .string()
      .refine(isSupportedEncoding, (value) => ({
        message: `unsupported encoding: ${value}`,
      }))
      .default(DEFAULT_ENCODING),
    skipRows: z.number().int().min(0).default(0),
    header: z.boolean().default(true),
    orient: z
      .enum(ORIENTS, {
        errorMap: (issue, ctx) =>
          issue.code === z.ZodIssueCode.invalid_enum_value
            ? {
                message: `unsupported JSON orient: ${String(issue.received)} (expected ${ORIENTS.join(', ')})`,
              }
            : { message: ctx.defaultError },
      })
      .default('records'),
    indent: z.number().int().min(0).nullable().default(null),
  })
  .strict();

export type ConversionOptions = Readonly<z.output<typeof ConversionOptionsSchema>>;
export type ConversionOptionsInput = z.input<typeof ConversionOptionsSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.errors
    .map((issue) => {
      const path = issue.path.join('.');
      return `${path || 'root'}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Validate untrusted option values. Throws InvalidOptionError on the first
 * bad configuration, before any I/O happens.
 */
export function parseConversionOptions(raw: unknown): ConversionOptions {
  const result = ConversionOptionsSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new InvalidOptionError(
      `Invalid conversion options: ${formatIssues(result.error)}`
    );
  }
  return Object.freeze(result.data);
}

export function createConversionOptions(
  input: ConversionOptionsInput = {}
): ConversionOptions {
  return parseConversionOptions(input);
}
