import { z } from 'zod';
import { formatIssues } from '../core/conversion-options.js';
import { InvalidOptionError } from '../core/errors.js';

/**
 * Validates tool arguments against the tool's Zod schema
 * @param toolName - Used in the error message only
 * @throws {InvalidOptionError} listing every failing argument
 */
export function validateToolArgs<T>(
  toolName: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  args: unknown
): T {
  const result = schema.safeParse(args ?? {});

  if (!result.success) {
    throw new InvalidOptionError(
      `Validation failed for tool "${toolName}": ${formatIssues(result.error)}`
    );
  }

  return result.data;
}
