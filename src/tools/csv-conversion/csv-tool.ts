import { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import {
  ConversionOptions,
  parseConversionOptions,
} from '../../core/conversion-options.js';
import { Envelope, toFailureEnvelope, toSuccessEnvelope } from '../../core/envelope.js';
import { validateToolArgs } from '../../validation/validator.js';

export interface ShapeArgs {
  delimiter?: string;
  encoding?: string;
  skip_rows?: number;
  header?: boolean;
  orient?: string;
  indent?: number | null;
}

/**
 * Map snake_case tool arguments onto validated conversion options
 */
export function toConversionOptions(args: ShapeArgs): ConversionOptions {
  return parseConversionOptions({
    delimiter: args.delimiter,
    encoding: args.encoding,
    skipRows: args.skip_rows,
    header: args.header,
    orient: args.orient,
    indent: args.indent,
  });
}

/**
 * JSON Schema properties shared by every converting tool
 */
export const SHAPE_OPTION_PROPERTIES = {
  delimiter: {
    type: 'string',
    description: 'CSV delimiter (single character), e.g. "," "\\t" ";"',
    default: ',',
  },
  skip_rows: {
    type: 'integer',
    description: 'Number of leading rows to skip',
    minimum: 0,
    default: 0,
  },
  header: {
    type: 'boolean',
    description:
      'Whether the first retained row is a header; when false, keys are column_0, column_1, ...',
    default: true,
  },
  orient: {
    type: 'string',
    enum: ['records', 'values', 'split'],
    description:
      'JSON layout: "records" (array of objects), "values" (array of arrays) or "split" ({columns, data})',
    default: 'records',
  },
  indent: {
    type: ['integer', 'null'],
    description: 'Indentation width for pretty-printing (e.g. 2 or 4); null for compact output',
    minimum: 0,
    default: null,
  },
};

export const ENCODING_PROPERTY = {
  type: 'string',
  description: 'File encoding, e.g. "utf-8", "gbk", "latin1"',
  default: 'utf-8',
};

/**
 * A remote-callable operation: validates raw arguments, runs, and wraps the
 * outcome in an envelope. handle() never throws.
 */
export abstract class CsvTool<TArgs, TPayload extends object> {
  abstract readonly definition: Tool;
  protected abstract readonly schema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
  protected abstract readonly successMessage: string;

  protected abstract execute(args: TArgs): Promise<TPayload>;

  get name(): string {
    return this.definition.name;
  }

  async handle(rawArgs: unknown): Promise<Envelope<TPayload>> {
    try {
      const args = validateToolArgs(this.name, this.schema, rawArgs);
      const payload = await this.execute(args);
      return toSuccessEnvelope(this.successMessage, payload);
    } catch (error) {
      return toFailureEnvelope(error);
    }
  }
}
