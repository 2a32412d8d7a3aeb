/**
 * convert_csv_string - convert in-memory CSV text to JSON text
 */

import { Tool } from '@modelcontextprotocol/sdk/types.js';
import { CsvConverter } from '../../core/csv-converter.js';
import {
  ConvertCsvStringArgs,
  ConvertCsvStringSchema,
} from '../../validation/tool-schemas.js';
import { CsvTool, SHAPE_OPTION_PROPERTIES, toConversionOptions } from './csv-tool.js';

export interface ConvertCsvStringPayload {
  json: string;
}

export const CONVERT_CSV_STRING_TOOL_DEFINITION: Tool = {
  name: 'convert_csv_string',
  description:
    'Convert CSV text to JSON text. Returns the serialized JSON in the "json" field. All cell values stay strings.',
  inputSchema: {
    type: 'object',
    properties: {
      csv_content: {
        type: 'string',
        description: 'CSV content to convert',
      },
      ...SHAPE_OPTION_PROPERTIES,
    },
    required: ['csv_content'],
  },
};

export class ConvertCsvStringTool extends CsvTool<
  ConvertCsvStringArgs,
  ConvertCsvStringPayload
> {
  readonly definition = CONVERT_CSV_STRING_TOOL_DEFINITION;
  protected readonly schema = ConvertCsvStringSchema;
  protected readonly successMessage = 'CSV string converted';

  constructor(private readonly converter: CsvConverter) {
    super();
  }

  protected async execute(args: ConvertCsvStringArgs): Promise<ConvertCsvStringPayload> {
    const options = toConversionOptions(args);
    return { json: this.converter.convertString(args.csv_content, options) };
  }
}

export function getConvertCsvStringTool(converter: CsvConverter): ConvertCsvStringTool {
  return new ConvertCsvStringTool(converter);
}
