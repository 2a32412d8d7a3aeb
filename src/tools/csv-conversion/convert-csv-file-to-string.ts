/**
 * convert_csv_file_to_string - convert a CSV file and return the JSON text
 */

import { Tool } from '@modelcontextprotocol/sdk/types.js';
import { CsvConverter } from '../../core/csv-converter.js';
import {
  ConvertCsvFileToStringArgs,
  ConvertCsvFileToStringSchema,
} from '../../validation/tool-schemas.js';
import {
  CsvTool,
  ENCODING_PROPERTY,
  SHAPE_OPTION_PROPERTIES,
  toConversionOptions,
} from './csv-tool.js';
import { ConvertCsvStringPayload } from './convert-csv-string.js';

export const CONVERT_CSV_FILE_TO_STRING_TOOL_DEFINITION: Tool = {
  name: 'convert_csv_file_to_string',
  description:
    'Convert a CSV file to JSON and return the serialized JSON in the "json" field without writing any file.',
  inputSchema: {
    type: 'object',
    properties: {
      file_path: {
        type: 'string',
        description: 'Path to an existing CSV file',
      },
      encoding: ENCODING_PROPERTY,
      ...SHAPE_OPTION_PROPERTIES,
    },
    required: ['file_path'],
  },
};

export class ConvertCsvFileToStringTool extends CsvTool<
  ConvertCsvFileToStringArgs,
  ConvertCsvStringPayload
> {
  readonly definition = CONVERT_CSV_FILE_TO_STRING_TOOL_DEFINITION;
  protected readonly schema = ConvertCsvFileToStringSchema;
  protected readonly successMessage = 'CSV file converted';

  constructor(private readonly converter: CsvConverter) {
    super();
  }

  protected async execute(
    args: ConvertCsvFileToStringArgs
  ): Promise<ConvertCsvStringPayload> {
    const options = toConversionOptions(args);
    return { json: await this.converter.convertFileToString(args.file_path, options) };
  }
}

export function getConvertCsvFileToStringTool(
  converter: CsvConverter
): ConvertCsvFileToStringTool {
  return new ConvertCsvFileToStringTool(converter);
}
