/**
 * convert_csv_file - convert a CSV file and write the JSON beside it
 */

import { Tool } from '@modelcontextprotocol/sdk/types.js';
import { CsvConverter } from '../../core/csv-converter.js';
import {
  ConvertCsvFileArgs,
  ConvertCsvFileSchema,
} from '../../validation/tool-schemas.js';
import {
  CsvTool,
  ENCODING_PROPERTY,
  SHAPE_OPTION_PROPERTIES,
  toConversionOptions,
} from './csv-tool.js';

export interface ConvertCsvFilePayload {
  json_file_path: string;
}

export const CONVERT_CSV_FILE_TOOL_DEFINITION: Tool = {
  name: 'convert_csv_file',
  description:
    'Convert a CSV file to a JSON file. The JSON is written to output_file_path, or next to the CSV file with a .json extension. All cell values stay strings.',
  inputSchema: {
    type: 'object',
    properties: {
      file_path: {
        type: 'string',
        description: 'Path to an existing CSV file',
      },
      output_file_path: {
        type: 'string',
        description:
          'Output JSON file path (optional, defaults to the CSV path with a .json extension)',
      },
      encoding: ENCODING_PROPERTY,
      ...SHAPE_OPTION_PROPERTIES,
    },
    required: ['file_path'],
  },
};

export class ConvertCsvFileTool extends CsvTool<
  ConvertCsvFileArgs,
  ConvertCsvFilePayload
> {
  readonly definition = CONVERT_CSV_FILE_TOOL_DEFINITION;
  protected readonly schema = ConvertCsvFileSchema;
  protected readonly successMessage = 'CSV file converted, JSON file written';

  constructor(private readonly converter: CsvConverter) {
    super();
  }

  protected async execute(args: ConvertCsvFileArgs): Promise<ConvertCsvFilePayload> {
    // Options first: a bad orient must fail before the file system is touched
    const options = toConversionOptions(args);
    const jsonFilePath = await this.converter.convertFileToFile(
      args.file_path,
      args.output_file_path ?? undefined,
      options
    );
    return { json_file_path: jsonFilePath };
  }
}

export function getConvertCsvFileTool(converter: CsvConverter): ConvertCsvFileTool {
  return new ConvertCsvFileTool(converter);
}
