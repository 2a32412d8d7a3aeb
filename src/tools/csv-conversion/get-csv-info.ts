/**
 * get_csv_info - advisory metadata for a CSV file (size, counts, header, sample)
 */

import { Tool } from '@modelcontextprotocol/sdk/types.js';
import { CsvInfo, InfoInspector } from '../../core/info-inspector.js';
import { OrderedObject } from '../../core/json-writer.js';
import { GetCsvInfoArgs, GetCsvInfoSchema } from '../../validation/tool-schemas.js';
import { CsvTool } from './csv-tool.js';

export interface CsvInfoWire {
  file_size: number;
  row_count: number;
  column_count: number;
  columns: string[];
  sample_data: OrderedObject[];
  file_encoding: string;
  detected_delimiter: string;
}

export function toCsvInfoWire(info: CsvInfo): CsvInfoWire {
  return {
    file_size: info.fileSize,
    row_count: info.rowCount,
    column_count: info.columnCount,
    columns: info.columns,
    sample_data: info.sampleData,
    file_encoding: info.fileEncoding,
    detected_delimiter: info.detectedDelimiter,
  };
}

export const GET_CSV_INFO_TOOL_DEFINITION: Tool = {
  name: 'get_csv_info',
  description:
    'Inspect a CSV file: size in bytes, approximate row count, column count, header and up to 3 sample records. Assumes UTF-8 and a comma delimiter.',
  inputSchema: {
    type: 'object',
    properties: {
      file_path: {
        type: 'string',
        description: 'Path to an existing CSV file',
      },
    },
    required: ['file_path'],
  },
};

export class GetCsvInfoTool extends CsvTool<GetCsvInfoArgs, { info: CsvInfoWire }> {
  readonly definition = GET_CSV_INFO_TOOL_DEFINITION;
  protected readonly schema = GetCsvInfoSchema;
  protected readonly successMessage = 'CSV file inspected';

  constructor(private readonly inspector: InfoInspector) {
    super();
  }

  protected async execute(args: GetCsvInfoArgs): Promise<{ info: CsvInfoWire }> {
    return { info: toCsvInfoWire(await this.inspector.inspect(args.file_path)) };
  }
}

export function getCsvInfoTool(inspector: InfoInspector): GetCsvInfoTool {
  return new GetCsvInfoTool(inspector);
}
