/**
 * Info Inspector - advisory metadata for a CSV file.
 *
 * Detection is fixed: comma delimiter, UTF-8. Only the first few records are
 * parsed for structure, while the line count covers the whole file and
 * always leaves out one line for the header.
 */

import { DEFAULT_DELIMITER, DEFAULT_ENCODING } from './conversion-options.js';
import { parseCsvRecords } from './csv-records.js';
import { OrderedObject } from './json-writer.js';
import { synthesizeHeader } from './table-reader.js';
import { readTextFile, statSource } from './text-source.js';

export const INSPECTED_RECORDS = 10;
export const SAMPLE_SIZE = 3;

export interface CsvInfo {
  fileSize: number;
  rowCount: number;
  columnCount: number;
  columns: string[];
  /** Header-ordered sample records */
  sampleData: OrderedObject[];
  fileEncoding: string;
  detectedDelimiter: string;
}

const LINE_BREAK = /\r\n|\r|\n/g;

/**
 * Count lines the way a line-oriented reader would: each break ends a line,
 * and a final unterminated line still counts.
 */
export function countLines(text: string): number {
  if (text.length === 0) {
    return 0;
  }
  const breaks = text.match(LINE_BREAK)?.length ?? 0;
  return /[\r\n]$/.test(text) ? breaks : breaks + 1;
}

export class InfoInspector {
  async inspect(filePath: string): Promise<CsvInfo> {
    const { size } = await statSource(filePath);
    const text = await readTextFile(filePath, DEFAULT_ENCODING);
    const records = parseCsvRecords(text, {
      delimiter: DEFAULT_DELIMITER,
      preview: INSPECTED_RECORDS,
    });

    const first = records[0];
    if (first === undefined) {
      return {
        fileSize: size,
        rowCount: 0,
        columnCount: 0,
        columns: [],
        sampleData: [],
        fileEncoding: DEFAULT_ENCODING,
        detectedDelimiter: DEFAULT_DELIMITER,
      };
    }

    // Only a multi-field first record is taken as names; either way it is
    // not sampled
    const columns = first.length > 1 ? [...first] : synthesizeHeader(first.length);

    const sampleData = records
      .slice(1, 1 + SAMPLE_SIZE)
      .filter((record) => record.length === columns.length)
      .map((record) => OrderedObject.from(columns, record));

    const lineCount = countLines(text);

    return {
      fileSize: size,
      rowCount: lineCount > 1 ? lineCount - 1 : lineCount,
      columnCount: columns.length,
      columns,
      sampleData,
      fileEncoding: DEFAULT_ENCODING,
      detectedDelimiter: DEFAULT_DELIMITER,
    };
  }
}
