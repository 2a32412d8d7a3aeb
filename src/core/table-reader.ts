/**
 * Table Reader - CSV source plus options in, header and rows out
 */

import { ConversionOptions } from './conversion-options.js';
import { CsvRecord, parseCsvRecords } from './csv-records.js';
import { readTextFile } from './text-source.js';

export interface Table {
  readonly header: readonly string[];
  readonly rows: readonly CsvRecord[];
}

export const EMPTY_TABLE: Table = Object.freeze({
  header: Object.freeze([]),
  rows: Object.freeze([]),
});

export function synthesizeHeader(width: number): string[] {
  return Array.from({ length: width }, (_, index) => `column_${index}`);
}

/**
 * Build a table from already-split records
 */
export function buildTable(
  records: readonly CsvRecord[],
  options: Pick<ConversionOptions, 'skipRows' | 'header'>
): Table {
  const retained = records.slice(options.skipRows);
  const first = retained[0];

  if (first === undefined) {
    return EMPTY_TABLE;
  }

  if (options.header) {
    return { header: first, rows: retained.slice(1) };
  }

  return { header: synthesizeHeader(first.length), rows: retained };
}

export class TableReader {
  readText(text: string, options: ConversionOptions): Table {
    const records = parseCsvRecords(text, { delimiter: options.delimiter });
    return buildTable(records, options);
  }

  async readFile(filePath: string, options: ConversionOptions): Promise<Table> {
    const text = await readTextFile(filePath, options.encoding);
    return this.readText(text, options);
  }
}
