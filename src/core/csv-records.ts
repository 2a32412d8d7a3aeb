/**
 * CSV record splitting on top of papaparse
 */

import { parse as parseCSV } from 'papaparse';
import { ParseError } from './errors.js';

export type CsvRecord = readonly string[];

export interface ParseRecordsOptions {
  delimiter: string;
  /** Stop after this many records; nothing past them is parsed */
  preview?: number;
}

/**
 * Split CSV text into records. Every field stays a string; blank lines
 * become empty records and a final line break does not add one.
 */
export function parseCsvRecords(
  text: string,
  options: ParseRecordsOptions
): CsvRecord[] {
  // papaparse drops a leading BOM; drop it here too so cursors line up
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const records: CsvRecord[] = [];
  let quoteError: string | undefined;
  let rowStart = 0;

  // Rows arrive one at a time so each can be matched to its source text
  parseCSV<string[]>(input, {
    delimiter: options.delimiter,
    header: false,
    dynamicTyping: false,
    skipEmptyLines: false,
    quoteChar: '"',
    escapeChar: '"',
    preview: options.preview,
    step: (result, parser) => {
      const source = input.slice(rowStart, result.meta.cursor);
      rowStart = result.meta.cursor;

      const error = result.errors.find((candidate) => candidate.type === 'Quotes');
      if (error) {
        quoteError = `Malformed CSV at row ${records.length + 1}: ${error.message}`;
        parser.abort();
        return;
      }

      const record = result.data;
      if (record.length === 1 && record[0] === '') {
        // Nothing left after the final line break
        if (source.length === 0) {
          return;
        }
        // A blank line, as opposed to a quoted empty field
        if (!source.includes('"')) {
          records.push([]);
          return;
        }
      }
      records.push(record);
    },
  });

  if (quoteError !== undefined) {
    throw new ParseError(quoteError);
  }
  return records;
}
