/**
 * CSV Converter - composes the Table Reader and Shape Converter into the
 * file→file, file→string and string→string conversions.
 */

import { writeFile } from 'fs/promises';
import { join, parse } from 'path';
import { ConversionOptions } from './conversion-options.js';
import { createLogger, Logger } from './logger.js';
import { ShapeConverter } from './shape-converter.js';
import { TableReader } from './table-reader.js';
import { statSource } from './text-source.js';

/**
 * Source path with its extension replaced by `.json`
 */
export function defaultOutputPath(sourcePath: string): string {
  const { dir, name } = parse(sourcePath);
  return join(dir, `${name}.json`);
}

export class CsvConverter {
  private readonly reader: TableReader;
  private readonly shaper: ShapeConverter;
  private readonly logger: Logger;

  constructor(
    reader: TableReader = new TableReader(),
    shaper: ShapeConverter = new ShapeConverter(),
    logger: Logger = createLogger('csv-converter')
  ) {
    this.reader = reader;
    this.shaper = shaper;
    this.logger = logger;
  }

  convertString(csvContent: string, options: ConversionOptions): string {
    const startTime = Date.now();
    const table = this.reader.readText(csvContent, options);
    const json = this.shaper.serialize(table, options);
    this.logger.debug(
      `Converted ${table.rows.length} rows from string as ${options.orient} in ${Date.now() - startTime}ms`
    );
    return json;
  }

  async convertFileToString(
    filePath: string,
    options: ConversionOptions
  ): Promise<string> {
    const startTime = Date.now();
    const table = await this.reader.readFile(filePath, options);
    const json = this.shaper.serialize(table, options);
    this.logger.debug(
      `Converted ${table.rows.length} rows from ${filePath} as ${options.orient} in ${Date.now() - startTime}ms`
    );
    return json;
  }

  /**
   * Convert a CSV file and write the JSON next to it (or to `outputFilePath`).
   * Returns the path written.
   */
  async convertFileToFile(
    filePath: string,
    outputFilePath: string | undefined,
    options: ConversionOptions
  ): Promise<string> {
    const startTime = Date.now();
    await statSource(filePath);

    const target = outputFilePath ?? defaultOutputPath(filePath);
    const table = await this.reader.readFile(filePath, options);
    const json = this.shaper.serialize(table, options);
    await writeFile(target, json, 'utf-8');

    this.logger.debug(
      `Wrote ${table.rows.length} rows from ${filePath} to ${target} as ${options.orient} in ${Date.now() - startTime}ms`
    );
    return target;
  }
}
