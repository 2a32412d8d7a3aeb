/**
 * Shape Converter - reshape a Table into records, values or split JSON
 */

import { ConversionOptions, Orient } from './conversion-options.js';
import { JsonNode, OrderedObject, writeJson } from './json-writer.js';
import { Table } from './table-reader.js';

export class ShapeConverter {
  /**
   * Build the JSON tree for `orient`
   */
  shape(table: Table, orient: Orient): JsonNode {
    switch (orient) {
      case 'records':
        return this.toRecords(table);
      case 'values':
        return table.rows;
      case 'split':
        return new OrderedObject([
          ['columns', table.header],
          ['data', table.rows],
        ]);
    }
  }

  /**
   * One object per row; rows whose width differs from the header are dropped
   */
  toRecords(table: Table): OrderedObject[] {
    const width = table.header.length;
    return table.rows
      .filter((row) => row.length === width)
      .map((row) => OrderedObject.from(table.header, row));
  }

  serialize(
    table: Table,
    options: Pick<ConversionOptions, 'orient' | 'indent'>
  ): string {
    return writeJson(this.shape(table, options.orient), options.indent);
  }
}
