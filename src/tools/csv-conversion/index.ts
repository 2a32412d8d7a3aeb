/**
 * CSV Conversion Tools - CSV to JSON as MCP tools
 */

export * from './csv-tool.js';
export * from './convert-csv-file.js';
export * from './convert-csv-string.js';
export * from './convert-csv-file-to-string.js';
export * from './get-csv-info.js';
