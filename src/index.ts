/**
 * csv2json-mcp - CSV to JSON conversion core and MCP server factory
 */

export * from './core/conversion-options.js';
export * from './core/csv-converter.js';
export * from './core/csv-records.js';
export * from './core/envelope.js';
export * from './core/errors.js';
export * from './core/info-inspector.js';
export * from './core/json-writer.js';
export * from './core/shape-converter.js';
export * from './core/table-reader.js';
export { ConfigManager } from './core/config.js';
export { createLogger, setLogLevel } from './core/logger.js';
export type { Logger, LogLevel } from './core/logger.js';
export type { Csv2JsonConfig } from './core/types.js';
export * from './tools/csv-conversion/index.js';
export { createCsv2JsonServer } from './server/create-server.js';
export { buildToolRegistry } from './server/tool-registry.js';
export type { RegisteredTool, ToolRegistry } from './server/tool-registry.js';
