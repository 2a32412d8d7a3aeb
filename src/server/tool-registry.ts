/**
 * Tool registration table, built once at startup.
 *
 * Maps each operation name to its handler. Handlers hold no per-call state,
 * so concurrent invocations share nothing.
 */

import { Tool } from '@modelcontextprotocol/sdk/types.js';
import { CsvConverter } from '../core/csv-converter.js';
import { Envelope } from '../core/envelope.js';
import { InfoInspector } from '../core/info-inspector.js';
import { createLogger, Logger } from '../core/logger.js';
import {
  getConvertCsvFileTool,
  getConvertCsvFileToStringTool,
  getConvertCsvStringTool,
  getCsvInfoTool,
} from '../tools/csv-conversion/index.js';

export interface RegisteredTool {
  readonly definition: Tool;
  handle(args: unknown): Promise<Envelope<object>>;
}

export type ToolRegistry = ReadonlyMap<string, RegisteredTool>;

export interface ToolRegistryDeps {
  converter?: CsvConverter;
  inspector?: InfoInspector;
  logger?: Logger;
}

/**
 * Wrap a tool so every invocation is logged with its outcome and duration
 */
function withLogging(tool: RegisteredTool, logger: Logger): RegisteredTool {
  return {
    definition: tool.definition,
    async handle(args: unknown) {
      const startTime = Date.now();
      const result = await tool.handle(args);
      const duration = Date.now() - startTime;
      if (result.success) {
        logger.info(`${tool.definition.name} succeeded in ${duration}ms`);
      } else {
        logger.warn(
          `${tool.definition.name} failed in ${duration}ms: [${result.error_type}] ${result.error}`
        );
      }
      return result;
    },
  };
}

export function buildToolRegistry(deps: ToolRegistryDeps = {}): ToolRegistry {
  const converter = deps.converter ?? new CsvConverter();
  const inspector = deps.inspector ?? new InfoInspector();
  const logger = deps.logger ?? createLogger('tools');

  const tools: RegisteredTool[] = [
    getConvertCsvFileTool(converter),
    getConvertCsvStringTool(converter),
    getConvertCsvFileToStringTool(converter),
    getCsvInfoTool(inspector),
  ];

  return new Map(
    tools.map((tool) => [tool.definition.name, withLogging(tool, logger)] as const)
  );
}
