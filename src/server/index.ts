#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ConfigManager } from '../core/config.js';
import { createLogger, setLogLevel } from '../core/logger.js';
import { parseServerArgs } from './cli-args.js';
import { createCsv2JsonServer } from './create-server.js';
import { startHttpServer } from './http-transport.js';
import { buildToolRegistry } from './tool-registry.js';

const logger = createLogger('server');

// Start server
async function main() {
  const configManager = new ConfigManager();
  configManager.update(parseServerArgs(process.argv.slice(2)));
  const config = configManager.get();
  setLogLevel(config.logging.level);

  const registry = buildToolRegistry();

  process.on('SIGINT', () => {
    process.exit(0);
  });

  process.on('SIGTERM', () => {
    process.exit(0);
  });

  if (config.transport.mode === 'http') {
    logger.info(`Starting ${config.server.name} ${config.server.version} (http)`);
    await startHttpServer(config, registry);
    return;
  }

  logger.info(`Starting ${config.server.name} ${config.server.version} (stdio)`);
  const server = createCsv2JsonServer(config.server, registry);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  logger.error('Server error:', error);
  process.exit(1);
});
