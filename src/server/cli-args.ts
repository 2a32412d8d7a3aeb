import { isLogLevel } from '../core/logger.js';
import { Csv2JsonConfigOverrides } from '../core/types.js';

/**
 * Parse process arguments into config overrides.
 *
 * Recognised: --http, --stdio, --host <host>, --port <port>,
 * --log-level <level>. Anything else is ignored.
 */
export function parseServerArgs(argv: readonly string[]): Csv2JsonConfigOverrides {
  const transport: NonNullable<Csv2JsonConfigOverrides['transport']> = {};
  const logging: NonNullable<Csv2JsonConfigOverrides['logging']> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    switch (arg) {
      case '--http':
        transport.mode = 'http';
        break;
      case '--stdio':
        transport.mode = 'stdio';
        break;
      case '--host':
        if (next !== undefined) {
          transport.host = next;
          i++;
        }
        break;
      case '--port': {
        const port = Number(next);
        if (Number.isInteger(port) && port > 0 && port <= 65535) {
          transport.port = port;
          i++;
        }
        break;
      }
      case '--log-level':
        if (next !== undefined && isLogLevel(next)) {
          logging.level = next;
          i++;
        }
        break;
    }
  }

  const overrides: Csv2JsonConfigOverrides = {};
  if (Object.keys(transport).length > 0) overrides.transport = transport;
  if (Object.keys(logging).length > 0) overrides.logging = logging;
  return overrides;
}
