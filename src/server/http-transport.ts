/**
 * Streamable HTTP transport (stateless): every POST gets a fresh server and
 * transport pair that is closed when the response ends.
 */

import { Server as HttpServer } from 'http';
import express, { Request, Response } from 'express';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { createLogger } from '../core/logger.js';
import { Csv2JsonConfig } from '../core/types.js';
import { createCsv2JsonServer } from './create-server.js';
import { ToolRegistry } from './tool-registry.js';

const logger = createLogger('http');

function methodNotAllowed(_req: Request, res: Response): void {
  res.status(405).json({
    jsonrpc: '2.0',
    error: {
      code: -32000,
      message: 'Method not allowed.',
    },
    id: null,
  });
}

export function createHttpApp(
  config: Csv2JsonConfig,
  registry: ToolRegistry
): express.Express {
  const app = express();
  app.use(express.json({ limit: '50mb' }));

  app.post(config.transport.path, async (req: Request, res: Response) => {
    const server = createCsv2JsonServer(config.server, registry);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });

    res.on('close', () => {
      transport.close().catch((error) => {
        logger.error('Failed to close transport:', error);
      });
      server.close().catch((error) => {
        logger.error('Failed to close server:', error);
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error('Error handling MCP request:', error);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: {
            code: -32603,
            message: 'Internal server error',
          },
          id: null,
        });
      }
    }
  });

  app.get(config.transport.path, methodNotAllowed);
  app.delete(config.transport.path, methodNotAllowed);

  return app;
}

export function startHttpServer(
  config: Csv2JsonConfig,
  registry: ToolRegistry
): Promise<HttpServer> {
  const app = createHttpApp(config, registry);
  const { host, port, path } = config.transport;

  return new Promise((resolve, reject) => {
    const httpServer = app.listen(port, host, () => {
      logger.info(`Listening on http://${host}:${port}${path}`);
      resolve(httpServer);
    });
    httpServer.on('error', reject);
  });
}
