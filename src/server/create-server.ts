import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  CallToolResult,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { FailureEnvelope } from '../core/envelope.js';
import { toJsonNode, writeJson } from '../core/json-writer.js';
import { Csv2JsonConfig } from '../core/types.js';
import { buildToolRegistry, ToolRegistry } from './tool-registry.js';

// Written with the ordered writer so sample records keep header order
function toToolResult(envelope: { success: boolean }): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: writeJson(toJsonNode(envelope), 2),
      },
    ],
    isError: !envelope.success,
  };
}

/**
 * Create the MCP server with the CSV tools registered. The registry is
 * built once and reused for every request.
 */
export function createCsv2JsonServer(
  serverInfo: Csv2JsonConfig['server'],
  registry: ToolRegistry = buildToolRegistry()
): Server {
  const server = new Server(
    {
      name: serverInfo.name,
      version: serverInfo.version,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: Array.from(registry.values(), (tool) => tool.definition),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const tool = registry.get(name);

    if (!tool) {
      const unknownTool: FailureEnvelope = {
        success: false,
        error_type: 'Unknown',
        error: `Unknown tool: ${name}`,
        message: 'Unknown tool',
      };
      return toToolResult(unknownTool);
    }

    return toToolResult(await tool.handle(args ?? {}));
  });

  return server;
}
