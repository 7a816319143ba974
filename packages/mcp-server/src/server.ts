import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { handleToolCall } from './handlers.js';
import type { Services } from './handlers.js';
import { tools } from './tools.js';
import { formatErrorResponse, isErrorResponse, safeErrorHandler } from './utils/errors.js';

export const SERVER_NAME = 'manuscript-assembler-mcp';
export const SERVER_VERSION = '1.0.0';

/**
 * Create the MCP server with its tool list and call handler.
 */
export function createServer(services: Services): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // Handle tool list requests
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools };
  });

  // Handle tool execution
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      const result = await handleToolCall(name, args ?? {}, services);
      return {
        content: [{
          type: 'text',
          text: JSON.stringify(result, null, 2),
        }],
        isError: isErrorResponse(result),
      };
    } catch (error) {
      services.logger.error(`Tool ${name} failed`, error instanceof Error ? error : undefined);
      return {
        content: [{
          type: 'text',
          text: formatErrorResponse(safeErrorHandler(error, `run ${name}`, { tool: name })),
        }],
        isError: true,
      };
    }
  });

  return server;
}
