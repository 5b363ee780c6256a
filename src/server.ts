/**
 * MCP server exposing the timetree tools on stdio
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { logger } from './utils/logger.js';
import { getConfig } from './config/index.js';
import { getDatabase, resetDatabase } from './services/db/manager.js';
import { handleToolCall, getToolDefinitions } from './tools/index.js';

export function createServer(): Server {
  const server = new Server(
    {
      name: 'timetree',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // Register tool listing handler
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: getToolDefinitions(),
    };
  });

  // Register tool call handler
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    logger.debug(`Tool call: ${name}`, args);

    try {
      const result = await handleToolCall(name, args ?? {});
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify(result, null, 2),
          },
        ],
        isError: !result.success,
      };
    } catch (error) {
      logger.error(`Tool error: ${name}`, error);
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify({
              success: false,
              error: error instanceof Error ? error.message : String(error),
            }),
          },
        ],
        isError: true,
      };
    }
  });

  return server;
}

// Graceful shutdown handler
function shutdown(): void {
  logger.info('Shutting down...');
  resetDatabase();
  logger.info('Shutdown complete');
  process.exit(0);
}

/**
 * Open the database and serve until stdin closes or a signal arrives
 */
export async function startServer(): Promise<void> {
  const config = getConfig();
  logger.info('Starting timetree MCP server', {
    dbPath: config.dbPath,
    logLevel: logger.getLevel(),
  });

  // Fail early on an unusable database
  getDatabase();

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('Server connected with stdio transport');
}
