#!/usr/bin/env node

/**
 * chunk-relay-mcp
 *
 * MCP server that relays large text payloads to a webhook in chunks
 * and returns one combined result.
 */

import 'dotenv/config';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ErrorCode,
} from '@modelcontextprotocol/sdk/types.js';

import type { ToolDefinition } from './types.js';
import { loadConfig, validateConfig } from './config.js';
import { getRelayClient } from './relay/index.js';
import { setLogLevel, logger } from './utils/logger.js';
import {
  executeSendContent,
  executeSendFile,
  getSendContentInputSchema,
  getSendFileInputSchema,
  parseSendContentInput,
  parseSendFileInput,
} from './tools/send.js';
import { executePlan, getPlanInputSchema, parsePlanInput } from './tools/plan.js';
import {
  executeConfigure,
  executeTestConnection,
  getConfigureInputSchema,
} from './tools/connection.js';

// Tool definitions
const TOOLS: ToolDefinition[] = [
  {
    name: 'send_content',
    description: `Send text to the configured webhook and return its combined response.

Content larger than the chunk size (measured in bytes of the original source) is split
at paragraph, line or word boundaries and sent as numbered chunks, one at a time.
Responses are combined in chunk order, separated by a blank line.

Empty 2xx responses mean the endpoint is still processing and are not errors.`,
    inputSchema: getSendContentInputSchema(),
  },
  {
    name: 'send_file',
    description: `Read a text file (UTF-8, UTF-16 or latin1) and send it like send_content.
The file's size on disk decides how many chunks are needed.`,
    inputSchema: getSendFileInputSchema(),
  },
  {
    name: 'plan_chunks',
    description: 'Preview how content would be split into chunks, without sending anything.',
    inputSchema: getPlanInputSchema(),
  },
  {
    name: 'test_connection',
    description: 'Probe the webhook. 2xx, 400 and 404 responses count as reachable.',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'configure',
    description: 'Change the chunk size or webhook URL for subsequent sends.',
    inputSchema: getConfigureInputSchema(),
  },
];

function jsonResult(result: unknown, isError: boolean) {
  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify(result, null, 2),
      },
    ],
    isError,
  };
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  // Load and validate configuration
  const config = loadConfig();
  const configErrors = validateConfig(config);

  if (configErrors.length > 0) {
    logger.error('Configuration errors:');
    configErrors.forEach(err => logger.error(`  - ${err}`));
    process.exit(1);
  }

  setLogLevel(config.logLevel);
  if (!config.webhookUrl) {
    logger.warn('WEBHOOK_URL is not set; use the configure tool before sending');
  }

  const client = getRelayClient();

  // Create MCP server
  const server = new Server(
    {
      name: 'chunk-relay-mcp',
      version: '1.0.0',
    },
    {
      capabilities: {
        tools: {
          listChanged: false,
        },
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOLS };
  });

  // Handle tool calls
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      switch (name) {
        case 'send_content': {
          const result = await executeSendContent(parseSendContentInput(args), client);
          return jsonResult(result, !result.success);
        }

        case 'send_file': {
          const result = await executeSendFile(parseSendFileInput(args), client);
          return jsonResult(result, !result.success);
        }

        case 'plan_chunks': {
          const result = executePlan(parsePlanInput(args), client);
          return jsonResult(result, !result.success);
        }

        case 'test_connection': {
          const result = await executeTestConnection(client);
          return jsonResult(result, !result.reachable);
        }

        case 'configure': {
          const result = executeConfigure(args, client);
          return jsonResult(result, false);
        }

        default:
          throw new McpError(ErrorCode.InvalidParams, `Unknown tool: ${name}`);
      }
    } catch (err) {
      if (err instanceof McpError) {
        throw err;
      }
      return jsonResult({
        success: false,
        error: {
          code: 'TOOL_ERROR',
          message: err instanceof Error ? err.message : 'Unknown error',
        },
      }, true);
    }
  });

  // Handle graceful shutdown
  const shutdown = async () => {
    logger.info('Shutting down...');
    await server.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  // Start server
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('chunk-relay-mcp server started');
}

// Run
main().catch((err) => {
  logger.error('Fatal error:', err);
  process.exit(1);
});
