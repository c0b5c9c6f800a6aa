/**
 * Connection Tools
 *
 * Reachability probe and runtime settings for the relay client.
 */

import type { ToolInputSchema } from '../types.js';
import type { RelayClient } from '../relay/client.js';
import { isHttpUrl } from '../config.js';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { requireNumber, requireRecord, requireString } from './args.js';

export interface TestConnectionOutput {
  reachable: boolean;
  webhook_url: string;
}

export interface SettingsOutput {
  webhook_url: string;
  timeout_ms: number;
  chunk_size_bytes: number;
}

function describeSettings(client: RelayClient): SettingsOutput {
  const settings = client.getSettings();
  return {
    webhook_url: settings.webhookUrl,
    timeout_ms: settings.timeoutMs,
    chunk_size_bytes: settings.chunkSizeBytes,
  };
}

/**
 * Execute the test_connection tool
 */
export async function executeTestConnection(client: RelayClient): Promise<TestConnectionOutput> {
  const reachable = await client.testReachability();
  return {
    reachable,
    webhook_url: client.getSettings().webhookUrl,
  };
}

/**
 * Execute the configure tool: chunk size and/or webhook URL
 */
export function executeConfigure(args: unknown, client: RelayClient): SettingsOutput {
  const argsObject = requireRecord(args, 'arguments');
  const sizeValue = argsObject['chunk_size_bytes'];
  const urlValue = argsObject['webhook_url'];

  if (sizeValue === undefined && urlValue === undefined) {
    throw new McpError(
      ErrorCode.InvalidParams,
      'Either chunk_size_bytes or webhook_url must be provided'
    );
  }

  if (urlValue !== undefined) {
    const url = requireString(urlValue, 'webhook_url');
    if (!isHttpUrl(url)) {
      throw new McpError(ErrorCode.InvalidParams, 'webhook_url must be an http:// or https:// URL');
    }
    client.setWebhookUrl(url);
  }

  if (sizeValue !== undefined) {
    client.setChunkSize(requireNumber(sizeValue, 'chunk_size_bytes'));
  }

  return describeSettings(client);
}

export function getConfigureInputSchema(): ToolInputSchema {
  return {
    type: 'object',
    properties: {
      chunk_size_bytes: {
        type: 'number',
        description: 'New chunk size in bytes, clamped to 5120-102400',
      },
      webhook_url: {
        type: 'string',
        description: 'New webhook endpoint (kept in memory only)',
      },
    },
  };
}
