/**
 * Send Tools
 *
 * Relay text or a text file to the webhook, chunking as needed.
 */

import type { AggregateResult, ToolInputSchema } from '../types.js';
import type { RelayClient } from '../relay/client.js';
import {
  optionalNonNegativeInteger,
  optionalRecord,
  requireRecord,
  requireString,
  requireText,
} from './args.js';

export interface SendContentToolInput {
  source_name: string;
  content: string;
  original_byte_size?: number;
  metadata?: Record<string, unknown>;
}

export interface SendFileToolInput {
  path: string;
  metadata?: Record<string, unknown>;
}

export function parseSendContentInput(args: unknown): SendContentToolInput {
  const argsObject = requireRecord(args, 'arguments');
  return {
    source_name: requireString(argsObject['source_name'], 'source_name'),
    content: requireText(argsObject['content'], 'content'),
    original_byte_size: optionalNonNegativeInteger(argsObject['original_byte_size'], 'original_byte_size'),
    metadata: optionalRecord(argsObject['metadata'], 'metadata'),
  };
}

export function parseSendFileInput(args: unknown): SendFileToolInput {
  const argsObject = requireRecord(args, 'arguments');
  return {
    path: requireString(argsObject['path'], 'path'),
    metadata: optionalRecord(argsObject['metadata'], 'metadata'),
  };
}

/**
 * Execute the send_content tool
 */
export async function executeSendContent(
  input: SendContentToolInput,
  client: RelayClient
): Promise<AggregateResult> {
  return client.send(input.source_name, input.content, {
    originalByteSize: input.original_byte_size,
    metadata: input.metadata,
  });
}

/**
 * Execute the send_file tool
 */
export async function executeSendFile(
  input: SendFileToolInput,
  client: RelayClient
): Promise<AggregateResult> {
  return client.sendFile(input.path, { metadata: input.metadata });
}

export function getSendContentInputSchema(): ToolInputSchema {
  return {
    type: 'object',
    properties: {
      source_name: {
        type: 'string',
        description: 'Name the endpoint receives as file_name',
      },
      content: {
        type: 'string',
        description: 'Text to relay',
      },
      original_byte_size: {
        type: 'number',
        description: 'Byte size of the original source. Estimated as 2 bytes per character when omitted.',
      },
      metadata: {
        type: 'object',
        description: 'Extra metadata forwarded with every chunk',
      },
    },
    required: ['source_name', 'content'],
  };
}

export function getSendFileInputSchema(): ToolInputSchema {
  return {
    type: 'object',
    properties: {
      path: {
        type: 'string',
        description: 'Path of a text file to relay',
      },
      metadata: {
        type: 'object',
        description: 'Extra metadata forwarded with every chunk',
      },
    },
    required: ['path'],
  };
}
