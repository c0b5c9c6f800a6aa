/**
 * Plan Tool
 *
 * Shows how content would be split, without contacting the endpoint.
 */

import type { ChunkPlan, ToolInputSchema } from '../types.js';
import type { RelayClient } from '../relay/client.js';
import { planChunks } from '../processing/chunker.js';
import { validateChunkSize } from '../relay/chunk-config.js';
import { optionalNonNegativeInteger, requireRecord, requireText } from './args.js';

export interface PlanToolInput {
  content: string;
  original_byte_size?: number;
  chunk_size_bytes?: number;
}

export interface PlanToolOutput {
  success: boolean;
  plan?: ChunkPlan;
  estimated_byte_size: boolean;
  error?: {
    code: string;
    message: string;
  };
}

export function parsePlanInput(args: unknown): PlanToolInput {
  const argsObject = requireRecord(args, 'arguments');
  return {
    content: requireText(argsObject['content'], 'content'),
    original_byte_size: optionalNonNegativeInteger(argsObject['original_byte_size'], 'original_byte_size'),
    chunk_size_bytes: optionalNonNegativeInteger(argsObject['chunk_size_bytes'], 'chunk_size_bytes'),
  };
}

/**
 * Execute the plan_chunks tool
 */
export function executePlan(input: PlanToolInput, client: RelayClient): PlanToolOutput {
  const estimated = input.original_byte_size === undefined;
  const originalByteSize = input.original_byte_size ?? input.content.length * 2;
  const chunkSizeBytes = input.chunk_size_bytes === undefined
    ? client.getSettings().chunkSizeBytes
    : validateChunkSize(input.chunk_size_bytes);

  try {
    return {
      success: true,
      plan: planChunks(input.content, originalByteSize, chunkSizeBytes),
      estimated_byte_size: estimated,
    };
  } catch (err) {
    return {
      success: false,
      estimated_byte_size: estimated,
      error: {
        code: 'PLAN_ERROR',
        message: err instanceof Error ? err.message : 'Failed to plan chunks',
      },
    };
  }
}

export function getPlanInputSchema(): ToolInputSchema {
  return {
    type: 'object',
    properties: {
      content: {
        type: 'string',
        description: 'Text to split',
      },
      original_byte_size: {
        type: 'number',
        description: 'Byte size of the original source. Estimated as 2 bytes per character when omitted.',
      },
      chunk_size_bytes: {
        type: 'number',
        description: 'Chunk size to plan with (clamped to 5120-102400). Defaults to the current setting.',
      },
    },
    required: ['content'],
  };
}
