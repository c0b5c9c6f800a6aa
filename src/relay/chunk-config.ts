/**
 * Chunk configuration
 *
 * Holds the endpoint, the per-request timeout and the chunk size budget.
 * The budget is always kept inside [MIN_CHUNK_SIZE_BYTES, MAX_CHUNK_SIZE_BYTES].
 */

import type { ChunkSettings } from '../types.js';
import { logger } from '../utils/logger.js';

export const MIN_CHUNK_SIZE_BYTES = 5 * 1024;
export const MAX_CHUNK_SIZE_BYTES = 100 * 1024;
export const DEFAULT_CHUNK_SIZE_BYTES = 50 * 1024;

export interface ChunkConfigInit {
  webhookUrl: string;
  timeoutMs: number;
  chunkSizeBytes?: number;
}

/**
 * Clamp a chunk size into the accepted range, warning when it had to move
 */
export function validateChunkSize(size: number): number {
  if (!Number.isFinite(size)) {
    logger.warn(`Chunk size ${size} is not a number, using default ${DEFAULT_CHUNK_SIZE_BYTES}`);
    return DEFAULT_CHUNK_SIZE_BYTES;
  }

  const rounded = Math.floor(size);

  if (rounded < MIN_CHUNK_SIZE_BYTES) {
    logger.warn(`Chunk size ${size} too small, using minimum ${MIN_CHUNK_SIZE_BYTES}`);
    return MIN_CHUNK_SIZE_BYTES;
  }

  if (rounded > MAX_CHUNK_SIZE_BYTES) {
    logger.warn(`Chunk size ${size} too large, using maximum ${MAX_CHUNK_SIZE_BYTES}`);
    return MAX_CHUNK_SIZE_BYTES;
  }

  return rounded;
}

export class ChunkConfig {
  private webhookUrl: string;
  private readonly timeoutMs: number;
  private chunkSizeBytes: number;

  constructor(init: ChunkConfigInit) {
    this.webhookUrl = init.webhookUrl.trim();
    this.timeoutMs = init.timeoutMs;
    this.chunkSizeBytes = validateChunkSize(init.chunkSizeBytes ?? DEFAULT_CHUNK_SIZE_BYTES);
  }

  get chunkSize(): number {
    return this.chunkSizeBytes;
  }

  get endpoint(): string {
    return this.webhookUrl;
  }

  /**
   * Replace the budget. Jobs already running keep their snapshot.
   */
  setChunkSize(size: number): number {
    const previous = this.chunkSizeBytes;
    this.chunkSizeBytes = validateChunkSize(size);
    logger.info(`Chunk size changed: ${previous} -> ${this.chunkSizeBytes} bytes`);
    return this.chunkSizeBytes;
  }

  setWebhookUrl(url: string): void {
    this.webhookUrl = url.trim();
    logger.info(`Webhook URL set to ${this.webhookUrl || '(none)'}`);
  }

  snapshot(): ChunkSettings {
    return Object.freeze({
      webhookUrl: this.webhookUrl,
      timeoutMs: this.timeoutMs,
      chunkSizeBytes: this.chunkSizeBytes,
    });
  }
}
