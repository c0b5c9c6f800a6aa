/**
 * Relay pipeline: public API
 */

import { getConfig } from '../config.js';
import { RelayClient } from './client.js';

export { RelayClient, REACHABLE_STATUSES } from './client.js';
export type { RelayClientOptions, SendFileOptions } from './client.js';
export {
  ChunkConfig,
  validateChunkSize,
  MIN_CHUNK_SIZE_BYTES,
  MAX_CHUNK_SIZE_BYTES,
  DEFAULT_CHUNK_SIZE_BYTES,
} from './chunk-config.js';
export { sendPiece, sendAll, buildPayload, SUCCESS_STATUSES } from './dispatcher.js';
export type { DispatchContext, SendAllOptions, WebhookPayload } from './dispatcher.js';
export {
  calculateChunkCount,
  splitContent,
  splitIntoPieces,
  planChunks,
} from '../processing/chunker.js';
export { extractResponseText, RESPONSE_TEXT_KEYS } from '../processing/response-parser.js';
export { combineOutcomes, ALL_EMPTY_TEXT } from '../processing/aggregator.js';
export { postJson } from '../fetcher/webhook-transport.js';

// Singleton client built from the environment configuration
let clientInstance: RelayClient | null = null;

export function getRelayClient(): RelayClient {
  if (!clientInstance) {
    const config = getConfig();
    clientInstance = new RelayClient({
      webhookUrl: config.webhookUrl,
      timeoutMs: config.timeoutMs,
      chunkSizeBytes: config.chunkSizeBytes,
      probeTimeoutMs: config.probeTimeoutMs,
      userAgent: config.userAgent,
    });
  }
  return clientInstance;
}

export function resetRelayClient(): void {
  clientInstance = null;
}
