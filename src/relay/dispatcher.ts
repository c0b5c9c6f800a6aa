/**
 * Chunk Dispatcher
 *
 * Sends pieces to the webhook one at a time, in index order, and turns
 * every response into an outcome. A failed piece never stops the batch.
 */

import type {
  AggregateResult,
  ChunkSettings,
  LastResponse,
  Piece,
  PieceOutcome,
  TransportResultSuccess,
  WebhookTransport,
} from '../types.js';
import { extractResponseText, parseResponseBody } from '../processing/response-parser.js';
import {
  combineOutcomes,
  contentReceived,
  emptyAccepted,
  pieceFailed,
} from '../processing/aggregator.js';
import { logger } from '../utils/logger.js';
import { preview, truncate } from '../utils/format.js';

const ERROR_BODY_CHARS = 200;

/** Statuses that carry a usable reply; other 2xx codes are treated as errors */
export const SUCCESS_STATUSES: ReadonlySet<number> = new Set([200, 201, 202]);

export interface DispatchContext {
  settings: ChunkSettings;
  transport: WebhookTransport;
  userAgent?: string;
  /** Receives every HTTP exchange, for diagnostics */
  onResponse?: (response: LastResponse) => void;
}

export interface SendAllOptions {
  shouldContinue?: () => boolean;
}

export interface WebhookPayload {
  file_name: string;
  content: string;
  timestamp: string;
  metadata?: Record<string, unknown>;
  chunk_number?: number;
  total_chunks?: number;
}

/**
 * Build the request body for one piece. Position fields are only set
 * when the job has more than one piece.
 */
export function buildPayload(piece: Piece, now: Date = new Date()): WebhookPayload {
  const payload: WebhookPayload = {
    file_name: piece.source_name,
    content: piece.text,
    timestamp: now.toISOString(),
  };

  if (piece.total > 1) {
    payload.chunk_number = piece.index;
    payload.total_chunks = piece.total;
    payload.metadata = {
      ...(piece.metadata ?? {}),
      chunk_index: piece.index,
      total_chunks: piece.total,
    };
  } else if (piece.metadata && Object.keys(piece.metadata).length > 0) {
    payload.metadata = { ...piece.metadata };
  }

  return payload;
}

function notRegisteredMessage(body: string): string | null {
  if (!body.includes('not registered')) {
    return null;
  }
  const parsed = parseResponseBody(body);
  if (typeof parsed === 'object' && parsed !== null && 'message' in parsed &&
      typeof parsed.message === 'string') {
    return parsed.message;
  }
  return 'Webhook not registered';
}

function classifyResponse(piece: Piece, response: TransportResultSuccess): PieceOutcome {
  const { status, body } = response;

  if (status === 404) {
    const message = notRegisteredMessage(body);
    if (message) {
      const error = `Webhook returned 404: ${message}`;
      logger.error(error);
      return pieceFailed(piece.index, {
        code: 'WEBHOOK_NOT_REGISTERED',
        message: error,
        status_code: status,
      });
    }
  }

  if (!SUCCESS_STATUSES.has(status)) {
    const error = `Webhook returned ${status}: ${truncate(body, ERROR_BODY_CHARS)}`;
    logger.error(error);
    return pieceFailed(piece.index, {
      code: 'HTTP_ERROR',
      message: error,
      status_code: status,
    });
  }

  const parsed = parseResponseBody(body);
  logger.debug(`Response body: ${preview(parsed)}`);

  const text = extractResponseText(parsed);
  if (text === null) {
    logger.info(`Webhook returned ${status} with empty response (async processing pattern)`);
    return emptyAccepted(piece.index);
  }

  logger.info(`Successfully received response from webhook (Status: ${status})`);
  return contentReceived(piece.index, text);
}

/**
 * Send one piece and classify the result
 */
export async function sendPiece(piece: Piece, context: DispatchContext): Promise<PieceOutcome> {
  const { settings, transport } = context;

  if (!settings.webhookUrl) {
    const error = 'Webhook URL not configured';
    logger.error(error);
    return pieceFailed(piece.index, { code: 'CONFIGURATION_ERROR', message: error });
  }

  if (piece.total > 1) {
    logger.debug(`Sending chunk ${piece.index}/${piece.total}`);
  }
  logger.info(`Sending to webhook: ${settings.webhookUrl}`);

  const result = await transport(settings.webhookUrl, buildPayload(piece), {
    timeoutMs: settings.timeoutMs,
    userAgent: context.userAgent,
  });

  if (!result.success) {
    logger.error(result.error.message);
    return pieceFailed(piece.index, {
      code: result.error.code,
      message: result.error.message,
    });
  }

  context.onResponse?.({
    status: result.status,
    body_excerpt: truncate(result.body, ERROR_BODY_CHARS),
    received_at: new Date().toISOString(),
  });

  return classifyResponse(piece, result);
}

/**
 * Send every piece strictly in order and combine the outcomes
 */
export async function sendAll(
  pieces: readonly Piece[],
  context: DispatchContext,
  options: SendAllOptions = {}
): Promise<AggregateResult> {
  const ordered = [...pieces].sort((a, b) => a.index - b.index);
  const total = ordered.length;
  const outcomes: PieceOutcome[] = [];
  let cancelled = false;

  for (const piece of ordered) {
    if (outcomes.length > 0 && options.shouldContinue && !options.shouldContinue()) {
      logger.warn(`Job cancelled after ${outcomes.length}/${total} chunks`);
      cancelled = true;
      break;
    }

    logger.info(`Processing chunk ${piece.index}/${total} (${piece.text.length} chars)`);
    const outcome = await sendPiece(piece, context);

    switch (outcome.kind) {
      case 'content':
        logger.info(`Chunk ${piece.index} completed successfully with content`);
        break;
      case 'empty':
        logger.info(`Chunk ${piece.index} returned empty (async pattern - treated as success)`);
        break;
      case 'failed':
        logger.error(`Chunk ${piece.index} failed: ${outcome.error.message}`);
        break;
    }

    outcomes.push(outcome);
  }

  return combineOutcomes(outcomes, total, { cancelled });
}
