/**
 * Aggregator
 *
 * Folds the per-piece outcomes of one job into a single result.
 * Contents are joined raw, without headers or footers.
 */

import type {
  AggregateResult,
  ContentReceived,
  EmptyAccepted,
  OutcomeCounts,
  PieceFailed,
  PieceFailure,
  PieceOutcome,
  RelayError,
} from '../types.js';
import { logger } from '../utils/logger.js';

export const PIECE_SEPARATOR = '\n\n';

export const ALL_EMPTY_TEXT =
  '[All chunks processed but no content returned - the endpoint may still be processing]';

export function contentReceived(index: number, text: string): ContentReceived {
  const outcome: ContentReceived = { kind: 'content', index, text };
  return Object.freeze(outcome);
}

export function emptyAccepted(index: number): EmptyAccepted {
  const outcome: EmptyAccepted = { kind: 'empty', index };
  return Object.freeze(outcome);
}

export function pieceFailed(index: number, error: RelayError): PieceFailed {
  const outcome: PieceFailed = { kind: 'failed', index, error: Object.freeze({ ...error }) };
  return Object.freeze(outcome);
}

/**
 * Join content texts in piece order. One text is returned verbatim.
 */
export function joinContents(texts: string[]): string {
  if (texts.length === 1) {
    return texts[0] ?? '';
  }
  return texts.join(PIECE_SEPARATOR);
}

export function formatFailures(failures: PieceFailure[]): string {
  return failures.map(f => `Chunk ${f.index}: ${f.message}`).join(', ');
}

export interface CombineOptions {
  /** Set when the caller stopped the job before every piece was sent */
  cancelled?: boolean;
}

/**
 * Combine outcomes into the job result.
 *
 * Success when at least one piece returned content, or when every
 * dispatched piece was accepted empty with no failures.
 */
export function combineOutcomes(
  outcomes: readonly PieceOutcome[],
  totalChunks: number,
  options: CombineOptions = {}
): AggregateResult {
  const ordered = [...outcomes].sort((a, b) => a.index - b.index);

  const texts: string[] = [];
  const emptyIndices: number[] = [];
  const failures: PieceFailure[] = [];

  for (const outcome of ordered) {
    switch (outcome.kind) {
      case 'content':
        texts.push(outcome.text);
        break;
      case 'empty':
        emptyIndices.push(outcome.index);
        break;
      case 'failed':
        failures.push({
          index: outcome.index,
          code: outcome.error.code,
          message: outcome.error.message,
        });
        break;
    }
  }

  const counts: OutcomeCounts = {
    content: texts.length,
    empty: emptyIndices.length,
    failed: failures.length,
  };
  const cancelled = options.cancelled ?? false;
  const errorSummary = failures.length > 0 ? formatFailures(failures) : undefined;

  if (emptyIndices.length > 0) {
    logger.info(`Chunks with empty responses (async pattern): ${emptyIndices.join(', ')}`);
  }

  if (texts.length === 0) {
    if (failures.length === 0 && emptyIndices.length > 0) {
      logger.warn(`All ${emptyIndices.length} chunks returned empty (endpoint still processing?)`);
      return {
        success: true,
        text: ALL_EMPTY_TEXT,
        failures,
        counts,
        total_chunks: totalChunks,
        cancelled,
      };
    }

    const message =
      `Failed to get content from chunks: ${failures.length} failed, ${emptyIndices.length} empty` +
      (errorSummary ? ` (${errorSummary})` : '');
    logger.error(message);
    return {
      success: false,
      error: { code: 'AGGREGATE_FAILURE', message },
      ...(errorSummary ? { error_summary: errorSummary } : {}),
      failures,
      counts,
      total_chunks: totalChunks,
      cancelled,
    };
  }

  if (errorSummary) {
    logger.warn(`${failures.length} of ${totalChunks} chunks failed - ${errorSummary}`);
  }

  logger.info(`Successfully extracted content from ${texts.length}/${totalChunks} chunks`);

  return {
    success: true,
    text: joinContents(texts),
    ...(errorSummary ? { error_summary: errorSummary } : {}),
    failures,
    counts,
    total_chunks: totalChunks,
    cancelled,
  };
}
