/**
 * Relay Client
 *
 * Entry point for callers: decides whether a payload needs chunking,
 * runs the job against a settings snapshot, and reports one result.
 */

import type {
  AggregateResult,
  ChunkSettings,
  LastResponse,
  Piece,
  PieceMetadata,
  PieceOutcome,
  SendOptions,
  WebhookTransport,
} from '../types.js';
import { ChunkConfig } from './chunk-config.js';
import { sendAll, sendPiece, type DispatchContext } from './dispatcher.js';
import { calculateChunkCount, splitIntoPieces } from '../processing/chunker.js';
import { combineOutcomes, formatFailures } from '../processing/aggregator.js';
import { postJson } from '../fetcher/webhook-transport.js';
import { readTextFile } from '../utils/file-reader.js';
import { logger } from '../utils/logger.js';
import { formatKb } from '../utils/format.js';

/** Statuses that count as "reachable" for the probe; test webhooks may 404 */
export const REACHABLE_STATUSES: ReadonlySet<number> = new Set([200, 201, 202, 400, 404]);

export interface RelayClientOptions {
  webhookUrl: string;
  timeoutMs: number;
  chunkSizeBytes?: number;
  probeTimeoutMs?: number;
  userAgent?: string;
  transport?: WebhookTransport;
}

export interface SendFileOptions {
  metadata?: PieceMetadata;
  shouldContinue?: () => boolean;
}

export class RelayClient {
  private readonly config: ChunkConfig;
  private readonly transport: WebhookTransport;
  private readonly probeTimeoutMs: number;
  private readonly userAgent: string | undefined;
  private lastResponse: LastResponse | null = null;

  constructor(options: RelayClientOptions) {
    this.config = new ChunkConfig({
      webhookUrl: options.webhookUrl,
      timeoutMs: options.timeoutMs,
      chunkSizeBytes: options.chunkSizeBytes,
    });
    this.transport = options.transport ?? postJson;
    this.probeTimeoutMs = options.probeTimeoutMs ?? 5000;
    this.userAgent = options.userAgent;

    logger.info(
      `RelayClient initialized with chunk_size=${this.config.chunkSize} bytes (${formatKb(this.config.chunkSize)})`
    );
  }

  /**
   * Send content, chunking it when its source is larger than the budget
   */
  async send(
    sourceName: string,
    content: string,
    options: SendOptions = {}
  ): Promise<AggregateResult> {
    const settings = this.config.snapshot();
    const context = this.createContext(settings);

    let originalByteSize = options.originalByteSize;
    if (originalByteSize === undefined || !Number.isFinite(originalByteSize)) {
      // Rough guess; multi-byte text makes this inaccurate
      const estimate = content.length * 2;
      logger.warn(
        originalByteSize === undefined
          ? `originalByteSize not provided, estimating as ${estimate} bytes (${formatKb(estimate)})`
          : `originalByteSize ${originalByteSize} is not usable, estimating as ${estimate} bytes (${formatKb(estimate)})`
      );
      originalByteSize = estimate;
    }

    logger.info(`Processing: ${sourceName}`);
    logger.info(`  File size: ${originalByteSize} bytes (${formatKb(originalByteSize)})`);
    logger.info(`  Content: ${content.length} characters`);
    logger.info(`  Chunk strategy: ${settings.chunkSizeBytes} bytes (${formatKb(settings.chunkSizeBytes)}) per chunk`);

    if (!settings.webhookUrl) {
      const message = 'Webhook URL not configured';
      logger.error(message);
      return {
        success: false,
        error: { code: 'CONFIGURATION_ERROR', message },
        failures: [],
        counts: { content: 0, empty: 0, failed: 0 },
        total_chunks: 0,
        cancelled: false,
      };
    }

    if (calculateChunkCount(originalByteSize, settings.chunkSizeBytes) === 1) {
      logger.info(`File size (${formatKb(originalByteSize)}) within chunk limit, sending as single chunk`);
      const piece: Piece = {
        index: 1,
        total: 1,
        text: content,
        source_name: sourceName,
        ...(options.metadata ? { metadata: options.metadata } : {}),
      };
      return this.singlePieceResult(await sendPiece(piece, context));
    }

    const pieces = splitIntoPieces(
      sourceName,
      content,
      originalByteSize,
      settings.chunkSizeBytes,
      options.metadata
    );
    logger.info(`File exceeds chunk size, split into ${pieces.length} chunks`);

    return sendAll(pieces, context, { shouldContinue: options.shouldContinue });
  }

  /**
   * Read a text file and send it, using its size on disk for chunking
   */
  async sendFile(filePath: string, options: SendFileOptions = {}): Promise<AggregateResult> {
    const file = await readTextFile(filePath);

    if (!file.success) {
      return {
        success: false,
        error: file.error,
        failures: [],
        counts: { content: 0, empty: 0, failed: 0 },
        total_chunks: 0,
        cancelled: false,
      };
    }

    const { name, content, size_bytes, lines } = file.file;
    return this.send(name, content, {
      originalByteSize: size_bytes,
      metadata: { size_bytes, lines, ...(options.metadata ?? {}) },
      shouldContinue: options.shouldContinue,
    });
  }

  /**
   * Fire a minimal probe at the endpoint
   */
  async testReachability(): Promise<boolean> {
    const { webhookUrl } = this.config.snapshot();
    if (!webhookUrl) {
      logger.error('Connection test failed: webhook URL not configured');
      return false;
    }

    logger.info(`Testing connection to ${webhookUrl}`);
    const result = await this.transport(webhookUrl, { test: true }, {
      timeoutMs: this.probeTimeoutMs,
      userAgent: this.userAgent,
    });

    if (!result.success) {
      logger.error(`Connection test failed: ${result.error.message}`);
      return false;
    }

    const reachable = REACHABLE_STATUSES.has(result.status);
    if (reachable) {
      logger.info('Webhook connection test passed');
    } else {
      logger.warn(`Webhook returned unexpected status during test: ${result.status}`);
    }
    return reachable;
  }

  setChunkSize(size: number): number {
    return this.config.setChunkSize(size);
  }

  setWebhookUrl(url: string): void {
    this.config.setWebhookUrl(url);
  }

  getSettings(): ChunkSettings {
    return this.config.snapshot();
  }

  getLastResponse(): LastResponse | null {
    return this.lastResponse;
  }

  private createContext(settings: ChunkSettings): DispatchContext {
    return {
      settings,
      transport: this.transport,
      userAgent: this.userAgent,
      onResponse: (response) => {
        this.lastResponse = response;
      },
    };
  }

  private singlePieceResult(outcome: PieceOutcome): AggregateResult {
    switch (outcome.kind) {
      case 'content':
        return combineOutcomes([outcome], 1);
      case 'empty':
        return {
          success: true,
          failures: [],
          counts: { content: 0, empty: 1, failed: 0 },
          total_chunks: 1,
          cancelled: false,
        };
      case 'failed': {
        const failures = [{ index: 1, code: outcome.error.code, message: outcome.error.message }];
        return {
          success: false,
          error: { ...outcome.error },
          error_summary: formatFailures(failures),
          failures,
          counts: { content: 0, empty: 0, failed: 1 },
          total_chunks: 1,
          cancelled: false,
        };
      }
    }
  }
}
