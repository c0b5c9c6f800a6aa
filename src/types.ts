/**
 * Core types for chunk-relay-mcp
 */

// ============================================
// CONFIGURATION
// ============================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Config {
  webhookUrl: string;
  timeoutMs: number;
  chunkSizeBytes: number;
  probeTimeoutMs: number;
  userAgent: string;
  logLevel: LogLevel;
}

/**
 * Immutable view of the chunking settings a job runs with
 */
export interface ChunkSettings {
  readonly webhookUrl: string;
  readonly timeoutMs: number;
  readonly chunkSizeBytes: number;
}

// ============================================
// ERRORS
// ============================================

export type RelayErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'TIMEOUT'
  | 'UNREACHABLE'
  | 'REQUEST_FAILED'
  | 'HTTP_ERROR'
  | 'WEBHOOK_NOT_REGISTERED'
  | 'AGGREGATE_FAILURE'
  | 'FILE_READ_ERROR';

export interface RelayError {
  code: RelayErrorCode;
  message: string;
  status_code?: number;
}

// ============================================
// PIECES
// ============================================

export type PieceMetadata = Record<string, unknown>;

export interface Piece {
  index: number;
  total: number;
  text: string;
  source_name: string;
  metadata?: PieceMetadata;
}

export type BoundaryKind = 'paragraph' | 'line' | 'word' | 'hard' | 'end';

export interface ChunkPlanEntry {
  index: number;
  start_char: number;
  end_char: number;
  char_len: number;
  boundary: BoundaryKind;
}

export interface ChunkPlan {
  original_byte_size: number;
  chunk_size_bytes: number;
  total_chunks: number;
  total_chars: number;
  chunks: ChunkPlanEntry[];
}

// ============================================
// OUTCOMES
// ============================================

export interface ContentReceived {
  readonly kind: 'content';
  readonly index: number;
  readonly text: string;
}

export interface EmptyAccepted {
  readonly kind: 'empty';
  readonly index: number;
}

export interface PieceFailed {
  readonly kind: 'failed';
  readonly index: number;
  readonly error: Readonly<RelayError>;
}

export type PieceOutcome = ContentReceived | EmptyAccepted | PieceFailed;

export interface PieceFailure {
  index: number;
  code: RelayErrorCode;
  message: string;
}

export interface OutcomeCounts {
  content: number;
  empty: number;
  failed: number;
}

export interface AggregateResult {
  success: boolean;
  text?: string;
  error?: RelayError;
  error_summary?: string;
  failures: PieceFailure[];
  counts: OutcomeCounts;
  total_chunks: number;
  cancelled: boolean;
}

// ============================================
// TRANSPORT
// ============================================

export type TransportErrorCode = 'TIMEOUT' | 'UNREACHABLE' | 'REQUEST_FAILED';

export interface TransportError {
  code: TransportErrorCode;
  message: string;
}

export type TransportResultSuccess = {
  success: true;
  status: number;
  body: string;
};

export type TransportResultError = {
  success: false;
  error: TransportError;
};

export type TransportResult = TransportResultSuccess | TransportResultError;

export interface TransportOptions {
  timeoutMs: number;
  userAgent?: string;
}

/**
 * Posts one JSON payload to the endpoint. Never rejects.
 */
export type WebhookTransport = (
  endpoint: string,
  payload: unknown,
  options: TransportOptions
) => Promise<TransportResult>;

export interface LastResponse {
  status: number;
  body_excerpt: string;
  received_at: string;
}

// ============================================
// SEND OPTIONS
// ============================================

export interface SendOptions {
  /** Size of the source on disk; estimated from the text when omitted */
  originalByteSize?: number;
  metadata?: PieceMetadata;
  /** Checked before each piece after the first; false stops the job */
  shouldContinue?: () => boolean;
}

export interface TextFile {
  path: string;
  name: string;
  content: string;
  size_bytes: number;
  encoding: string;
  lines: number;
}

// ============================================
// TOOLS
// ============================================

export interface ToolInputSchema {
  [key: string]: unknown;
  type: 'object';
  properties: Record<string, object>;
  required?: string[];
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}
