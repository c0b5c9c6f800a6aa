/**
 * Webhook Transport
 *
 * Posts JSON payloads to the webhook endpoint and reports either the
 * status and body text, or a classified transport error.
 */

import { request, Agent } from 'undici';
import type {
  TransportErrorCode,
  TransportOptions,
  TransportResult,
} from '../types.js';

// Keep-alive agent for connection pooling
const agent = new Agent({
  keepAliveTimeout: 30000,
  keepAliveMaxTimeout: 60000,
  connections: 10,
});

const TIMEOUT_CODES = new Set([
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'ETIMEDOUT',
]);

const UNREACHABLE_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_SOCKET',
]);

function getErrorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const { code } = err;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Map a thrown request error onto a transport error code
 */
export function classifyTransportError(err: unknown): TransportErrorCode {
  const code = getErrorCode(err);
  const cause = err instanceof Error ? getErrorCode(err.cause) : undefined;
  const message = err instanceof Error ? err.message : '';

  if ((code && TIMEOUT_CODES.has(code)) || (cause && TIMEOUT_CODES.has(cause)) ||
      message.toLowerCase().includes('timeout')) {
    return 'TIMEOUT';
  }

  if ((code && UNREACHABLE_CODES.has(code)) || (cause && UNREACHABLE_CODES.has(cause)) ||
      message.includes('ECONNREFUSED') ||
      message.includes('ENOTFOUND') ||
      message.includes('socket hang up')) {
    return 'UNREACHABLE';
  }

  return 'REQUEST_FAILED';
}

function describeTransportError(code: TransportErrorCode, err: unknown, timeoutMs: number): string {
  const detail = err instanceof Error ? err.message : 'Unknown error';
  switch (code) {
    case 'TIMEOUT':
      return `Request timeout (>${timeoutMs}ms)`;
    case 'UNREACHABLE':
      return `Cannot reach webhook: ${detail}`;
    case 'REQUEST_FAILED':
      return `HTTP request failed: ${detail}`;
  }
}

/**
 * POST a JSON payload. Resolves for every HTTP status; only I/O failures
 * come back as errors.
 */
export async function postJson(
  endpoint: string,
  payload: unknown,
  options: TransportOptions
): Promise<TransportResult> {
  const { timeoutMs, userAgent } = options;

  try {
    const response = await request(endpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Accept': 'application/json, text/plain;q=0.9, */*;q=0.8',
        ...(userAgent ? { 'User-Agent': userAgent } : {}),
      },
      body: JSON.stringify(payload),
      dispatcher: agent,
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
    });

    const chunks: Buffer[] = [];
    for await (const chunk of response.body) {
      chunks.push(Buffer.from(chunk));
    }

    return {
      success: true,
      status: response.statusCode,
      body: Buffer.concat(chunks).toString('utf8'),
    };
  } catch (err) {
    const code = classifyTransportError(err);
    return {
      success: false,
      error: {
        code,
        message: describeTransportError(code, err, timeoutMs),
      },
    };
  }
}
