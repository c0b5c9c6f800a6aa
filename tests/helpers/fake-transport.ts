/**
 * In-process stand-in for the webhook transport
 */

import type {
  TransportOptions,
  TransportResult,
  WebhookTransport,
} from '../../src/types.js';

export interface RecordedCall {
  endpoint: string;
  payload: unknown;
  options: TransportOptions;
}

export function ok(status: number, body: string): TransportResult {
  return { success: true, status, body };
}

export function fail(code: 'TIMEOUT' | 'UNREACHABLE' | 'REQUEST_FAILED', message: string): TransportResult {
  return { success: false, error: { code, message } };
}

/**
 * Transport that answers each request with the next scripted result
 */
export function scriptedTransport(
  results: TransportResult[],
  onCall?: (call: RecordedCall) => void
): { transport: WebhookTransport; calls: RecordedCall[] } {
  const queue = [...results];
  const calls: RecordedCall[] = [];

  const transport: WebhookTransport = async (endpoint, payload, options) => {
    const call = { endpoint, payload, options };
    calls.push(call);
    onCall?.(call);
    const next = queue.shift();
    if (!next) {
      throw new Error(`Unexpected request #${calls.length}`);
    }
    return next;
  };

  return { transport, calls };
}

export function payloadField(call: RecordedCall | undefined, field: string): unknown {
  if (!call || typeof call.payload !== 'object' || call.payload === null) {
    return undefined;
  }
  return Object.entries(call.payload).find(([key]) => key === field)?.[1];
}
