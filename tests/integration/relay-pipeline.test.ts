/**
 * Relay Pipeline Integration Tests
 *
 * Runs the complete flow against an in-process endpoint:
 * plan -> split -> dispatch -> aggregate
 */

import { describe, it, expect } from 'vitest';
import { RelayClient } from '../../src/relay/client.js';
import { planChunks } from '../../src/processing/chunker.js';
import { ALL_EMPTY_TEXT } from '../../src/processing/aggregator.js';
import type { TransportResult } from '../../src/types.js';
import { ok, payloadField, scriptedTransport } from '../helpers/fake-transport.js';

const WEBHOOK_URL = 'http://localhost:5678/webhook/relay';

function createClient(results: TransportResult[], chunkSizeBytes: number) {
  const { transport, calls } = scriptedTransport(results);
  const client = new RelayClient({
    webhookUrl: WEBHOOK_URL,
    timeoutMs: 10000,
    chunkSizeBytes,
    transport,
  });
  return { client, calls };
}

function buildDocument(paragraphs: number): string {
  const lines: string[] = [];
  for (let i = 0; i < paragraphs; i++) {
    lines.push(`Paragraph ${i}: ${'lorem ipsum dolor sit amet '.repeat(8).trim()}`);
  }
  return lines.join('\n\n');
}

describe('Relay Pipeline Integration', () => {
  it('splits a large payload, relays every piece and combines the replies', async () => {
    const content = 'x'.repeat(120000);
    const { client, calls } = createClient([
      ok(200, '{"summary":"First summary"}'),
      ok(200, '{"output":"Second summary"}'),
      ok(500, 'boom'),
    ], 50000);

    const result = await client.send('big.txt', content, { originalByteSize: 120000 });

    expect(result).toEqual({
      success: true,
      text: 'First summary\n\nSecond summary',
      error_summary: 'Chunk 3: Webhook returned 500: boom',
      failures: [{ index: 3, code: 'HTTP_ERROR', message: 'Webhook returned 500: boom' }],
      counts: { content: 2, empty: 0, failed: 1 },
      total_chunks: 3,
      cancelled: false,
    });

    expect(calls.map(call => payloadField(call, 'chunk_number'))).toEqual([1, 2, 3]);
    expect(calls.map(call => payloadField(call, 'total_chunks'))).toEqual([3, 3, 3]);
    expect(calls.map(call => payloadField(call, 'content')).join('')).toBe(content);
  });

  it('sends exactly the pieces the plan describes', async () => {
    const content = buildDocument(120);
    const byteSize = Buffer.byteLength(content, 'utf8');
    const plan = planChunks(content, byteSize, 5120);
    const replies = plan.chunks.map(chunk => ok(200, `{"result":"piece ${chunk.index}"}`));
    const { client, calls } = createClient(replies, 5120);

    const result = await client.send('doc.txt', content, { originalByteSize: byteSize });

    expect(plan.total_chunks).toBeGreaterThan(1);
    expect(calls.map(call => payloadField(call, 'content'))).toEqual(
      plan.chunks.map(chunk => content.substring(chunk.start_char, chunk.end_char))
    );
    expect(plan.chunks.slice(0, -1).every(chunk => chunk.boundary === 'paragraph')).toBe(true);
    expect(result.text).toBe(plan.chunks.map(chunk => `piece ${chunk.index}`).join('\n\n'));
  });

  it('reports a placeholder when the endpoint only acknowledges', async () => {
    const { client } = createClient([ok(202, ''), ok(202, '{}')], 5120);

    const result = await client.send('doc.txt', 'y'.repeat(200), { originalByteSize: 10240 });

    expect(result.success).toBe(true);
    expect(result.text).toBe(ALL_EMPTY_TEXT);
    expect(result.counts).toEqual({ content: 0, empty: 2, failed: 0 });
  });

  it('stops a job when the caller cancels it', async () => {
    const { client, calls } = createClient([ok(200, 'one'), ok(200, 'two')], 5120);
    let allowed = 2;

    const result = await client.send('doc.txt', 'z'.repeat(400), {
      originalByteSize: 20480,
      shouldContinue: () => --allowed > 0,
    });

    expect(calls).toHaveLength(2);
    expect(result.total_chunks).toBe(4);
    expect(result.cancelled).toBe(true);
    expect(result.text).toBe('one\n\ntwo');
  });
});
