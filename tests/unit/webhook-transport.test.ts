import { describe, it, expect, vi, beforeEach } from 'vitest';
import { classifyTransportError, postJson } from '../../src/fetcher/webhook-transport.js';

const requestMock = vi.fn();

vi.mock('undici', () => ({
  Agent: class Agent {},
  request: (...args: unknown[]) => requestMock(...args),
}));

function bodyOf(...parts: string[]): AsyncIterable<Buffer> {
  return (async function* () {
    for (const part of parts) {
      yield Buffer.from(part);
    }
  })();
}

function errorWithCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('classifyTransportError', () => {
  it('recognizes timeouts by code and by message', () => {
    expect(classifyTransportError(errorWithCode('Headers Timeout Error', 'UND_ERR_HEADERS_TIMEOUT'))).toBe('TIMEOUT');
    expect(classifyTransportError(new Error('Connect Timeout'))).toBe('TIMEOUT');
  });

  it('recognizes unreachable hosts, including through the cause', () => {
    expect(classifyTransportError(errorWithCode('connect ECONNREFUSED', 'ECONNREFUSED'))).toBe('UNREACHABLE');
    expect(classifyTransportError(new Error('fetch failed', { cause: { code: 'ENOTFOUND' } }))).toBe('UNREACHABLE');
    expect(classifyTransportError(new Error('socket hang up'))).toBe('UNREACHABLE');
  });

  it('falls back to a generic request failure', () => {
    expect(classifyTransportError(new Error('boom'))).toBe('REQUEST_FAILED');
    expect(classifyTransportError('not an error')).toBe('REQUEST_FAILED');
  });
});

describe('postJson', () => {
  beforeEach(() => {
    requestMock.mockReset();
  });

  it('posts the payload as JSON and returns status and body', async () => {
    requestMock.mockResolvedValue({
      statusCode: 201,
      body: bodyOf('{"summary":', '"done"}'),
    });

    const result = await postJson('http://localhost:5678/webhook/test', { file_name: 'a.txt' }, {
      timeoutMs: 1000,
      userAgent: 'test-agent',
    });

    expect(result).toEqual({ success: true, status: 201, body: '{"summary":"done"}' });

    const [endpoint, options] = requestMock.mock.calls[0] ?? [];
    expect(endpoint).toBe('http://localhost:5678/webhook/test');
    expect(options).toMatchObject({
      method: 'POST',
      body: '{"file_name":"a.txt"}',
      headersTimeout: 1000,
      bodyTimeout: 1000,
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': 'test-agent',
      },
    });
  });

  it('resolves for error statuses', async () => {
    requestMock.mockResolvedValue({ statusCode: 500, body: bodyOf('boom') });

    const result = await postJson('http://localhost/hook', {}, { timeoutMs: 1000 });
    expect(result).toEqual({ success: true, status: 500, body: 'boom' });
  });

  it('reports timeouts', async () => {
    requestMock.mockRejectedValue(errorWithCode('Headers Timeout Error', 'UND_ERR_HEADERS_TIMEOUT'));

    const result = await postJson('http://localhost/hook', {}, { timeoutMs: 1000 });
    expect(result).toEqual({
      success: false,
      error: { code: 'TIMEOUT', message: 'Request timeout (>1000ms)' },
    });
  });

  it('reports unreachable endpoints', async () => {
    requestMock.mockRejectedValue(new Error('fetch failed', { cause: { code: 'ECONNREFUSED' } }));

    const result = await postJson('http://localhost/hook', {}, { timeoutMs: 1000 });
    expect(result).toEqual({
      success: false,
      error: { code: 'UNREACHABLE', message: 'Cannot reach webhook: fetch failed' },
    });
  });

  it('reports other failures', async () => {
    requestMock.mockRejectedValue(new Error('invalid url'));

    const result = await postJson('http://localhost/hook', {}, { timeoutMs: 1000 });
    expect(result).toEqual({
      success: false,
      error: { code: 'REQUEST_FAILED', message: 'HTTP request failed: invalid url' },
    });
  });
});
