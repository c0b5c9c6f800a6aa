import { describe, it, expect, vi } from 'vitest';
import {
  ChunkConfig,
  validateChunkSize,
  DEFAULT_CHUNK_SIZE_BYTES,
  MAX_CHUNK_SIZE_BYTES,
  MIN_CHUNK_SIZE_BYTES,
} from '../../src/relay/chunk-config.js';
import { logger } from '../../src/utils/logger.js';

describe('validateChunkSize', () => {
  it('clamps small sizes to the minimum', () => {
    expect(validateChunkSize(1000)).toBe(5120);
  });

  it('clamps large sizes to the maximum', () => {
    expect(validateChunkSize(9_000_000)).toBe(102400);
  });

  it('keeps sizes inside the range unchanged', () => {
    expect(validateChunkSize(51200)).toBe(51200);
    expect(validateChunkSize(MIN_CHUNK_SIZE_BYTES)).toBe(MIN_CHUNK_SIZE_BYTES);
    expect(validateChunkSize(MAX_CHUNK_SIZE_BYTES)).toBe(MAX_CHUNK_SIZE_BYTES);
  });

  it('warns only when clamping happens', () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {});

    validateChunkSize(51200);
    expect(warn).not.toHaveBeenCalled();

    validateChunkSize(1000);
    expect(warn).toHaveBeenCalledWith('Chunk size 1000 too small, using minimum 5120');
  });

  it('falls back to the default for non-numbers', () => {
    vi.spyOn(logger, 'warn').mockImplementation(() => {});
    expect(validateChunkSize(Number.NaN)).toBe(DEFAULT_CHUNK_SIZE_BYTES);
  });
});

describe('ChunkConfig', () => {
  it('defaults to 50KB chunks', () => {
    const config = new ChunkConfig({ webhookUrl: 'http://localhost/hook', timeoutMs: 10000 });
    expect(config.chunkSize).toBe(51200);
  });

  it('clamps the initial chunk size', () => {
    vi.spyOn(logger, 'warn').mockImplementation(() => {});
    const config = new ChunkConfig({
      webhookUrl: 'http://localhost/hook',
      timeoutMs: 10000,
      chunkSizeBytes: 200,
    });
    expect(config.chunkSize).toBe(5120);
  });

  it('re-validates on setChunkSize', () => {
    vi.spyOn(logger, 'warn').mockImplementation(() => {});
    const config = new ChunkConfig({ webhookUrl: 'http://localhost/hook', timeoutMs: 10000 });

    expect(config.setChunkSize(20000)).toBe(20000);
    expect(config.setChunkSize(500000)).toBe(102400);
    expect(config.chunkSize).toBe(102400);
  });

  it('returns snapshots that later changes do not touch', () => {
    const config = new ChunkConfig({
      webhookUrl: 'http://localhost/hook',
      timeoutMs: 10000,
      chunkSizeBytes: 10240,
    });

    const snapshot = config.snapshot();
    config.setChunkSize(40960);
    config.setWebhookUrl('http://localhost/other');

    expect(snapshot).toEqual({
      webhookUrl: 'http://localhost/hook',
      timeoutMs: 10000,
      chunkSizeBytes: 10240,
    });
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(config.snapshot().chunkSizeBytes).toBe(40960);
    expect(config.endpoint).toBe('http://localhost/other');
  });

  it('trims the webhook URL', () => {
    const config = new ChunkConfig({ webhookUrl: '  http://localhost/hook \n', timeoutMs: 10000 });
    expect(config.endpoint).toBe('http://localhost/hook');
  });
});
