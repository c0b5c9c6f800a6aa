/**
 * Configuration management for chunk-relay-mcp
 */

import type { Config, LogLevel } from './types.js';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseLogLevel(value: string | undefined, defaultValue: LogLevel): LogLevel {
  if (!value) return defaultValue;
  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find(level => level === normalized) ?? defaultValue;
}

export function loadConfig(): Config {
  return {
    webhookUrl: (process.env['WEBHOOK_URL'] ?? '').trim(),
    timeoutMs: parseNumber(process.env['WEBHOOK_TIMEOUT_MS'], 10000),
    chunkSizeBytes: parseNumber(process.env['CHUNK_SIZE_BYTES'], 50 * 1024),
    probeTimeoutMs: parseNumber(process.env['PROBE_TIMEOUT_MS'], 5000),
    userAgent: process.env['USER_AGENT'] || 'chunk-relay-mcp/1.0',
    logLevel: parseLogLevel(process.env['LOG_LEVEL'], 'info'),
  };
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}

export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

// Validate configuration. Chunk size is clamped rather than rejected.
export function validateConfig(config: Config): string[] {
  const errors: string[] = [];

  if (config.timeoutMs < 1000) {
    errors.push('WEBHOOK_TIMEOUT_MS must be at least 1000ms');
  }
  if (config.timeoutMs > 600000) {
    errors.push('WEBHOOK_TIMEOUT_MS must be at most 600000ms (10 minutes)');
  }
  if (config.probeTimeoutMs < 500 || config.probeTimeoutMs > 60000) {
    errors.push('PROBE_TIMEOUT_MS must be between 500 and 60000ms');
  }
  if (config.webhookUrl && !isHttpUrl(config.webhookUrl)) {
    errors.push('WEBHOOK_URL must be an http:// or https:// URL');
  }

  return errors;
}
