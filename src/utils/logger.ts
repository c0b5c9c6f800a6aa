/**
 * Leveled logger for chunk-relay-mcp.
 *
 * Everything goes to stderr: stdout carries the MCP stdio protocol.
 *
 * Control via LOG_LEVEL environment variable:
 *   - 'debug' → shows everything, including every boundary and parse decision
 *   - 'info'  → shows info, warn, error (default)
 *   - 'warn'  → shows warn + error
 *   - 'error' → shows only errors
 */

import type { LogLevel } from '../types.js';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

function levelFromEnv(): number {
  const envLevel = process.env['LOG_LEVEL']?.toLowerCase() ?? '';
  return isLogLevel(envLevel) ? LEVELS[envLevel] : LEVELS.info;
}

let currentLevel = levelFromEnv();

const shouldLog = (level: LogLevel): boolean => LEVELS[level] >= currentLevel;

export function setLogLevel(level: LogLevel): void {
  currentLevel = LEVELS[level];
}

export const logger = {
  debug: (...args: unknown[]): void => {
    if (shouldLog('debug')) console.error('[debug]', ...args);
  },
  info: (...args: unknown[]): void => {
    if (shouldLog('info')) console.error('[info]', ...args);
  },
  warn: (...args: unknown[]): void => {
    if (shouldLog('warn')) console.error('[warn]', ...args);
  },
  error: (...args: unknown[]): void => {
    if (shouldLog('error')) console.error('[error]', ...args);
  },
};
