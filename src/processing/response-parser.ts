/**
 * Response Parser
 *
 * Pulls the single most relevant text out of a webhook response. The
 * remote workflow does not fix the name of its result field, so a fixed,
 * ordered list of conventional keys is probed.
 */

import { logger } from '../utils/logger.js';
import { preview } from '../utils/format.js';

/**
 * Probe order for structured responses. Order is part of the contract.
 */
export const RESPONSE_TEXT_KEYS = [
  'summary',
  'summarization',
  'result',
  'output',
  'text',
  'content',
] as const;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringifyValue(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value, null, 2);
  }
  return String(value);
}

/**
 * Extract usable text from a parsed response body.
 *
 * @returns the text, or null when the response carries nothing usable
 */
export function extractResponseText(body: unknown): string | null {
  logger.debug(`Response type: ${Array.isArray(body) ? 'array' : body === null ? 'null' : typeof body}`);

  if (body === null || body === undefined) {
    logger.debug('Result: response is empty');
    return null;
  }

  if (typeof body === 'string') {
    if (body.trim() === '') {
      logger.debug('Result: response is a blank string');
      return null;
    }
    logger.debug(`Result: returning string response (${body.length} chars): ${preview(body)}`);
    return body;
  }

  if (isPlainObject(body)) {
    return extractFromObject(body);
  }

  const stringified = stringifyValue(body);
  if (stringified.trim() === '') {
    logger.debug('Result: response is blank after stringification');
    return null;
  }
  logger.debug(`Result: stringified ${typeof body} (${stringified.length} chars)`);
  return stringified;
}

function extractFromObject(body: Record<string, unknown>): string | null {
  const keys = Object.keys(body);
  logger.debug(`Response keys: ${keys.join(', ') || '(none)'}`);

  for (const key of RESPONSE_TEXT_KEYS) {
    if (!(key in body)) {
      continue;
    }

    const value = body[key];

    // A present key wins even when its value is null
    if (value === null || value === undefined) {
      logger.debug(`Result: key '${key}' is ${String(value)}`);
      return String(value);
    }

    if (typeof value === 'string') {
      if (value.trim() !== '') {
        logger.debug(`Result: extracted from key '${key}' (${value.length} chars)`);
        return value;
      }
      logger.debug(`  Key '${key}' is an empty string, continuing`);
      continue;
    }

    const stringified = stringifyValue(value);
    logger.debug(`Result: found ${Array.isArray(value) ? 'array' : typeof value} in key '${key}' (${stringified.length} chars)`);
    return stringified;
  }

  if (keys.length === 0) {
    logger.debug('Result: response object is empty');
    return null;
  }

  const whole = JSON.stringify(body, null, 2);
  logger.debug(`Result: no known keys, returning whole object as JSON (${whole.length} chars)`);
  return whole;
}

/**
 * Decode a raw HTTP body: JSON when it parses, the text otherwise
 */
export function parseResponseBody(raw: string): unknown {
  if (raw.trim() === '') {
    return raw;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return raw;
  }
}
