/**
 * Text file reading with encoding detection
 *
 * The byte size on disk is kept alongside the decoded text because
 * chunk counts are derived from it.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { RelayError, TextFile } from '../types.js';
import { logger } from './logger.js';
import { countLines } from './format.js';

export type ReadTextFileResult =
  | { success: true; file: TextFile }
  | { success: false; error: RelayError };

interface Decoded {
  text: string;
  encoding: string;
}

function looksLikeUtf16Le(bytes: Buffer): boolean {
  if (bytes.length < 2 || bytes.length % 2 !== 0) {
    return false;
  }
  let oddNuls = 0;
  for (let i = 1; i < bytes.length; i += 2) {
    if (bytes[i] === 0) oddNuls++;
  }
  return oddNuls / (bytes.length / 2) > 0.3;
}

/**
 * Decode raw bytes: BOM first, then BOM-less UTF-16LE, then strict UTF-8, then latin1
 */
export function decodeText(bytes: Buffer): Decoded {
  if (bytes.length >= 3 && bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) {
    return { text: bytes.subarray(3).toString('utf8'), encoding: 'utf-8-sig' };
  }
  if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe) {
    return { text: bytes.subarray(2).toString('utf16le'), encoding: 'utf-16le' };
  }
  if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) {
    const body = bytes.subarray(2, bytes.length - (bytes.length % 2));
    return { text: Buffer.from(body).swap16().toString('utf16le'), encoding: 'utf-16be' };
  }

  if (looksLikeUtf16Le(bytes)) {
    return { text: bytes.toString('utf16le'), encoding: 'utf-16le' };
  }

  try {
    const text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    return { text, encoding: 'utf-8' };
  } catch (err) {
    logger.debug(`Encoding 'utf-8' failed: ${err instanceof Error ? err.message : String(err)}`);
  }

  logger.warn('Could not decode with standard encodings, using latin1 fallback');
  return { text: bytes.toString('latin1'), encoding: 'latin1' };
}

/**
 * Read a text file from disk
 */
export async function readTextFile(filePath: string): Promise<ReadTextFileResult> {
  try {
    const stat = await fs.stat(filePath);
    if (!stat.isFile()) {
      return {
        success: false,
        error: { code: 'FILE_READ_ERROR', message: `Not a file: ${filePath}` },
      };
    }

    const bytes = await fs.readFile(filePath);
    const { text, encoding } = decodeText(bytes);
    logger.debug(`Read ${filePath} with encoding '${encoding}': ${stat.size} bytes → ${text.length} chars`);

    if (text.trim() === '') {
      logger.warn(`File is empty: ${filePath}`);
      return {
        success: false,
        error: { code: 'FILE_READ_ERROR', message: `File is empty: ${filePath}` },
      };
    }

    return {
      success: true,
      file: {
        path: filePath,
        name: path.basename(filePath),
        content: text,
        size_bytes: stat.size,
        encoding,
        lines: countLines(text),
      },
    };
  } catch (err) {
    const message = `Error reading file: ${err instanceof Error ? err.message : String(err)}`;
    logger.error(message);
    return {
      success: false,
      error: { code: 'FILE_READ_ERROR', message },
    };
  }
}
