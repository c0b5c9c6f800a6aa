/**
 * Content Chunker
 *
 * Decides how many pieces a payload needs from the byte size of its
 * source, then splits the text into that many pieces, cutting at
 * paragraph, line or word boundaries where one is close to the ideal
 * cut point.
 */

import type {
  BoundaryKind,
  ChunkPlan,
  ChunkPlanEntry,
  Piece,
  PieceMetadata,
} from '../types.js';
import { logger } from '../utils/logger.js';
import { formatKb } from '../utils/format.js';

interface BoundaryRule {
  needle: string;
  kind: BoundaryKind;
}

// Checked in order; the first rule with a match inside the window wins
const BOUNDARY_RULES: readonly BoundaryRule[] = [
  { needle: '\n\n', kind: 'paragraph' },
  { needle: '\n', kind: 'line' },
  { needle: ' ', kind: 'word' },
];

interface Cut {
  end: number;
  kind: BoundaryKind;
}

/**
 * Number of pieces for a source of the given byte size. Always >= 1.
 */
export function calculateChunkCount(originalByteSize: number, chunkSizeBytes: number): number {
  if (!Number.isFinite(originalByteSize)) {
    logger.warn(`Byte size ${originalByteSize} is not a finite number, using a single chunk`);
    return 1;
  }

  const count = Math.max(1, Math.ceil(Math.max(0, originalByteSize) / chunkSizeBytes));

  logger.debug(
    `File ${originalByteSize} bytes (${formatKb(originalByteSize)}): ` +
    `${count} chunks × ${formatKb(chunkSizeBytes)}`
  );

  return count;
}

/**
 * Split text into ordered pieces whose concatenation is the original text
 */
export function splitContent(
  text: string,
  originalByteSize: number,
  chunkSizeBytes: number
): string[] {
  return computeCuts(text, originalByteSize, chunkSizeBytes)
    .map(entry => text.substring(entry.start_char, entry.end_char));
}

/**
 * Split text and wrap each slice as a numbered piece
 */
export function splitIntoPieces(
  sourceName: string,
  text: string,
  originalByteSize: number,
  chunkSizeBytes: number,
  metadata?: PieceMetadata
): Piece[] {
  const slices = splitContent(text, originalByteSize, chunkSizeBytes);
  const total = slices.length;

  return slices.map((slice, i) => ({
    index: i + 1,
    total,
    text: slice,
    source_name: sourceName,
    ...(metadata ? { metadata: { ...metadata } } : {}),
  }));
}

/**
 * Describe how a text would be split, without sending anything
 */
export function planChunks(
  text: string,
  originalByteSize: number,
  chunkSizeBytes: number
): ChunkPlan {
  const chunks = computeCuts(text, originalByteSize, chunkSizeBytes);

  return {
    original_byte_size: originalByteSize,
    chunk_size_bytes: chunkSizeBytes,
    total_chunks: chunks.length,
    total_chars: text.length,
    chunks,
  };
}

function computeCuts(
  text: string,
  originalByteSize: number,
  chunkSizeBytes: number
): ChunkPlanEntry[] {
  const contentLength = text.length;
  const chunkCount = calculateChunkCount(originalByteSize, chunkSizeBytes);

  logger.info(
    `Splitting content (${contentLength} chars from ${originalByteSize} bytes) into ${chunkCount} chunks`
  );

  if (chunkCount === 1 || contentLength === 0) {
    logger.debug('Content fits in a single chunk');
    return [{
      index: 1,
      start_char: 0,
      end_char: contentLength,
      char_len: contentLength,
      boundary: 'end',
    }];
  }

  const charsPerChunk = Math.ceil(contentLength / chunkCount);
  const windowRadius = Math.floor(charsPerChunk / 4);
  logger.debug(`Target: ${charsPerChunk} chars per chunk (total ${contentLength} chars)`);

  const entries: ChunkPlanEntry[] = [];
  let start = 0;

  for (let chunkNum = 1; chunkNum <= chunkCount; chunkNum++) {
    let cut: Cut;

    if (chunkNum === chunkCount) {
      // Last piece takes whatever is left
      cut = { end: contentLength, kind: 'end' };
    } else {
      const proposedEnd = start + charsPerChunk;
      const searchStart = Math.max(start, proposedEnd - windowRadius);
      const searchEnd = Math.min(contentLength, proposedEnd + windowRadius);
      cut = findBoundary(text, start, proposedEnd, searchStart, searchEnd);
    }

    const end = Math.min(cut.end, contentLength);
    entries.push({
      index: chunkNum,
      start_char: start,
      end_char: end,
      char_len: end - start,
      boundary: cut.kind,
    });
    logger.info(`Chunk ${chunkNum}/${chunkCount}: ${end - start} chars`);

    start = end;
  }

  logger.info(`Created ${entries.length} chunks`);
  return entries;
}

function findBoundary(
  text: string,
  start: number,
  proposedEnd: number,
  searchStart: number,
  searchEnd: number
): Cut {
  for (const rule of BOUNDARY_RULES) {
    const position = lastIndexWithin(text, rule.needle, searchStart, searchEnd);
    if (position !== -1 && position > start) {
      logger.debug(`Split chunk at ${rule.kind} boundary`);
      return { end: position + rule.needle.length, kind: rule.kind };
    }
  }

  logger.debug('No boundary found, performing hard split');
  return { end: proposedEnd, kind: 'hard' };
}

/**
 * Last index of needle lying entirely inside [windowStart, windowEnd), or -1
 */
function lastIndexWithin(
  text: string,
  needle: string,
  windowStart: number,
  windowEnd: number
): number {
  const lastStart = windowEnd - needle.length;
  if (lastStart < windowStart) {
    return -1;
  }
  const found = text.lastIndexOf(needle, lastStart);
  return found >= windowStart ? found : -1;
}
