/**
 * Text Chunker
 * Overlapping character windows that prefer to end on whitespace
 */

import { IngestionError } from '../utils/errors.js';

export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export interface TextChunk {
  /** `<documentId>:<index>` */
  id: string;
  index: number;
  content: string;
}

export const DEFAULT_CHUNK_OPTIONS: Readonly<ChunkOptions> = {
  chunkSize: 1000,
  chunkOverlap: 200,
};

/** A window may end on whitespace found in its last 20% */
const BREAK_WINDOW_RATIO = 0.8;

export function chunkId(documentId: string, index: number): string {
  return `${documentId}:${index}`;
}

function lastWhitespace(text: string, from: number, to: number): number {
  for (let i = to - 1; i >= from; i--) {
    if (/\s/.test(text.charAt(i))) return i;
  }
  return -1;
}

/**
 * Split text into chunks of at most `chunkSize` characters, consecutive
 * chunks sharing about `chunkOverlap` characters. Line endings are
 * normalized; empty pieces are dropped.
 */
export function chunkText(
  documentId: string,
  content: string,
  options: ChunkOptions = DEFAULT_CHUNK_OPTIONS
): TextChunk[] {
  const { chunkSize, chunkOverlap } = options;
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new IngestionError(`chunkSize must be a positive integer (got ${chunkSize})`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new IngestionError(`chunkOverlap must be in [0, chunkSize) (got ${chunkOverlap})`);
  }

  const text = content.replace(/\r\n?/g, '\n').trim();
  if (text.length === 0) {
    return [];
  }

  const pieces: string[] = [];
  let start = 0;

  while (start < text.length) {
    const hardEnd = Math.min(text.length, start + chunkSize);
    let end = hardEnd;

    if (hardEnd < text.length) {
      const breakAt = lastWhitespace(text, start + Math.floor(chunkSize * BREAK_WINDOW_RATIO), hardEnd);
      if (breakAt > start) end = breakAt;
    }

    const piece = text.slice(start, end).trim();
    if (piece) pieces.push(piece);
    if (end >= text.length) break;

    start = Math.max(end - chunkOverlap, start + 1);
  }

  return pieces.map((piece, index) => ({ id: chunkId(documentId, index), index, content: piece }));
}
