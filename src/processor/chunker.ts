import { Chunk } from '../types.js';

export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
}

/**
 * Break candidates, strongest first. A chunk ends right after the last match
 * of the strongest pattern that falls in the second half of its window.
 */
const BOUNDARY_PATTERNS: RegExp[] = [
  /\n\n/g, // paragraph
  /\n/g, // line
  /[.!?]["')\]]?\s/g, // sentence
  / /g, // word
];

function lastBoundary(text: string, from: number, to: number, pattern: RegExp): number {
  const window = text.slice(from, to);
  const regex = new RegExp(pattern.source, 'g');
  let found = -1;
  let match: RegExpExecArray | null;
  while ((match = regex.exec(window)) !== null) {
    found = from + match.index + match[0].length;
  }
  return found;
}

function findChunkEnd(text: string, start: number, windowEnd: number, minEnd: number): number {
  for (const pattern of BOUNDARY_PATTERNS) {
    const boundary = lastBoundary(text, start, windowEnd, pattern);
    if (boundary >= minEnd) {
      return boundary;
    }
  }
  return windowEnd;
}

/**
 * Split text into chunks of at most `chunkSize` characters where each chunk
 * repeats the last `chunkOverlap` characters of its predecessor.
 *
 * Text no longer than `chunkSize` yields one chunk; empty text yields none.
 * The output is a pure function of the text and options.
 */
export function chunkText(text: string, { chunkSize, chunkOverlap }: ChunkOptions): Chunk[] {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new RangeError(`chunkOverlap must be an integer in [0, chunkSize), got ${chunkOverlap}`);
  }

  const chunks: Chunk[] = [];
  if (text.length === 0) {
    return chunks;
  }

  // Ends are never placed before this point, so each step advances past the overlap
  const minAdvance = Math.max(Math.floor(chunkSize / 2), chunkOverlap + 1);
  let start = 0;
  let overlap = 0;

  for (;;) {
    const windowEnd = start + chunkSize;
    if (windowEnd >= text.length) {
      chunks.push({ index: chunks.length, text: text.slice(start), start, end: text.length, overlap });
      return chunks;
    }

    const end = findChunkEnd(text, start, windowEnd, start + minAdvance);
    chunks.push({ index: chunks.length, text: text.slice(start, end), start, end, overlap });

    start = end - chunkOverlap;
    overlap = chunkOverlap;
  }
}

/**
 * Inverse of chunkText: concatenate chunks with each overlap prefix removed
 */
export function reconstructText(chunks: readonly Chunk[]): string {
  return chunks.map((chunk, i) => (i === 0 ? chunk.text : chunk.text.slice(chunk.overlap))).join('');
}
