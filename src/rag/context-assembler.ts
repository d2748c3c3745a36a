import { Chunk, ChunkRef } from '../types.js';

/**
 * Pick up to `count` items spread evenly from first to last, keeping order.
 * Always includes the first and (when count > 1) the last item.
 */
export function sampleEvenly<T>(items: readonly T[], count: number): T[] {
  if (count <= 0 || items.length === 0) return [];
  if (items.length <= count) return [...items];
  if (count === 1) return [items[0]];

  const picked: T[] = [];
  const step = (items.length - 1) / (count - 1);
  for (let i = 0; i < count; i++) {
    picked.push(items[Math.round(i * step)]);
  }
  return picked;
}

/** Collapse runs of whitespace so excerpts read as single paragraphs */
export function compactWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Render chunks as labelled excerpts the model can cite by number, e.g.
 * `[Chunk 3]\n...text...`
 */
export function formatLabelledChunks(chunks: readonly (Chunk | ChunkRef)[]): string {
  return chunks.map((chunk) => `[Chunk ${chunk.index}]\n${compactWhitespace(chunk.text)}`).join('\n\n');
}

/**
 * Take excerpts in order until the character budget is used up.
 * The first excerpt is truncated rather than dropped when it alone is too long.
 */
export function fitToBudget(texts: readonly string[], budget: number, separator = '\n\n...\n\n'): string {
  let assembled = '';
  for (const text of texts) {
    const next = assembled.length === 0 ? text : `${assembled}${separator}${text}`;
    if (next.length > budget) {
      if (assembled.length === 0) {
        return text.slice(0, budget);
      }
      break;
    }
    assembled = next;
  }
  return assembled;
}

/**
 * Short preview of a chunk for justification strings
 */
export function snippet(text: string, maxLength = 150): string {
  const compact = compactWhitespace(text);
  return compact.length > maxLength ? `${compact.slice(0, maxLength)}...` : compact;
}
