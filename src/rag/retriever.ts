import { Chunk, ChunkCollection, ChunkRef, RetrievedChunk } from '../types.js';
import { EmbeddingsProvider } from '../embeddings/types.js';
import { logger } from '../util/logger.js';

export interface RetrievalOptions {
  topK: number;
  /** Results are dropped entirely when the best score is below this */
  minScore: number;
}

/**
 * Cosine similarity in [-1, 1]. Mismatched lengths are compared up to the
 * shorter vector; a zero vector scores 0.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let na = 0;
  let nb = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

/**
 * Score every chunk against the query vector, best first.
 * Equal scores keep document order.
 */
export function rankChunks(queryVector: readonly number[], collection: ChunkCollection): RetrievedChunk[] {
  return collection.chunks
    .map((chunk, i) => ({ chunk, score: cosineSimilarity(queryVector, collection.embeddings[i] ?? []) }))
    .sort((a, b) => b.score - a.score || a.chunk.index - b.chunk.index);
}

export function toChunkRef({ chunk, score }: RetrievedChunk): ChunkRef {
  return { index: chunk.index, text: chunk.text, score };
}

export function chunkToRef(chunk: Chunk): ChunkRef {
  return { index: chunk.index, text: chunk.text };
}

export class ContextRetriever {
  constructor(private readonly embeddings: EmbeddingsProvider) {}

  /**
   * Rank all chunks of the collection against the query, ignoring the relevance gate
   */
  async rank(query: string, collection: ChunkCollection): Promise<RetrievedChunk[]> {
    if (collection.chunks.length === 0) {
      return [];
    }
    const queryVector = await this.embeddings.embed(query);
    return rankChunks(queryVector, collection);
  }

  /**
   * Top-K chunks scoring at least `minScore`, so the list is empty when even
   * the best match falls below it. Chunks whose text repeats an earlier pick are skipped.
   */
  async retrieve(query: string, collection: ChunkCollection, { topK, minScore }: RetrievalOptions): Promise<RetrievedChunk[]> {
    const ranked = await this.rank(query, collection);
    if (ranked.length === 0) {
      logger.debug('[ContextRetriever] Empty collection');
      return [];
    }

    const best = ranked[0].score;
    if (best < minScore) {
      logger.debug(`[ContextRetriever] Best score ${best.toFixed(3)} below threshold ${minScore}`);
      return [];
    }

    const seen = new Set<string>();
    const selected: RetrievedChunk[] = [];
    for (const result of ranked) {
      if (result.score < minScore) break;
      if (seen.has(result.chunk.text)) continue;
      seen.add(result.chunk.text);
      selected.push(result);
      if (selected.length >= topK) break;
    }

    logger.debug(
      `[ContextRetriever] Selected chunks ${selected.map((r) => r.chunk.index).join(', ')} (best ${best.toFixed(3)})`
    );
    return selected;
  }
}
