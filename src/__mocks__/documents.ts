/**
 * Document and chunk fixtures for tests
 */

import type { Chunk, ChunkCollection, DocumentRecord } from '../types.js';
import { secureHash } from '../util/security.js';

export const SKY_AND_WATER = 'The sky is blue. Water boils at 100°C at sea level.';

export function makeDocument(text: string, fileName = 'doc.txt'): DocumentRecord {
  return { id: secureHash(text), fileName, kind: 'text', text, charCount: text.length };
}

/**
 * Collection whose chunks are the given texts laid end to end, without overlap
 */
export function makeCollection(texts: string[], embeddings: number[][], documentId = 'doc-1'): ChunkCollection {
  let offset = 0;
  const chunks: Chunk[] = texts.map((text, index) => {
    const chunk = { index, text, start: offset, end: offset + text.length, overlap: 0 };
    offset += text.length;
    return chunk;
  });
  return { documentId, chunks, embeddings };
}
