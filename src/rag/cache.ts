import QuickLRU from 'quick-lru';
import { ChunkCollection, DocumentRecord } from '../types.js';
import { ChunkOptions } from '../processor/chunker.js';
import { logger } from '../util/logger.js';

interface CachedDocument {
  document: DocumentRecord;
  /** Keyed by chunking parameters and embedding model */
  collections: Map<string, ChunkCollection>;
}

/**
 * Identifies a chunk collection built from the same document with the same
 * chunking and embedding settings
 */
export function collectionKey(options: ChunkOptions, embeddingModel: string): string {
  return `${options.chunkSize}:${options.chunkOverlap}:${embeddingModel}`;
}

/**
 * Content-addressed cache of extracted documents and their embedded chunks.
 * Keys are SHA-256 digests of the uploaded bytes.
 */
export class DocumentCache {
  private readonly entries: QuickLRU<string, CachedDocument>;

  constructor(maxSize: number) {
    this.entries = new QuickLRU({ maxSize });
  }

  getDocument(documentId: string): DocumentRecord | undefined {
    return this.entries.get(documentId)?.document;
  }

  setDocument(document: DocumentRecord): void {
    const existing = this.entries.get(document.id);
    this.entries.set(document.id, {
      document,
      collections: existing?.collections ?? new Map(),
    });
  }

  getCollection(documentId: string, key: string): ChunkCollection | undefined {
    return this.entries.get(documentId)?.collections.get(key);
  }

  /** Collections can only be stored for a document already in the cache */
  setCollection(documentId: string, key: string, collection: ChunkCollection): boolean {
    const entry = this.entries.get(documentId);
    if (!entry) {
      return false;
    }
    entry.collections.set(key, collection);
    return true;
  }

  invalidate(documentId: string): boolean {
    const removed = this.entries.delete(documentId);
    if (removed) {
      logger.debug(`[DocumentCache] Invalidated ${documentId.slice(0, 12)}`);
    }
    return removed;
  }

  has(documentId: string): boolean {
    return this.entries.has(documentId);
  }

  get size(): number {
    return this.entries.size;
  }
}
