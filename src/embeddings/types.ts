export interface EmbeddingsProvider {
  /** Embed a single text (used for queries) */
  embed(text: string): Promise<number[]>;
  /** Embed several texts, preserving order (used for document chunks) */
  embedMany(texts: readonly string[]): Promise<number[][]>;
  readonly model: string;
}
