import OpenAI from 'openai';
import { EmbeddingsProvider } from './types.js';
import { EmbeddingError, describeError } from '../util/errors.js';
import { logger } from '../util/logger.js';

const BATCH_SIZE = 64;

export class OpenAIEmbeddings implements EmbeddingsProvider {
  private openai: OpenAI;
  readonly model: string;

  constructor(apiKey: string, model = 'text-embedding-3-small') {
    if (!apiKey) {
      throw new Error('OpenAI API key is required');
    }
    this.openai = new OpenAI({ apiKey });
    this.model = model;
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedMany([text]);
    return embedding;
  }

  async embedMany(texts: readonly string[]): Promise<number[][]> {
    const inputs = texts.map((text) => text.trim());
    if (inputs.some((input) => input.length === 0)) {
      throw new EmbeddingError('Input text is empty after trimming');
    }

    const vectors: number[][] = [];
    for (let i = 0; i < inputs.length; i += BATCH_SIZE) {
      const batch = inputs.slice(i, i + BATCH_SIZE);

      let response: OpenAI.CreateEmbeddingResponse;
      try {
        response = await this.openai.embeddings.create({
          model: this.model,
          input: batch,
        });
      } catch (error) {
        logger.error('[OpenAIEmbeddings] Embedding request failed:', error);
        throw new EmbeddingError(`Embedding request failed: ${describeError(error)}`, { cause: error });
      }

      // The API may return items out of order; `index` is authoritative
      const byIndex = new Map(response.data.map((item) => [item.index, item.embedding]));
      for (let j = 0; j < batch.length; j++) {
        const embedding = byIndex.get(j);
        if (!Array.isArray(embedding) || embedding.length === 0) {
          throw new EmbeddingError(`No embedding returned for input ${i + j}`);
        }
        vectors.push(embedding);
      }

      logger.debug(`[OpenAIEmbeddings] Embedded ${Math.min(i + BATCH_SIZE, inputs.length)}/${inputs.length} texts`);
    }

    return vectors;
  }
}
