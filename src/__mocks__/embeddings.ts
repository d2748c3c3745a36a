/**
 * In-process stand-ins for the embedding and generation capabilities
 */

import type { EmbeddingsProvider } from '../embeddings/types.js';
import type { GenerationRequest, TextGenerator } from '../generation/types.js';

function fromEmbed(model: string, embed: (text: string) => Promise<number[]>): EmbeddingsProvider {
  return {
    model,
    embed,
    embedMany: async (texts: readonly string[]) => Promise.all(texts.map((text) => embed(text))),
  };
}

/**
 * Deterministic embeddings derived from a hash of the text
 * @param dimensions - vector length (default 16)
 */
export function createMockEmbeddings(dimensions: number = 16): EmbeddingsProvider {
  return fromEmbed('mock-hash', async (text: string): Promise<number[]> => {
    const hash = simpleHash(text);
    return generateDeterministicVector(hash, dimensions);
  });
}

/**
 * Embeddings looked up from a table of exact texts, so tests control every similarity.
 * Unknown texts get `fallback` (a zero vector by default, which scores 0 against everything).
 */
export function createTableEmbeddings(
  table: Record<string, number[]>,
  fallback: number[] = [0, 0, 0]
): EmbeddingsProvider & { calls: string[] } {
  const calls: string[] = [];
  const provider = fromEmbed('mock-table', async (text: string): Promise<number[]> => {
    calls.push(text);
    return table[text] ?? fallback;
  });
  return { ...provider, calls };
}

/**
 * Simple hash function for generating deterministic values
 */
function simpleHash(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = (hash << 5) - hash + char;
    hash = hash & hash; // Convert to 32bit integer
  }
  return Math.abs(hash);
}

/**
 * Generate a deterministic unit vector based on a seed
 */
function generateDeterministicVector(seed: number, dimensions: number): number[] {
  const vector: number[] = [];
  let value = seed;
  for (let i = 0; i < dimensions; i++) {
    // Linear congruential generator
    value = (value * 1103515245 + 12345) & 0x7fffffff;
    vector.push((value / 0x7fffffff) * 2 - 1);
  }
  const magnitude = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  return vector.map((v) => v / magnitude);
}

/**
 * Mock embeddings provider that throws errors (for error handling testing)
 */
export function createFailingEmbeddings(error: Error = new Error('Embeddings service unavailable')): EmbeddingsProvider {
  return fromEmbed('mock-failing', async (): Promise<number[]> => {
    throw error;
  });
}

/**
 * Generator returning a fixed reply, or one computed from the request.
 * `generate` is a spy so tests can inspect prompts and call counts.
 */
export function createStubGenerator(reply: string | ((request: GenerationRequest) => string)) {
  const generate = vi.fn(async (request: GenerationRequest): Promise<string> =>
    typeof reply === 'string' ? reply : reply(request)
  );
  const generator: TextGenerator & { generate: typeof generate } = { model: 'mock-generator', generate };
  return generator;
}
