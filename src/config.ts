import dotenv from 'dotenv';
import { z } from 'zod';
import { logger } from './util/logger.js';

export interface AssistantConfig {
  openaiApiKey: string;
  generationModel: string;
  embeddingModel: string;
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  minRelevanceScore: number;
  summaryMaxWords: number;
  summaryInputChars: number;
  challengeQuestionCount: number;
  challengeSampleChunks: number;
  maxHistoryTurns: number;
  cacheSize: number;
  maxFileBytes: number;
}

export const DEFAULT_CONFIG: Omit<AssistantConfig, 'openaiApiKey'> = {
  generationModel: 'gpt-4o-mini',
  embeddingModel: 'text-embedding-3-small',
  chunkSize: 1000,
  chunkOverlap: 200,
  topK: 5,
  // Cosine floor below which a chunk is not considered evidence
  minRelevanceScore: 0.3,
  summaryMaxWords: 150,
  summaryInputChars: 10000,
  challengeQuestionCount: 3,
  challengeSampleChunks: 8,
  maxHistoryTurns: 5,
  cacheSize: 20,
  maxFileBytes: 20 * 1024 * 1024,
};

const intFromEnv = (min: number, max: number) => z.coerce.number().int().min(min).max(max);

const EnvSchema = z
  .object({
    GENERATION_MODEL: z.string().trim().min(1).optional(),
    EMBEDDING_MODEL: z.string().trim().min(1).optional(),
    CHUNK_SIZE: intFromEnv(50, 8000).optional(),
    CHUNK_OVERLAP: intFromEnv(0, 4000).optional(),
    TOP_K: intFromEnv(1, 20).optional(),
    MIN_RELEVANCE_SCORE: z.coerce.number().min(-1).max(1).optional(),
    // Summaries never exceed 150 words; the setting can only tighten that
    SUMMARY_MAX_WORDS: intFromEnv(10, 150).optional(),
    SUMMARY_INPUT_CHARS: intFromEnv(500, 200000).optional(),
    CHALLENGE_QUESTION_COUNT: intFromEnv(1, 10).optional(),
    CHALLENGE_SAMPLE_CHUNKS: intFromEnv(1, 50).optional(),
    MAX_HISTORY_TURNS: intFromEnv(0, 50).optional(),
    CACHE_SIZE: intFromEnv(1, 1000).optional(),
    MAX_FILE_BYTES: intFromEnv(1024, 500 * 1024 * 1024).optional(),
  })
  .transform((env) => ({
    generationModel: env.GENERATION_MODEL ?? DEFAULT_CONFIG.generationModel,
    embeddingModel: env.EMBEDDING_MODEL ?? DEFAULT_CONFIG.embeddingModel,
    chunkSize: env.CHUNK_SIZE ?? DEFAULT_CONFIG.chunkSize,
    chunkOverlap: env.CHUNK_OVERLAP ?? DEFAULT_CONFIG.chunkOverlap,
    topK: env.TOP_K ?? DEFAULT_CONFIG.topK,
    minRelevanceScore: env.MIN_RELEVANCE_SCORE ?? DEFAULT_CONFIG.minRelevanceScore,
    summaryMaxWords: env.SUMMARY_MAX_WORDS ?? DEFAULT_CONFIG.summaryMaxWords,
    summaryInputChars: env.SUMMARY_INPUT_CHARS ?? DEFAULT_CONFIG.summaryInputChars,
    challengeQuestionCount: env.CHALLENGE_QUESTION_COUNT ?? DEFAULT_CONFIG.challengeQuestionCount,
    challengeSampleChunks: env.CHALLENGE_SAMPLE_CHUNKS ?? DEFAULT_CONFIG.challengeSampleChunks,
    maxHistoryTurns: env.MAX_HISTORY_TURNS ?? DEFAULT_CONFIG.maxHistoryTurns,
    cacheSize: env.CACHE_SIZE ?? DEFAULT_CONFIG.cacheSize,
    maxFileBytes: env.MAX_FILE_BYTES ?? DEFAULT_CONFIG.maxFileBytes,
  }))
  .refine((config) => config.chunkOverlap < config.chunkSize, {
    message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    path: ['CHUNK_OVERLAP'],
  });

/**
 * Empty strings count as unset so that `CHUNK_SIZE=` in a .env file falls back to the default
 */
function pickSet(env: NodeJS.ProcessEnv): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      picked[key] = value;
    }
  }
  return picked;
}

/**
 * Build the configuration from environment variables.
 * @param env - Defaults to process.env after loading a .env file
 * @throws Error when OPENAI_API_KEY is missing or a value is out of range
 */
export function loadConfig(env?: NodeJS.ProcessEnv): AssistantConfig {
  if (!env) {
    dotenv.config();
  }
  const source = pickSet(env ?? process.env);
  logger.debug('[Config] Loading configuration');

  const openaiApiKey = source.OPENAI_API_KEY?.trim();
  if (!openaiApiKey) {
    throw new Error('OPENAI_API_KEY environment variable is required');
  }

  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${errors}`);
  }

  const config: AssistantConfig = Object.freeze({ ...result.data, openaiApiKey });

  logger.debug('[Config] Configuration loaded:', { ...config, openaiApiKey: '***' });

  return config;
}
