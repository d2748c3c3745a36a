import { z } from 'zod';
import { Chunk, ChallengeItem, ChunkCollection, EvaluationResult, Verdict } from '../types.js';
import { TextGenerator } from '../generation/types.js';
import { GenerationError, describeError } from '../util/errors.js';
import { safeJsonParse } from '../util/security.js';
import { logger } from '../util/logger.js';
import { ContextRetriever, chunkToRef } from './retriever.js';
import { sampleEvenly } from './context-assembler.js';
import { buildChallengePrompt, buildEvaluationPrompt } from './prompts.js';
import { validateReferences } from './validator.js';

const ChallengeResponseSchema = z.object({
  questions: z.array(
    z.object({
      question: z.string(),
      // Validated against the sample afterwards
      chunks: z.array(z.unknown()).default([]),
    })
  ),
});

export interface ChallengeOptions {
  questionCount: number;
  sampleChunks: number;
}

export class ChallengeGenerator {
  constructor(
    private readonly generator: TextGenerator,
    private readonly retriever: ContextRetriever,
    private readonly options: ChallengeOptions
  ) {}

  async generate(collection: ChunkCollection): Promise<ChallengeItem[]> {
    const { questionCount, sampleChunks } = this.options;
    const sample = sampleEvenly(collection.chunks, sampleChunks);
    if (sample.length === 0) {
      throw new GenerationError('Document has no content to build questions from');
    }

    const { system, prompt } = buildChallengePrompt(sample.map(chunkToRef), questionCount);
    const response = await this.generator.generate({ system, prompt, json: true, temperature: 0.5 });

    let parsed: z.infer<typeof ChallengeResponseSchema>;
    try {
      parsed = safeJsonParse(response, ChallengeResponseSchema);
    } catch (error) {
      throw new GenerationError(`Challenge questions could not be parsed: ${describeError(error)}`, { cause: error });
    }

    const byIndex = new Map<number, Chunk>(collection.chunks.map((chunk) => [chunk.index, chunk]));
    const allowed = new Set(sample.map((chunk) => chunk.index));
    const seen = new Set<string>();
    const items: ChallengeItem[] = [];

    for (const candidate of parsed.questions) {
      if (items.length >= questionCount) break;

      const question = candidate.question.trim();
      if (question.length === 0 || seen.has(question.toLowerCase())) continue;

      let indices = validateReferences(candidate.chunks, allowed).valid;
      if (indices.length === 0) {
        const [best] = await this.retriever.rank(question, collection);
        indices = best ? [best.chunk.index] : [];
      }

      const supportingChunks = indices.flatMap((index) => {
        const chunk = byIndex.get(index);
        return chunk ? [chunkToRef(chunk)] : [];
      });
      if (supportingChunks.length === 0) {
        logger.warn(`[ChallengeGenerator] Discarding unsupported question: ${question}`);
        continue;
      }

      seen.add(question.toLowerCase());
      items.push({ id: `q${items.length + 1}`, question, supportingChunks });
    }

    if (items.length === 0) {
      throw new GenerationError('No usable challenge questions were generated');
    }

    logger.info(`[ChallengeGenerator] Generated ${items.length} question(s) from ${sample.length} sampled chunks`);
    return items;
  }
}

function toVerdict(label: string): Verdict {
  const value = label.toLowerCase();
  if (value.includes('partially')) return 'partially_correct';
  if (/\b(incorrect|wrong)\b/.test(value) || /\bnot\s+(correct|right)\b/.test(value)) return 'incorrect';
  if (/\bcorrect\b/.test(value)) return 'correct';
  return 'unknown';
}

/**
 * Read the grader's reply, which is asked to look like
 *
 *   Evaluation: Partially Correct
 *   Justification: ...
 *
 * Missing labels fall back to `unknown` and the whole reply as feedback.
 */
export function parseEvaluation(response: string): { verdict: Verdict; feedback: string } {
  const evaluation = /evaluation\s*:\s*\**\s*([^\n]+)/i.exec(response);
  const justification = /justification\s*:\s*\**\s*([\s\S]+)/i.exec(response);

  const verdict = evaluation ? toVerdict(evaluation[1]) : 'unknown';
  const feedback = (justification ? justification[1] : response).trim();
  return { verdict, feedback };
}

export class AnswerEvaluator {
  constructor(private readonly generator: TextGenerator) {}

  async evaluate(item: ChallengeItem, answer: string): Promise<EvaluationResult> {
    const { system, prompt } = buildEvaluationPrompt(item.question, answer, item.supportingChunks);
    const response = await this.generator.generate({ system, prompt, temperature: 0 });
    const { verdict, feedback } = parseEvaluation(response);

    logger.debug(`[AnswerEvaluator] ${item.id}: ${verdict}`);
    return {
      questionId: item.id,
      question: item.question,
      verdict,
      feedback,
      supportingChunks: item.supportingChunks,
    };
  }
}
