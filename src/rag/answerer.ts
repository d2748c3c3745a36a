import { AskResult, ChunkCollection, ChunkRef, ConversationTurn } from '../types.js';
import { TextGenerator } from '../generation/types.js';
import { logger } from '../util/logger.js';
import { ContextRetriever, RetrievalOptions, toChunkRef } from './retriever.js';
import { buildAnswerPrompt, NOT_IN_DOCUMENT_ANSWER } from './prompts.js';
import { isInsufficientContextAnswer } from './validator.js';
import { snippet } from './context-assembler.js';

export interface AnswerOptions extends RetrievalOptions {
  maxHistoryTurns: number;
}

export const NO_SUPPORT_JUSTIFICATION = 'No passage of the document was relevant enough to answer this question.';

/**
 * One line per supporting chunk, e.g. `[Chunk 2] "Water boils at..." (score 0.91)`
 */
export function formatJustification(sources: readonly ChunkRef[]): string {
  if (sources.length === 0) {
    return NO_SUPPORT_JUSTIFICATION;
  }
  const lines = sources.map((source) => {
    const score = source.score === undefined ? '' : ` (score ${source.score.toFixed(2)})`;
    return `[Chunk ${source.index}] "${snippet(source.text)}"${score}`;
  });
  return `Supported by:\n${lines.join('\n')}`;
}

export class QuestionAnswerer {
  constructor(
    private readonly retriever: ContextRetriever,
    private readonly generator: TextGenerator,
    private readonly options: AnswerOptions
  ) {}

  async answer(question: string, collection: ChunkCollection, history: readonly ConversationTurn[]): Promise<AskResult> {
    const { topK, minScore, maxHistoryTurns } = this.options;
    const retrieved = await this.retriever.retrieve(question, collection, { topK, minScore });

    if (retrieved.length === 0) {
      logger.info('[QuestionAnswerer] No relevant context, returning not-found answer');
      return { status: 'not_found', answer: NOT_IN_DOCUMENT_ANSWER, justification: NO_SUPPORT_JUSTIFICATION, sources: [] };
    }

    const sources = retrieved.map(toChunkRef);
    const recent = maxHistoryTurns > 0 ? history.slice(-maxHistoryTurns) : [];
    const { system, prompt } = buildAnswerPrompt(question, sources, recent);

    const text = (await this.generator.generate({ system, prompt })).trim();

    if (isInsufficientContextAnswer(text)) {
      // The model read the excerpts and found no answer; report it like a failed retrieval
      return { status: 'not_found', answer: text, justification: NO_SUPPORT_JUSTIFICATION, sources: [] };
    }

    return { status: 'answered', answer: text, justification: formatJustification(sources), sources };
  }
}
