import { ChunkCollection, DocumentRecord } from '../types.js';
import { TextGenerator } from '../generation/types.js';
import { GenerationError } from '../util/errors.js';
import { logger } from '../util/logger.js';
import { fitToBudget, sampleEvenly } from './context-assembler.js';
import { buildSummaryPrompt } from './prompts.js';

export interface SummaryOptions {
  maxWords: number;
  /** Documents longer than this are summarized from a sample of chunks */
  inputChars: number;
}

/**
 * Cut text to at most `maxWords` words, marking the cut with "..."
 */
export function limitWords(text: string, maxWords: number): string {
  const words = text.trim().split(/\s+/).filter((word) => word.length > 0);
  if (words.length <= maxWords) {
    return words.join(' ');
  }
  return `${words.slice(0, maxWords).join(' ')}...`;
}

export class DocumentSummarizer {
  constructor(
    private readonly generator: TextGenerator,
    private readonly options: SummaryOptions
  ) {}

  /**
   * Text the model sees: the whole document when it fits, otherwise chunks
   * sampled from start to end until the budget is filled.
   */
  selectInput(document: DocumentRecord, collection: ChunkCollection): { content: string; sampled: boolean } {
    const { inputChars } = this.options;
    if (document.text.length <= inputChars || collection.chunks.length <= 1) {
      return { content: document.text.slice(0, inputChars), sampled: false };
    }

    // Enough chunks to cover the budget, spread over the whole document
    const averageChunk = Math.max(1, Math.ceil(document.text.length / collection.chunks.length));
    const wanted = Math.max(2, Math.floor(inputChars / averageChunk));
    const sample = sampleEvenly(collection.chunks, wanted);
    return {
      content: fitToBudget(
        sample.map((chunk) => chunk.text.trim()),
        inputChars
      ),
      sampled: true,
    };
  }

  async summarize(document: DocumentRecord, collection: ChunkCollection): Promise<string> {
    const { content, sampled } = this.selectInput(document, collection);
    const { system, prompt } = buildSummaryPrompt(content, this.options.maxWords, sampled);

    logger.debug(`[DocumentSummarizer] Summarizing ${document.fileName} (${content.length} chars, sampled: ${sampled})`);
    const response = await this.generator.generate({ system, prompt, maxTokens: 400 });

    const summary = limitWords(response, this.options.maxWords);
    if (summary.length === 0) {
      throw new GenerationError('Summary generation returned no text');
    }
    return summary;
  }
}
