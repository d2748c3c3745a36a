import { AskResult, ChallengeItem, ChunkCollection, DocumentRecord, EvaluationResult, UploadedFile } from '../types.js';
import { AssistantConfig } from '../config.js';
import { EmbeddingsProvider } from '../embeddings/types.js';
import { TextGenerator } from '../generation/types.js';
import { extractText } from '../processor/extractor.js';
import { chunkText, ChunkOptions } from '../processor/chunker.js';
import { IngestionProgressTracker } from '../indexing/progress.js';
import { LoadedDocument, SessionContext } from '../session/session.js';
import { describeError } from '../util/errors.js';
import { secureHash } from '../util/security.js';
import { logger } from '../util/logger.js';
import { DocumentCache, collectionKey } from './cache.js';
import { ContextRetriever } from './retriever.js';
import { DocumentSummarizer } from './summarizer.js';
import { QuestionAnswerer } from './answerer.js';
import { AnswerEvaluator, ChallengeGenerator } from './challenge.js';

/** Chunks sent per embedding call while ingesting, so progress can be reported */
const EMBED_GROUP_SIZE = 32;

export type PipelineConfig = Pick<
  AssistantConfig,
  | 'chunkSize'
  | 'chunkOverlap'
  | 'topK'
  | 'minRelevanceScore'
  | 'summaryMaxWords'
  | 'summaryInputChars'
  | 'challengeQuestionCount'
  | 'challengeSampleChunks'
  | 'maxHistoryTurns'
  | 'cacheSize'
>;

export interface PipelineDependencies {
  embeddings: EmbeddingsProvider;
  generator: TextGenerator;
  cache?: DocumentCache;
  progress?: IngestionProgressTracker;
}

/**
 * Everything between an uploaded file and an answer: extraction, chunking,
 * embedding (cached by content), summarizing, answering and the challenge mode.
 * Operations act on the session they are given and never on another.
 */
export class RAGPipeline {
  private readonly embeddings: EmbeddingsProvider;
  private readonly cache: DocumentCache;
  private readonly progress: IngestionProgressTracker;
  private readonly chunkOptions: ChunkOptions;
  private readonly summarizer: DocumentSummarizer;
  private readonly answerer: QuestionAnswerer;
  private readonly challengeGenerator: ChallengeGenerator;
  private readonly evaluator: AnswerEvaluator;

  constructor(config: PipelineConfig, deps: PipelineDependencies) {
    this.embeddings = deps.embeddings;
    this.cache = deps.cache ?? new DocumentCache(config.cacheSize);
    this.progress = deps.progress ?? new IngestionProgressTracker();
    this.chunkOptions = { chunkSize: config.chunkSize, chunkOverlap: config.chunkOverlap };

    const retriever = new ContextRetriever(deps.embeddings);
    this.summarizer = new DocumentSummarizer(deps.generator, {
      maxWords: config.summaryMaxWords,
      inputChars: config.summaryInputChars,
    });
    this.answerer = new QuestionAnswerer(retriever, deps.generator, {
      topK: config.topK,
      minScore: config.minRelevanceScore,
      maxHistoryTurns: config.maxHistoryTurns,
    });
    this.challengeGenerator = new ChallengeGenerator(deps.generator, retriever, {
      questionCount: config.challengeQuestionCount,
      sampleChunks: config.challengeSampleChunks,
    });
    this.evaluator = new AnswerEvaluator(deps.generator);
  }

  get documentCache(): DocumentCache {
    return this.cache;
  }

  get progressTracker(): IngestionProgressTracker {
    return this.progress;
  }

  /**
   * Extract the file, reusing an earlier extraction of identical bytes
   */
  async extract(file: UploadedFile): Promise<DocumentRecord> {
    const id = secureHash(file.data);
    const cached = this.cache.getDocument(id);
    if (cached) {
      logger.debug(`[RAGPipeline] Extraction cache hit for ${file.name}`);
      return cached.fileName === file.name ? cached : { ...cached, fileName: file.name };
    }

    const extracted = await extractText(file);
    const document: DocumentRecord = {
      ...extracted,
      id,
      fileName: file.name,
      charCount: extracted.text.length,
    };
    this.cache.setDocument(document);
    logger.info(`[RAGPipeline] Extracted ${document.charCount} characters from ${file.name}`);
    return document;
  }

  /**
   * Chunk and embed a document, reusing a collection built with the same settings
   */
  async index(document: DocumentRecord, onProgress?: (processed: number, total: number) => void): Promise<ChunkCollection> {
    const key = collectionKey(this.chunkOptions, this.embeddings.model);
    const cached = this.cache.getCollection(document.id, key);
    if (cached) {
      logger.debug(`[RAGPipeline] Chunk cache hit for ${document.fileName}`);
      onProgress?.(cached.chunks.length, cached.chunks.length);
      return cached;
    }

    const chunks = chunkText(document.text, this.chunkOptions);
    const embeddings: number[][] = [];
    onProgress?.(0, chunks.length);
    for (let i = 0; i < chunks.length; i += EMBED_GROUP_SIZE) {
      const group = chunks.slice(i, i + EMBED_GROUP_SIZE);
      embeddings.push(...(await this.embeddings.embedMany(group.map((chunk) => chunk.text))));
      onProgress?.(embeddings.length, chunks.length);
    }

    const collection: ChunkCollection = { documentId: document.id, chunks, embeddings };
    this.cache.setCollection(document.id, key, collection);
    logger.info(`[RAGPipeline] Indexed ${chunks.length} chunks of ${document.fileName}`);
    return collection;
  }

  async summarize(document: DocumentRecord, collection: ChunkCollection): Promise<string> {
    return this.summarizer.summarize(document, collection);
  }

  /**
   * Ingest a file into the session: extract, index, summarize, then replace the
   * session's document. The session is left untouched if any step fails.
   */
  async loadDocument(session: SessionContext, file: UploadedFile): Promise<LoadedDocument> {
    session.assertCan('upload');
    const previousId = session.document?.id;
    this.progress.start(session.id, file.name);

    try {
      const document = await this.extract(file);
      const collection = await this.index(document, (processed, total) => {
        this.progress.advance(session.id, processed, total);
      });

      this.progress.setPhase(session.id, 'summarizing');
      const summary = await this.summarize(document, collection);

      const loaded: LoadedDocument = { document, collection, summary };
      session.loadDocument(loaded);
      this.progress.complete(session.id);

      if (previousId && previousId !== document.id) {
        this.cache.invalidate(previousId);
      }
      return loaded;
    } catch (error) {
      this.progress.fail(session.id, describeError(error));
      throw error;
    }
  }

  async ask(session: SessionContext, question: string): Promise<AskResult> {
    const collection = session.requireCollection('ask');
    const result = await this.answerer.answer(question, collection, session.history);
    session.recordAnswer(question, result, collection);
    return result;
  }

  async generateChallenge(session: SessionContext): Promise<readonly ChallengeItem[]> {
    const collection = session.requireCollection('generateChallenge');
    const items = await this.challengeGenerator.generate(collection);
    session.setChallenge(items, collection);
    return session.challenge;
  }

  async evaluateAnswer(session: SessionContext, questionId: string, answer: string): Promise<EvaluationResult> {
    const trimmed = answer.trim();
    if (trimmed.length === 0) {
      throw new Error('Invalid arguments: answer: Answer must not be empty');
    }

    const item = session.beginEvaluation(questionId);
    const result = await this.evaluator.evaluate(item, trimmed);
    session.recordEvaluation(item, trimmed, result);
    return result;
  }
}
