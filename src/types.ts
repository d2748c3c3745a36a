export type DocumentKind = 'pdf' | 'text';

/**
 * Raw file as received from the client, before extraction
 */
export interface UploadedFile {
  name: string;
  data: Buffer;
  mimeType?: string;
}

export interface ExtractedDocument {
  kind: DocumentKind;
  text: string;
  pageCount?: number;
}

/**
 * Extracted document keyed by the SHA-256 of the uploaded bytes.
 * Immutable once created.
 */
export interface DocumentRecord extends ExtractedDocument {
  readonly id: string;
  readonly fileName: string;
  readonly charCount: number;
}

/**
 * Substring of a document. `start`/`end` are character offsets into the
 * document text; `overlap` is how many leading characters repeat the end of
 * the previous chunk.
 */
export interface Chunk {
  readonly index: number;
  readonly text: string;
  readonly start: number;
  readonly end: number;
  readonly overlap: number;
}

/**
 * Chunks of one document with a parallel array of embedding vectors
 */
export interface ChunkCollection {
  readonly documentId: string;
  readonly chunks: readonly Chunk[];
  readonly embeddings: readonly (readonly number[])[];
}

/** A chunk returned by the retriever together with its similarity to the query */
export interface RetrievedChunk {
  chunk: Chunk;
  score: number;
}

/** Reference to a chunk of the session's current document, as shown to the client */
export interface ChunkRef {
  index: number;
  text: string;
  score?: number;
}

export type AnswerStatus = 'answered' | 'not_found';

export interface ConversationTurn {
  readonly question: string;
  readonly answer: string;
  readonly status: AnswerStatus;
  readonly sources: readonly ChunkRef[];
  readonly askedAt: Date;
}

export type Verdict = 'correct' | 'partially_correct' | 'incorrect' | 'unknown';

export interface ChallengeSubmission {
  answer: string;
  verdict: Verdict;
  feedback: string;
  evaluatedAt: Date;
}

export interface ChallengeItem {
  id: string;
  question: string;
  supportingChunks: ChunkRef[];
  submission?: ChallengeSubmission;
}

export interface AskResult {
  status: AnswerStatus;
  answer: string;
  justification: string;
  sources: ChunkRef[];
}

export interface EvaluationResult {
  questionId: string;
  question: string;
  verdict: Verdict;
  feedback: string;
  supportingChunks: ChunkRef[];
}

export type IngestionPhase = 'extracting' | 'embedding' | 'summarizing' | 'complete' | 'failed';

export interface IngestionStatus {
  sessionId: string;
  fileName: string;
  phase: IngestionPhase;
  /** Chunks embedded so far */
  processed: number;
  total: number;
  startedAt: Date;
  error?: string;
}
