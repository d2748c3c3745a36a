import {
  AskResult,
  ChallengeItem,
  ChallengeSubmission,
  ChunkCollection,
  ConversationTurn,
  DocumentRecord,
  EvaluationResult,
} from '../types.js';
import { ChallengeItemNotFoundError, InvalidStateError } from '../util/errors.js';

export type SessionState =
  | 'idle'
  | 'document_loaded'
  | 'asking'
  | 'challenge_generated'
  | 'answer_submitted'
  | 'evaluated';

export type SessionAction = 'upload' | 'ask' | 'generateChallenge' | 'submitAnswer';

const CHALLENGE_STATES: readonly SessionState[] = ['challenge_generated', 'answer_submitted', 'evaluated'];

/**
 * Which actions each state accepts. Upload is always allowed and resets the session.
 */
export function canPerform(state: SessionState, action: SessionAction): boolean {
  switch (action) {
    case 'upload':
      return true;
    case 'ask':
    case 'generateChallenge':
      return state !== 'idle';
    case 'submitAnswer':
      return CHALLENGE_STATES.includes(state);
  }
}

export interface LoadedDocument {
  document: DocumentRecord;
  collection: ChunkCollection;
  summary: string;
}

export interface SessionSnapshot {
  id: string;
  state: SessionState;
  createdAt: string;
  document?: { id: string; fileName: string; kind: string; charCount: number; pageCount?: number; chunkCount: number };
  summary?: string;
  history: ConversationTurn[];
  challenge: ChallengeItem[];
}

/**
 * State of one user's interaction with one document. Owns the conversation
 * history and the current challenge; nothing here is shared between sessions.
 */
export class SessionContext {
  readonly id: string;
  readonly createdAt: Date;
  private _state: SessionState = 'idle';
  private loaded?: LoadedDocument;
  private turns: ConversationTurn[] = [];
  private challengeItems: ChallengeItem[] = [];

  constructor(id: string) {
    this.id = id;
    this.createdAt = new Date();
  }

  get state(): SessionState {
    return this._state;
  }

  get document(): DocumentRecord | undefined {
    return this.loaded?.document;
  }

  get summary(): string | undefined {
    return this.loaded?.summary;
  }

  get history(): readonly ConversationTurn[] {
    return this.turns;
  }

  get challenge(): readonly ChallengeItem[] {
    return this.challengeItems;
  }

  assertCan(action: SessionAction): void {
    if (canPerform(this._state, action)) return;

    const message =
      action === 'submitAnswer' && this._state !== 'idle'
        ? 'No challenge generated yet. Generate a challenge before submitting answers.'
        : 'No document loaded. Upload a document first.';
    throw new InvalidStateError(message, this._state, action);
  }

  /**
   * Chunks of the current document, for retrieval
   * @throws InvalidStateError when no document is loaded
   */
  requireCollection(action: SessionAction): ChunkCollection {
    this.assertCan(action);
    if (!this.loaded) {
      throw new InvalidStateError('No document loaded. Upload a document first.', this._state, action);
    }
    return this.loaded.collection;
  }

  loadDocument(loaded: LoadedDocument): void {
    this.assertCan('upload');
    this.loaded = loaded;
    this.turns = [];
    this.challengeItems = [];
    this._state = 'document_loaded';
  }

  /**
   * Throws when the session switched documents after `collection` was read,
   * so results built from an older upload never land in the current one.
   */
  private assertCurrent(collection: ChunkCollection, action: SessionAction): void {
    if (this.loaded?.collection !== collection) {
      throw new InvalidStateError(
        'The document changed while the request was running. Repeat the request for the new document.',
        this._state,
        action
      );
    }
  }

  recordAnswer(question: string, result: AskResult, collection: ChunkCollection): ConversationTurn {
    this.assertCan('ask');
    this.assertCurrent(collection, 'ask');
    const turn: ConversationTurn = {
      question,
      answer: result.answer,
      status: result.status,
      sources: result.sources,
      askedAt: new Date(),
    };
    this.turns.push(turn);
    this._state = 'asking';
    return turn;
  }

  setChallenge(items: ChallengeItem[], collection: ChunkCollection): void {
    this.assertCan('generateChallenge');
    this.assertCurrent(collection, 'generateChallenge');
    this.challengeItems = items;
    this._state = 'challenge_generated';
  }

  getChallengeItem(questionId: string): ChallengeItem {
    this.assertCan('submitAnswer');
    const item = this.challengeItems.find((candidate) => candidate.id === questionId);
    if (!item) {
      throw new ChallengeItemNotFoundError(questionId);
    }
    return item;
  }

  /** Marks an answer as awaiting evaluation */
  beginEvaluation(questionId: string): ChallengeItem {
    const item = this.getChallengeItem(questionId);
    this._state = 'answer_submitted';
    return item;
  }

  /**
   * @param item - the item returned by `beginEvaluation`; it must still belong to the current challenge
   */
  recordEvaluation(item: ChallengeItem, answer: string, result: EvaluationResult): ChallengeSubmission {
    if (!this.challengeItems.includes(item)) {
      throw new InvalidStateError(
        'The challenge changed while the answer was being evaluated. Answer a question from the current challenge.',
        this._state,
        'submitAnswer'
      );
    }
    const submission: ChallengeSubmission = {
      answer,
      verdict: result.verdict,
      feedback: result.feedback,
      evaluatedAt: new Date(),
    };
    item.submission = submission;
    this._state = 'evaluated';
    return submission;
  }

  snapshot(): SessionSnapshot {
    const loaded = this.loaded;
    return {
      id: this.id,
      state: this._state,
      createdAt: this.createdAt.toISOString(),
      document: loaded
        ? {
            id: loaded.document.id,
            fileName: loaded.document.fileName,
            kind: loaded.document.kind,
            charCount: loaded.document.charCount,
            pageCount: loaded.document.pageCount,
            chunkCount: loaded.collection.chunks.length,
          }
        : undefined,
      summary: loaded?.summary,
      history: [...this.turns],
      challenge: this.challengeItems.map((item) => ({ ...item })),
    };
  }
}
