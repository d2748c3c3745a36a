/**
 * Error kinds surfaced to MCP clients.
 *
 * Each carries a stable `code` so the server can report the failure kind
 * without matching on message text. "No relevant context" is not an error:
 * the answerer returns a `not_found` result instead.
 */

export type AssistantErrorCode =
  | 'EXTRACTION_FAILED'
  | 'EMBEDDING_FAILED'
  | 'GENERATION_FAILED'
  | 'INVALID_STATE'
  | 'SESSION_NOT_FOUND'
  | 'CHALLENGE_ITEM_NOT_FOUND';

export class AssistantError extends Error {
  readonly code: AssistantErrorCode;

  constructor(code: AssistantErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AssistantError';
    this.code = code;
  }
}

/** The uploaded file is unreadable, of an unsupported type, or has no text. */
export class ExtractionError extends AssistantError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EXTRACTION_FAILED', message, options);
    this.name = 'ExtractionError';
  }
}

/** The embedding capability failed (network, quota, malformed response). */
export class EmbeddingError extends AssistantError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EMBEDDING_FAILED', message, options);
    this.name = 'EmbeddingError';
  }
}

/** The generation capability failed or returned something unusable. */
export class GenerationError extends AssistantError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('GENERATION_FAILED', message, options);
    this.name = 'GenerationError';
  }
}

/** An action was requested that the session's current state does not allow. */
export class InvalidStateError extends AssistantError {
  readonly state: string;
  readonly action: string;

  constructor(message: string, state: string, action: string) {
    super('INVALID_STATE', message);
    this.name = 'InvalidStateError';
    this.state = state;
    this.action = action;
  }
}

export class SessionNotFoundError extends AssistantError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super('SESSION_NOT_FOUND', `Session not found: ${sessionId}`);
    this.name = 'SessionNotFoundError';
    this.sessionId = sessionId;
  }
}

export class ChallengeItemNotFoundError extends AssistantError {
  readonly questionId: string;

  constructor(questionId: string) {
    super('CHALLENGE_ITEM_NOT_FOUND', `Challenge question not found: ${questionId}`);
    this.name = 'ChallengeItemNotFoundError';
    this.questionId = questionId;
  }
}

/**
 * Message of any thrown value, for wrapping third-party failures
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
