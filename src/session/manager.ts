import { randomUUID } from 'node:crypto';
import { UploadedFile } from '../types.js';
import { RAGPipeline } from '../rag/pipeline.js';
import { SessionNotFoundError } from '../util/errors.js';
import { logger } from '../util/logger.js';
import { LoadedDocument, SessionContext } from './session.js';

export interface UploadOutcome {
  session: SessionContext;
  loaded: LoadedDocument;
}

/**
 * Owns the live sessions of this process. Sessions never see each other's
 * documents, history or challenges; they disappear on `end` or process exit.
 */
export class SessionManager {
  private readonly sessions = new Map<string, SessionContext>();

  constructor(private readonly pipeline: RAGPipeline) {}

  create(): SessionContext {
    const session = new SessionContext(randomUUID());
    this.sessions.set(session.id, session);
    logger.debug(`[SessionManager] Created session ${session.id}`);
    return session;
  }

  get(sessionId: string): SessionContext {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  list(): SessionContext[] {
    return Array.from(this.sessions.values());
  }

  /**
   * Load a document into the named session, or into a new one when no id is given.
   * A failed upload of a freshly created session does not leave it behind.
   * `beforeLoad` sees the session before ingestion starts.
   */
  async upload(
    file: UploadedFile,
    sessionId?: string,
    beforeLoad?: (session: SessionContext) => void
  ): Promise<UploadOutcome> {
    const isNew = sessionId === undefined;
    const session = sessionId === undefined ? this.create() : this.get(sessionId);

    try {
      beforeLoad?.(session);
      const loaded = await this.pipeline.loadDocument(session, file);
      logger.info(`[SessionManager] Session ${session.id} loaded ${file.name}`);
      return { session, loaded };
    } catch (error) {
      if (isNew) {
        this.end(session.id);
      }
      throw error;
    }
  }

  end(sessionId: string): boolean {
    const removed = this.sessions.delete(sessionId);
    if (removed) {
      this.pipeline.progressTracker.remove(sessionId);
      logger.debug(`[SessionManager] Ended session ${sessionId}`);
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }

  clear(): void {
    for (const id of Array.from(this.sessions.keys())) {
      this.end(id);
    }
  }
}
