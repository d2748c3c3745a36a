import { readFile, stat } from 'node:fs/promises';
import { basename } from 'node:path';
import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  CallToolResult,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { AssistantConfig } from './config.js';
import { EmbeddingsProvider } from './embeddings/types.js';
import { OpenAIEmbeddings } from './embeddings/openai.js';
import { TextGenerator } from './generation/types.js';
import { OpenAIGenerator } from './generation/openai.js';
import { RAGPipeline } from './rag/pipeline.js';
import { SessionManager } from './session/manager.js';
import { SessionContext } from './session/session.js';
import { ChunkRef, IngestionStatus, UploadedFile } from './types.js';
import { AssistantError, ExtractionError, describeError } from './util/errors.js';
import { logger } from './util/logger.js';
import {
  AskQuestionArgsSchema,
  GenerateChallengeArgsSchema,
  SessionArgsSchema,
  SubmitChallengeAnswerArgsSchema,
  UploadDocumentArgs,
  UploadDocumentArgsSchema,
  sanitizeErrorMessage,
  validateToolArgs,
  wrapExternalContent,
} from './util/security.js';

/** Progress token type from MCP spec */
type ProgressToken = string | number;

const PHASE_MESSAGES: Record<IngestionStatus['phase'], string> = {
  extracting: 'Extracting text',
  embedding: 'Embedding chunks',
  summarizing: 'Writing summary',
  complete: 'Document ready',
  failed: 'Upload failed',
};

const SESSION_ID_PROPERTY = {
  type: 'string',
  description: 'Session ID returned by upload_document',
};

export const TOOLS: Tool[] = [
  {
    name: 'upload_document',
    description:
      'Upload a PDF or plain-text document. Extracts, chunks and embeds it, then returns a summary of at most 150 words. Starts a new session unless sessionId is given, in which case that session switches to the new document and its history and challenge are cleared.',
    inputSchema: {
      type: 'object',
      properties: {
        sessionId: { ...SESSION_ID_PROPERTY, description: 'Optional existing session to load the document into' },
        path: { type: 'string', description: 'Path of a .pdf, .txt or .md file readable by the server' },
        text: { type: 'string', description: 'Raw document text, as an alternative to path' },
        fileName: { type: 'string', description: 'Display name for text uploads' },
      },
    },
  },
  {
    name: 'ask_question',
    description:
      'Ask a free-form question about the uploaded document. The answer is drawn only from the document and comes with the supporting snippets. When the document has nothing relevant the status is "not_found".',
    inputSchema: {
      type: 'object',
      properties: {
        sessionId: SESSION_ID_PROPERTY,
        question: { type: 'string', description: 'Question about the document. Follow-ups may refer to earlier turns.' },
      },
      required: ['sessionId', 'question'],
    },
  },
  {
    name: 'generate_challenge',
    description:
      'Challenge Me: generate comprehension questions about the document. Replaces any earlier challenge in the session.',
    inputSchema: {
      type: 'object',
      properties: { sessionId: SESSION_ID_PROPERTY },
      required: ['sessionId'],
    },
  },
  {
    name: 'submit_challenge_answer',
    description:
      'Answer one generated challenge question. Returns a verdict (correct, partially_correct, incorrect or unknown), feedback, and the passages the question was built from.',
    inputSchema: {
      type: 'object',
      properties: {
        sessionId: SESSION_ID_PROPERTY,
        questionId: { type: 'string', description: 'ID of the question from generate_challenge' },
        answer: { type: 'string', description: 'Your answer' },
      },
      required: ['sessionId', 'questionId', 'answer'],
    },
  },
  {
    name: 'get_session',
    description: 'Show the state of a session: document, summary, conversation history and challenge progress.',
    inputSchema: {
      type: 'object',
      properties: { sessionId: SESSION_ID_PROPERTY },
      required: ['sessionId'],
    },
  },
  {
    name: 'list_sessions',
    description: 'List the live sessions with their state and loaded document.',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'end_session',
    description: 'End a session and discard its document, history and challenge.',
    inputSchema: {
      type: 'object',
      properties: { sessionId: SESSION_ID_PROPERTY },
      required: ['sessionId'],
    },
  },
];

export interface ServerDependencies {
  embeddings?: EmbeddingsProvider;
  generator?: TextGenerator;
}

function jsonResult(value: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

function toSnippet(ref: ChunkRef) {
  return {
    chunk: ref.index,
    score: ref.score === undefined ? undefined : Number(ref.score.toFixed(4)),
    text: wrapExternalContent(ref.text, `chunk ${ref.index}`),
  };
}

function describeSession(session: SessionContext) {
  const snapshot = session.snapshot();
  return {
    ...snapshot,
    history: snapshot.history.map((turn) => ({
      question: turn.question,
      answer: turn.answer,
      status: turn.status,
      sourceChunks: turn.sources.map((source) => source.index),
      askedAt: turn.askedAt.toISOString(),
    })),
    challenge: snapshot.challenge.map((item) => ({
      id: item.id,
      question: item.question,
      supportingChunks: item.supportingChunks.map((chunk) => chunk.index),
      submission: item.submission
        ? { ...item.submission, evaluatedAt: item.submission.evaluatedAt.toISOString() }
        : undefined,
    })),
  };
}

export class DocQaServer {
  private server: McpServer;
  private readonly pipeline: RAGPipeline;
  private readonly sessions: SessionManager;
  /** Maps session ID to progress token for MCP notifications */
  private progressTokens: Map<string, ProgressToken> = new Map();

  constructor(
    private readonly config: AssistantConfig,
    deps: ServerDependencies = {}
  ) {
    const embeddings = deps.embeddings ?? new OpenAIEmbeddings(config.openaiApiKey, config.embeddingModel);
    const generator = deps.generator ?? new OpenAIGenerator(config.openaiApiKey, config.generationModel);

    this.pipeline = new RAGPipeline(config, { embeddings, generator });
    this.sessions = new SessionManager(this.pipeline);

    // Set up status change listener for MCP progress notifications
    this.pipeline.progressTracker.addListener((status) => {
      void this.sendProgressNotification(status);
    });

    this.server = new McpServer(
      {
        name: 'doc-qa-assistant',
        version: '1.0.0',
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupToolHandlers();

    this.server.server.onerror = (error: Error) => logger.error('[MCP Error]', error);
  }

  get sessionManager(): SessionManager {
    return this.sessions;
  }

  /**
   * Send MCP progress notification to client.
   * Only sends if the client provided a progressToken with the upload.
   */
  private async sendProgressNotification(status: IngestionStatus): Promise<void> {
    const progressToken = this.progressTokens.get(status.sessionId);
    if (progressToken === undefined) {
      return;
    }

    const finished = status.phase === 'complete' || status.phase === 'failed';
    const message =
      status.phase === 'embedding'
        ? `${PHASE_MESSAGES.embedding} (${status.processed}/${status.total})`
        : PHASE_MESSAGES[status.phase];

    try {
      await this.server.server.notification({
        method: 'notifications/progress',
        params: {
          progressToken,
          progress: status.phase === 'embedding' ? status.processed : finished ? status.total : 0,
          total: status.total,
          message,
        },
      });
    } catch (error) {
      logger.debug('[Progress] Failed to send notification:', error);
    }

    if (finished) {
      this.progressTokens.delete(status.sessionId);
    }
  }

  private setupToolHandlers(): void {
    this.server.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

    this.server.server.setRequestHandler(CallToolRequestSchema, async (request) =>
      this.callTool(request.params.name, request.params.arguments, request.params._meta?.progressToken)
    );
  }

  /**
   * Dispatch a tool call. Invalid arguments raise `InvalidParams`; failures of
   * the assistant itself come back as an error result the client can show.
   */
  async callTool(
    name: string,
    args: Record<string, unknown> | undefined,
    progressToken?: ProgressToken
  ): Promise<CallToolResult> {
    try {
      switch (name) {
        case 'upload_document':
          return await this.handleUploadDocument(args, progressToken);
        case 'ask_question':
          return await this.handleAskQuestion(args);
        case 'generate_challenge':
          return await this.handleGenerateChallenge(args);
        case 'submit_challenge_answer':
          return await this.handleSubmitChallengeAnswer(args);
        case 'get_session':
          return this.handleGetSession(args);
        case 'list_sessions':
          return this.handleListSessions();
        case 'end_session':
          return this.handleEndSession(args);
        default:
          throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }
    } catch (error) {
      if (error instanceof McpError) {
        throw error;
      }
      const message = sanitizeErrorMessage(error);
      if (error instanceof AssistantError) {
        logger.warn(`[DocQaServer] ${name} failed (${error.code}): ${message}`);
        return { content: [{ type: 'text', text: `Error: ${message}` }], isError: true };
      }
      if (message.startsWith('Invalid arguments')) {
        throw new McpError(ErrorCode.InvalidParams, message);
      }
      logger.error(`[DocQaServer] ${name} failed unexpectedly:`, error);
      throw new McpError(ErrorCode.InternalError, message);
    }
  }

  private parseArgs<T>(args: Record<string, unknown> | undefined, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    try {
      return validateToolArgs(args, schema);
    } catch (error) {
      throw new McpError(ErrorCode.InvalidParams, sanitizeErrorMessage(error));
    }
  }

  /**
   * Turn upload arguments into file bytes, enforcing the size limit
   */
  private async readUpload(args: UploadDocumentArgs): Promise<UploadedFile> {
    const limit = this.config.maxFileBytes;

    if (args.text !== undefined) {
      const data = Buffer.from(args.text, 'utf-8');
      if (data.byteLength > limit) {
        throw new ExtractionError(`Could not read text upload: larger than the ${limit} byte limit`);
      }
      return { name: args.fileName ?? 'document.txt', data, mimeType: 'text/plain' };
    }

    const path = args.path ?? '';
    const name = args.fileName ?? basename(path);
    try {
      const info = await stat(path);
      if (!info.isFile()) {
        throw new ExtractionError(`Could not read ${name}: not a regular file`);
      }
      if (info.size > limit) {
        throw new ExtractionError(`Could not read ${name}: larger than the ${limit} byte limit`);
      }
      return { name, data: await readFile(path) };
    } catch (error) {
      if (error instanceof ExtractionError) throw error;
      throw new ExtractionError(`Could not read ${name}: ${describeError(error)}`, { cause: error });
    }
  }

  private async handleUploadDocument(args: Record<string, unknown> | undefined, progressToken?: ProgressToken) {
    const validatedArgs = this.parseArgs(args, UploadDocumentArgsSchema);

    // Fail on an unknown session before touching the file
    if (validatedArgs.sessionId !== undefined) {
      this.sessions.get(validatedArgs.sessionId);
    }
    const file = await this.readUpload(validatedArgs);

    const { session, loaded } = await this.sessions.upload(file, validatedArgs.sessionId, (target) => {
      if (progressToken !== undefined) {
        this.progressTokens.set(target.id, progressToken);
      }
    });

    return jsonResult({
      sessionId: session.id,
      state: session.state,
      document: {
        id: loaded.document.id,
        fileName: loaded.document.fileName,
        kind: loaded.document.kind,
        pageCount: loaded.document.pageCount,
        charCount: loaded.document.charCount,
        chunkCount: loaded.collection.chunks.length,
      },
      summary: loaded.summary,
    });
  }

  private async handleAskQuestion(args: Record<string, unknown> | undefined) {
    const { sessionId, question } = this.parseArgs(args, AskQuestionArgsSchema);
    const session = this.sessions.get(sessionId);

    const result = await this.pipeline.ask(session, question);
    return jsonResult({
      sessionId,
      status: result.status,
      answer: result.answer,
      justification: result.justification,
      snippets: result.sources.map(toSnippet),
    });
  }

  private async handleGenerateChallenge(args: Record<string, unknown> | undefined) {
    const { sessionId } = this.parseArgs(args, GenerateChallengeArgsSchema);
    const session = this.sessions.get(sessionId);

    const items = await this.pipeline.generateChallenge(session);
    return jsonResult({
      sessionId,
      questions: items.map((item) => ({
        id: item.id,
        question: item.question,
        supportingChunks: item.supportingChunks.map((chunk) => chunk.index),
      })),
    });
  }

  private async handleSubmitChallengeAnswer(args: Record<string, unknown> | undefined) {
    const { sessionId, questionId, answer } = this.parseArgs(args, SubmitChallengeAnswerArgsSchema);
    const session = this.sessions.get(sessionId);

    const result = await this.pipeline.evaluateAnswer(session, questionId, answer);
    return jsonResult({
      sessionId,
      questionId: result.questionId,
      question: result.question,
      verdict: result.verdict,
      feedback: result.feedback,
      snippets: result.supportingChunks.map(toSnippet),
    });
  }

  private handleGetSession(args: Record<string, unknown> | undefined) {
    const { sessionId } = this.parseArgs(args, SessionArgsSchema);
    const session = this.sessions.get(sessionId);
    return jsonResult({
      ...describeSession(session),
      ingestion: this.pipeline.progressTracker.getStatus(sessionId),
    });
  }

  private handleListSessions() {
    return jsonResult({
      sessions: this.sessions.list().map((session) => ({
        id: session.id,
        state: session.state,
        fileName: session.document?.fileName,
        createdAt: session.createdAt.toISOString(),
      })),
    });
  }

  private handleEndSession(args: Record<string, unknown> | undefined) {
    const { sessionId } = this.parseArgs(args, SessionArgsSchema);
    this.sessions.get(sessionId);
    this.sessions.end(sessionId);
    this.progressTokens.delete(sessionId);
    return jsonResult({ sessionId, ended: true });
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async close(): Promise<void> {
    this.sessions.clear();
    this.pipeline.progressTracker.stop();
    await this.server.close();
  }
}
