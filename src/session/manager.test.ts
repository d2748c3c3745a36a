import { SessionManager } from './manager.js';
import { RAGPipeline } from '../rag/pipeline.js';
import { DEFAULT_CONFIG } from '../config.js';
import { SessionNotFoundError } from '../util/errors.js';
import { createMockEmbeddings, createStubGenerator } from '../__mocks__/embeddings.js';

describe('SessionManager', () => {
  let pipeline: RAGPipeline;
  let manager: SessionManager;

  beforeEach(() => {
    pipeline = new RAGPipeline(DEFAULT_CONFIG, {
      embeddings: createMockEmbeddings(),
      generator: createStubGenerator('A summary.'),
    });
    manager = new SessionManager(pipeline);
  });

  afterEach(() => {
    pipeline.progressTracker.stop();
  });

  it('should create sessions with unique ids', () => {
    const a = manager.create();
    const b = manager.create();

    expect(a.id).not.toBe(b.id);
    expect(manager.get(a.id)).toBe(a);
    expect(manager.list()).toEqual([a, b]);
  });

  it('should throw for unknown sessions', () => {
    expect(() => manager.get('missing')).toThrow(SessionNotFoundError);
    expect(() => manager.get('missing')).toThrow('Session not found: missing');
  });

  it('should upload into a new session when no id is given', async () => {
    const { session, loaded } = await manager.upload({ name: 'notes.txt', data: Buffer.from('Some notes.') });

    expect(manager.size).toBe(1);
    expect(session.state).toBe('document_loaded');
    expect(loaded.summary).toBe('A summary.');
  });

  it('should reuse the named session', async () => {
    const existing = manager.create();
    const seen: string[] = [];

    const { session } = await manager.upload({ name: 'notes.txt', data: Buffer.from('Some notes.') }, existing.id, (s) =>
      seen.push(s.id)
    );

    expect(session).toBe(existing);
    expect(seen).toEqual([existing.id]);
    expect(manager.size).toBe(1);
  });

  it('should discard a new session whose upload fails', async () => {
    await expect(manager.upload({ name: 'empty.txt', data: Buffer.from('   ') })).rejects.toThrow(
      'No extractable text found in empty.txt'
    );
    expect(manager.size).toBe(0);
  });

  it('should keep an existing session whose upload fails', async () => {
    const existing = manager.create();

    await expect(manager.upload({ name: 'empty.txt', data: Buffer.from('   ') }, existing.id)).rejects.toThrow(
      'No extractable text found in empty.txt'
    );
    expect(manager.get(existing.id).state).toBe('idle');
  });

  it('should end sessions', () => {
    const session = manager.create();

    expect(manager.end(session.id)).toBe(true);
    expect(manager.end(session.id)).toBe(false);
    expect(() => manager.get(session.id)).toThrow(SessionNotFoundError);
  });
});
