import { MultiBar, SingleBar } from 'cli-progress';
import { IngestionPhase, IngestionStatus } from '../types.js';

export type IngestionListener = (status: IngestionStatus) => void;

/**
 * Tracks document ingestion per session, drawing a progress bar on stderr
 * and forwarding every change to listeners (MCP progress notifications).
 */
export class IngestionProgressTracker {
  private multibar: MultiBar;
  private bars: Map<string, SingleBar>;
  private statuses: Map<string, IngestionStatus>;
  private listeners: Set<IngestionListener>;

  constructor() {
    this.multibar = new MultiBar({
      format: '{title} [{bar}] {percentage}% | {value}/{total} | {phase}',
      hideCursor: true,
      clearOnComplete: false,
      stopOnComplete: true,
      stream: process.stderr,
    });
    this.bars = new Map();
    this.statuses = new Map();
    this.listeners = new Set();
  }

  /**
   * @returns a function that removes the listener
   */
  addListener(listener: IngestionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(status: IngestionStatus): void {
    this.listeners.forEach((listener) => listener(status));
  }

  private update(sessionId: string, patch: Partial<IngestionStatus>): void {
    const current = this.statuses.get(sessionId);
    if (!current) return;

    const status: IngestionStatus = { ...current, ...patch };
    this.statuses.set(sessionId, status);

    const bar = this.bars.get(sessionId);
    if (bar) {
      bar.setTotal(Math.max(status.total, 1));
      bar.update(status.processed, { phase: status.phase });
    }

    this.notify(status);
  }

  start(sessionId: string, fileName: string): void {
    // A new upload replaces whatever the session was ingesting before
    this.bars.get(sessionId)?.stop();

    const status: IngestionStatus = {
      sessionId,
      fileName,
      phase: 'extracting',
      processed: 0,
      total: 0,
      startedAt: new Date(),
    };

    const bar = this.multibar.create(1, 0, {
      title: fileName.slice(0, 30).padEnd(30),
      phase: status.phase,
    });

    this.bars.set(sessionId, bar);
    this.statuses.set(sessionId, status);
    this.notify(status);
  }

  setPhase(sessionId: string, phase: IngestionPhase): void {
    this.update(sessionId, { phase });
  }

  /** Record embedding progress; moves the session into the embedding phase */
  advance(sessionId: string, processed: number, total: number): void {
    this.update(sessionId, { phase: 'embedding', total, processed: Math.min(processed, total) });
  }

  complete(sessionId: string): void {
    const current = this.statuses.get(sessionId);
    if (!current) return;
    this.update(sessionId, { phase: 'complete', processed: current.total });
    this.bars.get(sessionId)?.stop();
  }

  fail(sessionId: string, error: string): void {
    this.update(sessionId, { phase: 'failed', error });
    this.bars.get(sessionId)?.stop();
  }

  getStatus(sessionId: string): IngestionStatus | undefined {
    return this.statuses.get(sessionId);
  }

  /** Forget a session's progress, e.g. when the session ends */
  remove(sessionId: string): void {
    const bar = this.bars.get(sessionId);
    if (bar) {
      this.multibar.remove(bar);
    }
    this.bars.delete(sessionId);
    this.statuses.delete(sessionId);
  }

  stop(): void {
    this.multibar.stop();
  }
}
