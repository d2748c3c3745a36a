import { IngestionProgressTracker } from './progress.js';
import { IngestionStatus } from '../types.js';

describe('IngestionProgressTracker', () => {
  let tracker: IngestionProgressTracker;
  let updates: IngestionStatus[];

  beforeEach(() => {
    tracker = new IngestionProgressTracker();
    updates = [];
    tracker.addListener((status) => updates.push(status));
  });

  afterEach(() => {
    tracker.stop();
  });

  it('should start in the extracting phase', () => {
    tracker.start('s1', 'report.pdf');

    const status = tracker.getStatus('s1');
    expect(status).toMatchObject({ sessionId: 's1', fileName: 'report.pdf', phase: 'extracting', processed: 0, total: 0 });
    expect(status?.startedAt).toBeInstanceOf(Date);
    expect(updates).toHaveLength(1);
  });

  it('should report embedding progress and completion', () => {
    tracker.start('s1', 'report.pdf');
    tracker.advance('s1', 0, 4);
    tracker.advance('s1', 2, 4);
    tracker.setPhase('s1', 'summarizing');
    tracker.complete('s1');

    expect(updates.map((status) => [status.phase, status.processed, status.total])).toEqual([
      ['extracting', 0, 0],
      ['embedding', 0, 4],
      ['embedding', 2, 4],
      ['summarizing', 2, 4],
      ['complete', 4, 4],
    ]);
  });

  it('should never report more processed chunks than the total', () => {
    tracker.start('s1', 'report.pdf');
    tracker.advance('s1', 9, 4);
    expect(tracker.getStatus('s1')?.processed).toBe(4);
  });

  it('should record failures', () => {
    tracker.start('s1', 'report.pdf');
    tracker.fail('s1', 'No extractable text found in report.pdf');

    expect(tracker.getStatus('s1')).toMatchObject({ phase: 'failed', error: 'No extractable text found in report.pdf' });
  });

  it('should ignore updates for unknown sessions', () => {
    tracker.advance('missing', 1, 2);
    tracker.complete('missing');

    expect(updates).toEqual([]);
    expect(tracker.getStatus('missing')).toBeUndefined();
  });

  it('should stop notifying removed listeners', () => {
    const seen: IngestionStatus[] = [];
    const unsubscribe = tracker.addListener((status) => seen.push(status));
    unsubscribe();

    tracker.start('s1', 'report.pdf');
    expect(seen).toEqual([]);
  });

  it('should forget removed sessions', () => {
    tracker.start('s1', 'report.pdf');
    tracker.remove('s1');
    expect(tracker.getStatus('s1')).toBeUndefined();
  });
});
