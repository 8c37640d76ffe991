import type { BulkOperationResult, BulkProgress } from 'bulk-select';
import type { BulkJob, BulkJobStore, NewBulkJob } from '../src/features/bulk-actions/job-store.js';
import { MESSAGE_FIELDS } from '../src/domain/messages.js';
import { MemoryRecordSource } from '../../tests/unit/helpers.js';

export { MemoryRecordSource, MemoryTokenStore, makeClock } from '../../tests/unit/helpers.js';

/**
 * In-process stand-in for PostgresBulkJobStore.
 * `failCreate` and `failFinish` make that many following calls throw.
 */
export class MemoryJobStore implements BulkJobStore {
  readonly jobs = new Map<string, BulkJob>();
  progressWrites = 0;
  finishAttempts = 0;
  failCreate = 0;
  failFinish = 0;

  async create(job: NewBulkJob): Promise<void> {
    if (this.failCreate > 0) {
      this.failCreate--;
      throw new Error('job store unavailable');
    }
    this.jobs.set(job.resultId, {
      ...job,
      status: 'running',
      attempted: 0,
      succeeded: 0,
      failed: 0,
      failures: [],
      failuresTruncated: false,
    });
  }

  async recordProgress(resultId: string, progress: BulkProgress): Promise<void> {
    this.progressWrites++;
    const job = this.jobs.get(resultId);
    if (job === undefined || job.status !== 'running') return;
    this.jobs.set(resultId, {
      ...job,
      attempted: progress.attempted,
      succeeded: progress.succeeded,
      failed: progress.failed,
      failures: progress.failures,
      failuresTruncated: progress.failuresTruncated,
    });
  }

  async finish(resultId: string, result: BulkOperationResult): Promise<void> {
    this.finishAttempts++;
    if (this.failFinish > 0) {
      this.failFinish--;
      throw new Error('job store unavailable');
    }
    const job = this.jobs.get(resultId);
    if (job === undefined) return;
    this.jobs.set(resultId, {
      resultId: job.resultId,
      token: job.token,
      actionKind: job.actionKind,
      status: result.status,
      attempted: result.attempted,
      succeeded: result.succeeded,
      failed: result.failed,
      failures: result.failures,
      failuresTruncated: result.failuresTruncated,
      ...(result.abortReason !== undefined ? { abortReason: result.abortReason } : {}),
      ...(result.interruption !== undefined ? { interruption: result.interruption } : {}),
      startedAt: job.startedAt,
      finishedAt: result.finishedAt,
    });
  }

  async get(resultId: string): Promise<BulkJob | null> {
    return this.jobs.get(resultId) ?? null;
  }

  async abandonRunning(now: Date): Promise<number> {
    let count = 0;
    for (const [id, job] of this.jobs) {
      if (job.status !== 'running') continue;
      this.jobs.set(id, { ...job, status: 'aborted', abortReason: 'interrupted', finishedAt: now });
      count++;
    }
    return count;
  }

  async initializeSchema(): Promise<void> {}
}

/** A messages table with ids msg-1..msg-n. */
export function seedInbox(count: number, status = 'unreplied'): MemoryRecordSource {
  const source = new MemoryRecordSource(MESSAGE_FIELDS);
  for (let i = 1; i <= count; i++) {
    source.insert(`msg-${i}`, {
      status,
      sender: `sender${i % 3}@example.com`,
      subject: `Subject ${i}`,
      priority: i % 6,
      starred: i % 2 === 0,
      receivedAt: '2024-05-01T00:00:00.000Z',
    });
  }
  return source;
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let settle: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: () => settle() };
}
