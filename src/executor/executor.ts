import { ActionError, ResolutionInterruptedError } from '../errors.js';
import type {
  AbortReason,
  BulkAction,
  BulkOperationResult,
  BulkProgress,
  FailedRecord,
  RecordId,
} from '../types.js';

export const DEFAULT_CONCURRENCY = 8;
export const DEFAULT_MAX_REPORTED_FAILURES = 1000;

export interface ExecuteOptions {
  /** Actions in flight at once within a batch. Use 1 for order-sensitive actions. */
  concurrency?: number;
  /** Cooperative cancellation, checked between batches. */
  signal?: AbortSignal;
  /** Soft timeout, checked between batches; ends the run like a cancellation. */
  timeoutMs?: number;
  /** Skip ids already processed in this execution. Defaults to true. */
  dedupe?: boolean;
  /** Failures listed in the result; 0 keeps counts only. */
  maxReportedFailures?: number;
  /** Called after every batch with the running totals. */
  onProgress?: (progress: BulkProgress) => void;
}

/** Internal: running totals for one execution */
class ResultTally {
  attempted = 0;
  succeeded = 0;
  failed = 0;
  readonly failures: FailedRecord[] = [];
  failuresTruncated = false;

  constructor(
    private readonly maxReportedFailures: number,
    readonly startedAt: Date,
  ) {}

  recordSuccess(): void {
    this.attempted++;
    this.succeeded++;
  }

  recordFailure(id: RecordId, err: unknown): void {
    this.attempted++;
    this.failed++;
    if (this.failures.length >= this.maxReportedFailures) {
      this.failuresTruncated = true;
      return;
    }
    this.failures.push(describeFailure(id, err));
  }

  progress(): BulkProgress {
    return {
      attempted: this.attempted,
      succeeded: this.succeeded,
      failed: this.failed,
      failures: [...this.failures],
      failuresTruncated: this.failuresTruncated,
      startedAt: this.startedAt,
    };
  }
}

function describeFailure(id: RecordId, err: unknown): FailedRecord {
  if (err instanceof ActionError) return { id, kind: err.kind, message: err.message };
  return { id, kind: 'unexpected', message: err instanceof Error ? err.message : String(err) };
}

function firstSighting(seen: Set<RecordId>, id: RecordId): boolean {
  if (seen.has(id)) return false;
  seen.add(id);
  return true;
}

function checkPositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

/**
 * Runs `worker` over `ids` with at most `limit` calls in flight.
 * Workers must not throw.
 */
async function runPool(
  ids: readonly RecordId[],
  limit: number,
  worker: (id: RecordId) => Promise<void>,
): Promise<void> {
  let next = 0;
  const lane = async (): Promise<void> => {
    while (next < ids.length) {
      const id = ids[next++];
      if (id === undefined) return;
      await worker(id);
    }
  };
  await Promise.all(Array.from({ length: Math.min(limit, ids.length) }, lane));
}

/**
 * Applies `action` to every id the batch stream yields.
 *
 * A failing record never stops the others: its error is captured in the
 * result and processing continues. Cancellation, timeout and resolution
 * interruption end the run with status `aborted`; actions already applied
 * are not rolled back. Completion order across records is unspecified when
 * `concurrency` > 1.
 */
export async function executeBulk(
  batches: AsyncIterable<RecordId[]>,
  action: BulkAction,
  options: ExecuteOptions = {},
): Promise<BulkOperationResult> {
  const concurrency = checkPositiveInteger('concurrency', options.concurrency ?? DEFAULT_CONCURRENCY);
  const maxReported = options.maxReportedFailures ?? DEFAULT_MAX_REPORTED_FAILURES;
  if (!Number.isInteger(maxReported) || maxReported < 0) {
    throw new RangeError(`maxReportedFailures must be a non-negative integer, got ${maxReported}`);
  }
  const deadline = options.timeoutMs !== undefined ? Date.now() + options.timeoutMs : undefined;
  const seen = options.dedupe === false ? null : new Set<RecordId>();
  const tally = new ResultTally(maxReported, new Date());

  let abortReason: AbortReason | undefined;
  let interruption: string | undefined;
  let exhausted = false;

  const worker = async (id: RecordId): Promise<void> => {
    try {
      await action(id);
      tally.recordSuccess();
    } catch (err) {
      tally.recordFailure(id, err);
    }
  };

  const iterator = batches[Symbol.asyncIterator]();
  try {
    while (true) {
      if (options.signal?.aborted) {
        abortReason = 'cancelled';
        break;
      }
      if (deadline !== undefined && Date.now() >= deadline) {
        abortReason = 'timeout';
        break;
      }

      let next: IteratorResult<RecordId[]>;
      try {
        next = await iterator.next();
      } catch (err) {
        if (!(err instanceof ResolutionInterruptedError)) throw err;
        exhausted = true;
        abortReason = 'interrupted';
        interruption = err.message;
        break;
      }
      if (next.done) {
        exhausted = true;
        break;
      }

      const ids = seen === null ? next.value : next.value.filter((id) => firstSighting(seen, id));
      await runPool(ids, concurrency, worker);
      try { options.onProgress?.(tally.progress()); } catch { /* swallow */ }
    }
  } finally {
    if (!exhausted) await iterator.return?.();
  }

  const status = abortReason !== undefined
    ? 'aborted'
    : tally.failed > 0 ? 'completed_with_errors' : 'completed';

  return {
    ...tally.progress(),
    status,
    ...(abortReason !== undefined ? { abortReason } : {}),
    ...(interruption !== undefined ? { interruption } : {}),
    finishedAt: new Date(),
  };
}
