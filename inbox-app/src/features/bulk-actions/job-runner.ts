import type { FastifyBaseLogger } from 'fastify';
import { v4 as uuidv4 } from 'uuid';
import { withRetry } from 'bulk-select';
import type {
  BulkAction,
  BulkOperationResult,
  BulkProgress,
  BulkSelectionService,
  Clock,
  ExecuteOptions,
  RetryPolicy,
  StoredSelection,
} from 'bulk-select';
import { BulkJobNotFoundError, BulkJobNotRunningError } from '../../domain/errors.js';
import type { BulkJobStore } from './job-store.js';

export interface BulkJobRunnerConfig {
  service: BulkSelectionService;
  jobs: BulkJobStore;
  log: FastifyBaseLogger;
  clock: Clock;
  concurrency: number;
  timeoutMs: number;
  /** Backoff for writing a job's final result. */
  finishRetry?: Pick<RetryPolicy, 'maxRetries' | 'retryDelayMs'>;
}

const DEFAULT_FINISH_RETRY = { maxRetries: 3, retryDelayMs: 200 };

function emptyProgress(startedAt: Date): BulkProgress {
  return { attempted: 0, succeeded: 0, failed: 0, failures: [], failuresTruncated: false, startedAt };
}

interface RunningJob {
  controller: AbortController;
  done: Promise<void>;
}

/**
 * Runs bulk actions either inline or as background jobs persisted in the
 * job store. Cancellation only reaches jobs started by this process.
 */
export class BulkJobRunner {
  private readonly running = new Map<string, RunningJob>();

  constructor(private readonly config: BulkJobRunnerConfig) {}

  private executeOptions(signal?: AbortSignal): ExecuteOptions {
    return {
      concurrency: this.config.concurrency,
      timeoutMs: this.config.timeoutMs,
      ...(signal !== undefined ? { signal } : {}),
    };
  }

  async runInline(stored: StoredSelection, action: BulkAction): Promise<BulkOperationResult> {
    return this.config.service.executeStored(stored, action, this.executeOptions());
  }

  /** Records the job and starts it in the background; returns its result id. */
  async start(stored: StoredSelection, actionKind: string, action: BulkAction): Promise<string> {
    const resultId = uuidv4();
    try {
      await this.config.jobs.create({
        resultId,
        token: stored.token,
        actionKind,
        startedAt: this.config.clock.now(),
      });
    } catch (err) {
      await this.config.service.release(stored);
      throw err;
    }

    const controller = new AbortController();
    const done = this.run(resultId, stored, action, controller.signal)
      .catch((err: unknown) => {
        this.config.log.error({ err, resultId }, 'bulk action job failed to record its result');
      })
      .finally(() => {
        this.running.delete(resultId);
      });
    this.running.set(resultId, { controller, done });
    return resultId;
  }

  /** Requests cancellation; the job stops before its next batch. */
  async cancel(resultId: string): Promise<void> {
    const job = this.running.get(resultId);
    if (job !== undefined) {
      job.controller.abort();
      return;
    }
    const stored = await this.config.jobs.get(resultId);
    if (stored === null) throw new BulkJobNotFoundError(resultId);
    throw new BulkJobNotRunningError(resultId, stored.status);
  }

  isRunning(resultId: string): boolean {
    return this.running.has(resultId);
  }

  /** Cancels every running job and waits for each to record its result. */
  async stop(): Promise<void> {
    const jobs = [...this.running.values()];
    for (const job of jobs) job.controller.abort();
    await Promise.all(jobs.map((job) => job.done));
  }

  private async run(
    resultId: string,
    stored: StoredSelection,
    action: BulkAction,
    signal: AbortSignal,
  ): Promise<void> {
    const { jobs, log } = this.config;
    let progressWrites: Promise<void> = Promise.resolve();
    let latest: BulkProgress | undefined;

    let result: BulkOperationResult;
    try {
      result = await this.config.service.executeStored(stored, action, {
        ...this.executeOptions(signal),
        onProgress: (progress) => {
          latest = progress;
          progressWrites = progressWrites
            .then(() => jobs.recordProgress(resultId, progress))
            .catch((err: unknown) => {
              log.warn({ err, resultId }, 'failed to record bulk action progress');
            });
        },
      });
    } catch (err) {
      log.error({ err, resultId }, 'bulk action stopped by an unexpected error');
      const now = this.config.clock.now();
      result = {
        ...(latest ?? emptyProgress(now)),
        status: 'aborted',
        abortReason: 'interrupted',
        interruption: err instanceof Error ? err.message : String(err),
        finishedAt: now,
      };
    }

    await progressWrites;
    // Until this lands the row still reads `running`
    await withRetry(
      'finish',
      {
        ...(this.config.finishRetry ?? DEFAULT_FINISH_RETRY),
        onRetry: (_operation, attempt, err, nextDelayMs) => {
          log.warn({ err, resultId, attempt, nextDelayMs }, 'retrying bulk action result write');
        },
      },
      () => jobs.finish(resultId, result),
      () => true,
    );
    log.info(
      {
        resultId,
        status: result.status,
        attempted: result.attempted,
        succeeded: result.succeeded,
        failed: result.failed,
        ...(result.abortReason !== undefined ? { abortReason: result.abortReason } : {}),
      },
      'bulk action finished',
    );
  }
}
