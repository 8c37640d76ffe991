import type pg from 'pg';
import { validate as isUuid } from 'uuid';
import { z } from 'zod';
import type { AbortReason, BulkOperationResult, BulkOperationStatus, BulkProgress, FailedRecord } from 'bulk-select';

export type BulkJobStatus = 'running' | BulkOperationStatus;

/** What `GET /bulk-actions/:resultId` returns: the result so far, or the final one. */
export interface BulkJob {
  resultId: string;
  token: string;
  actionKind: string;
  status: BulkJobStatus;
  attempted: number;
  succeeded: number;
  failed: number;
  failures: FailedRecord[];
  failuresTruncated: boolean;
  abortReason?: AbortReason;
  interruption?: string;
  startedAt: Date;
  finishedAt?: Date;
}

export interface NewBulkJob {
  resultId: string;
  token: string;
  actionKind: string;
  startedAt: Date;
}

export interface BulkJobStore {
  create(job: NewBulkJob): Promise<void>;
  recordProgress(resultId: string, progress: BulkProgress): Promise<void>;
  finish(resultId: string, result: BulkOperationResult): Promise<void>;
  get(resultId: string): Promise<BulkJob | null>;
  /** Marks jobs left `running` by a previous process as interrupted; returns how many. */
  abandonRunning(now: Date): Promise<number>;
  initializeSchema(): Promise<void>;
}

export const DDL_CREATE_BULK_OPERATIONS_TABLE = `
CREATE TABLE IF NOT EXISTS bulk_operations (
  result_id           UUID         PRIMARY KEY,
  token               TEXT         NOT NULL,
  action_kind         TEXT         NOT NULL,
  status              TEXT         NOT NULL,
  attempted           INTEGER      NOT NULL DEFAULT 0,
  succeeded           INTEGER      NOT NULL DEFAULT 0,
  failed              INTEGER      NOT NULL DEFAULT 0,
  failures            JSONB        NOT NULL DEFAULT '[]',
  failures_truncated  BOOLEAN      NOT NULL DEFAULT FALSE,
  abort_reason        TEXT         NULL,
  interruption        TEXT         NULL,
  started_at          TIMESTAMPTZ  NOT NULL,
  finished_at         TIMESTAMPTZ  NULL
)
`.trim();

const INSERT_JOB_SQL = `
INSERT INTO bulk_operations (result_id, token, action_kind, status, started_at)
VALUES ($1, $2, $3, 'running', $4)
`.trim();

const PROGRESS_SQL = `
UPDATE bulk_operations
SET attempted = $2, succeeded = $3, failed = $4, failures = $5::jsonb, failures_truncated = $6
WHERE result_id = $1 AND status = 'running'
`.trim();

const FINISH_SQL = `
UPDATE bulk_operations
SET status = $2, attempted = $3, succeeded = $4, failed = $5, failures = $6::jsonb,
    failures_truncated = $7, abort_reason = $8, interruption = $9, finished_at = $10
WHERE result_id = $1
`.trim();

const SELECT_JOB_SQL = `
SELECT result_id, token, action_kind, status, attempted, succeeded, failed, failures,
       failures_truncated, abort_reason, interruption, started_at, finished_at
FROM bulk_operations
WHERE result_id = $1
`.trim();

const ABANDON_SQL = `
UPDATE bulk_operations
SET status = 'aborted', abort_reason = 'interrupted', interruption = 'Service restarted before the run finished',
    finished_at = $1
WHERE status = 'running'
`.trim();

type BulkJobRow = {
  result_id: string;
  token: string;
  action_kind: string;
  status: string;
  attempted: number;
  succeeded: number;
  failed: number;
  failures: unknown;                 // pg auto-parses JSONB
  failures_truncated: boolean;
  abort_reason: string | null;
  interruption: string | null;
  started_at: Date;
  finished_at: Date | null;
};

const jobStatus = z.enum(['running', 'completed', 'completed_with_errors', 'aborted']);
const abortReason = z.enum(['cancelled', 'timeout', 'interrupted']);
const failureList = z.array(z.object({ id: z.string(), kind: z.string(), message: z.string() }));

function mapBulkJobRow(row: BulkJobRow): BulkJob {
  return {
    resultId: row.result_id,
    token: row.token,
    actionKind: row.action_kind,
    status: jobStatus.parse(row.status),
    attempted: row.attempted,
    succeeded: row.succeeded,
    failed: row.failed,
    failures: failureList.parse(row.failures),
    failuresTruncated: row.failures_truncated,
    ...(row.abort_reason !== null ? { abortReason: abortReason.parse(row.abort_reason) } : {}),
    ...(row.interruption !== null ? { interruption: row.interruption } : {}),
    startedAt: row.started_at,
    ...(row.finished_at !== null ? { finishedAt: row.finished_at } : {}),
  };
}

export class PostgresBulkJobStore implements BulkJobStore {
  constructor(private readonly pool: pg.Pool) {}

  async initializeSchema(): Promise<void> {
    await this.pool.query(DDL_CREATE_BULK_OPERATIONS_TABLE);
  }

  async create(job: NewBulkJob): Promise<void> {
    await this.pool.query(INSERT_JOB_SQL, [job.resultId, job.token, job.actionKind, job.startedAt]);
  }

  async recordProgress(resultId: string, progress: BulkProgress): Promise<void> {
    await this.pool.query(PROGRESS_SQL, [
      resultId,
      progress.attempted,
      progress.succeeded,
      progress.failed,
      JSON.stringify(progress.failures),
      progress.failuresTruncated,
    ]);
  }

  async finish(resultId: string, result: BulkOperationResult): Promise<void> {
    await this.pool.query(FINISH_SQL, [
      resultId,
      result.status,
      result.attempted,
      result.succeeded,
      result.failed,
      JSON.stringify(result.failures),
      result.failuresTruncated,
      result.abortReason ?? null,
      result.interruption ?? null,
      result.finishedAt,
    ]);
  }

  async get(resultId: string): Promise<BulkJob | null> {
    if (!isUuid(resultId)) return null;
    const result = await this.pool.query<BulkJobRow>(SELECT_JOB_SQL, [resultId]);
    const row = result.rows[0];
    return row === undefined ? null : mapBulkJobRow(row);
  }

  async abandonRunning(now: Date): Promise<number> {
    const result = await this.pool.query(ABANDON_SQL, [now]);
    return result.rowCount ?? 0;
  }
}
