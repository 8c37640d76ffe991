import type pg from 'pg';
import { RecordSourceError } from '../errors.js';
import type { FilterDescriptor } from '../filter/types.js';
import {
  compileBatchQuery,
  compileCountQuery,
  compileLookupQuery,
  compileVersionLock,
  compileVersionQuery,
} from '../filter/compiler.js';
import type {
  MatchedRecord,
  RecordId,
  RecordSource,
  RecordStreamOptions,
  SnapshotBasis,
} from '../types.js';
import { assertTableConfig } from './table.js';
import type { RecordTableConfig } from './table.js';
import { mapRecordRow } from './row-mapper.js';
import type { RecordRow } from './row-mapper.js';

export const DEFAULT_PIN_LOCK_TIMEOUT_MS = 5_000;

export interface RecordSourceConfig {
  pool: pg.Pool;
  table: RecordTableConfig;
  /** How long currentVersion() waits for open writes on the table. */
  pinLockTimeoutMs?: number;
}

/**
 * Evaluates filter descriptors against one PostgreSQL table. Streaming uses
 * keyset pagination on the position column: no long-lived transactions, no
 * server-side cursors, safe to stop early.
 */
export class PostgresRecordSource implements RecordSource {
  private readonly pool: pg.Pool;
  private readonly table: RecordTableConfig;
  private readonly pinLockTimeoutMs: number;

  constructor(config: RecordSourceConfig) {
    assertTableConfig(config.table);
    const pinLockTimeoutMs = config.pinLockTimeoutMs ?? DEFAULT_PIN_LOCK_TIMEOUT_MS;
    if (!Number.isInteger(pinLockTimeoutMs) || pinLockTimeoutMs < 1) {
      throw new RangeError(`pinLockTimeoutMs must be a positive integer, got ${pinLockTimeoutMs}`);
    }
    this.pool = config.pool;
    this.table = config.table;
    this.pinLockTimeoutMs = pinLockTimeoutMs;
  }

  /**
   * MAX(position) read under a SHARE lock: positions are allocated at insert
   * time, not commit time, so an unlocked read could return a maximum while a
   * lower position is still uncommitted.
   */
  async currentVersion(): Promise<bigint> {
    const { sql, params } = compileVersionQuery(this.table);
    let client: pg.PoolClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw new RecordSourceError(`Failed to connect to record store: ${String(err)}`, err);
    }
    try {
      await client.query('BEGIN');
      // SET LOCAL takes no parameters; the value is a validated integer
      await client.query(`SET LOCAL lock_timeout = '${this.pinLockTimeoutMs}ms'`);
      await client.query(compileVersionLock(this.table));
      const result = await client.query<{ max_pos: string }>(sql, params);
      await client.query('COMMIT');
      return BigInt(result.rows[0]?.max_pos ?? '0');
    } catch (err) {
      await client.query('ROLLBACK').catch(() => undefined);
      throw new RecordSourceError(`Failed to read record store version: ${String(err)}`, err);
    } finally {
      client.release();
    }
  }

  async *stream(filter: FilterDescriptor, options: RecordStreamOptions): AsyncGenerator<MatchedRecord> {
    const batchSize = options.batchSize ?? 1000;
    let lastPosition = options.afterPosition ?? 0n;

    while (true) {
      const { sql, params } = compileBatchQuery(this.table, filter, options.snapshot, lastPosition, batchSize);
      const result = await this.run<RecordRow>(sql, params, 'stream matching records');

      for (const row of result.rows) {
        const record = mapRecordRow(row);
        yield record;
        lastPosition = record.position;
      }

      if (result.rowCount === null || result.rowCount < batchSize) break;
    }
  }

  async lookup(
    filter: FilterDescriptor,
    ids: readonly RecordId[],
    snapshot: SnapshotBasis,
  ): Promise<MatchedRecord[]> {
    if (ids.length === 0) return [];
    const { sql, params } = compileLookupQuery(this.table, filter, ids, snapshot);
    const result = await this.run<RecordRow>(sql, params, 'look up selected records');
    return result.rows.map(mapRecordRow);
  }

  async count(filter: FilterDescriptor, snapshot: SnapshotBasis): Promise<number> {
    const { sql, params } = compileCountQuery(this.table, filter, snapshot);
    const result = await this.run<{ total: string }>(sql, params, 'count matching records');
    return Number(result.rows[0]?.total ?? '0');
  }

  private async run<R extends pg.QueryResultRow>(
    sql: string,
    params: unknown[],
    what: string,
  ): Promise<pg.QueryResult<R>> {
    try {
      return await this.pool.query<R>(sql, params);
    } catch (err) {
      throw new RecordSourceError(`Failed to ${what}: ${String(err)}`, err);
    }
  }
}
