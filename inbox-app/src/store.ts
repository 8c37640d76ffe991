import pg from 'pg';
import { PostgresRecordSource, PostgresSelectionTokenStore } from 'bulk-select';
import type { Clock, RecordSource, SelectionTokenStore } from 'bulk-select';
import { MESSAGES_TABLE, applyMessageSchema } from './domain/messages.js';
import { PostgresBulkJobStore } from './features/bulk-actions/job-store.js';
import type { BulkJobStore } from './features/bulk-actions/job-store.js';

export interface InboxStores {
  pool: pg.Pool;
  tokens: SelectionTokenStore;
  records: RecordSource;
  jobs: BulkJobStore;
}

/** One pool shared by the token store, the messages table and the job table. */
export function createStores(connectionString: string, clock: Clock, tokenTtlMs: number): InboxStores {
  const pool = new pg.Pool({ connectionString });
  return {
    pool,
    tokens: new PostgresSelectionTokenStore({ pool, clock, ttlMs: tokenTtlMs }),
    records: new PostgresRecordSource({ pool, table: MESSAGES_TABLE }),
    jobs: new PostgresBulkJobStore(pool),
  };
}

export async function initializeSchema(stores: InboxStores): Promise<void> {
  await stores.tokens.initializeSchema();
  const client = await stores.pool.connect();
  try {
    await applyMessageSchema(client);
  } finally {
    client.release();
  }
  await stores.jobs.initializeSchema();
}
