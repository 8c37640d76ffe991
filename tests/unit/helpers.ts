import { v4 as uuidv4 } from 'uuid';
import type { Clock } from '../../src/clock.js';
import { RecordSourceError, StoreUnavailableError, TokenExpiredError, TokenNotFoundError } from '../../src/errors.js';
import { matchesFilter } from '../../src/filter/evaluate.js';
import type { RecordFields } from '../../src/filter/evaluate.js';
import type { FieldSchema, FilterDescriptor } from '../../src/filter/types.js';
import type {
  CreateTokenOptions,
  MatchedRecord,
  RecordId,
  RecordSource,
  RecordStreamOptions,
  SelectionState,
  SelectionToken,
  SelectionTokenStore,
  SnapshotBasis,
  StoredSelection,
} from '../../src/types.js';

export const MESSAGE_FIELDS: FieldSchema = {
  status: { column: 'status', type: 'string' },
  priority: { column: 'priority', type: 'number' },
  starred: { column: 'starred', type: 'boolean' },
  receivedAt: { column: 'received_at', type: 'timestamp' },
};

export function makeClock(start: Date): Clock & { advance(ms: number): void } {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    advance: (ms: number) => {
      current += ms;
    },
  };
}

interface MemoryRecord {
  id: RecordId;
  position: bigint;
  fields: RecordFields;
}

/**
 * In-process stand-in for PostgresRecordSource with the same keyset paging.
 * `failOnPage` makes the n-th page fetch (1-based, across calls) throw.
 */
export class MemoryRecordSource implements RecordSource {
  private readonly records: MemoryRecord[] = [];
  private seq = 0n;
  pagesServed = 0;
  failOnPage: number | null = null;

  constructor(private readonly schema: FieldSchema = MESSAGE_FIELDS) {}

  insert(id: RecordId, fields: RecordFields): void {
    this.seq += 1n;
    this.records.push({ id, position: this.seq, fields });
  }

  delete(id: RecordId): void {
    const index = this.records.findIndex((r) => r.id === id);
    if (index >= 0) this.records.splice(index, 1);
  }

  async currentVersion(): Promise<bigint> {
    return this.seq;
  }

  async *stream(filter: FilterDescriptor, options: RecordStreamOptions): AsyncGenerator<MatchedRecord> {
    const batchSize = options.batchSize ?? 1000;
    let lastPosition = options.afterPosition ?? 0n;
    while (true) {
      this.pagesServed++;
      if (this.failOnPage === this.pagesServed) {
        throw new RecordSourceError('Failed to stream matching records: connection lost');
      }
      const page = this.matching(filter, options.snapshot)
        .filter((r) => r.position > lastPosition)
        .slice(0, batchSize);
      for (const record of page) {
        yield { id: record.id, position: record.position };
        lastPosition = record.position;
      }
      if (page.length < batchSize) break;
    }
  }

  async lookup(filter: FilterDescriptor, ids: readonly RecordId[], snapshot: SnapshotBasis): Promise<MatchedRecord[]> {
    this.pagesServed++;
    if (this.failOnPage === this.pagesServed) {
      throw new RecordSourceError('Failed to look up selected records: connection lost');
    }
    const wanted = new Set(ids);
    return this.matching(filter, snapshot)
      .filter((r) => wanted.has(r.id))
      .map((r) => ({ id: r.id, position: r.position }));
  }

  async count(filter: FilterDescriptor, snapshot: SnapshotBasis): Promise<number> {
    return this.matching(filter, snapshot).length;
  }

  private matching(filter: FilterDescriptor, snapshot: SnapshotBasis): MemoryRecord[] {
    return this.records.filter(
      (r) =>
        (snapshot.kind === 'live' || r.position <= snapshot.version) &&
        matchesFilter(filter, this.schema, r.fields),
    );
  }
}

/** Seeds `count` messages with ids msg-1..msg-n and the given status. */
export function seedMessages(source: MemoryRecordSource, count: number, status = 'unreplied', offset = 0): void {
  for (let i = 1; i <= count; i++) {
    source.insert(`msg-${i + offset}`, { status, priority: i % 5, starred: false, receivedAt: '2024-05-01T00:00:00.000Z' });
  }
}

/**
 * In-process stand-in for PostgresSelectionTokenStore.
 * `failNext` makes that many following calls throw StoreUnavailableError.
 */
export class MemoryTokenStore implements SelectionTokenStore {
  readonly rows = new Map<string, StoredSelection>();
  failNext = 0;

  constructor(
    private readonly clock: Clock,
    private readonly ttlMs = 15 * 60_000,
  ) {}

  private maybeFail(): void {
    if (this.failNext > 0) {
      this.failNext--;
      throw new StoreUnavailableError('token store unavailable');
    }
  }

  async create(
    filter: FilterDescriptor,
    selection: SelectionState,
    snapshot: SnapshotBasis,
    options: CreateTokenOptions = {},
  ): Promise<SelectionToken> {
    this.maybeFail();
    const createdAt = this.clock.now();
    const expiresAt = new Date(createdAt.getTime() + (options.ttlMs ?? this.ttlMs));
    const token = uuidv4();
    this.rows.set(token, {
      token,
      filter,
      selection,
      snapshot,
      singleUse: options.singleUse ?? false,
      createdAt,
      expiresAt,
    });
    return { token, expiresAt };
  }

  async resolve(token: string): Promise<StoredSelection> {
    this.maybeFail();
    const row = this.rows.get(token);
    if (row === undefined) throw new TokenNotFoundError(token);
    if (row.expiresAt.getTime() <= this.clock.now().getTime()) throw new TokenExpiredError(token, row.expiresAt);
    return row;
  }

  async consume(token: string): Promise<StoredSelection> {
    this.maybeFail();
    const row = this.rows.get(token);
    if (row === undefined) throw new TokenNotFoundError(token);
    if (row.expiresAt.getTime() <= this.clock.now().getTime()) throw new TokenExpiredError(token, row.expiresAt);
    this.rows.delete(token);
    return row;
  }

  async restore(stored: StoredSelection): Promise<void> {
    this.maybeFail();
    if (!this.rows.has(stored.token)) this.rows.set(stored.token, stored);
  }

  async invalidate(token: string): Promise<void> {
    this.maybeFail();
    this.rows.delete(token);
  }

  async purgeExpired(graceMs = 0): Promise<number> {
    this.maybeFail();
    const cutoff = this.clock.now().getTime() - graceMs;
    let removed = 0;
    for (const [token, row] of this.rows) {
      if (row.expiresAt.getTime() < cutoff) {
        this.rows.delete(token);
        removed++;
      }
    }
    return removed;
  }

  async initializeSchema(): Promise<void> {}

  async close(): Promise<void> {}
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}
