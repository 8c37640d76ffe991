import { RecordSourceError, ResolutionInterruptedError } from '../errors.js';
import type { FilterDescriptor } from '../filter/types.js';
import type { MatchedRecord, RecordId, RecordSource, SelectionState, SnapshotBasis } from '../types.js';

export const DEFAULT_RESOLVE_BATCH_SIZE = 1000;
export const MAX_RESOLVE_BATCH_SIZE = 10_000;

export interface ResolveRequest {
  filter: FilterDescriptor;
  selection: SelectionState;
  snapshot: SnapshotBasis;
  /** Ids per emitted batch. */
  batchSize?: number;
}

function checkBatchSize(batchSize: number): number {
  if (!Number.isInteger(batchSize) || batchSize < 1 || batchSize > MAX_RESOLVE_BATCH_SIZE) {
    throw new RangeError(`batchSize must be an integer between 1 and ${MAX_RESOLVE_BATCH_SIZE}, got ${batchSize}`);
  }
  return batchSize;
}

/**
 * Turns a (filter, selection, snapshot) triple into batches of record ids in
 * ascending position order.
 *
 * The returned iterable is pull-based: nothing is fetched until the consumer
 * asks for the next batch, and at most one source page is held at a time in
 * all mode. A live snapshot may yield a different set on every call; only a
 * pinned snapshot is repeatable (up to deletions).
 */
export class SelectionResolver {
  private readonly batchSize: number;

  constructor(
    private readonly source: RecordSource,
    batchSize: number = DEFAULT_RESOLVE_BATCH_SIZE,
  ) {
    this.batchSize = checkBatchSize(batchSize);
  }

  async *resolve(request: ResolveRequest): AsyncGenerator<RecordId[]> {
    const batchSize = checkBatchSize(request.batchSize ?? this.batchSize);
    let emitted = 0;
    const batches = request.selection.mode === 'manual'
      ? this.lookupIncluded(request, request.selection.included, batchSize)
      : this.streamMatching(request, request.selection.excluded, batchSize);

    try {
      while (true) {
        let next: IteratorResult<RecordId[]>;
        try {
          next = await batches.next();
        } catch (err) {
          if (err instanceof RecordSourceError) throw new ResolutionInterruptedError(emitted, err);
          throw err;
        }
        if (next.done) return;
        emitted += next.value.length;
        yield next.value;
      }
    } finally {
      // Closes the source stream when the consumer stops early
      await batches.return(undefined);
    }
  }

  /**
   * Included ids are validated against the filter by direct lookup instead of
   * scanning the table. The matches are bounded by |included|, so they are
   * sorted in memory before batching.
   */
  private async *lookupIncluded(
    request: ResolveRequest,
    included: ReadonlySet<RecordId>,
    batchSize: number,
  ): AsyncGenerator<RecordId[]> {
    const ids = [...included];
    const matched: MatchedRecord[] = [];
    for (let i = 0; i < ids.length; i += batchSize) {
      const chunk = ids.slice(i, i + batchSize);
      matched.push(...await this.source.lookup(request.filter, chunk, request.snapshot));
    }
    matched.sort((a, b) => (a.position < b.position ? -1 : a.position > b.position ? 1 : 0));

    for (let i = 0; i < matched.length; i += batchSize) {
      yield matched.slice(i, i + batchSize).map((record) => record.id);
    }
  }

  private async *streamMatching(
    request: ResolveRequest,
    excluded: ReadonlySet<RecordId>,
    batchSize: number,
  ): AsyncGenerator<RecordId[]> {
    let batch: RecordId[] = [];
    const candidates = this.source.stream(request.filter, { snapshot: request.snapshot, batchSize });
    for await (const record of candidates) {
      if (excluded.has(record.id)) continue;
      batch.push(record.id);
      if (batch.length >= batchSize) {
        yield batch;
        batch = [];
      }
    }
    if (batch.length > 0) yield batch;
  }
}

/** Collects every batch. Only for small selections and tests. */
export async function resolveAll(batches: AsyncIterable<RecordId[]>): Promise<RecordId[]> {
  const ids: RecordId[] = [];
  for await (const batch of batches) ids.push(...batch);
  return ids;
}
