import { describe, it, expect } from 'vitest';

describe('Public API surface', () => {
  it('exports the filter entry point', async () => {
    const { filter } = await import('../../src/index.js');
    expect(filter.where.field('status').equals('unreplied').constraints).toEqual([
      { field: 'status', op: 'eq', value: 'unreplied' },
    ]);
  });

  it('exports the selection state operations', async () => {
    const api = await import('../../src/index.js');
    for (const name of ['emptySelection', 'toggleRecord', 'toggleRecords', 'selectAllMatching', 'clearAll', 'isSelected', 'estimatedCount']) {
      expect(typeof (api as Record<string, unknown>)[name]).toBe('function');
    }
  });

  it('exports the store, source, resolver, executor and service', async () => {
    const api = await import('../../src/index.js');
    expect(typeof api.PostgresSelectionTokenStore).toBe('function');
    expect(typeof api.PostgresRecordSource).toBe('function');
    expect(typeof api.SelectionResolver).toBe('function');
    expect(typeof api.executeBulk).toBe('function');
    expect(typeof api.BulkSelectionService).toBe('function');
    expect(typeof api.TokenSweeper).toBe('function');
  });

  it('exports TokenExpiredError as a class usable with instanceof', async () => {
    const { TokenExpiredError } = await import('../../src/index.js');
    const err = new TokenExpiredError('t', new Date('2024-01-01T00:00:00.000Z'));
    expect(err).toBeInstanceOf(TokenExpiredError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('TokenExpiredError');
  });

  it('exports the tuning defaults', async () => {
    const api = await import('../../src/index.js');
    expect(api.DEFAULT_TOKEN_TTL_MS).toBe(900_000);
    expect(api.DEFAULT_RESOLVE_BATCH_SIZE).toBe(1000);
    expect(api.MAX_RESOLVE_BATCH_SIZE).toBe(10_000);
    expect(api.DEFAULT_CONCURRENCY).toBe(8);
  });

  it('does NOT export compileBatchQuery (internal)', async () => {
    const api = await import('../../src/index.js');
    expect((api as Record<string, unknown>)['compileBatchQuery']).toBeUndefined();
  });

  it('does NOT export mapTokenRow (internal)', async () => {
    const api = await import('../../src/index.js');
    expect((api as Record<string, unknown>)['mapTokenRow']).toBeUndefined();
  });

  it('does NOT export ConstraintSetter (internal)', async () => {
    const api = await import('../../src/index.js');
    expect((api as Record<string, unknown>)['ConstraintSetter']).toBeUndefined();
  });
});
