import type { FieldSchema, FilterDescriptor } from '../filter/types.js';
import { validateFilter } from '../filter/validate.js';
import { estimatedCount } from '../selection/state.js';
import { executeBulk } from '../executor/executor.js';
import type { ExecuteOptions } from '../executor/executor.js';
import { SelectionResolver, DEFAULT_RESOLVE_BATCH_SIZE } from '../resolver/resolver.js';
import type {
  BulkAction,
  BulkOperationResult,
  RecordId,
  RecordSource,
  SelectionMode,
  SelectionState,
  SelectionToken,
  SelectionTokenStore,
  SnapshotBasis,
  StoredSelection,
} from '../types.js';
import { withStoreRetry } from './retry.js';
import type { RetryPolicy } from './retry.js';

export interface BulkSelectionServiceConfig {
  tokens: SelectionTokenStore;
  records: RecordSource;
  /** Fields a filter may reference. */
  schema: FieldSchema;
  batchSize?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  onRetry?: RetryPolicy['onRetry'];
  /** Failures that must not fail the caller's request, such as restoring a consumed token. */
  onError?: (operation: string, error: unknown) => void;
}

export interface CreateSelectionInput {
  filter: FilterDescriptor;
  selection: SelectionState;
  /** Pin the snapshot to the record store's current version. */
  pinSnapshot?: boolean;
  singleUse?: boolean;
  ttlMs?: number;
}

export interface SelectionEstimate {
  mode: SelectionMode;
  /** Advisory only; the executor's `attempted` count is authoritative. */
  estimatedCount: number;
  /** Records matching the filter right now; absent in manual mode. */
  matchingTotal?: number;
}

/**
 * Wires the token store, resolver and executor together behind token-based
 * operations. Holds no selection state of its own.
 */
export class BulkSelectionService {
  private readonly resolver: SelectionResolver;
  private readonly retry: RetryPolicy;
  private readonly onError: (operation: string, error: unknown) => void;

  constructor(private readonly config: BulkSelectionServiceConfig) {
    this.resolver = new SelectionResolver(config.records, config.batchSize ?? DEFAULT_RESOLVE_BATCH_SIZE);
    this.retry = {
      maxRetries: config.maxRetries ?? 3,
      retryDelayMs: config.retryDelayMs ?? 100,
      ...(config.onRetry !== undefined ? { onRetry: config.onRetry } : {}),
    };
    this.onError = config.onError ?? ((operation, err) => {
      console.error(`[selections] ${operation} failed:`, err);
    });
  }

  /** Validates the filter and stores the selection under a fresh token, retrying transient store failures. */
  async createSelection(input: CreateSelectionInput): Promise<SelectionToken> {
    validateFilter(input.filter, this.config.schema);
    const snapshot: SnapshotBasis = input.pinSnapshot
      ? { kind: 'pinned', version: await withStoreRetry('pin', this.retry, () => this.config.records.currentVersion()) }
      : { kind: 'live' };
    const options = {
      ...(input.singleUse !== undefined ? { singleUse: input.singleUse } : {}),
      ...(input.ttlMs !== undefined ? { ttlMs: input.ttlMs } : {}),
    };
    return withStoreRetry('create', this.retry, () =>
      this.config.tokens.create(input.filter, input.selection, snapshot, options),
    );
  }

  /** Resolves a token, retrying transient store failures. */
  async openSelection(token: string): Promise<StoredSelection> {
    return withStoreRetry('resolve', this.retry, () => this.config.tokens.resolve(token));
  }

  /**
   * Opens a token for execution. A single-use token is consumed here, so of
   * several concurrent callers only one gets it.
   */
  async claimSelection(token: string): Promise<StoredSelection> {
    const stored = await this.openSelection(token);
    if (!stored.singleUse) return stored;
    // Not retried: a lost reply may still have consumed the token
    return this.config.tokens.consume(token);
  }

  async estimate(token: string): Promise<SelectionEstimate> {
    const stored = await this.openSelection(token);
    if (stored.selection.mode === 'manual') {
      return { mode: 'manual', estimatedCount: estimatedCount(stored.selection, 0) };
    }
    const matchingTotal = await withStoreRetry('count', this.retry, () =>
      this.config.records.count(stored.filter, stored.snapshot),
    );
    return {
      mode: 'all',
      estimatedCount: estimatedCount(stored.selection, matchingTotal),
      matchingTotal,
    };
  }

  /** Ids the token currently resolves to, batch by batch. */
  resolve(stored: StoredSelection): AsyncIterable<RecordId[]> {
    return this.resolver.resolve({
      filter: stored.filter,
      selection: stored.selection,
      snapshot: stored.snapshot,
    });
  }

  /**
   * Claims the token and applies `action` to every selected record.
   * Token and filter errors reject; per-record failures are reported in the result.
   * A single-use token is consumed by the run and restored if the run aborts.
   */
  async execute(token: string, action: BulkAction, options: ExecuteOptions = {}): Promise<BulkOperationResult> {
    const stored = await this.claimSelection(token);
    return this.executeStored(stored, action, options);
  }

  /** Runs a selection obtained from claimSelection(). */
  async executeStored(
    stored: StoredSelection,
    action: BulkAction,
    options: ExecuteOptions = {},
  ): Promise<BulkOperationResult> {
    let result: BulkOperationResult;
    try {
      result = await executeBulk(this.resolve(stored), action, options);
    } catch (err) {
      await this.release(stored);
      throw err;
    }
    if (result.status === 'aborted') await this.release(stored);
    return result;
  }

  /**
   * Gives a claimed single-use token back so the caller can retry. Failures go
   * to `onError`; the token then stays consumed.
   */
  async release(stored: StoredSelection): Promise<void> {
    if (!stored.singleUse) return;
    await withStoreRetry('restore', this.retry, () => this.config.tokens.restore(stored)).catch((err: unknown) => {
      this.onError(`restore single-use token ${stored.token}`, err);
    });
  }

  async invalidate(token: string): Promise<void> {
    await withStoreRetry('invalidate', this.retry, () => this.config.tokens.invalidate(token));
  }
}
