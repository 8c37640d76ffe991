import type { FilterDescriptor } from './filter/types.js';

export type RecordId = string;

export interface ManualSelection {
  readonly mode: 'manual';
  readonly included: ReadonlySet<RecordId>;
}

export interface AllSelection {
  readonly mode: 'all';
  readonly excluded: ReadonlySet<RecordId>;
}

/**
 * Either an explicit include-list, or "everything matching the filter" minus
 * an exclude-list. Each mode carries only its own set.
 */
export type SelectionState = ManualSelection | AllSelection;

export type SelectionMode = SelectionState['mode'];

/**
 * `live` re-evaluates the filter at resolve time; a long stream sees each page
 * as of the moment it is read. `pinned` bounds membership to records whose
 * position is ≤ `version`, where `version` is read only once every insert that
 * allocated a position up to it has committed or rolled back. Two resolves of
 * a pinned token therefore see the same positions, less records deleted in
 * between.
 */
export type SnapshotBasis =
  | { kind: 'live' }
  | { kind: 'pinned'; version: bigint };

export interface SelectionToken {
  token: string;
  expiresAt: Date;
}

export interface StoredSelection {
  token: string;
  filter: FilterDescriptor;
  selection: SelectionState;
  snapshot: SnapshotBasis;
  singleUse: boolean;
  createdAt: Date;
  expiresAt: Date;
}

export interface CreateTokenOptions {
  /** Overrides the store's default TTL. */
  ttlMs?: number;
  /** The first execution consumes the token; an aborted one gives it back. */
  singleUse?: boolean;
}

/**
 * Keyed store of (filter, selection, snapshot) tuples. Tokens are immutable
 * once created: the only writes are create, delete and restore of a consumed token.
 */
export interface SelectionTokenStore {
  create(
    filter: FilterDescriptor,
    selection: SelectionState,
    snapshot: SnapshotBasis,
    options?: CreateTokenOptions,
  ): Promise<SelectionToken>;
  resolve(token: string): Promise<StoredSelection>;
  /**
   * Deletes an unexpired token and returns what it held, in one step, so at
   * most one concurrent caller gets it. Throws like `resolve` otherwise.
   */
  consume(token: string): Promise<StoredSelection>;
  /** Puts a consumed token back unchanged; a no-op if the token exists. */
  restore(stored: StoredSelection): Promise<void>;
  invalidate(token: string): Promise<void>;
  /** Deletes tokens that expired more than `graceMs` ago; returns the number removed. */
  purgeExpired(graceMs?: number): Promise<number>;
  initializeSchema(): Promise<void>;
  close(): Promise<void>;
}

export interface MatchedRecord {
  id: RecordId;
  position: bigint;
}

export interface RecordStreamOptions {
  snapshot: SnapshotBasis;
  batchSize?: number;
  afterPosition?: bigint;
}

/**
 * The external record store, seen through filter evaluation only.
 * Every method orders results by ascending position.
 */
export interface RecordSource {
  currentVersion(): Promise<bigint>;
  stream(filter: FilterDescriptor, options: RecordStreamOptions): AsyncIterable<MatchedRecord>;
  lookup(filter: FilterDescriptor, ids: readonly RecordId[], snapshot: SnapshotBasis): Promise<MatchedRecord[]>;
  count(filter: FilterDescriptor, snapshot: SnapshotBasis): Promise<number>;
}

/** Applies one bulk action to one record. Resolves on success, throws on failure. */
export type BulkAction = (id: RecordId) => Promise<void>;

export type BulkOperationStatus = 'completed' | 'completed_with_errors' | 'aborted';

export type AbortReason = 'cancelled' | 'timeout' | 'interrupted';

export interface FailedRecord {
  id: RecordId;
  kind: string;
  message: string;
}

export interface BulkOperationResult {
  status: BulkOperationStatus;
  attempted: number;
  succeeded: number;
  failed: number;
  /** At most `maxReportedFailures` entries; `failuresTruncated` is set when more failed. */
  failures: FailedRecord[];
  failuresTruncated: boolean;
  abortReason?: AbortReason;
  /** Message of the ResolutionInterruptedError when `abortReason` is `interrupted`. */
  interruption?: string;
  startedAt: Date;
  finishedAt: Date;
}

export type BulkProgress = Omit<BulkOperationResult, 'status' | 'finishedAt' | 'abortReason' | 'interruption'>;
