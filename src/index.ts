export { filter } from './filter/filter-object.js';
export type {
  FieldConstraint,
  FieldDefinition,
  FieldSchema,
  FieldType,
  FilterDescriptor,
  FilterOperator,
  ScalarValue,
  RangeValue,
} from './filter/types.js';
export { validateFilter } from './filter/validate.js';
export { parseFilterDescriptor, serializeFilter, filterDescriptorSchema } from './filter/parse.js';
export { matchesFilter } from './filter/evaluate.js';
export type { RecordFields } from './filter/evaluate.js';
export { canonicalFilterKey } from './filter/compiler.js';
export {
  emptySelection,
  toggleRecord,
  toggleRecords,
  selectAllMatching,
  clearAll,
  isSelected,
  selectedIdsOnPage,
  estimatedCount,
} from './selection/state.js';
export type { MembershipCheck } from './selection/state.js';
export { serializeSelection, parseSelection, selectionStateSchema } from './selection/serialize.js';
export type { SelectionStateJson } from './selection/serialize.js';
export type {
  RecordId,
  SelectionState,
  ManualSelection,
  AllSelection,
  SelectionMode,
  SnapshotBasis,
  SelectionToken,
  StoredSelection,
  CreateTokenOptions,
  SelectionTokenStore,
  MatchedRecord,
  RecordStreamOptions,
  RecordSource,
  BulkAction,
  BulkOperationStatus,
  BulkOperationResult,
  BulkProgress,
  AbortReason,
  FailedRecord,
} from './types.js';
export { systemClock } from './clock.js';
export type { Clock } from './clock.js';
export {
  PostgresSelectionTokenStore,
  DEFAULT_TOKEN_TTL_MS,
  MIN_TOKEN_TTL_MS,
  MAX_TOKEN_TTL_MS,
  DEFAULT_PURGE_GRACE_MS,
} from './tokens/token-store.js';
export type { TokenStoreConfig } from './tokens/token-store.js';
export { TokenSweeper } from './tokens/sweeper.js';
export type { TokenSweeperConfig } from './tokens/sweeper.js';
export { PostgresRecordSource, DEFAULT_PIN_LOCK_TIMEOUT_MS } from './records/postgres-source.js';
export type { RecordSourceConfig } from './records/postgres-source.js';
export type { RecordTableConfig } from './records/table.js';
export { SelectionResolver, resolveAll, DEFAULT_RESOLVE_BATCH_SIZE, MAX_RESOLVE_BATCH_SIZE } from './resolver/resolver.js';
export type { ResolveRequest } from './resolver/resolver.js';
export { executeBulk, DEFAULT_CONCURRENCY, DEFAULT_MAX_REPORTED_FAILURES } from './executor/executor.js';
export type { ExecuteOptions } from './executor/executor.js';
export { BulkSelectionService } from './service/selection-service.js';
export { withRetry, isTransientStoreError } from './service/retry.js';
export type { RetryPolicy } from './service/retry.js';
export type {
  BulkSelectionServiceConfig,
  CreateSelectionInput,
  SelectionEstimate,
} from './service/selection-service.js';
export {
  InvalidFilterError,
  InvalidSelectionError,
  TokenNotFoundError,
  TokenExpiredError,
  StoreUnavailableError,
  RecordSourceError,
  ResolutionInterruptedError,
  ActionError,
} from './errors.js';
