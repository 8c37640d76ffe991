import type { FieldSchema } from '../filter/types.js';

/**
 * Describes the table a PostgresRecordSource reads from.
 * `positionColumn` must be a unique, monotonically increasing BIGINT (e.g. a
 * BIGSERIAL): it is the stable sort key, the keyset cursor and the snapshot
 * version all at once.
 */
export interface RecordTableConfig {
  table: string;
  idColumn: string;
  positionColumn: string;
  fields: FieldSchema;
}

const IDENTIFIER_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]{0,62}$/;

export function quoteIdentifier(name: string): string {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new Error(`Invalid SQL identifier "${name}": must match ${String(IDENTIFIER_PATTERN)}`);
  }
  return `"${name}"`;
}

/** Throws if any table, column or field identifier is unsafe to interpolate. */
export function assertTableConfig(config: RecordTableConfig): void {
  quoteIdentifier(config.table);
  quoteIdentifier(config.idColumn);
  quoteIdentifier(config.positionColumn);
  for (const def of Object.values(config.fields)) quoteIdentifier(def.column);
}
