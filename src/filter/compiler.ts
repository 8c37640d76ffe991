import type { SnapshotBasis, RecordId } from '../types.js';
import type { RecordTableConfig } from '../records/table.js';
import { quoteIdentifier } from '../records/table.js';
import type { FieldConstraint, FilterDescriptor } from './types.js';
import { fieldDefinition } from './validate.js';

export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

const COMPARISON_SQL = { gt: '>', gte: '>=', lt: '<', lte: '<=' } as const;

function nextParam(params: unknown[], value: unknown): string {
  params.push(value);
  return `$${params.length}`;
}

/**
 * Compiles a single constraint into a SQL predicate and appends its parameters.
 */
function compileConstraint(
  constraint: FieldConstraint,
  table: RecordTableConfig,
  params: unknown[],
): string {
  const column = quoteIdentifier(fieldDefinition(table.fields, constraint.field).column);

  switch (constraint.op) {
    case 'eq':
      return `${column} = ${nextParam(params, constraint.value)}`;
    case 'ne':
      return `${column} IS DISTINCT FROM ${nextParam(params, constraint.value)}`;
    case 'in':
      return `${column} = ANY(${nextParam(params, constraint.values)})`;
    case 'nin':
      return `NOT (${column} = ANY(${nextParam(params, constraint.values)}))`;
    case 'between': {
      const low = nextParam(params, constraint.low);
      const high = nextParam(params, constraint.high);
      return `${column} BETWEEN ${low} AND ${high}`;
    }
    default:
      return `${column} ${COMPARISON_SQL[constraint.op]} ${nextParam(params, constraint.value)}`;
  }
}

/**
 * Filter predicates followed by the snapshot pin, in declaration order.
 */
function compileConditions(
  descriptor: FilterDescriptor,
  snapshot: SnapshotBasis,
  table: RecordTableConfig,
  params: unknown[],
): string[] {
  const conditions = descriptor.constraints.map((c) => compileConstraint(c, table, params));
  if (snapshot.kind === 'pinned') {
    conditions.push(`${quoteIdentifier(table.positionColumn)} <= ${nextParam(params, snapshot.version)}`);
  }
  return conditions;
}

function whereClause(conditions: string[]): string | null {
  return conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : null;
}

function selectRecordColumns(table: RecordTableConfig): string {
  const id = quoteIdentifier(table.idColumn);
  const position = quoteIdentifier(table.positionColumn);
  return `SELECT ${id} AS record_id, ${position} AS record_position`;
}

function joinLines(lines: Array<string | null>): string {
  return lines.filter((line): line is string => line !== null).join('\n');
}

/**
 * Keyset-paginated page of matching records, ordered by position ASC.
 * Appends `position > $N` and `LIMIT $M` after the filter and snapshot predicates.
 */
export function compileBatchQuery(
  table: RecordTableConfig,
  descriptor: FilterDescriptor,
  snapshot: SnapshotBasis,
  afterPosition: bigint,
  batchSize: number,
): CompiledQuery {
  const params: unknown[] = [];
  const conditions = compileConditions(descriptor, snapshot, table, params);
  const position = quoteIdentifier(table.positionColumn);
  conditions.push(`${position} > ${nextParam(params, afterPosition)}`);
  const limitRef = nextParam(params, batchSize);

  const sql = joinLines([
    selectRecordColumns(table),
    `FROM ${quoteIdentifier(table.table)}`,
    whereClause(conditions),
    `ORDER BY ${position} ASC`,
    `LIMIT ${limitRef}`,
  ]);
  return { sql, params };
}

/**
 * The subset of `ids` that match the filter under the snapshot, ordered by position ASC.
 */
export function compileLookupQuery(
  table: RecordTableConfig,
  descriptor: FilterDescriptor,
  ids: readonly RecordId[],
  snapshot: SnapshotBasis,
): CompiledQuery {
  const params: unknown[] = [];
  const conditions = compileConditions(descriptor, snapshot, table, params);
  conditions.push(`${quoteIdentifier(table.idColumn)} = ANY(${nextParam(params, [...ids])})`);

  const sql = joinLines([
    selectRecordColumns(table),
    `FROM ${quoteIdentifier(table.table)}`,
    whereClause(conditions),
    `ORDER BY ${quoteIdentifier(table.positionColumn)} ASC`,
  ]);
  return { sql, params };
}

export function compileCountQuery(
  table: RecordTableConfig,
  descriptor: FilterDescriptor,
  snapshot: SnapshotBasis,
): CompiledQuery {
  const params: unknown[] = [];
  const conditions = compileConditions(descriptor, snapshot, table, params);
  const sql = joinLines([
    'SELECT COUNT(*) AS total',
    `FROM ${quoteIdentifier(table.table)}`,
    whereClause(conditions),
  ]);
  return { sql, params };
}

/**
 * Highest position in the table; used as the version when pinning a snapshot.
 * Only commit-safe while compileVersionLock()'s lock is held.
 */
export function compileVersionQuery(table: RecordTableConfig): CompiledQuery {
  const sql = joinLines([
    `SELECT COALESCE(MAX(${quoteIdentifier(table.positionColumn)}), 0) AS max_pos`,
    `FROM ${quoteIdentifier(table.table)}`,
  ]);
  return { sql, params: [] };
}

/**
 * SHARE mode waits for every open INSERT, UPDATE or DELETE on the table and
 * holds off new ones, so no position at or below the current maximum can still
 * be in flight while it is held.
 */
export function compileVersionLock(table: RecordTableConfig): string {
  return `LOCK TABLE ${quoteIdentifier(table.table)} IN SHARE MODE`;
}

/**
 * Stable string form of a descriptor. Constraint order does not affect the key.
 */
export function canonicalFilterKey(descriptor: FilterDescriptor): string {
  const sorted = [...descriptor.constraints]
    .map((c) => JSON.stringify(c, Object.keys(c).sort()))
    .sort();
  return `[${sorted.join(',')}]`;
}
