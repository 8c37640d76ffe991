import type { FieldConstraint, FieldSchema, FieldType, FilterDescriptor } from './types.js';
import { fieldDefinition } from './validate.js';

/** A record as seen by in-memory evaluation: field name → value. */
export type RecordFields = Readonly<Record<string, unknown>>;

type Comparable = string | number | boolean;

function toComparable(type: FieldType, value: unknown): Comparable | undefined {
  if (type === 'timestamp') {
    if (value instanceof Date) return value.getTime();
    if (typeof value === 'string') {
      const ms = Date.parse(value);
      return Number.isNaN(ms) ? undefined : ms;
    }
    return undefined;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return undefined;
}

function satisfies(constraint: FieldConstraint, type: FieldType, raw: unknown): boolean {
  const actual = toComparable(type, raw);
  const expected = (v: unknown) => toComparable(type, v);

  switch (constraint.op) {
    case 'eq':
      return actual !== undefined && actual === expected(constraint.value);
    case 'ne':
      // SQL `IS DISTINCT FROM`: a missing value differs from any concrete one
      return actual !== expected(constraint.value);
    case 'in':
      return actual !== undefined && constraint.values.some((v) => expected(v) === actual);
    case 'nin':
      return actual !== undefined && !constraint.values.some((v) => expected(v) === actual);
    case 'between': {
      const low = expected(constraint.low);
      const high = expected(constraint.high);
      return (
        typeof actual === 'number' &&
        typeof low === 'number' &&
        typeof high === 'number' &&
        actual >= low &&
        actual <= high
      );
    }
    case 'gt':
    case 'gte':
    case 'lt':
    case 'lte': {
      const bound = expected(constraint.value);
      if (typeof actual !== 'number' || typeof bound !== 'number') return false;
      if (constraint.op === 'gt') return actual > bound;
      if (constraint.op === 'gte') return actual >= bound;
      if (constraint.op === 'lt') return actual < bound;
      return actual <= bound;
    }
  }
}

/**
 * Evaluates the descriptor against one record in memory, with the same
 * semantics as the compiled SQL. Assumes the descriptor was validated.
 */
export function matchesFilter(
  descriptor: FilterDescriptor,
  schema: FieldSchema,
  record: RecordFields,
): boolean {
  return descriptor.constraints.every((constraint) => {
    const { type } = fieldDefinition(schema, constraint.field);
    return satisfies(constraint, type, record[constraint.field]);
  });
}
