export type FieldType = 'string' | 'number' | 'boolean' | 'timestamp';

/** Timestamps travel as ISO-8601 strings so descriptors stay JSON-serializable. */
export type ScalarValue = string | number | boolean;

/** Range bounds: numbers for `number` fields, ISO strings for `timestamp` fields. */
export type RangeValue = string | number;

export type EqualityOperator = 'eq' | 'ne';
export type SetOperator = 'in' | 'nin';
export type RangeOperator = 'gt' | 'gte' | 'lt' | 'lte';
export type FilterOperator = EqualityOperator | SetOperator | RangeOperator | 'between';

export type FieldConstraint =
  | { field: string; op: EqualityOperator; value: ScalarValue }
  | { field: string; op: SetOperator; values: ScalarValue[] }
  | { field: string; op: RangeOperator; value: RangeValue }
  | { field: string; op: 'between'; low: RangeValue; high: RangeValue };

/**
 * Immutable conjunction of field constraints.
 * Built via the filter DSL or parsed from the wire with parseFilterDescriptor().
 */
export interface FilterDescriptor {
  readonly constraints: readonly FieldConstraint[];
}

export interface FieldDefinition {
  /** Column backing the field in the record table. */
  column: string;
  type: FieldType;
}

/** Field name → definition. Only fields listed here may appear in a filter. */
export type FieldSchema = Readonly<Record<string, FieldDefinition>>;

export const RANGE_OPERATORS: readonly FilterOperator[] = ['gt', 'gte', 'lt', 'lte', 'between'];
