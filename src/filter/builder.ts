import type { FieldConstraint, FilterDescriptor, RangeValue, ScalarValue } from './types.js';

type BuilderValue = ScalarValue | Date;
type BuilderBound = RangeValue | Date;

function normalize(value: BuilderValue): ScalarValue {
  return value instanceof Date ? value.toISOString() : value;
}

function normalizeBound(value: BuilderBound): RangeValue {
  return value instanceof Date ? value.toISOString() : value;
}

/**
 * Fluent immutable filter builder. Implements FilterDescriptor so it can be
 * passed directly to the token store and resolver. Every operation returns a
 * new FilterBuilder; existing instances are never mutated.
 */
export class FilterBuilder implements FilterDescriptor {
  constructor(readonly constraints: readonly FieldConstraint[]) {}

  /** Add another constraint. Constraints always combine with AND. */
  get and(): FieldSelector {
    return new FieldSelector(this.constraints);
  }
}

/**
 * Intermediate builder step: awaits a field name.
 */
export class FieldSelector {
  constructor(private readonly _constraints: readonly FieldConstraint[]) {}

  field(name: string): ConstraintSetter {
    return new ConstraintSetter(this._constraints, name);
  }
}

/**
 * Intermediate builder step: holds the field and awaits an operator.
 */
export class ConstraintSetter {
  constructor(
    private readonly _constraints: readonly FieldConstraint[],
    private readonly _field: string,
  ) {}

  private push(constraint: FieldConstraint): FilterBuilder {
    return new FilterBuilder([...this._constraints, constraint]);
  }

  equals(value: BuilderValue): FilterBuilder {
    return this.push({ field: this._field, op: 'eq', value: normalize(value) });
  }

  notEquals(value: BuilderValue): FilterBuilder {
    return this.push({ field: this._field, op: 'ne', value: normalize(value) });
  }

  oneOf(values: readonly BuilderValue[]): FilterBuilder {
    return this.push({ field: this._field, op: 'in', values: values.map(normalize) });
  }

  noneOf(values: readonly BuilderValue[]): FilterBuilder {
    return this.push({ field: this._field, op: 'nin', values: values.map(normalize) });
  }

  gt(value: BuilderBound): FilterBuilder {
    return this.push({ field: this._field, op: 'gt', value: normalizeBound(value) });
  }

  gte(value: BuilderBound): FilterBuilder {
    return this.push({ field: this._field, op: 'gte', value: normalizeBound(value) });
  }

  lt(value: BuilderBound): FilterBuilder {
    return this.push({ field: this._field, op: 'lt', value: normalizeBound(value) });
  }

  lte(value: BuilderBound): FilterBuilder {
    return this.push({ field: this._field, op: 'lte', value: normalizeBound(value) });
  }

  between(low: BuilderBound, high: BuilderBound): FilterBuilder {
    return this.push({
      field: this._field,
      op: 'between',
      low: normalizeBound(low),
      high: normalizeBound(high),
    });
  }
}
