import { InvalidFilterError } from '../errors.js';
import { RANGE_OPERATORS } from './types.js';
import type { FieldDefinition, FieldSchema, FilterDescriptor, FieldType } from './types.js';

/** Looks up a field, rejecting names not declared by the schema (prototype keys included). */
export function fieldDefinition(schema: FieldSchema, field: string): FieldDefinition {
  const def = Object.hasOwn(schema, field) ? schema[field] : undefined;
  if (def === undefined) {
    throw new InvalidFilterError(`Unknown filter field "${field}"`, field);
  }
  return def;
}

function isValueOfType(type: FieldType, value: unknown): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'timestamp':
      return typeof value === 'string' && !Number.isNaN(Date.parse(value));
  }
}

function checkValue(field: string, type: FieldType, value: unknown): void {
  if (!isValueOfType(type, value)) {
    throw new InvalidFilterError(
      `Field "${field}" expects a ${type} value, got ${JSON.stringify(value)}`,
      field,
    );
  }
}

/** Numeric ordering key for range bounds: the number itself or epoch millis. */
function orderKey(type: FieldType, value: string | number): number {
  return type === 'timestamp' ? Date.parse(String(value)) : Number(value);
}

/**
 * Checks every constraint against the schema.
 * Throws InvalidFilterError for unknown fields, operators incompatible with the
 * field type, or values of the wrong type.
 */
export function validateFilter(descriptor: FilterDescriptor, schema: FieldSchema): void {
  for (const constraint of descriptor.constraints) {
    const { field, op } = constraint;
    const { type } = fieldDefinition(schema, field);

    if (RANGE_OPERATORS.includes(op) && type !== 'number' && type !== 'timestamp') {
      throw new InvalidFilterError(
        `Operator "${op}" is not supported on ${type} field "${field}"`,
        field,
      );
    }

    switch (constraint.op) {
      case 'eq':
      case 'ne':
      case 'gt':
      case 'gte':
      case 'lt':
      case 'lte':
        checkValue(field, type, constraint.value);
        break;
      case 'in':
      case 'nin':
        if (constraint.values.length === 0) {
          throw new InvalidFilterError(
            `Operator "${op}" on field "${field}" needs at least one value`,
            field,
          );
        }
        for (const value of constraint.values) checkValue(field, type, value);
        break;
      case 'between':
        checkValue(field, type, constraint.low);
        checkValue(field, type, constraint.high);
        if (orderKey(type, constraint.low) > orderKey(type, constraint.high)) {
          throw new InvalidFilterError(`Field "${field}": between bounds are reversed`, field);
        }
        break;
    }
  }
}
