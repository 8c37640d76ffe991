import { FieldSelector, FilterBuilder } from './builder.js';
import type { FilterDescriptor } from './types.js';

/**
 * Entry point for the filter DSL.
 *
 * @example
 * filter.where.field('status').equals('unreplied')
 *   .and.field('priority').gte(2)
 *   .and.field('receivedAt').between('2024-01-01T00:00:00.000Z', new Date())
 */
export const filter = {
  get where(): FieldSelector {
    return new FieldSelector([]);
  },
  /** Matches every record in the collection. */
  everything(): FilterBuilder {
    return new FilterBuilder([]);
  },
  /** Wraps an existing descriptor (e.g. one parsed from a request) to extend it. */
  from(descriptor: FilterDescriptor): FilterBuilder {
    return new FilterBuilder([...descriptor.constraints]);
  },
};
