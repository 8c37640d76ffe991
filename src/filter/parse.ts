import { z } from 'zod';
import { InvalidFilterError } from '../errors.js';
import type { FilterDescriptor } from './types.js';

const scalar = z.union([z.string(), z.number(), z.boolean()]);
const bound = z.union([z.string(), z.number()]);
const field = z.string().min(1);

const constraintSchema = z.union([
  z.object({ field, op: z.enum(['eq', 'ne']), value: scalar }).strict(),
  z.object({ field, op: z.enum(['in', 'nin']), values: z.array(scalar) }).strict(),
  z.object({ field, op: z.enum(['gt', 'gte', 'lt', 'lte']), value: bound }).strict(),
  z.object({ field, op: z.literal('between'), low: bound, high: bound }).strict(),
]);

export const filterDescriptorSchema = z.object({
  constraints: z.array(constraintSchema),
});

/**
 * Validates the wire shape of a filter descriptor. Field names and value types
 * are checked separately against a schema by validateFilter().
 */
export function parseFilterDescriptor(input: unknown): FilterDescriptor {
  const parsed = filterDescriptorSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new InvalidFilterError(`Malformed filter descriptor${where}: ${issue?.message ?? 'invalid'}`);
  }
  return { constraints: parsed.data.constraints };
}

/** Plain JSON form; strips builder classes. */
export function serializeFilter(descriptor: FilterDescriptor): FilterDescriptor {
  return { constraints: descriptor.constraints.map((c) => ({ ...c })) };
}
