import { z } from 'zod';
import { InvalidSelectionError } from '../errors.js';
import type { SelectionState } from '../types.js';

const recordId = z.string().min(1);

export const selectionStateSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('manual'), included: z.array(recordId) }).strict(),
  z.object({ mode: z.literal('all'), excluded: z.array(recordId) }).strict(),
]);

export type SelectionStateJson = z.infer<typeof selectionStateSchema>;

export function serializeSelection(state: SelectionState): SelectionStateJson {
  return state.mode === 'manual'
    ? { mode: 'manual', included: [...state.included] }
    : { mode: 'all', excluded: [...state.excluded] };
}

/**
 * Parses the wire form. A payload carrying the other mode's set is rejected
 * rather than silently dropped.
 */
export function parseSelection(input: unknown): SelectionState {
  const parsed = selectionStateSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new InvalidSelectionError(`Malformed selection state${where}: ${issue?.message ?? 'invalid'}`);
  }
  const data = parsed.data;
  return data.mode === 'manual'
    ? { mode: 'manual', included: new Set(data.included) }
    : { mode: 'all', excluded: new Set(data.excluded) };
}
