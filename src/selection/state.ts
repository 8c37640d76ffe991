import type { RecordId, SelectionState } from '../types.js';

/** Tests whether a record matches the active filter. */
export type MembershipCheck = (id: RecordId) => boolean;

function flip(set: ReadonlySet<RecordId>, id: RecordId): Set<RecordId> {
  const next = new Set(set);
  if (next.has(id)) next.delete(id);
  else next.add(id);
  return next;
}

/** Initial state of a freshly opened table view: manual mode, nothing selected. */
export function emptySelection(): SelectionState {
  return { mode: 'manual', included: new Set() };
}

/**
 * Flips one row. In manual mode the row moves in or out of `included`; in
 * all mode it moves in or out of `excluded`. Applying it twice is a no-op.
 */
export function toggleRecord(state: SelectionState, id: RecordId): SelectionState {
  return state.mode === 'manual'
    ? { mode: 'manual', included: flip(state.included, id) }
    : { mode: 'all', excluded: flip(state.excluded, id) };
}

/** Flips each distinct id once (e.g. a page's "toggle visible rows" checkbox). */
export function toggleRecords(state: SelectionState, ids: Iterable<RecordId>): SelectionState {
  let next = state;
  for (const id of new Set(ids)) next = toggleRecord(next, id);
  return next;
}

/** Switches to all mode with no exclusions. Any manual picks are discarded. */
export function selectAllMatching(_state: SelectionState): SelectionState {
  return { mode: 'all', excluded: new Set() };
}

/** Back to manual mode with nothing selected. */
export function clearAll(_state: SelectionState): SelectionState {
  return emptySelection();
}

/**
 * In all mode, selection is relative to the filter: the id must also pass
 * `membership`, which is never consulted in manual mode.
 */
export function isSelected(state: SelectionState, id: RecordId, membership: MembershipCheck): boolean {
  if (state.mode === 'manual') return state.included.has(id);
  return membership(id) && !state.excluded.has(id);
}

/** The ids of a visible page that are currently selected, in page order. */
export function selectedIdsOnPage(
  state: SelectionState,
  pageIds: readonly RecordId[],
  membership: MembershipCheck,
): RecordId[] {
  return pageIds.filter((id) => isSelected(state, id, membership));
}

/**
 * Advisory count for display. `matchingTotal` may be stale by the time it is
 * shown; the executor's `attempted` count is authoritative. Excluded ids that
 * no longer match can push the difference below zero, so it is clamped.
 */
export function estimatedCount(state: SelectionState, matchingTotal: number): number {
  if (state.mode === 'manual') return state.included.size;
  return Math.max(0, matchingTotal - state.excluded.size);
}
