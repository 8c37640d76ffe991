import { describe, it, expect } from 'vitest';
import {
  clearAll,
  emptySelection,
  estimatedCount,
  isSelected,
  selectAllMatching,
  selectedIdsOnPage,
  toggleRecord,
  toggleRecords,
} from '../../src/selection/state.js';
import type { SelectionState } from '../../src/types.js';

const matchesEverything = () => true;

function ids(state: SelectionState): string[] {
  return state.mode === 'manual' ? [...state.included].sort() : [...state.excluded].sort();
}

describe('selection state', () => {
  it('starts in manual mode with nothing selected', () => {
    const state = emptySelection();
    expect(state.mode).toBe('manual');
    expect(ids(state)).toEqual([]);
  });

  it('toggling in manual mode includes then removes a record', () => {
    const once = toggleRecord(emptySelection(), 'msg-1');
    expect(once.mode).toBe('manual');
    expect(ids(once)).toEqual(['msg-1']);
    const twice = toggleRecord(once, 'msg-1');
    expect(ids(twice)).toEqual([]);
  });

  it('toggling in all mode excludes then re-includes a record', () => {
    const all = selectAllMatching(emptySelection());
    const once = toggleRecord(all, 'msg-7');
    expect(once).toEqual({ mode: 'all', excluded: new Set(['msg-7']) });
    expect(toggleRecord(once, 'msg-7')).toEqual({ mode: 'all', excluded: new Set() });
  });

  it('does not mutate the previous state', () => {
    const before = toggleRecord(emptySelection(), 'a');
    toggleRecord(before, 'b');
    expect(ids(before)).toEqual(['a']);
  });

  it('selectAllMatching discards manual picks', () => {
    const manual = toggleRecords(emptySelection(), ['a', 'b']);
    expect(selectAllMatching(manual)).toEqual({ mode: 'all', excluded: new Set() });
  });

  it('clearAll returns to an empty manual selection from either mode', () => {
    const all = toggleRecord(selectAllMatching(emptySelection()), 'x');
    expect(clearAll(all)).toEqual({ mode: 'manual', included: new Set() });
  });

  it('toggleRecords flips each distinct id exactly once', () => {
    const state = toggleRecords(toggleRecord(emptySelection(), 'a'), ['a', 'b', 'b', 'c']);
    expect(ids(state)).toEqual(['b', 'c']);
  });

  describe('isSelected', () => {
    it('manual mode ignores membership', () => {
      const state = toggleRecord(emptySelection(), 'a');
      expect(isSelected(state, 'a', () => false)).toBe(true);
      expect(isSelected(state, 'b', () => true)).toBe(false);
    });

    it('all mode requires membership and no exclusion', () => {
      const state = toggleRecord(selectAllMatching(emptySelection()), 'b');
      const membership = (id: string) => id !== 'c';
      expect(isSelected(state, 'a', membership)).toBe(true);
      expect(isSelected(state, 'b', membership)).toBe(false);
      expect(isSelected(state, 'c', membership)).toBe(false);
    });
  });

  it('selectedIdsOnPage keeps page order', () => {
    const state = toggleRecord(selectAllMatching(emptySelection()), 'p2');
    expect(selectedIdsOnPage(state, ['p3', 'p2', 'p1'], matchesEverything)).toEqual(['p3', 'p1']);
  });

  describe('estimatedCount', () => {
    it('manual mode counts included ids', () => {
      const state = toggleRecords(emptySelection(), ['a', 'b', 'c']);
      expect(estimatedCount(state, 10_000)).toBe(3);
    });

    it('all mode subtracts exclusions from the matching total', () => {
      const state = toggleRecords(selectAllMatching(emptySelection()), ['a', 'b', 'c']);
      expect(estimatedCount(state, 10_000)).toBe(9_997);
    });

    it('never goes below zero', () => {
      const state = toggleRecords(selectAllMatching(emptySelection()), ['a', 'b']);
      expect(estimatedCount(state, 1)).toBe(0);
    });
  });
});
