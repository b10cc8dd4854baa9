import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  clearHistory,
  createSessionState,
  INVALID_POTENTIAL_MESSAGE,
  runConversion,
  selectReference,
  setPotential,
  swapReferences
} from '../src/state/session';

const AG_AGCL_SAT = "Ag/AgCl (Sat'd KCl)";
const SHE = 'SHE (Standard Hydrogen)';

describe('createSessionState', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('starts from the default conversion', () => {
    const state = createSessionState();
    expect(state).toEqual({
      potential: 0.35,
      fromRef: AG_AGCL_SAT,
      toRef: SHE,
      history: [],
      lastResult: null,
      error: null
    });
  });

  it('takes custom defaults', () => {
    const state = createSessionState({ potential: -0.1, fromRef: 'Hg/HgO (1M NaOH)', toRef: AG_AGCL_SAT });
    expect(state.potential).toBe(-0.1);
    expect(state.fromRef).toBe('Hg/HgO (1M NaOH)');
    expect(state.toRef).toBe(AG_AGCL_SAT);
  });

  it('falls back when the defaults are unusable', () => {
    const state = createSessionState({ potential: Number.NaN, fromRef: 'Unobtainium', toRef: 'Nope' });
    expect(state.potential).toBe(0.35);
    expect(state.fromRef).toBe(AG_AGCL_SAT);
    expect(state.toRef).toBe(SHE);
  });
});

describe('session transitions', () => {
  it('appends one record per successful conversion', () => {
    const initial = createSessionState();
    const next = runConversion(initial, 1_000);

    expect(next.history).toHaveLength(1);
    expect(initial.history).toHaveLength(0);
    const [record] = next.history;
    expect(record.inputPotential).toBe(0.35);
    expect(record.fromRef).toBe(AG_AGCL_SAT);
    expect(record.toRef).toBe(SHE);
    expect(record.result).toBeCloseTo(0.547, 12);
    expect(record.timestamp).toBe(1_000);
    expect(next.lastResult).toBe(record);
    expect(next.error).toBeNull();
  });

  it('keeps history ordered most-recent-last', () => {
    let state = createSessionState();
    state = runConversion(state, 1);
    state = setPotential(state, 0.1);
    state = runConversion(state, 2);
    expect(state.history.map((record) => record.timestamp)).toEqual([1, 2]);
    expect(state.history[1].inputPotential).toBe(0.1);
  });

  it('reports unknown electrodes without touching history', () => {
    let state = runConversion(createSessionState(), 1);
    state = selectReference(state, 'to', 'Unobtainium');
    const rejected = runConversion(state, 2);

    expect(rejected.history).toHaveLength(1);
    expect(rejected.history).toBe(state.history);
    expect(rejected.lastResult).toBeNull();
    expect(rejected.error).toBe('Unknown reference electrode: Unobtainium');
  });

  it('swaps the selected references', () => {
    const swapped = swapReferences(createSessionState());
    expect(swapped.fromRef).toBe(SHE);
    expect(swapped.toRef).toBe(AG_AGCL_SAT);
    expect(swapReferences(swapped).fromRef).toBe(AG_AGCL_SAT);
  });

  it('converts back after a swap', () => {
    let state = runConversion(createSessionState(), 1);
    state = swapReferences(state);
    state = setPotential(state, 0.547);
    state = runConversion(state, 2);
    expect(state.lastResult?.result).toBeCloseTo(0.35, 12);
  });

  it('rejects non-finite potentials and keeps the previous value', () => {
    const state = setPotential(createSessionState(), Number.NaN);
    expect(state.potential).toBe(0.35);
    expect(state.error).toBe(INVALID_POTENTIAL_MESSAGE);
    expect(setPotential(state, 1.2).error).toBeNull();
  });

  it('clears the whole history', () => {
    let state = createSessionState();
    for (let i = 0; i < 3; i += 1) {
      state = runConversion(state, i);
    }
    expect(state.history).toHaveLength(3);

    const cleared = clearHistory(state);
    expect(cleared.history).toHaveLength(0);
    expect(cleared.lastResult).toBeNull();
    expect(clearHistory(cleared).history).toHaveLength(0);
  });
});
