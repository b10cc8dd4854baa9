import {
  DEFAULT_FROM_REF,
  DEFAULT_POTENTIAL_V,
  DEFAULT_TO_REF,
  FALLBACK_FROM_REF,
  FALLBACK_POTENTIAL_V,
  FALLBACK_TO_REF
} from '../config';
import { convert } from '../electrodes/convert';
import { isElectrodeName } from '../electrodes/table';
import type { ConversionRecord, ReferenceSide, SessionDefaults, SessionState } from '../types';
import { errorMessage, isUnknownElectrodeError } from '../utils/errors';

export const INVALID_POTENTIAL_MESSAGE = 'Enter a finite potential value in volts.';

function resolveReference(name: string, fallback: string): string {
  if (isElectrodeName(name)) {
    return name;
  }
  if (import.meta.env.DEV) {
    console.warn(`Ignoring unknown default reference "${name}", using "${fallback}"`);
  }
  return fallback;
}

export function createSessionState(defaults: SessionDefaults = {}): SessionState {
  const potential = defaults.potential ?? DEFAULT_POTENTIAL_V;
  return {
    potential: Number.isFinite(potential) ? potential : FALLBACK_POTENTIAL_V,
    fromRef: resolveReference(defaults.fromRef ?? DEFAULT_FROM_REF, FALLBACK_FROM_REF),
    toRef: resolveReference(defaults.toRef ?? DEFAULT_TO_REF, FALLBACK_TO_REF),
    history: [],
    lastResult: null,
    error: null
  };
}

export function setPotential(state: SessionState, value: number): SessionState {
  if (!Number.isFinite(value)) {
    return { ...state, error: INVALID_POTENTIAL_MESSAGE };
  }
  return { ...state, potential: value, error: null };
}

export function selectReference(state: SessionState, side: ReferenceSide, name: string): SessionState {
  return side === 'from'
    ? { ...state, fromRef: name, error: null }
    : { ...state, toRef: name, error: null };
}

export function swapReferences(state: SessionState): SessionState {
  return { ...state, fromRef: state.toRef, toRef: state.fromRef, error: null };
}

/**
 * Converts the current potential and appends the outcome to history. An
 * unknown electrode leaves history as it was and reports through `error`.
 */
export function runConversion(state: SessionState, now: number = Date.now()): SessionState {
  let result: number;
  try {
    result = convert(state.potential, state.fromRef, state.toRef);
  } catch (error) {
    if (!isUnknownElectrodeError(error)) {
      throw error;
    }
    return { ...state, lastResult: null, error: errorMessage(error, 'Conversion failed.') };
  }

  const record: ConversionRecord = {
    inputPotential: state.potential,
    fromRef: state.fromRef,
    toRef: state.toRef,
    result,
    timestamp: now
  };
  return { ...state, history: [...state.history, record], lastResult: record, error: null };
}

export function clearHistory(state: SessionState): SessionState {
  return { ...state, history: [], lastResult: null, error: null };
}
