import { lookupOffset } from './table';

export function toShe(potential: number, ref: string): number {
  return potential + lookupOffset(ref);
}

export function fromShe(potentialVsShe: number, ref: string): number {
  return potentialVsShe - lookupOffset(ref);
}

/**
 * Re-expresses `potential` (measured against `fromRef`) on the `toRef` scale,
 * pivoting through SHE. Throws `UnknownElectrodeError` for names outside the
 * reference table.
 */
export function convert(potential: number, fromRef: string, toRef: string): number {
  if (fromRef === toRef) {
    lookupOffset(fromRef);
    return potential;
  }
  return fromShe(toShe(potential, fromRef), toRef);
}
