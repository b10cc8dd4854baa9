import { SHE } from './electrodes/table';

function readNumber(raw: string | undefined, fallback: number): number {
  if (raw == null || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const FALLBACK_POTENTIAL_V = 0.35;
export const FALLBACK_FROM_REF = "Ag/AgCl (Sat'd KCl)";
export const FALLBACK_TO_REF: string = SHE;

export const DEFAULT_POTENTIAL_V = readNumber(import.meta.env.VITE_DEFAULT_POTENTIAL, FALLBACK_POTENTIAL_V);
export const DEFAULT_FROM_REF = import.meta.env.VITE_DEFAULT_FROM_REF ?? FALLBACK_FROM_REF;
export const DEFAULT_TO_REF = import.meta.env.VITE_DEFAULT_TO_REF ?? FALLBACK_TO_REF;

export const DISPLAY_PRECISION = 3;
export const POTENTIAL_STEP = 0.001;

export const APP_TITLE = 'Electrochemical Potential Converter';
export const REFERENCE_TEMPERATURE_LABEL = 'Values vs. SHE at 25°C';
