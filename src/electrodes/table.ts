import { UnknownElectrodeError } from '../utils/errors';

/** Potentials of common reference electrodes vs. SHE at 25 °C, in volts. */
export const REFERENCE_POTENTIALS = Object.freeze({
  'NHE (Normal Hydrogen)': 0.0,
  'SHE (Standard Hydrogen)': 0.0,
  "Calomel (Sat'd KCl)": 0.241,
  'Calomel (3.5M KCl)': 0.25,
  'Calomel (1M KCl)': 0.28,
  'Calomel (0.1M KCl)': 0.334,
  "Ag/AgCl (Sat'd KCl)": 0.197,
  'Ag/AgCl (3.5M KCl)': 0.205,
  'Ag/AgCl (3M KCl)': 0.21,
  'Ag/AgCl (0.1M KCl)': 0.288,
  'Mercury/Mercurous Sulfate (0.5M H₂SO₄)': 0.682,
  'Mercury/Mercurous Sulfate (1M H₂SO₄)': 0.674,
  "Mercury/Mercurous Sulfate (Sat'd K₂SO₄)": 0.64,
  'Hg/HgO (1M NaOH)': 0.098,
  'Hg/HgO (20% KOH)': 0.095,
  "Silver/Silver Sulfate (Sat'd K₂SO₄)": 0.654
} as const);

export type ElectrodeName = keyof typeof REFERENCE_POTENTIALS;

export interface ReferenceElectrode {
  name: ElectrodeName;
  offsetVoltsVsShe: number;
}

export const SHE: ElectrodeName = 'SHE (Standard Hydrogen)';

export const ELECTRODE_NAMES: readonly ElectrodeName[] = Object.freeze(
  Object.keys(REFERENCE_POTENTIALS).filter(isElectrodeName)
);

export function isElectrodeName(name: string): name is ElectrodeName {
  return Object.prototype.hasOwnProperty.call(REFERENCE_POTENTIALS, name);
}

export function lookupOffset(name: string): number {
  if (!isElectrodeName(name)) {
    throw new UnknownElectrodeError(name);
  }
  return REFERENCE_POTENTIALS[name];
}

export function listReferenceElectrodes(): ReferenceElectrode[] {
  return ELECTRODE_NAMES.map((name) => ({ name, offsetVoltsVsShe: REFERENCE_POTENTIALS[name] }));
}
