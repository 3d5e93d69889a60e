/**
 * Derived quantities, computed from binding energies in one source's index.
 *
 * All results are MeV. A missing neighbor, a missing binding energy or an
 * out-of-range (Z, N) gives `null`, never 0.
 */

import type { NuclideIndex } from './nuclideIndex.js';
import type { NuclideRecord } from './record.js';

/** Binding energy of 4He, MeV. */
export const BE_HE4_MEV = 28.295674;
/** m_n - m(1H) from the neutron and hydrogen mass excesses, MeV. */
export const NEUTRON_HYDROGEN_MASS_DIFF_MEV = 0.7823465;

export const MAGIC_NUMBERS = [2, 8, 20, 28, 50, 82, 126] as const;

export type SeparationKind = 'Sn' | 'Sp' | 'S2n' | 'S2p';
export type QValueKind = 'alpha' | 'betaMinus' | 'EC';

export interface NucleonShift {
  dZ: number;
  dN: number;
}

const SEPARATION_SHIFTS: Record<SeparationKind, NucleonShift> = {
  Sn: { dZ: 0, dN: -1 },
  Sp: { dZ: -1, dN: 0 },
  S2n: { dZ: 0, dN: -2 },
  S2p: { dZ: -2, dN: 0 },
};

export const Q_VALUE_DAUGHTERS: Record<QValueKind, NucleonShift> = {
  alpha: { dZ: -2, dN: -2 },
  betaMinus: { dZ: 1, dN: -1 },
  EC: { dZ: -1, dN: 1 },
};

// Decay-mode labels as they appear in the experimental export
const DECAY_MODE_SHIFTS: Record<string, NucleonShift> = {
  'A': { dZ: -2, dN: -2 },
  'B-': { dZ: 1, dN: -1 },
  'B+': { dZ: -1, dN: 1 },
  'EC': { dZ: -1, dN: 1 },
  'EC+B+': { dZ: -1, dN: 1 },
  'B+EC': { dZ: -1, dN: 1 },
  'N': { dZ: 0, dN: -1 },
  'P': { dZ: -1, dN: 0 },
  '2N': { dZ: 0, dN: -2 },
  '2P': { dZ: -2, dN: 0 },
  '2B-': { dZ: 2, dN: -2 },
  'B-N': { dZ: 1, dN: -2 },
  'ECP': { dZ: -2, dN: 1 },
};

/** Nucleon shift for a decay-mode label, or null for IT, SF and unknown labels. */
export function decayModeShift(mode: string): NucleonShift | null {
  return DECAY_MODE_SHIFTS[mode.trim().toUpperCase()] ?? null;
}

export function bindingEnergyAt(index: NuclideIndex, Z: number, N: number): number | null {
  if (Z < 0 || N < 0) return null;
  return index.get(Z, N)?.bindingEnergy?.value ?? null;
}

export function bindingEnergyPerNucleon(record: NuclideRecord): number | null {
  const be = record.bindingEnergy?.value;
  if (be === undefined || record.A === 0) return null;
  return be / record.A;
}

export function separationEnergy(index: NuclideIndex, Z: number, N: number, kind: SeparationKind): number | null {
  const { dZ, dN } = SEPARATION_SHIFTS[kind];
  const parent = bindingEnergyAt(index, Z, N);
  const residual = bindingEnergyAt(index, Z + dZ, N + dN);
  if (parent === null || residual === null) return null;
  return parent - residual;
}

export function qValue(index: NuclideIndex, Z: number, N: number, kind: QValueKind): number | null {
  const { dZ, dN } = Q_VALUE_DAUGHTERS[kind];
  const parent = bindingEnergyAt(index, Z, N);
  const daughter = bindingEnergyAt(index, Z + dZ, N + dN);
  if (parent === null || daughter === null) return null;
  switch (kind) {
    case 'alpha':
      return daughter + BE_HE4_MEV - parent;
    case 'betaMinus':
      return daughter - parent + NEUTRON_HYDROGEN_MASS_DIFF_MEV;
    case 'EC':
      return daughter - parent - NEUTRON_HYDROGEN_MASS_DIFF_MEV;
  }
}

/** E(4+)/E(2+); null when either is missing or E(2+) is not positive. */
export function ratioR42(record: NuclideRecord): number | null {
  const e2 = record.excitation.twoPlus?.value;
  const e4 = record.excitation.fourPlus?.value;
  if (e2 === undefined || e4 === undefined || e2 <= 0) return null;
  return e4 / e2;
}

export function isMagicNumber(n: number): boolean {
  return MAGIC_NUMBERS.some(m => m === n);
}

/** ["Z=20", "N=28"] style labels for closed shells. */
export function magicLabels(Z: number, N: number): string[] {
  const labels: string[] = [];
  if (isMagicNumber(Z)) labels.push(`Z=${Z}`);
  if (isMagicNumber(N)) labels.push(`N=${N}`);
  return labels;
}
