import { formatNuclideName, symbolForZ } from '../shared/elements.js';

// ── Values ──────────────────────────────────────────────────────────────────

/** A value with its unit; `uncertainty: null` means exact or unreported, not zero. */
export interface Measured {
  value: number;
  uncertainty: number | null;
  unit: string;
}

export function measured(value: number, unit: string, uncertainty: number | null = null): Measured {
  return { value, uncertainty, unit };
}

// ── Excited states and natively tabulated quantities ───────────────────────

export const EXCITED_STATE_KEYS = ['first', 'twoPlus', 'fourPlus', 'threeMinus'] as const;
export type ExcitedStateKey = typeof EXCITED_STATE_KEYS[number];

export const TABULATED_KEYS = [
  'Sn',
  'Sp',
  'S2n',
  'S2p',
  'Qalpha',
  'QbetaMinus',
  'QEC',
  'QpositronEmission',
  'QdeltaAlpha',
  'QbetaMinusN',
  'QbetaMinus2N',
  'QECp',
  'QdoubleBetaMinus',
  'QdoubleEC',
  'pairingGap',
  'quadrupoleDeformation',
  'thermalNeutronCapture',
] as const;
export type TabulatedKey = typeof TABULATED_KEYS[number];

// ── Decay ───────────────────────────────────────────────────────────────────

export type HalfLife =
  | { kind: 'stable' }
  | { kind: 'unknown' }
  | { kind: 'measured'; value: number; uncertainty: number | null; unit: string; seconds: number | null };

export interface DecayMode {
  mode: string;
  branching: number | null;
  uncertainty: number | null;
  unit: string;
}

export interface Level {
  energy: Measured | null;
  massExcess: Measured | null;
  spinParity: string | null;
  halfLife: HalfLife;
  modes: readonly DecayMode[];
  predictedModes: readonly DecayMode[];
}

export interface DecayInfo {
  halfLife: HalfLife;
  spinParity: string | null;
  modes: readonly DecayMode[];
  predictedModes: readonly DecayMode[];
}

// ── Fission yields ──────────────────────────────────────────────────────────

export const FISSION_PARENTS = ['U235', 'U238', 'Pu239', 'Cf252'] as const;
export type FissionParent = typeof FISSION_PARENTS[number];

export interface FissionYields {
  independent: Readonly<Partial<Record<FissionParent, Measured>>>;
  cumulative: Readonly<Partial<Record<FissionParent, Measured>>>;
}

// ── Record ──────────────────────────────────────────────────────────────────

/**
 * One nuclide from one source. Which fields carry data depends on the source:
 * theoretical tables have no decay, levels, excited states or fission yields.
 */
export interface NuclideRecord {
  readonly Z: number;
  readonly N: number;
  readonly A: number;
  readonly symbol: string;
  readonly name: string;
  readonly source: string;
  /** Total binding energy, MeV. */
  readonly bindingEnergy: Measured | null;
  /** Ground-state mass excess, MeV. */
  readonly massExcess: Measured | null;
  readonly excitation: Readonly<Record<ExcitedStateKey, Measured | null>>;
  readonly tabulated: Readonly<Partial<Record<TabulatedKey, Measured>>>;
  readonly decay: DecayInfo | null;
  readonly levels: readonly Level[];
  readonly fissionYields: FissionYields | null;
}

export interface RecordInit {
  Z: number;
  N: number;
  source: string;
  bindingEnergy?: Measured | null;
  massExcess?: Measured | null;
  excitation?: Partial<Record<ExcitedStateKey, Measured | null>>;
  tabulated?: Partial<Record<TabulatedKey, Measured>>;
  decay?: DecayInfo | null;
  levels?: Level[];
  fissionYields?: FissionYields | null;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

function presentTabulated(
  values: Partial<Record<TabulatedKey, Measured>> | undefined,
): Partial<Record<TabulatedKey, Measured>> {
  const out: Partial<Record<TabulatedKey, Measured>> = {};
  for (const key of TABULATED_KEYS) {
    const value = values?.[key];
    if (value !== undefined) out[key] = value;
  }
  return out;
}

export function createRecord(init: RecordInit): NuclideRecord {
  const A = init.Z + init.N;
  return deepFreeze({
    Z: init.Z,
    N: init.N,
    A,
    symbol: symbolForZ(init.Z),
    name: formatNuclideName(init.Z, A),
    source: init.source,
    bindingEnergy: init.bindingEnergy ?? null,
    massExcess: init.massExcess ?? null,
    excitation: {
      first: init.excitation?.first ?? null,
      twoPlus: init.excitation?.twoPlus ?? null,
      fourPlus: init.excitation?.fourPlus ?? null,
      threeMinus: init.excitation?.threeMinus ?? null,
    },
    tabulated: presentTabulated(init.tabulated),
    decay: init.decay ?? null,
    levels: init.levels ?? [],
    fissionYields: init.fissionYields ?? null,
  });
}

export function nuclideKey(Z: number, N: number): string {
  return `${Z},${N}`;
}

/** What a parser hands back: the records plus how many rows it had to drop. */
export interface ParseResult {
  records: NuclideRecord[];
  skipped: number;
  warnings: string[];
}
