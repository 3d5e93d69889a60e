import { formatNuclideName, symbolForZ } from '../shared/elements.js';
import { notFound } from '../shared/errors.js';
import {
  bindingEnergyPerNucleon,
  magicLabels,
  qValue,
  ratioR42,
  separationEnergy,
  type QValueKind,
  type SeparationKind,
} from './derived.js';
import type {
  DecayMode,
  ExcitedStateKey,
  FissionYields,
  HalfLife,
  Level,
  Measured,
  NuclideRecord,
  TabulatedKey,
} from './record.js';
import type { LoadedSource } from './registry.js';

export type MeasuredKey = 'BE' | 'massExcess' | ExcitedStateKey;

export interface DecaySummary {
  half_life: HalfLife;
  half_life_seconds: number | null;
  spin_parity: string | null;
  is_stable: boolean;
  modes: readonly DecayMode[];
  predicted_modes: readonly DecayMode[];
}

export interface NuclideSummary {
  Z: number;
  N: number;
  A: number;
  symbol: string;
  name: string;
  source: string;
  binding_energy: Measured | null;
  binding_energy_per_nucleon: number | null;
  mass_excess: Measured | null;
  separation_energies: Record<SeparationKind, number | null>;
  q_values: Record<QValueKind, number | null>;
  excitation: Record<ExcitedStateKey, Measured | null>;
  R42: number | null;
  magic: string[];
  decay: DecaySummary | null;
  fission_yields: FissionYields | null;
  levels_count: number;
  tabulated: Partial<Record<TabulatedKey, Measured>>;
}

/**
 * A resolved (Z, N) in one source. `exists` may be false; every other
 * accessor then throws NOT_FOUND. Values are computed on each read.
 */
export class Nuclide {
  readonly Z: number;
  readonly N: number;
  readonly A: number;
  readonly symbol: string;
  readonly name: string;
  readonly source: string;
  readonly exists: boolean;
  private readonly loaded: LoadedSource;
  private readonly found: NuclideRecord | null;

  constructor(Z: number, N: number, loaded: LoadedSource) {
    this.Z = Z;
    this.N = N;
    this.A = Z + N;
    this.symbol = symbolForZ(Z);
    this.name = formatNuclideName(Z, this.A);
    this.source = loaded.descriptor.name;
    this.loaded = loaded;
    this.found = loaded.index.get(Z, N) ?? null;
    this.exists = this.found !== null;
  }

  get record(): NuclideRecord {
    return this.requireRecord();
  }

  private requireRecord(): NuclideRecord {
    if (!this.found) {
      throw notFound(`${this.name} (Z=${this.Z}, N=${this.N}) not found in source ${this.source}`, {
        Z: this.Z,
        N: this.N,
        source: this.source,
      });
    }
    return this.found;
  }

  get supportsDecay(): boolean {
    return this.loaded.descriptor.supportsDecay;
  }

  // ── Energetics ──

  get BE(): number | null {
    return this.record.bindingEnergy?.value ?? null;
  }

  get BE_A(): number | null {
    return bindingEnergyPerNucleon(this.record);
  }

  get massExcess(): number | null {
    return this.record.massExcess?.value ?? null;
  }

  get Sn(): number | null {
    return this.separation('Sn');
  }

  get Sp(): number | null {
    return this.separation('Sp');
  }

  get S2n(): number | null {
    return this.separation('S2n');
  }

  get S2p(): number | null {
    return this.separation('S2p');
  }

  get Q_alpha(): number | null {
    return this.q('alpha');
  }

  get Q_beta(): number | null {
    return this.q('betaMinus');
  }

  get Q_EC(): number | null {
    return this.q('EC');
  }

  // ── Excited states ──

  get E_first(): number | null {
    return this.record.excitation.first?.value ?? null;
  }

  get E_2plus(): number | null {
    return this.record.excitation.twoPlus?.value ?? null;
  }

  get E_4plus(): number | null {
    return this.record.excitation.fourPlus?.value ?? null;
  }

  get E_3minus(): number | null {
    return this.record.excitation.threeMinus?.value ?? null;
  }

  get R42(): number | null {
    return ratioR42(this.record);
  }

  get magic(): string[] {
    this.requireRecord();
    return magicLabels(this.Z, this.N);
  }

  // ── Decay; null where the source carries none ──

  get halfLife(): HalfLife | null {
    return this.decayRecord()?.halfLife ?? null;
  }

  get halfLifeSeconds(): number | null {
    const halfLife = this.halfLife;
    return halfLife?.kind === 'measured' ? halfLife.seconds : null;
  }

  get spinParity(): string | null {
    return this.decayRecord()?.spinParity ?? null;
  }

  get isStable(): boolean | null {
    const halfLife = this.halfLife;
    return halfLife === null ? null : halfLife.kind === 'stable';
  }

  get decayModes(): readonly DecayMode[] | null {
    return this.decayRecord()?.modes ?? null;
  }

  get predictedDecayModes(): readonly DecayMode[] | null {
    return this.decayRecord()?.predictedModes ?? null;
  }

  get fissionYields(): FissionYields | null {
    return this.record.fissionYields;
  }

  get levels(): readonly Level[] {
    return this.record.levels;
  }

  /** Value with uncertainty and unit. */
  measured(key: MeasuredKey): Measured | null {
    const record = this.record;
    if (key === 'BE') return record.bindingEnergy;
    if (key === 'massExcess') return record.massExcess;
    return record.excitation[key];
  }

  /** The value as the source file ships it, without recomputation. */
  tabulated(key: TabulatedKey): Measured | null {
    return this.record.tabulated[key] ?? null;
  }

  separationEnergies(): Record<SeparationKind, number | null> {
    return { Sn: this.Sn, Sp: this.Sp, S2n: this.S2n, S2p: this.S2p };
  }

  qValues(): Record<QValueKind, number | null> {
    return { alpha: this.Q_alpha, betaMinus: this.Q_beta, EC: this.Q_EC };
  }

  summary(): NuclideSummary {
    const record = this.record;
    const halfLife = this.halfLife;
    return {
      Z: this.Z,
      N: this.N,
      A: this.A,
      symbol: this.symbol,
      name: this.name,
      source: this.source,
      binding_energy: record.bindingEnergy,
      binding_energy_per_nucleon: this.BE_A,
      mass_excess: record.massExcess,
      separation_energies: this.separationEnergies(),
      q_values: this.qValues(),
      excitation: { ...record.excitation },
      R42: this.R42,
      magic: this.magic,
      decay: halfLife === null ? null : {
        half_life: halfLife,
        half_life_seconds: this.halfLifeSeconds,
        spin_parity: this.spinParity,
        is_stable: halfLife.kind === 'stable',
        modes: this.decayModes ?? [],
        predicted_modes: this.predictedDecayModes ?? [],
      },
      fission_yields: record.fissionYields,
      levels_count: record.levels.length,
      tabulated: { ...record.tabulated },
    };
  }

  private decayRecord(): NuclideRecord['decay'] {
    const record = this.record;
    return this.supportsDecay ? record.decay : null;
  }

  private separation(kind: SeparationKind): number | null {
    this.requireRecord();
    return separationEnergy(this.loaded.index, this.Z, this.N, kind);
  }

  private q(kind: QValueKind): number | null {
    this.requireRecord();
    return qValue(this.loaded.index, this.Z, this.N, kind);
  }
}
