/**
 * NuDat-style experimental export parser.
 *
 * One JSON object keyed by nuclide name ("56Fe"), each entry carrying
 *   z, n, a                      identity
 *   bindingEnergy                per nucleon, keV
 *   neutronSeparationEnergy ...  keV, { value, uncertainty, unit }
 *   alpha, betaMinus, ...        decay Q-values, keV
 *   firstTwoPlusEnergy ...       excited states, keV
 *   FY235U ... cFY252Cf          independent / cumulative fission yields
 *   thermalNeutronCapture        { crossSection, uncertainty }, barn
 *   levels[]                     energy, massExcess, spinParity, halflife, decay modes
 *
 * Energies are converted to MeV; bindingEnergy becomes the total (× A).
 */

import { z } from 'zod';
import {
  createRecord,
  measured,
  FISSION_PARENTS,
  type DecayInfo,
  type DecayMode,
  type ExcitedStateKey,
  type FissionParent,
  type FissionYields,
  type HalfLife,
  type Level,
  type Measured,
  type NuclideRecord,
  type ParseResult,
  type TabulatedKey,
} from '../data/record.js';

const KEV_TO_MEV = 1e-3;

export const HALF_LIFE_UNIT_TO_SECONDS: Record<string, number> = {
  'ys': 1e-24,
  'zs': 1e-21,
  'as': 1e-18,
  'fs': 1e-15,
  'ps': 1e-12,
  'ns': 1e-9,
  'us': 1e-6,
  'µs': 1e-6,
  'μs': 1e-6,
  'ms': 1e-3,
  's':  1,
  'm':  60,
  'h':  3600,
  'd':  86400,
  'y':  365.25 * 86400,
  'ky': 365.25 * 86400 * 1e3,
  'My': 365.25 * 86400 * 1e6,
  'Gy': 365.25 * 86400 * 1e9,
  'Ty': 365.25 * 86400 * 1e12,
  'Py': 365.25 * 86400 * 1e15,
  'Ey': 365.25 * 86400 * 1e18,
  'Zy': 365.25 * 86400 * 1e21,
  'Yy': 365.25 * 86400 * 1e24,
};

const TABULATED_FIELDS: ReadonlyArray<{ key: TabulatedKey; field: string; scale: number; unit: string }> = [
  { key: 'Sn', field: 'neutronSeparationEnergy', scale: KEV_TO_MEV, unit: 'MeV' },
  { key: 'Sp', field: 'protonSeparationEnergy', scale: KEV_TO_MEV, unit: 'MeV' },
  { key: 'S2n', field: 'twoNeutronSeparationEnergy', scale: KEV_TO_MEV, unit: 'MeV' },
  { key: 'S2p', field: 'twoProtonSeparationEnergy', scale: KEV_TO_MEV, unit: 'MeV' },
  { key: 'Qalpha', field: 'alpha', scale: KEV_TO_MEV, unit: 'MeV' },
  { key: 'QbetaMinus', field: 'betaMinus', scale: KEV_TO_MEV, unit: 'MeV' },
  { key: 'QEC', field: 'electronCapture', scale: KEV_TO_MEV, unit: 'MeV' },
  { key: 'QpositronEmission', field: 'positronEmission', scale: KEV_TO_MEV, unit: 'MeV' },
  { key: 'QdeltaAlpha', field: 'deltaAlpha', scale: KEV_TO_MEV, unit: 'MeV' },
  { key: 'QbetaMinusN', field: 'betaMinusOneNeutronEmission', scale: KEV_TO_MEV, unit: 'MeV' },
  { key: 'QbetaMinus2N', field: 'betaMinusTwoNeutronEmission', scale: KEV_TO_MEV, unit: 'MeV' },
  { key: 'QECp', field: 'electronCaptureOneProtonEmission', scale: KEV_TO_MEV, unit: 'MeV' },
  { key: 'QdoubleBetaMinus', field: 'doubleBetaMinus', scale: KEV_TO_MEV, unit: 'MeV' },
  { key: 'QdoubleEC', field: 'doubleElectronCapture', scale: KEV_TO_MEV, unit: 'MeV' },
  { key: 'pairingGap', field: 'pairingGap', scale: KEV_TO_MEV, unit: 'MeV' },
  { key: 'quadrupoleDeformation', field: 'quadrupoleDeformation', scale: 1, unit: '' },
];

const EXCITED_STATE_FIELDS: Record<ExcitedStateKey, string> = {
  first: 'firstExcitedStateEnergy',
  twoPlus: 'firstTwoPlusEnergy',
  fourPlus: 'firstFourPlusEnergy',
  threeMinus: 'firstThreeMinusEnergy',
};

const FISSION_YIELD_FIELDS: Record<FissionParent, { independent: string; cumulative: string }> = {
  U235: { independent: 'FY235U', cumulative: 'cFY235U' },
  U238: { independent: 'FY238U', cumulative: 'cFY238U' },
  Pu239: { independent: 'FY239Pu', cumulative: 'cFY239Pu' },
  Cf252: { independent: 'FY252Cf', cumulative: 'cFY252Cf' },
};

// ── Schemas ─────────────────────────────────────────────────────────────────

const ExportSchema = z.record(z.string(), z.unknown());
const EntrySchema = z.record(z.string(), z.unknown());

const IdentitySchema = z.object({
  z: z.number().int().min(0),
  n: z.number().int().min(0),
  a: z.number().int().optional(),
});

const ValueSchema = z.object({
  value: z.union([z.number(), z.string()]).nullish(),
  uncertainty: z.union([z.number(), z.string()]).nullish(),
  unit: z.string().nullish(),
});

const CrossSectionSchema = z.object({
  crossSection: z.number(),
  uncertainty: z.number().nullish(),
});

const DecayModeSchema = z.object({
  mode: z.string().min(1),
  value: z.number().nullish(),
  uncertainty: z.number().nullish(),
  unit: z.string().nullish(),
});

const LevelSchema = z.object({
  energy: z.unknown().optional(),
  massExcess: z.unknown().optional(),
  spinParity: z.string().nullish(),
  halflife: z.unknown().optional(),
  decayModes: z.object({
    observed: z.array(z.unknown()).nullish(),
    predicted: z.array(z.unknown()).nullish(),
  }).nullish(),
  decayModesObserved: z.array(z.unknown()).nullish(),
  decayModesPredicted: z.array(z.unknown()).nullish(),
});

// ── Field helpers ───────────────────────────────────────────────────────────

function finiteNumber(raw: unknown): number | null {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
  if (typeof raw === 'string' && raw.trim() !== '') {
    const n = Number(raw.trim());
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/** `{ value, uncertainty, unit }` or a bare number → Measured; anything else → null. */
export function parseMeasured(raw: unknown, scale: number, unit?: string): Measured | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? measured(raw * scale, unit ?? '') : null;
  }
  const parsed = ValueSchema.safeParse(raw);
  if (!parsed.success) return null;
  const value = finiteNumber(parsed.data.value);
  if (value === null) return null;
  const unc = finiteNumber(parsed.data.uncertainty);
  return measured(value * scale, unit ?? parsed.data.unit ?? '', unc === null ? null : unc * scale);
}

export function parseHalfLife(raw: unknown): HalfLife {
  const parsed = ValueSchema.safeParse(raw);
  if (!parsed.success) return { kind: 'unknown' };
  const { value: rawValue, uncertainty: rawUnc, unit: rawUnit } = parsed.data;

  if (typeof rawValue === 'string' && rawValue.trim().toUpperCase() === 'STABLE') {
    return { kind: 'stable' };
  }

  const value = finiteNumber(rawValue);
  if (value === null) return { kind: 'unknown' };

  const unit = (rawUnit ?? '').trim();
  const factor = HALF_LIFE_UNIT_TO_SECONDS[unit];
  return {
    kind: 'measured',
    value,
    uncertainty: finiteNumber(rawUnc),
    unit,
    seconds: factor === undefined ? null : value * factor,
  };
}

function parseDecayModes(raw: readonly unknown[] | null | undefined): DecayMode[] {
  const modes: DecayMode[] = [];
  for (const item of raw ?? []) {
    const parsed = DecayModeSchema.safeParse(item);
    if (!parsed.success) continue;
    modes.push({
      mode: parsed.data.mode,
      branching: parsed.data.value ?? null,
      uncertainty: parsed.data.uncertainty ?? null,
      unit: parsed.data.unit ?? '%',
    });
  }
  return modes;
}

export function parseLevel(raw: unknown): Level | null {
  const parsed = LevelSchema.safeParse(raw);
  if (!parsed.success) return null;
  const level = parsed.data;
  return {
    energy: parseMeasured(level.energy, KEV_TO_MEV, 'MeV'),
    massExcess: parseMeasured(level.massExcess, KEV_TO_MEV, 'MeV'),
    spinParity: level.spinParity && level.spinParity.trim() !== '' ? level.spinParity.trim() : null,
    halfLife: parseHalfLife(level.halflife),
    modes: parseDecayModes(level.decayModes?.observed ?? level.decayModesObserved),
    predictedModes: parseDecayModes(level.decayModes?.predicted ?? level.decayModesPredicted),
  };
}

function parseFissionYields(entry: Record<string, unknown>): FissionYields | null {
  const independent: Partial<Record<FissionParent, Measured>> = {};
  const cumulative: Partial<Record<FissionParent, Measured>> = {};
  let found = false;
  for (const parent of FISSION_PARENTS) {
    const fields = FISSION_YIELD_FIELDS[parent];
    const fy = parseMeasured(entry[fields.independent], 1);
    const cfy = parseMeasured(entry[fields.cumulative], 1);
    if (fy) { independent[parent] = fy; found = true; }
    if (cfy) { cumulative[parent] = cfy; found = true; }
  }
  return found ? { independent, cumulative } : null;
}

function parseThermalCapture(raw: unknown): Measured | undefined {
  const parsed = CrossSectionSchema.safeParse(raw);
  if (!parsed.success || !Number.isFinite(parsed.data.crossSection)) return undefined;
  return measured(parsed.data.crossSection, 'b', parsed.data.uncertainty ?? null);
}

// ── Entry → record ──────────────────────────────────────────────────────────

export function experimentalEntryToRecord(
  key: string,
  raw: unknown,
  source: string,
): NuclideRecord | string {
  const entryResult = EntrySchema.safeParse(raw);
  if (!entryResult.success) return `entry ${key} is not an object`;
  const entry = entryResult.data;

  const identity = IdentitySchema.safeParse(entry);
  if (!identity.success) return `entry ${key} has a missing or invalid z/n`;
  const { z: Z, n: N, a: A } = identity.data;
  if (A !== undefined && A !== Z + N) {
    return `entry ${key}: a=${A} does not equal z+n=${Z + N}`;
  }

  const levels: Level[] = [];
  const rawLevels = Array.isArray(entry.levels) ? entry.levels : [];
  for (const rawLevel of rawLevels) {
    const level = parseLevel(rawLevel);
    if (level) levels.push(level);
  }
  // A level without an energy is the ground state
  const ground = levels.find(l => l.energy === null || l.energy.value === 0) ?? null;

  const decay: DecayInfo = {
    halfLife: ground?.halfLife ?? { kind: 'unknown' },
    spinParity: ground?.spinParity ?? null,
    modes: ground?.modes ?? [],
    predictedModes: ground?.predictedModes ?? [],
  };

  const bePerNucleon = parseMeasured(entry.bindingEnergy, KEV_TO_MEV, 'MeV');
  const bindingEnergy = bePerNucleon
    ? measured(
      bePerNucleon.value * (Z + N),
      'MeV',
      bePerNucleon.uncertainty === null ? null : bePerNucleon.uncertainty * (Z + N),
    )
    : null;

  const tabulated: Partial<Record<TabulatedKey, Measured>> = {};
  for (const { key: tabKey, field, scale, unit } of TABULATED_FIELDS) {
    const value = parseMeasured(entry[field], scale, unit);
    if (value) tabulated[tabKey] = value;
  }
  tabulated.thermalNeutronCapture = parseThermalCapture(entry.thermalNeutronCapture);

  return createRecord({
    Z,
    N,
    source,
    bindingEnergy,
    massExcess: ground?.massExcess ?? null,
    excitation: {
      first: parseMeasured(entry[EXCITED_STATE_FIELDS.first], KEV_TO_MEV, 'MeV'),
      twoPlus: parseMeasured(entry[EXCITED_STATE_FIELDS.twoPlus], KEV_TO_MEV, 'MeV'),
      fourPlus: parseMeasured(entry[EXCITED_STATE_FIELDS.fourPlus], KEV_TO_MEV, 'MeV'),
      threeMinus: parseMeasured(entry[EXCITED_STATE_FIELDS.threeMinus], KEV_TO_MEV, 'MeV'),
    },
    tabulated,
    decay,
    levels,
    fissionYields: parseFissionYields(entry),
  });
}

/** Throws on invalid JSON or a non-object root; bad entries are skipped and counted. */
export function parseExperimentalExport(content: string, source: string): ParseResult {
  const root = ExportSchema.parse(JSON.parse(content));
  const records: NuclideRecord[] = [];
  const warnings: string[] = [];
  let skipped = 0;

  for (const [key, raw] of Object.entries(root)) {
    const result = experimentalEntryToRecord(key, raw, source);
    if (typeof result === 'string') {
      skipped += 1;
      warnings.push(`${source}: ${result}`);
      continue;
    }
    records.push(result);
  }

  return { records, skipped, warnings };
}
