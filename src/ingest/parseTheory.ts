/**
 * Theoretical mass-table parser (one file per energy density functional:
 * SkM*, UNEDF0, UNEDF1, SLy4, SkP, SV-min).
 *
 * Whitespace-delimited, one header line, then one row per nuclide:
 *   col 1: element symbol
 *   col 2: Z
 *   col 3: N
 *   col 4: A
 *   col 5: binding energy (MeV, tabulated negative)
 *   col 6: S(p)
 *   col 7: S(2p)
 *   col 8: S(n)
 *   col 9: S(2n)
 *   col 10: Q(α)
 * Further columns are ignored.
 *
 * No_Data in a cell → not computed (NULL).
 */

import { createRecord, measured, type Measured, type NuclideRecord, type ParseResult } from '../data/record.js';

export const NO_DATA_TOKEN = 'No_Data';
export const THEORY_MIN_COLUMNS = 10;

export interface TheoryRow {
  Z: number;
  N: number;
  A: number;
  binding_energy_MeV: number | null;
  Sp_MeV: number | null;
  S2p_MeV: number | null;
  Sn_MeV: number | null;
  S2n_MeV: number | null;
  Qa_MeV: number | null;
}

export function parseTheoryValue(raw: string): number | null {
  const s = raw.trim();
  if (s === '' || s === NO_DATA_TOKEN) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

function parseCount(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const n = Number(raw);
  return Number.isInteger(n) && n >= 0 ? n : null;
}

/** Parse one data line; returns a reason string when the row is unusable. */
export function parseTheoryLine(line: string): TheoryRow | string {
  const parts = line.trim().split(/\s+/);
  if (parts.length < THEORY_MIN_COLUMNS) {
    return `expected ${THEORY_MIN_COLUMNS} columns, found ${parts.length}`;
  }

  const [, zText, nText, aText, beText, spText, s2pText, snText, s2nText, qaText] = parts;
  const Z = parseCount(zText);
  const N = parseCount(nText);
  const A = parseCount(aText);
  if (Z === null || N === null || A === null) {
    return `non-integer or negative Z/N/A (${zText} ${nText} ${aText})`;
  }
  if (A !== Z + N) {
    return `A=${A} does not equal Z+N=${Z + N}`;
  }

  const be = parseTheoryValue(beText ?? '');
  return {
    Z,
    N,
    A,
    binding_energy_MeV: be === null ? null : Math.abs(be),
    Sp_MeV: parseTheoryValue(spText ?? ''),
    S2p_MeV: parseTheoryValue(s2pText ?? ''),
    Sn_MeV: parseTheoryValue(snText ?? ''),
    S2n_MeV: parseTheoryValue(s2nText ?? ''),
    Qa_MeV: parseTheoryValue(qaText ?? ''),
  };
}

function mev(value: number | null): Measured | undefined {
  return value === null ? undefined : measured(value, 'MeV');
}

export function theoryRowToRecord(row: TheoryRow, source: string): NuclideRecord {
  return createRecord({
    Z: row.Z,
    N: row.N,
    source,
    bindingEnergy: row.binding_energy_MeV === null ? null : measured(row.binding_energy_MeV, 'MeV'),
    tabulated: {
      Sp: mev(row.Sp_MeV),
      S2p: mev(row.S2p_MeV),
      Sn: mev(row.Sn_MeV),
      S2n: mev(row.S2n_MeV),
      Qalpha: mev(row.Qa_MeV),
    },
  });
}

export function parseTheoryTable(content: string, source: string): ParseResult {
  const lines = content.split('\n');
  const records: NuclideRecord[] = [];
  const warnings: string[] = [];
  let skipped = 0;
  let seenContent = false;

  lines.forEach((line, i) => {
    if (line.trim().length === 0 || line.trimStart().startsWith('#')) return;

    const first = !seenContent;
    seenContent = true;
    const parsed = parseTheoryLine(line);
    if (typeof parsed === 'string') {
      // Column header
      if (first) return;
      skipped += 1;
      warnings.push(`${source} line ${i + 1}: ${parsed}`);
      return;
    }
    records.push(theoryRowToRecord(parsed, source));
  });

  return { records, skipped, warnings };
}
