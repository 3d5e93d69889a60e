import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { malformedIdentity } from './errors.js';

const ElementTableSchema = z.object({
  symbols: z.array(z.string().min(1)).min(2),
});

let symbolsCache: readonly string[] | null = null;
let zBySymbolCache: ReadonlyMap<string, number> | null = null;

function readElementTable(): readonly string[] {
  if (symbolsCache) return symbolsCache;
  const tablePath = fileURLToPath(new URL('../../resources/elements.json', import.meta.url));
  const parsed = ElementTableSchema.parse(JSON.parse(fs.readFileSync(tablePath, 'utf-8')));
  symbolsCache = Object.freeze(parsed.symbols);
  return symbolsCache;
}

function zBySymbol(): ReadonlyMap<string, number> {
  if (zBySymbolCache) return zBySymbolCache;
  const map = new Map<string, number>();
  // Z = 0 ('n') is left out so that "n14" reads as nitrogen-14
  readElementTable().forEach((symbol, Z) => {
    if (Z > 0) map.set(symbol.toLowerCase(), Z);
  });
  zBySymbolCache = map;
  return zBySymbolCache;
}

export function maxKnownZ(): number {
  return readElementTable().length - 1;
}

/** Element symbol for Z; `X<Z>` beyond the table. */
export function symbolForZ(Z: number): string {
  return readElementTable()[Z] ?? `X${Z}`;
}

/** Case-insensitive symbol lookup ("fe", "FE", "Fe" all give 26). */
export function zForSymbol(symbol: string): number | undefined {
  return zBySymbol().get(symbol.trim().toLowerCase());
}

export function formatNuclideName(Z: number, A: number): string {
  return `${symbolForZ(Z)}-${A}`;
}

export interface ParsedIdentity {
  Z: number;
  N: number;
  A: number;
}

const SYMBOL_FIRST = /^([A-Za-z]{1,3})\s*-?\s*(\d+)$/;
const MASS_FIRST = /^(\d+)\s*-?\s*([A-Za-z]{1,3})$/;

/**
 * Parse "Fe56", "fe-56", "FE 56" or "56Fe" into (Z, N).
 * Throws MALFORMED_IDENTITY for an unknown symbol or a mass number below Z.
 */
export function parseNuclideString(input: string): ParsedIdentity {
  const s = input.trim();
  const symbolFirst = SYMBOL_FIRST.exec(s);
  const massFirst = symbolFirst ? null : MASS_FIRST.exec(s);

  let symbol: string | undefined;
  let massText: string | undefined;
  if (symbolFirst) {
    symbol = symbolFirst[1];
    massText = symbolFirst[2];
  } else if (massFirst) {
    massText = massFirst[1];
    symbol = massFirst[2];
  }

  if (symbol === undefined || massText === undefined) {
    throw malformedIdentity(`Cannot parse nuclide: ${JSON.stringify(input)}`, {
      input,
      expected: 'element symbol and mass number, e.g. Fe56, fe-56 or 56Fe',
    });
  }

  const Z = zForSymbol(symbol);
  if (Z === undefined) {
    throw malformedIdentity(`Unknown element symbol: ${symbol}`, { input, symbol });
  }

  const A = parseInt(massText, 10);
  const N = A - Z;
  if (N < 0) {
    throw malformedIdentity(`Mass number ${A} is smaller than Z=${Z} for ${symbol}`, { input, Z, A });
  }

  return { Z, N, A };
}
