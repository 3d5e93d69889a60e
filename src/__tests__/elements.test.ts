import { describe, it, expect } from 'vitest';
import { formatNuclideName, maxKnownZ, parseNuclideString, symbolForZ, zForSymbol } from '../shared/elements.js';
import { isNuclideQueryError } from '../shared/errors.js';

describe('periodic table', () => {
  it('maps Z to symbols and back', () => {
    expect(symbolForZ(0)).toBe('n');
    expect(symbolForZ(26)).toBe('Fe');
    expect(symbolForZ(118)).toBe('Og');
    expect(maxKnownZ()).toBe(118);
    expect(zForSymbol('fe')).toBe(26);
    expect(zForSymbol('OG')).toBe(118);
  });

  it('falls back to X<Z> beyond the table', () => {
    expect(symbolForZ(130)).toBe('X130');
  });

  it('resolves n to nitrogen, never the neutron row', () => {
    expect(zForSymbol('n')).toBe(7);
    expect(zForSymbol('N')).toBe(7);
  });

  it('formats names as symbol-A', () => {
    expect(formatNuclideName(26, 56)).toBe('Fe-56');
  });
});

describe('parseNuclideString', () => {
  it.each(['Fe56', 'fe-56', 'FE 56', '56Fe', '56-fe', ' Fe56 '])('parses %j', (input) => {
    expect(parseNuclideString(input)).toEqual({ Z: 26, N: 30, A: 56 });
  });

  it('reads n14 as nitrogen-14', () => {
    expect(parseNuclideString('n14')).toEqual({ Z: 7, N: 7, A: 14 });
  });

  it('rejects unparseable strings', () => {
    try {
      parseNuclideString('iron');
      expect.unreachable();
    } catch (err) {
      expect(isNuclideQueryError(err, 'MALFORMED_IDENTITY')).toBe(true);
    }
  });

  it('rejects unknown symbols', () => {
    expect(() => parseNuclideString('Xx12')).toThrow('Unknown element symbol: Xx');
  });

  it('rejects a mass number below Z', () => {
    expect(() => parseNuclideString('U20')).toThrow('Mass number 20 is smaller than Z=92 for U');
  });
});
