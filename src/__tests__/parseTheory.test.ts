import { describe, it, expect } from 'vitest';
import { parseTheoryLine, parseTheoryTable, parseTheoryValue, NO_DATA_TOKEN } from '../ingest/parseTheory.js';

const HEADER = 'Symbol   Z   N   A   BE   Sp   S2p   Sn   S2n   Qa';

describe('parseTheoryValue', () => {
  it('reads numbers and maps the no-data token to null', () => {
    expect(parseTheoryValue('-342.125')).toBe(-342.125);
    expect(parseTheoryValue(NO_DATA_TOKEN)).toBeNull();
    expect(parseTheoryValue('')).toBeNull();
    expect(parseTheoryValue('n/a')).toBeNull();
  });
});

describe('parseTheoryLine', () => {
  it('parses a row and keeps the binding-energy magnitude', () => {
    const row = parseTheoryLine('Ca  20  20  40  -342.000  8.300  14.700  15.600  28.900  -7.000');
    expect(row).toEqual({
      Z: 20,
      N: 20,
      A: 40,
      binding_energy_MeV: 342,
      Sp_MeV: 8.3,
      S2p_MeV: 14.7,
      Sn_MeV: 15.6,
      S2n_MeV: 28.9,
      Qa_MeV: -7,
    });
  });

  it('ignores trailing columns', () => {
    const row = parseTheoryLine('Ti 22 26 48 -418.5 11.3 20.0 11.7 22.1 -5.0 0.25 extra');
    expect(typeof row).toBe('object');
    if (typeof row === 'string') return;
    expect(row.Qa_MeV).toBe(-5);
  });

  it('maps No_Data cells to null, not zero', () => {
    const row = parseTheoryLine('Ca 20 31 51 No_Data No_Data No_Data No_Data No_Data No_Data');
    expect(typeof row).toBe('object');
    if (typeof row === 'string') return;
    expect(row.binding_energy_MeV).toBeNull();
    expect(row.Sn_MeV).toBeNull();
  });

  it('rejects short rows', () => {
    expect(parseTheoryLine('Fe 26 31')).toBe('expected 10 columns, found 3');
  });

  it('rejects an inconsistent mass number', () => {
    expect(parseTheoryLine('Ca 20 10 40 -342 8 14 15 28 -7')).toBe('A=40 does not equal Z+N=30');
  });

  it('rejects non-integer counts', () => {
    expect(parseTheoryLine('Ca 20.5 20 40 -342 8 14 15 28 -7')).toBe('non-integer or negative Z/N/A (20.5 20 40)');
  });
});

describe('parseTheoryTable', () => {
  const content = [
    HEADER,
    '# comment',
    'Ca  20  20  40  -342.000  8.300  14.700  15.600  28.900  -7.000',
    '',
    'Fe  26  31',
    'Fe  26  30  56  -490.700  10.300  18.500  11.000  20.300  -7.700',
  ].join('\n');

  it('skips the header, comments and blank lines, and counts bad rows', () => {
    const result = parseTheoryTable(content, 'SKMS');
    expect(result.records.map(r => r.name)).toEqual(['Ca-40', 'Fe-56']);
    expect(result.skipped).toBe(1);
    expect(result.warnings).toEqual(['SKMS line 5: expected 10 columns, found 3']);
  });

  it('skips a header that follows leading blank lines and comments', () => {
    const padded = ['', '# SkM*', HEADER, 'Ca  20  20  40  -342.000  8.300  14.700  15.600  28.900  -7.000'].join('\n');
    const result = parseTheoryTable(padded, 'SKMS');
    expect(result.records.map(r => r.name)).toEqual(['Ca-40']);
    expect(result.skipped).toBe(0);
    expect(result.warnings).toEqual([]);
  });

  it('builds records tagged with the source, without decay data', () => {
    const [ca40] = parseTheoryTable(content, 'SKMS').records;
    expect(ca40?.source).toBe('SKMS');
    expect(ca40?.A).toBe(40);
    expect(ca40?.symbol).toBe('Ca');
    expect(ca40?.bindingEnergy).toEqual({ value: 342, uncertainty: null, unit: 'MeV' });
    expect(ca40?.tabulated.Sn).toEqual({ value: 15.6, uncertainty: null, unit: 'MeV' });
    expect(ca40?.tabulated.QbetaMinus).toBeUndefined();
    expect(ca40?.decay).toBeNull();
    expect(ca40?.levels).toEqual([]);
    expect(ca40?.fissionYields).toBeNull();
  });

  it('produces frozen records', () => {
    const [ca40] = parseTheoryTable(content, 'SKMS').records;
    expect(Object.isFrozen(ca40)).toBe(true);
    expect(Object.isFrozen(ca40?.tabulated)).toBe(true);
  });
});
