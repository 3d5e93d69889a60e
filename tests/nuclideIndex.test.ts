import { describe, expect, it } from 'vitest';
import { lowerBound, NuclideIndex, sliceRange } from '../src/data/nuclideIndex.js';
import { createRecord, measured } from '../src/data/record.js';

function rec(Z: number, N: number, be?: number) {
  return createRecord({ Z, N, source: 'test', bindingEnergy: be === undefined ? null : measured(be, 'MeV') });
}

describe('binary search helpers', () => {
  it('lowerBound finds the first element >= target', () => {
    expect(lowerBound([2, 4, 4, 8], 4)).toBe(1);
    expect(lowerBound([2, 4, 8], 5)).toBe(2);
    expect(lowerBound([2, 4, 8], 9)).toBe(3);
    expect(lowerBound([], 1)).toBe(0);
  });

  it('sliceRange is inclusive and empty when min > max', () => {
    expect(sliceRange([1, 3, 5, 7, 9], 3, 7)).toEqual([3, 5, 7]);
    expect(sliceRange([1, 3, 5, 7, 9], 4, 4)).toEqual([]);
    expect(sliceRange([1, 3, 5], 5, 1)).toEqual([]);
  });
});

describe('NuclideIndex', () => {
  const index = new NuclideIndex([
    rec(20, 22, 361.9),
    rec(20, 20, 342.0),
    rec(26, 30, 492.3),
    rec(20, 21, 350.4),
    rec(22, 20),
    rec(20, 20, 999),
  ]);

  it('looks up exact (Z, N)', () => {
    expect(index.get(26, 30)?.name).toBe('Fe-56');
    expect(index.has(26, 31)).toBe(false);
    expect(index.get(26, 31)).toBeUndefined();
  });

  it('keeps the first of duplicate (Z, N) entries and records the rest', () => {
    expect(index.size).toBe(5);
    expect(index.get(20, 20)?.bindingEnergy?.value).toBe(342.0);
    expect(index.duplicates).toEqual([{ Z: 20, N: 20, name: 'Ca-40' }]);
  });

  it('returns isotope chains in ascending N', () => {
    expect(index.isotopes(20).map(r => r.N)).toEqual([20, 21, 22]);
    expect(index.isotopes(20, 21, 30).map(r => r.N)).toEqual([21, 22]);
    expect(index.isotopes(99)).toEqual([]);
  });

  it('returns isotone chains in ascending Z', () => {
    expect(index.isotones(20).map(r => r.Z)).toEqual([20, 22]);
  });

  it('returns regions ordered by (Z, N)', () => {
    expect(index.region(20, 22, 20, 21).map(r => r.name)).toEqual(['Ca-40', 'Ca-41', 'Ti-42']);
  });

  it('lists proton and neutron numbers', () => {
    expect(index.protonNumbers()).toEqual([20, 22, 26]);
    expect(index.neutronNumbers()).toEqual([20, 21, 22, 30]);
  });

  it('iterates in (Z, N) order', () => {
    expect([...index].map(r => r.name)).toEqual(['Ca-40', 'Ca-41', 'Ca-42', 'Ti-42', 'Fe-56']);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(index)).toBe(true);
  });
});
