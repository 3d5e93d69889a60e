import { nuclideKey, type NuclideRecord } from './record.js';

export interface Duplicate {
  Z: number;
  N: number;
  name: string;
}

/** First index in `sorted` whose value is >= `target`. */
export function lowerBound(sorted: readonly number[], target: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const v = sorted[mid];
    if (v !== undefined && v < target) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/** Values of `sorted` within [min, max], by binary search. */
export function sliceRange(sorted: readonly number[], min: number, max: number): number[] {
  if (min > max) return [];
  const start = lowerBound(sorted, min);
  const end = lowerBound(sorted, max + 1);
  return sorted.slice(start, end);
}

function freezeSorted(groups: Map<number, number[]>): Map<number, readonly number[]> {
  const out = new Map<number, readonly number[]>();
  for (const [key, values] of groups) {
    out.set(key, Object.freeze([...values].sort((a, b) => a - b)));
  }
  return out;
}

function pushGroup(groups: Map<number, number[]>, key: number, value: number): void {
  const group = groups.get(key);
  if (group) group.push(value);
  else groups.set(key, [value]);
}

/**
 * Immutable lookup structures over one source's records:
 * (Z, N) → record, plus sorted N per Z and sorted Z per N for chain queries.
 */
export class NuclideIndex {
  readonly duplicates: readonly Duplicate[];
  private readonly byKey: ReadonlyMap<string, NuclideRecord>;
  private readonly nByZ: ReadonlyMap<number, readonly number[]>;
  private readonly zByN: ReadonlyMap<number, readonly number[]>;

  constructor(records: Iterable<NuclideRecord>) {
    const byKey = new Map<string, NuclideRecord>();
    const nByZ = new Map<number, number[]>();
    const zByN = new Map<number, number[]>();
    const duplicates: Duplicate[] = [];

    for (const record of records) {
      const key = nuclideKey(record.Z, record.N);
      if (byKey.has(key)) {
        duplicates.push({ Z: record.Z, N: record.N, name: record.name });
        continue;
      }
      byKey.set(key, record);
      pushGroup(nByZ, record.Z, record.N);
      pushGroup(zByN, record.N, record.Z);
    }

    this.byKey = byKey;
    this.nByZ = freezeSorted(nByZ);
    this.zByN = freezeSorted(zByN);
    this.duplicates = Object.freeze(duplicates);
    Object.freeze(this);
  }

  get size(): number {
    return this.byKey.size;
  }

  get(Z: number, N: number): NuclideRecord | undefined {
    return this.byKey.get(nuclideKey(Z, N));
  }

  has(Z: number, N: number): boolean {
    return this.byKey.has(nuclideKey(Z, N));
  }

  /** Isotope chain: fixed Z, N in [nMin, nMax], ascending N. */
  isotopes(Z: number, nMin = 0, nMax = Number.MAX_SAFE_INTEGER): NuclideRecord[] {
    const ns = sliceRange(this.nByZ.get(Z) ?? [], nMin, nMax);
    return this.collect(ns.map(N => nuclideKey(Z, N)));
  }

  /** Isotone chain: fixed N, Z in [zMin, zMax], ascending Z. */
  isotones(N: number, zMin = 0, zMax = Number.MAX_SAFE_INTEGER): NuclideRecord[] {
    const zs = sliceRange(this.zByN.get(N) ?? [], zMin, zMax);
    return this.collect(zs.map(Z => nuclideKey(Z, N)));
  }

  /** Records inside the rectangle, ordered by (Z, N). */
  region(zMin: number, zMax: number, nMin: number, nMax: number): NuclideRecord[] {
    const out: NuclideRecord[] = [];
    for (const Z of sliceRange(this.protonNumbers(), zMin, zMax)) {
      out.push(...this.isotopes(Z, nMin, nMax));
    }
    return out;
  }

  protonNumbers(): number[] {
    return [...this.nByZ.keys()].sort((a, b) => a - b);
  }

  neutronNumbers(): number[] {
    return [...this.zByN.keys()].sort((a, b) => a - b);
  }

  /** All records ordered by (Z, N). */
  *[Symbol.iterator](): IterableIterator<NuclideRecord> {
    for (const Z of this.protonNumbers()) {
      yield* this.isotopes(Z);
    }
  }

  private collect(keys: string[]): NuclideRecord[] {
    const out: NuclideRecord[] = [];
    for (const key of keys) {
      const record = this.byKey.get(key);
      if (record) out.push(record);
    }
    return out;
  }
}
