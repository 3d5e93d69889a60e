import { parseNuclideString } from '../shared/elements.js';
import { isNuclideQueryError, malformedIdentity, notFound, type NuclideQueryError } from '../shared/errors.js';
import { decayModeShift } from './derived.js';
import { Nuclide } from './nuclide.js';
import type { DecayMode, NuclideRecord } from './record.js';
import { getDefaultRegistry, type LoadedSource, type SourceRegistry } from './registry.js';
import { DEFAULT_SOURCE, type SourceKind } from './sources.js';

export interface RangeSpec {
  fixed: 'Z' | 'N';
  value: number;
}

export interface RegionSpec {
  Zmin: number;
  Zmax: number;
  Nmin: number;
  Nmax: number;
}

/** (Z, N) or a symbol string such as "Fe56". */
export type NuclideIdentity = { Z: number; N: number } | string;

export interface SourceInfo {
  name: string;
  kind: SourceKind;
  supportsDecay: boolean;
  description: string;
}

export type SourceComparison =
  | { source: string; nuclide: Nuclide; error: null }
  | { source: string; nuclide: null; error: NuclideQueryError };

export interface DecayStep {
  nuclide: Nuclide;
  /** Mode followed to the next step; null on the last one. */
  mode: string | null;
  branching: number | null;
}

export type DecayChainEnd = 'stable' | 'no_decay_data' | 'left_source' | 'cycle' | 'max_steps';

export interface DecayChain {
  steps: DecayStep[];
  end: DecayChainEnd;
}

const DEFAULT_MAX_CHAIN_STEPS = 64;

function requireCount(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw malformedIdentity(`${label} must be a non-negative integer, got ${value}`, { [label]: value });
  }
}

/** Highest-branching observed mode that leads to another nuclide. */
function dominantMode(modes: readonly DecayMode[]): DecayMode | null {
  let best: DecayMode | null = null;
  for (const mode of modes) {
    if (decayModeShift(mode.mode) === null) continue;
    if (best === null || (mode.branching ?? -1) > (best.branching ?? -1)) best = mode;
  }
  return best;
}

/** Source-agnostic queries over one registry. */
export class NuclideQuery {
  constructor(
    readonly registry: SourceRegistry = getDefaultRegistry(),
    readonly defaultSource: string = DEFAULT_SOURCE,
  ) {}

  /** Handle for (Z, N); `exists` is false when the source has no such nuclide. */
  async resolve(Z: number, N: number, source: string = this.defaultSource): Promise<Nuclide> {
    requireCount(Z, 'Z');
    requireCount(N, 'N');
    const loaded = await this.registry.load(source);
    return new Nuclide(Z, N, loaded);
  }

  async resolveBySymbol(text: string, source: string = this.defaultSource): Promise<Nuclide> {
    const { Z, N } = parseNuclideString(text);
    return this.resolve(Z, N, source);
  }

  async find(Z: number, N: number, source: string = this.defaultSource): Promise<Nuclide | null> {
    const nuclide = await this.resolve(Z, N, source);
    return nuclide.exists ? nuclide : null;
  }

  /** Ascending in the ranging number; absent nuclides are omitted. */
  async queryRange(range: RangeSpec, min: number, max: number, source: string = this.defaultSource): Promise<Nuclide[]> {
    requireCount(range.value, range.fixed);
    const loaded = await this.registry.load(source);
    const records = range.fixed === 'Z'
      ? loaded.index.isotopes(range.value, min, max)
      : loaded.index.isotones(range.value, min, max);
    return this.handles(records, loaded);
  }

  async queryIsotopes(Z: number, source: string = this.defaultSource, Nmin = 0, Nmax = Number.MAX_SAFE_INTEGER): Promise<Nuclide[]> {
    return this.queryRange({ fixed: 'Z', value: Z }, Nmin, Nmax, source);
  }

  async queryIsotones(N: number, source: string = this.defaultSource, Zmin = 0, Zmax = Number.MAX_SAFE_INTEGER): Promise<Nuclide[]> {
    return this.queryRange({ fixed: 'N', value: N }, Zmin, Zmax, source);
  }

  /** Ordered by (Z, N). */
  async queryRegion(region: RegionSpec, source: string = this.defaultSource): Promise<Nuclide[]> {
    const loaded = await this.registry.load(source);
    const records = loaded.index.region(region.Zmin, region.Zmax, region.Nmin, region.Nmax);
    return this.handles(records, loaded);
  }

  /** Existing nuclides in input order; a malformed identity fails the whole call. */
  async queryList(identities: readonly NuclideIdentity[], source: string = this.defaultSource): Promise<Nuclide[]> {
    const loaded = await this.registry.load(source);
    const out: Nuclide[] = [];
    for (const identity of identities) {
      let Z: number;
      let N: number;
      if (typeof identity === 'string') {
        ({ Z, N } = parseNuclideString(identity));
      } else {
        requireCount(identity.Z, 'Z');
        requireCount(identity.N, 'N');
        ({ Z, N } = identity);
      }
      const nuclide = new Nuclide(Z, N, loaded);
      if (nuclide.exists) out.push(nuclide);
    }
    return out;
  }

  /**
   * One entry per source, in the order given (default: every source).
   * Unknown names fail up front; an unusable source yields its error.
   */
  async compareSources(Z: number, N: number, sources?: readonly string[]): Promise<SourceComparison[]> {
    requireCount(Z, 'Z');
    requireCount(N, 'N');
    const names = (sources ?? this.registry.listSources().map(d => d.name))
      .map(name => this.registry.resolve(name).name)
      .filter((name, i, all) => all.indexOf(name) === i);

    return Promise.all(names.map(async (source): Promise<SourceComparison> => {
      try {
        return { source, nuclide: await this.resolve(Z, N, source), error: null };
      } catch (err) {
        if (isNuclideQueryError(err)) return { source, nuclide: null, error: err };
        throw err;
      }
    }));
  }

  /**
   * Follows the dominant observed decay mode from (Z, N) until a stable or
   * undecided nuclide, a daughter missing from the source, or a repeat.
   */
  async decayChain(
    Z: number,
    N: number,
    source: string = this.defaultSource,
    maxSteps: number = DEFAULT_MAX_CHAIN_STEPS,
  ): Promise<DecayChain> {
    const start = await this.resolve(Z, N, source);
    if (!start.exists) {
      throw notFound(`${start.name} (Z=${Z}, N=${N}) not found in source ${start.source}`, { Z, N, source: start.source });
    }

    const loaded = await this.registry.load(source);
    const steps: DecayStep[] = [];
    const visited = new Set<string>();
    let current = start;

    while (steps.length < maxSteps) {
      visited.add(`${current.Z},${current.N}`);
      const modes = current.decayModes;
      if (current.isStable === true) {
        steps.push({ nuclide: current, mode: null, branching: null });
        return { steps, end: 'stable' };
      }
      const mode = modes === null ? null : dominantMode(modes);
      const shift = mode === null ? null : decayModeShift(mode.mode);
      if (mode === null || shift === null) {
        steps.push({ nuclide: current, mode: null, branching: null });
        return { steps, end: 'no_decay_data' };
      }

      steps.push({ nuclide: current, mode: mode.mode, branching: mode.branching });
      const next = new Nuclide(current.Z + shift.dZ, current.N + shift.dN, loaded);
      if (next.Z < 0 || next.N < 0 || !next.exists) return { steps, end: 'left_source' };
      if (visited.has(`${next.Z},${next.N}`)) return { steps, end: 'cycle' };
      current = next;
    }
    return { steps, end: 'max_steps' };
  }

  listSources(): SourceInfo[] {
    return this.registry.listSources().map(d => ({
      name: d.name,
      kind: d.kind,
      supportsDecay: d.supportsDecay,
      description: d.description,
    }));
  }

  private handles(records: readonly NuclideRecord[], loaded: LoadedSource): Nuclide[] {
    return records.map(r => new Nuclide(r.Z, r.N, loaded));
  }
}
