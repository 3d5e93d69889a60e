import { describe, expect, it } from 'vitest';
import { SourceRegistry } from '../src/data/registry.js';
import { theoryTableLoader, type SourceLoader } from '../src/data/loaders.js';
import { isNuclideQueryError } from '../src/shared/errors.js';
import { BROKEN_DATA_DIR, FIXTURE_DATA_DIR, fixtureRegistry } from './helpers.js';

async function loadError(registry: SourceRegistry, name: string): Promise<unknown> {
  try {
    await registry.load(name);
  } catch (err) {
    return err;
  }
  throw new Error(`expected ${name} to fail`);
}

describe('SourceRegistry', () => {
  it('resolves names and aliases case-insensitively', () => {
    const { registry } = fixtureRegistry();
    expect(registry.resolve('EXP').name).toBe('experiment');
    expect(registry.resolve('nndc').name).toBe('experiment');
    expect(registry.resolve('sv-min').name).toBe('SV-MIN');
  });

  it('rejects unknown sources with the valid names', async () => {
    const { registry } = fixtureRegistry();
    const err = await loadError(registry, 'NOPE');
    expect(isNuclideQueryError(err, 'UNKNOWN_SOURCE')).toBe(true);
    if (!isNuclideQueryError(err)) return;
    expect(err.data?.valid).toEqual(['experiment', 'SKMS', 'UNEDF0', 'UNEDF1', 'SLY4', 'SKP', 'SV-MIN']);
  });

  it('lists sources in fixed order with decay support only for experiment', () => {
    const { registry } = fixtureRegistry();
    const sources = registry.listSources();
    expect(sources.map(s => s.name)).toEqual(['experiment', 'SKMS', 'UNEDF0', 'UNEDF1', 'SLY4', 'SKP', 'SV-MIN']);
    expect(sources.filter(s => s.supportsDecay).map(s => s.name)).toEqual(['experiment']);
  });

  it('reports which source files are present', () => {
    const { registry } = fixtureRegistry();
    expect(registry.availableSources().map(s => s.name)).toEqual(['experiment', 'SKMS', 'UNEDF0', 'UNEDF1']);
  });

  it('loads the experimental export, counting skipped entries and duplicates', async () => {
    const { registry, logs } = fixtureRegistry();
    const loaded = await registry.load('experiment');
    expect(loaded.report.records).toBe(8);
    expect(loaded.report.skipped).toBe(3);
    expect(loaded.report.duplicates).toBe(1);
    expect(loaded.index.get(26, 30)?.bindingEnergy?.value).toBeCloseTo(492.259936, 6);
    expect(logs).toContain('duplicate Fe-56 (Z=26, N=30) in experiment; keeping the first entry');
    expect(logs.some(line => line.startsWith('loaded experiment: 8 records, 3 skipped, 1 duplicates'))).toBe(true);
  });

  it('logs a warning for each skipped entry', async () => {
    const { registry, logs } = fixtureRegistry();
    await registry.load('experiment');
    expect(logs.filter(line => line.startsWith('skipped: '))).toEqual([
      'skipped: experiment: entry bad_missing_z has a missing or invalid z/n',
      'skipped: experiment: entry bad_mass_number: a=50 does not equal z+n=46',
      'skipped: experiment: entry bad_not_object is not an object',
    ]);
  });

  it('logs the first five skip warnings and counts the rest', async () => {
    const noisyLoader: SourceLoader = {
      async load(descriptor, filePath) {
        const result = await theoryTableLoader.load(descriptor, filePath);
        const extra = ['a', 'b', 'c', 'd', 'e'].map(tag => `SKMS row ${tag}: unusable`);
        return { ...result, warnings: [...result.warnings, ...extra] };
      },
    };
    const { registry, logs } = fixtureRegistry({ loaders: { 'theory-table': noisyLoader } });
    await registry.load('SKMS');
    expect(logs.filter(line => line.startsWith('skipped: '))).toEqual([
      'skipped: SKMS line 19: expected 10 columns, found 3',
      'skipped: SKMS line 20: A=40 does not equal Z+N=30',
      'skipped: SKMS row a: unusable',
      'skipped: SKMS row b: unusable',
      'skipped: SKMS row c: unusable',
      'skipped: ... 2 more in SKMS',
    ]);
  });

  it('loads a theoretical table', async () => {
    const { registry } = fixtureRegistry();
    const loaded = await registry.load('skms');
    expect(loaded.descriptor.name).toBe('SKMS');
    expect(loaded.report.records).toBe(16);
    expect(loaded.report.skipped).toBe(2);
    expect(loaded.report.duplicates).toBe(0);
  });

  it('keeps A = Z + N with non-negative counts for every loaded record', async () => {
    const { registry } = fixtureRegistry();
    for (const name of ['experiment', 'SKMS', 'UNEDF1']) {
      const { index } = await registry.load(name);
      for (const record of index) {
        expect(record.A).toBe(record.Z + record.N);
        expect(record.Z).toBeGreaterThanOrEqual(0);
        expect(record.N).toBeGreaterThanOrEqual(0);
      }
    }
  });

  it('loads each source at most once under concurrent first access', async () => {
    let calls = 0;
    const countingLoader: SourceLoader = {
      async load(descriptor, filePath) {
        calls += 1;
        return theoryTableLoader.load(descriptor, filePath);
      },
    };
    const { registry } = fixtureRegistry({ loaders: { 'theory-table': countingLoader } });

    const [a, b, c] = await Promise.all([registry.load('SKMS'), registry.load('skms'), registry.load('SKMS')]);
    expect(calls).toBe(1);
    expect(b).toBe(a);
    expect(c).toBe(a);
    expect(await registry.load('SKMS')).toBe(a);
    expect(calls).toBe(1);
  });

  it('gives identical index contents to separate registries', async () => {
    const first = await fixtureRegistry().registry.load('experiment');
    const second = await fixtureRegistry().registry.load('experiment');
    expect([...second.index]).toEqual([...first.index]);
  });

  it('reports a missing file as SOURCE_UNAVAILABLE', async () => {
    const { registry } = fixtureRegistry();
    const err = await loadError(registry, 'SLY4');
    expect(isNuclideQueryError(err, 'SOURCE_UNAVAILABLE')).toBe(true);
  });

  it('treats a source with zero records as unavailable', async () => {
    const { registry } = fixtureRegistry();
    const err = await loadError(registry, 'UNEDF0');
    expect(isNuclideQueryError(err, 'SOURCE_UNAVAILABLE')).toBe(true);
    if (!isNuclideQueryError(err)) return;
    expect(err.data?.skipped).toBe(0);
  });

  it('treats unparseable JSON as unavailable', async () => {
    const registry = new SourceRegistry({ dataDir: BROKEN_DATA_DIR, log: () => {} });
    const err = await loadError(registry, 'experiment');
    expect(isNuclideQueryError(err, 'SOURCE_UNAVAILABLE')).toBe(true);
  });

  it('caches a failed load without retrying', async () => {
    let calls = 0;
    const failingLoader: SourceLoader = {
      async load() {
        calls += 1;
        throw new Error('disk on fire');
      },
    };
    const { registry, logs } = fixtureRegistry({ loaders: { 'theory-table': failingLoader } });

    const first = await loadError(registry, 'SKMS');
    const second = await loadError(registry, 'SKMS');
    expect(calls).toBe(1);
    expect(second).toBe(first);
    expect(isNuclideQueryError(first, 'SOURCE_UNAVAILABLE')).toBe(true);
    expect(logs).toEqual(['failed to load SKMS: Source SKMS is unavailable: disk on fire']);
  });

  it('leaves other sources usable after one fails', async () => {
    const { registry } = fixtureRegistry();
    await loadError(registry, 'SLY4');
    const loaded = await registry.load('UNEDF1');
    expect(loaded.report.records).toBe(3);
  });

  it('reports per-source status', async () => {
    const { registry } = fixtureRegistry();
    await registry.load('SKMS');
    await loadError(registry, 'UNEDF0');
    const status = registry.status();
    expect(status.find(s => s.name === 'SKMS')).toEqual({
      name: 'SKMS',
      kind: 'theoretical',
      file: 'SKMS_all_nuclei-new.dat',
      available: true,
      state: 'loaded',
      records: 16,
      skipped: 2,
      duplicates: 0,
    });
    expect(status.find(s => s.name === 'UNEDF0')?.state).toBe('failed');
    expect(status.find(s => s.name === 'SLY4')).toEqual({
      name: 'SLY4',
      kind: 'theoretical',
      file: 'SLY4_all_nuclei.dat',
      available: false,
      state: 'not_loaded',
    });
  });

  it('uses the fixture directory', () => {
    expect(fixtureRegistry().registry.dataDir).toBe(FIXTURE_DATA_DIR);
  });
});
