export type SourceKind = 'experimental' | 'theoretical';
export type LoaderKey = 'experimental-json' | 'theory-table';

export interface SourceDescriptor {
  readonly name: string;
  readonly kind: SourceKind;
  readonly loader: LoaderKey;
  /** File name inside the data directory. */
  readonly file: string;
  readonly description: string;
  readonly supportsDecay: boolean;
  readonly aliases: readonly string[];
}

function theory(name: string, file: string, description: string): SourceDescriptor {
  return {
    name,
    kind: 'theoretical',
    loader: 'theory-table',
    file,
    description,
    supportsDecay: false,
    aliases: [],
  };
}

export const SOURCE_DESCRIPTORS: readonly SourceDescriptor[] = Object.freeze(([
  {
    name: 'experiment',
    kind: 'experimental',
    loader: 'experimental-json',
    file: 'nndc_nudat_data_export.json',
    description: 'Evaluated experimental data (NuDat export): masses, levels, decay, fission yields',
    supportsDecay: true,
    aliases: ['exp', 'nndc'],
  },
  theory('SKMS', 'SKMS_all_nuclei-new.dat', 'Skyrme SkM* energy density functional'),
  theory('UNEDF0', 'UNEDF0_all_nuclei.dat', 'UNEDF0 energy density functional'),
  theory('UNEDF1', 'UNEDF1_all_nuclei.dat', 'UNEDF1 energy density functional'),
  theory('SLY4', 'SLY4_all_nuclei.dat', 'Skyrme SLy4 energy density functional'),
  theory('SKP', 'SKP_all_nuclei.dat', 'Skyrme SkP energy density functional'),
  theory('SV-MIN', 'SV-MIN_all_nuclei.dat', 'Skyrme SV-min energy density functional'),
] satisfies SourceDescriptor[]).map(d => Object.freeze({ ...d, aliases: Object.freeze([...d.aliases]) })));

export const DEFAULT_SOURCE = 'experiment';

export function sourceNames(): string[] {
  return SOURCE_DESCRIPTORS.map(d => d.name);
}

/** Case-insensitive match against names and aliases. */
export function findSourceDescriptor(name: string): SourceDescriptor | undefined {
  const wanted = name.trim().toLowerCase();
  return SOURCE_DESCRIPTORS.find(
    d => d.name.toLowerCase() === wanted || d.aliases.some(a => a.toLowerCase() === wanted),
  );
}
