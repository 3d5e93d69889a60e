export { NuclideQuery } from './nuclideQuery.js';
export type {
  DecayChain,
  DecayChainEnd,
  DecayStep,
  NuclideIdentity,
  RangeSpec,
  RegionSpec,
  SourceComparison,
  SourceInfo,
} from './nuclideQuery.js';
export { Nuclide } from './nuclide.js';
export type { DecaySummary, MeasuredKey, NuclideSummary } from './nuclide.js';
export { SourceRegistry, getDefaultRegistry, defaultRegistryLog } from './registry.js';
export type { LoadReport, LoadedSource, RegistryLog, SourceRegistryOptions, SourceState, SourceStatus } from './registry.js';
export { NuclideIndex } from './nuclideIndex.js';
export type { Duplicate } from './nuclideIndex.js';
export { LOADERS, experimentalLoader, theoryTableLoader } from './loaders.js';
export type { LoadResult, SourceLoader } from './loaders.js';
export { SOURCE_DESCRIPTORS, DEFAULT_SOURCE, findSourceDescriptor, sourceNames } from './sources.js';
export type { LoaderKey, SourceDescriptor, SourceKind } from './sources.js';
export * from './derived.js';
export * from './record.js';
export { NuclideQueryError, isNuclideQueryError } from '../shared/errors.js';
export type { ErrorCode } from '../shared/errors.js';
export { parseNuclideString, symbolForZ, zForSymbol, formatNuclideName } from '../shared/elements.js';
