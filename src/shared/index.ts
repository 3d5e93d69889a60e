export {
  NuclideQueryError,
  isNuclideQueryError,
  invalidParams,
  notFound,
  unknownSource,
  sourceUnavailable,
  malformedIdentity,
} from './errors.js';
export type { ErrorCode } from './errors.js';
export { loadConfig, resolveDataDir, resolveDefaultSource, DATA_DIR_ENV, DEFAULT_SOURCE_ENV } from './config.js';
export type { RuntimeConfig } from './config.js';
