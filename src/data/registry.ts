import * as fs from 'fs';
import * as path from 'path';
import { loadConfig } from '../shared/config.js';
import { createLogger, type LogFn } from '../utils/logging.js';
import { isNuclideQueryError, sourceUnavailable, unknownSource, type NuclideQueryError } from '../shared/errors.js';
import { LOADERS, type SourceLoader } from './loaders.js';
import { NuclideIndex } from './nuclideIndex.js';
import {
  findSourceDescriptor,
  sourceNames,
  SOURCE_DESCRIPTORS,
  type LoaderKey,
  type SourceDescriptor,
  type SourceKind,
} from './sources.js';

export interface LoadReport {
  path: string;
  records: number;
  skipped: number;
  duplicates: number;
  warnings: readonly string[];
  elapsedMs: number;
}

export interface LoadedSource {
  descriptor: SourceDescriptor;
  index: NuclideIndex;
  report: LoadReport;
}

export type SourceState = 'not_loaded' | 'loading' | 'loaded' | 'failed';

export interface SourceStatus {
  name: string;
  kind: SourceKind;
  file: string;
  available: boolean;
  state: SourceState;
  records?: number;
  skipped?: number;
  duplicates?: number;
  error?: string;
}

export type RegistryLog = LogFn;

export interface SourceRegistryOptions {
  /** Directory holding the source files. Defaults to the configured data directory. */
  dataDir?: string;
  log?: RegistryLog;
  /** Replaces the loader for a format; the descriptors still pick which one. */
  loaders?: Partial<Record<LoaderKey, SourceLoader>>;
}

const MAX_LOGGED_WARNINGS = 5;

export const defaultRegistryLog: RegistryLog = createLogger('registry');

interface EntryStatus {
  state: 'loading' | 'loaded' | 'failed';
  loaded?: LoadedSource;
  error?: NuclideQueryError;
}

interface CacheEntry {
  status: EntryStatus;
  promise: Promise<LoadedSource>;
}

/**
 * Owns the per-source load cache. Each source is parsed at most once per
 * registry: concurrent first callers share the in-flight promise, and a
 * failed load stays failed for the registry's lifetime.
 */
export class SourceRegistry {
  readonly dataDir: string;
  private readonly log: RegistryLog;
  private readonly loaders: Readonly<Record<LoaderKey, SourceLoader>>;
  private readonly cache = new Map<string, CacheEntry>();

  constructor(options: SourceRegistryOptions = {}) {
    this.dataDir = options.dataDir ?? loadConfig().dataDir;
    this.log = options.log ?? defaultRegistryLog;
    this.loaders = { ...LOADERS, ...options.loaders };
  }

  resolve(name: string): SourceDescriptor {
    const descriptor = findSourceDescriptor(name);
    if (!descriptor) throw unknownSource(name, sourceNames());
    return descriptor;
  }

  listSources(): SourceDescriptor[] {
    return [...SOURCE_DESCRIPTORS];
  }

  filePath(descriptor: SourceDescriptor): string {
    return path.join(this.dataDir, descriptor.file);
  }

  isAvailable(descriptor: SourceDescriptor): boolean {
    const filePath = this.filePath(descriptor);
    return fs.existsSync(filePath) && fs.statSync(filePath).isFile();
  }

  /** Descriptors whose file is present in the data directory. */
  availableSources(): SourceDescriptor[] {
    return SOURCE_DESCRIPTORS.filter(d => this.isAvailable(d));
  }

  async load(name: string): Promise<LoadedSource> {
    const descriptor = this.resolve(name);
    const cached = this.cache.get(descriptor.name);
    if (cached) return cached.promise;

    const status: EntryStatus = { state: 'loading' };
    const promise = this.performLoad(descriptor).then(
      (loaded) => {
        status.state = 'loaded';
        status.loaded = loaded;
        return loaded;
      },
      (err: unknown) => {
        const error = isNuclideQueryError(err)
          ? err
          : sourceUnavailable(descriptor.name, err instanceof Error ? err.message : String(err));
        status.state = 'failed';
        status.error = error;
        this.log(`failed to load ${descriptor.name}: ${error.message}`);
        throw error;
      },
    );
    this.cache.set(descriptor.name, { status, promise });
    return promise;
  }

  status(): SourceStatus[] {
    return SOURCE_DESCRIPTORS.map(descriptor => {
      const entry = this.cache.get(descriptor.name);
      const base: SourceStatus = {
        name: descriptor.name,
        kind: descriptor.kind,
        file: descriptor.file,
        available: this.isAvailable(descriptor),
        state: entry?.status.state ?? 'not_loaded',
      };
      const loaded = entry?.status.loaded;
      if (loaded) {
        return {
          ...base,
          records: loaded.report.records,
          skipped: loaded.report.skipped,
          duplicates: loaded.report.duplicates,
        };
      }
      const error = entry?.status.error;
      return error ? { ...base, error: error.message } : base;
    });
  }

  private async performLoad(descriptor: SourceDescriptor): Promise<LoadedSource> {
    const filePath = this.filePath(descriptor);
    const started = Date.now();
    const result = await this.loaders[descriptor.loader].load(descriptor, filePath);
    const index = new NuclideIndex(result.records);

    const report: LoadReport = Object.freeze({
      path: filePath,
      records: index.size,
      skipped: result.skipped,
      duplicates: index.duplicates.length,
      warnings: Object.freeze([...result.warnings]),
      elapsedMs: Date.now() - started,
    });

    this.log(
      `loaded ${descriptor.name}: ${report.records} records, ${report.skipped} skipped, ` +
      `${report.duplicates} duplicates (${report.elapsedMs} ms)`,
    );
    for (const warning of result.warnings.slice(0, MAX_LOGGED_WARNINGS)) {
      this.log(`skipped: ${warning}`);
    }
    if (result.warnings.length > MAX_LOGGED_WARNINGS) {
      this.log(`skipped: ... ${result.warnings.length - MAX_LOGGED_WARNINGS} more in ${descriptor.name}`);
    }
    for (const dup of index.duplicates) {
      this.log(`duplicate ${dup.name} (Z=${dup.Z}, N=${dup.N}) in ${descriptor.name}; keeping the first entry`);
    }

    return Object.freeze({ descriptor, index, report });
  }
}

let defaultRegistry: SourceRegistry | null = null;

/** Process-wide registry for the server, created on first use. */
export function getDefaultRegistry(): SourceRegistry {
  if (!defaultRegistry) defaultRegistry = new SourceRegistry();
  return defaultRegistry;
}
