import { fileURLToPath } from 'url';
import { SourceRegistry, type SourceRegistryOptions } from '../src/data/registry.js';

export const FIXTURE_DATA_DIR = fileURLToPath(new URL('../fixtures/data', import.meta.url));
export const BROKEN_DATA_DIR = fileURLToPath(new URL('../fixtures/broken', import.meta.url));

/** Registry over the fixtures, collecting log lines instead of printing them. */
export function fixtureRegistry(options: SourceRegistryOptions = {}): { registry: SourceRegistry; logs: string[] } {
  const logs: string[] = [];
  const registry = new SourceRegistry({
    dataDir: FIXTURE_DATA_DIR,
    log: (message) => { logs.push(message); },
    ...options,
  });
  return { registry, logs };
}
