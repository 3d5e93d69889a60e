import { readFile } from 'fs/promises';
import { parseExperimentalExport } from '../ingest/parseExperimental.js';
import { parseTheoryTable } from '../ingest/parseTheory.js';
import { sourceUnavailable } from '../shared/errors.js';
import type { ParseResult } from './record.js';
import type { LoaderKey, SourceDescriptor } from './sources.js';

export type LoadResult = ParseResult;

export interface SourceLoader {
  load(descriptor: SourceDescriptor, filePath: string): Promise<LoadResult>;
}

async function readSourceFile(descriptor: SourceDescriptor, filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw sourceUnavailable(descriptor.name, `cannot read ${filePath}`, { path: filePath, cause: reason });
  }
}

function requireRecords(descriptor: SourceDescriptor, filePath: string, result: LoadResult): LoadResult {
  if (result.records.length === 0) {
    throw sourceUnavailable(descriptor.name, `no records parsed from ${filePath}`, {
      path: filePath,
      skipped: result.skipped,
    });
  }
  return result;
}

export const experimentalLoader: SourceLoader = {
  async load(descriptor, filePath) {
    const content = await readSourceFile(descriptor, filePath);
    let result: LoadResult;
    try {
      result = parseExperimentalExport(content, descriptor.name);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw sourceUnavailable(descriptor.name, `unparseable export ${filePath}`, { path: filePath, cause: reason });
    }
    return requireRecords(descriptor, filePath, result);
  },
};

export const theoryTableLoader: SourceLoader = {
  async load(descriptor, filePath) {
    const content = await readSourceFile(descriptor, filePath);
    return requireRecords(descriptor, filePath, parseTheoryTable(content, descriptor.name));
  },
};

export const LOADERS: Readonly<Record<LoaderKey, SourceLoader>> = {
  'experimental-json': experimentalLoader,
  'theory-table': theoryTableLoader,
};

export function loaderFor(descriptor: SourceDescriptor): SourceLoader {
  return LOADERS[descriptor.loader];
}
