import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { DEFAULT_SOURCE, findSourceDescriptor, sourceNames } from '../data/sources.js';
import { invalidParams, unknownSource } from './errors.js';

export const DATA_DIR_ENV = 'NUQ_DATA_DIR';
export const DEFAULT_SOURCE_ENV = 'NUQ_DEFAULT_SOURCE';

export function defaultDataDir(): string {
  return fileURLToPath(new URL('../../data', import.meta.url));
}

function validateDirPath(dirPath: string, envName: string): string {
  if (!path.isAbsolute(dirPath)) {
    throw invalidParams(`${envName} must be an absolute path`, { env: envName, value: dirPath });
  }

  const resolved = path.resolve(dirPath);
  if (!fs.existsSync(resolved)) {
    throw invalidParams(`${envName} does not exist`, { env: envName, value: resolved });
  }

  const stat = fs.statSync(resolved);
  if (!stat.isDirectory()) {
    throw invalidParams(`${envName} must point to a directory`, { env: envName, value: resolved });
  }

  return resolved;
}

/** `NUQ_DATA_DIR` when set (validated), otherwise `<package root>/data`, which need not exist yet. */
export function resolveDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const raw = env[DATA_DIR_ENV];
  if (!raw || raw.trim().length === 0) return defaultDataDir();
  return validateDirPath(raw.trim(), DATA_DIR_ENV);
}

/** Canonical name of `NUQ_DEFAULT_SOURCE`, or `experiment`. */
export function resolveDefaultSource(env: NodeJS.ProcessEnv = process.env): string {
  const raw = env[DEFAULT_SOURCE_ENV];
  if (!raw || raw.trim().length === 0) return DEFAULT_SOURCE;
  const descriptor = findSourceDescriptor(raw);
  if (!descriptor) throw unknownSource(raw.trim(), sourceNames());
  return descriptor.name;
}

export interface RuntimeConfig {
  dataDir: string;
  defaultSource: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  return {
    dataDir: resolveDataDir(env),
    defaultSource: resolveDefaultSource(env),
  };
}
