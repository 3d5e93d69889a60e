import { afterAll, describe, expect, it } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { defaultDataDir, loadConfig, resolveDataDir, resolveDefaultSource } from '../src/shared/config.js';
import { isNuclideQueryError } from '../src/shared/errors.js';

describe('configuration', () => {
  const tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'nuq-config-'));
  const aFile = path.join(tmpRoot, 'file.txt');
  fs.writeFileSync(aFile, 'x');

  afterAll(() => {
    fs.rmSync(tmpRoot, { recursive: true, force: true });
  });

  it('defaults the data directory to <package root>/data', () => {
    expect(resolveDataDir({})).toBe(defaultDataDir());
    expect(path.basename(defaultDataDir())).toBe('data');
  });

  it('accepts an absolute directory', () => {
    expect(resolveDataDir({ NUQ_DATA_DIR: tmpRoot })).toBe(path.resolve(tmpRoot));
  });

  it('rejects relative paths, missing paths and files', () => {
    for (const value of ['relative/data', path.join(tmpRoot, 'missing'), aFile]) {
      try {
        resolveDataDir({ NUQ_DATA_DIR: value });
        expect.unreachable();
      } catch (err) {
        expect(isNuclideQueryError(err, 'INVALID_PARAMS')).toBe(true);
      }
    }
  });

  it('canonicalises the default source through aliases', () => {
    expect(resolveDefaultSource({})).toBe('experiment');
    expect(resolveDefaultSource({ NUQ_DEFAULT_SOURCE: 'nndc' })).toBe('experiment');
    expect(resolveDefaultSource({ NUQ_DEFAULT_SOURCE: 'unedf1' })).toBe('UNEDF1');
  });

  it('rejects an unknown default source', () => {
    expect(() => loadConfig({ NUQ_DEFAULT_SOURCE: 'NOPE' })).toThrow(/Unknown source: NOPE/);
  });
});
