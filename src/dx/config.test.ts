import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { __resetConfigCacheForTests, loadOptionalConfig, normalizeConfig } from './config.js';

describe('config loader', () => {
  afterEach(() => {
    __resetConfigCacheForTests();
  });

  it('returns null when config file is missing', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'pyship-cfg-'));
    const cfg = await loadOptionalConfig(dir);
    expect(cfg).toBe(null);
  });

  it('loads pyship.config.js (default export)', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'pyship-cfg-'));
    writeFileSync(
      join(dir, 'pyship.config.js'),
      `export default { debug: true, python: "/opt/py/bin/python3", concurrency: 2 };\n`,
      'utf8',
    );

    const cfg = await loadOptionalConfig(dir);
    expect(cfg?.debug).toBe(true);
    expect(cfg?.python).toBe('/opt/py/bin/python3');
    expect(cfg?.concurrency).toBe(2);
  });

  it('reads the file at most once per process', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'pyship-cfg-'));
    const first = await loadOptionalConfig(dir);
    writeFileSync(join(dir, 'pyship.config.js'), `export default { debug: true };\n`, 'utf8');
    const second = await loadOptionalConfig(dir);
    expect(first).toBe(null);
    expect(second).toBe(null);
  });
});

describe('normalizeConfig', () => {
  it('rejects a non-object export', () => {
    expect(() => normalizeConfig(42)).toThrow('pyship.config.js: default export must be an object');
  });

  it('rejects a zero concurrency', () => {
    expect(() => normalizeConfig({ concurrency: 0 })).toThrow(
      'pyship.config.js: "concurrency" must be a positive integer',
    );
  });

  it('ignores unknown keys', () => {
    expect(normalizeConfig({ cacheDir: '/tmp/c', extra: 1 })).toEqual({
      python: undefined,
      cacheDir: '/tmp/c',
      scratchDir: undefined,
    });
  });
});
