import { describe, it, expect } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { assembleArtifacts } from './assembleArtifacts.js';
import type { BannerInjector } from './banner.js';
import type { BuildUnitResult } from '../backend/backendTypes.js';
import { createBuildRequest } from '../request.js';
import { PackagerError } from '../errors.js';

function workspace() {
  const base = mkdtempSync(join(tmpdir(), 'pyship-assemble-'));
  const out = join(base, 'out');
  const scratch = join(base, 'scratch');
  mkdirSync(out);
  mkdirSync(scratch);
  return { base, out, scratch };
}

function succeeded(out: string, scratch: string, name: string): BuildUnitResult {
  const intermediates = join(scratch, name);
  mkdirSync(intermediates);
  writeFileSync(join(intermediates, 'setup.py'), '');
  const artifactPath = join(out, `${name}.so`);
  writeFileSync(artifactPath, 'LIB');
  return { unit: `/src/${name}.py`, step: 'compile', status: 'succeeded', artifactPath, output: '', intermediates };
}

function failed(scratch: string, name: string): BuildUnitResult {
  const intermediates = join(scratch, name);
  mkdirSync(intermediates);
  return {
    unit: `/src/${name}.py`,
    step: 'compile',
    status: 'failed',
    output: 'boom\n',
    error: new PackagerError('BACKEND_INVOCATION_FAILED', 'boom'),
    intermediates,
  };
}

describe('artifact assembler', () => {
  it('creates the output directory', () => {
    const { base, scratch } = workspace();
    const outDir = join(base, 'fresh', 'dist');
    const request = createBuildRequest({ entry: '/src/main.py', outDir, format: 'so' });

    assembleArtifacts([], request, { scratchRoot: scratch });
    expect(existsSync(outDir)).toBe(true);
  });

  it('removes intermediates of finished units and the empty scratch root', () => {
    const { out, scratch } = workspace();
    const request = createBuildRequest({ entry: '/src/main.py', outDir: out, format: 'so' });
    const ok = succeeded(out, scratch, 'main');

    const { results, warnings } = assembleArtifacts([ok], request, { scratchRoot: scratch });

    expect(results[0].intermediates).toBeUndefined();
    expect(existsSync(join(scratch, 'main'))).toBe(false);
    expect(existsSync(scratch)).toBe(false);
    expect(warnings).toEqual([]);
  });

  it('keeps intermediates of failed units', () => {
    const { out, scratch } = workspace();
    const request = createBuildRequest({ entry: '/src/main.py', outDir: out, format: 'so' });

    const { results, warnings } = assembleArtifacts(
      [succeeded(out, scratch, 'main'), failed(scratch, 'util')],
      request,
      { scratchRoot: scratch },
    );

    expect(results[1].intermediates).toBe(join(scratch, 'util'));
    expect(existsSync(join(scratch, 'util'))).toBe(true);
    expect(existsSync(join(scratch, 'main'))).toBe(false);
    expect(warnings.map((w) => w.code)).toEqual(['INTERMEDIATES_KEPT']);
  });

  it('stamps the banner into succeeded artifacts only', () => {
    const { base, out, scratch } = workspace();
    const banner = join(base, 'NOTICE');
    writeFileSync(banner, 'hello');
    const request = createBuildRequest({ entry: '/src/main.py', outDir: out, format: 'so', banner });
    const seen: string[] = [];
    const injector: BannerInjector = {
      name: 'recording',
      inject(path, bytes) {
        seen.push(`${path}:${Buffer.from(bytes).toString('utf8')}`);
      },
    };

    assembleArtifacts([succeeded(out, scratch, 'main'), failed(scratch, 'util')], request, {
      scratchRoot: scratch,
      injector,
    });

    expect(seen).toEqual([`${join(out, 'main.so')}:hello`]);
  });

  it('keeps the unbannered artifact when the banner file is missing', () => {
    const { base, out, scratch } = workspace();
    const request = createBuildRequest({
      entry: '/src/main.py',
      outDir: out,
      format: 'so',
      banner: join(base, 'missing-banner.txt'),
    });

    const { results, warnings } = assembleArtifacts([succeeded(out, scratch, 'main')], request, {
      scratchRoot: scratch,
    });

    expect(results[0].status).toBe('succeeded');
    expect(readFileSync(join(out, 'main.so'), 'utf8')).toBe('LIB');
    expect(warnings.map((w) => w.code)).toEqual(['BANNER_INJECTION_FAILED']);
  });

  it('turns an injector error into a warning', () => {
    const { base, out, scratch } = workspace();
    const banner = join(base, 'NOTICE');
    writeFileSync(banner, 'hello');
    const request = createBuildRequest({ entry: '/src/main.py', outDir: out, format: 'zip', banner });

    // main.so is not a zip archive, so the zip injector cannot re-pack it.
    const { results, warnings } = assembleArtifacts([succeeded(out, scratch, 'main')], request, {
      scratchRoot: scratch,
    });

    expect(results[0].status).toBe('succeeded');
    expect(readFileSync(join(out, 'main.so'), 'utf8')).toBe('LIB');
    expect(warnings).toHaveLength(1);
    expect(warnings[0].code).toBe('BANNER_INJECTION_FAILED');
    expect(warnings[0].message.startsWith(`Cannot stamp banner into ${join(out, 'main.so')}:`)).toBe(true);
  });
});
