import { describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, readdirSync, readFileSync, realpathSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { unzipSync } from 'fflate';

import { buildPackage, type BuildOptions } from './build.js';
import { createBuildRequest } from './request.js';
import { exitCodeFor } from './report.js';
import { isPackagerError, PackagerError } from './errors.js';
import { detectPlatform } from './backend/detectPlatform.js';
import type { BuildBackend } from './backend/backendTypes.js';
import type { BundleStep, CompileStep } from './plan/planTypes.js';

const linux = detectPlatform('linux', 'x64');

function project(files: Record<string, string>) {
  const base = realpathSync(mkdtempSync(join(tmpdir(), 'pyship-build-')));
  const src = join(base, 'src');
  for (const [rel, body] of Object.entries(files)) {
    const p = join(src, rel);
    mkdirSync(dirname(p), { recursive: true });
    writeFileSync(p, body, 'utf8');
  }
  return { src, out: join(base, 'out'), scratch: join(base, 'scratch') };
}

const APP = {
  'main.py': 'import util\nfrom pkg import mod\n\nmod.run(util.VALUE)\n',
  'util.py': 'import os\nVALUE = os.sep\n',
  'pkg/__init__.py': '',
  'pkg/mod.py': 'def run(v):\n    print(v)\n',
};

function fakeCompiler(failing: string[] = []): BuildBackend<CompileStep> {
  return {
    name: 'fake-cc',
    kind: 'compile',
    ensureAvailable() {},
    async run(step, ctx) {
      if (failing.includes(step.moduleName)) {
        throw new PackagerError('BACKEND_INVOCATION_FAILED', `cannot compile ${step.moduleName}`, { output: 'E\n' });
      }
      const artifact = join(ctx.scratchDir, 'built.so');
      writeFileSync(artifact, `so:${step.moduleName}`);
      return { artifact, output: '' };
    },
  };
}

function fakeBundler(seen: BundleStep[]): BuildBackend<BundleStep> {
  return {
    name: 'fake-bundler',
    kind: 'bundle',
    ensureAvailable() {},
    async run(step, ctx) {
      seen.push(step);
      const artifact = join(ctx.scratchDir, step.name);
      writeFileSync(artifact, 'EXE');
      return { artifact, output: '' };
    },
  };
}

function options(dirs: { scratch: string }, extra: BuildOptions = {}): BuildOptions {
  return { platform: linux, useCache: false, config: { scratchDir: dirs.scratch }, ...extra };
}

describe('buildPackage', () => {
  it('compiles every local unit and cleans up scratch space', async () => {
    const dirs = project(APP);
    const request = createBuildRequest({ entry: join(dirs.src, 'main.py'), outDir: dirs.out, format: 'so' });

    const report = await buildPackage(request, options(dirs, { backends: { compile: fakeCompiler() } }));

    expect(report.ok).toBe(true);
    expect(report.cancelled).toBe(false);
    expect(exitCodeFor(report)).toBe(0);
    expect(report.results.map((r) => r.unit)).toEqual([
      join(dirs.src, 'main.py'),
      join(dirs.src, 'pkg', '__init__.py'),
      join(dirs.src, 'pkg', 'mod.py'),
      join(dirs.src, 'util.py'),
    ]);
    expect(readFileSync(join(dirs.out, 'pkg', 'mod.so'), 'utf8')).toBe('so:pkg.mod');
    expect(readFileSync(join(dirs.out, 'util.so'), 'utf8')).toBe('so:util');
    expect(readdirSync(dirs.scratch)).toEqual([]);
  });

  it('builds each unit of a 3-cycle exactly once', async () => {
    const dirs = project({ 'a.py': 'import b\n', 'b.py': 'import c\n', 'c.py': 'import a\n' });
    const request = createBuildRequest({ entry: join(dirs.src, 'a.py'), outDir: dirs.out, format: 'so' });

    const report = await buildPackage(request, options(dirs, { backends: { compile: fakeCompiler() } }));

    expect(report.graph.units.size).toBe(3);
    expect(report.plan.steps).toHaveLength(3);
    expect(readdirSync(dirs.out).sort()).toEqual(['a.so', 'b.so', 'c.so']);
  });

  it('produces a single step with --no-deps even when a dependency is unreadable', async () => {
    const dirs = project(APP);
    const unreadable = join(dirs.src, 'util.py');
    const readFile = (p: string) => {
      if (p === unreadable) throw new Error('permission denied');
      return readFileSync(p, 'utf8');
    };
    const request = createBuildRequest({
      entry: join(dirs.src, 'main.py'),
      outDir: dirs.out,
      format: 'so',
      includeDeps: false,
    });

    const report = await buildPackage(request, options(dirs, { readFile, backends: { compile: fakeCompiler() } }));

    expect(report.ok).toBe(true);
    expect(report.plan.steps).toHaveLength(1);
    expect(report.results.map((r) => r.status)).toEqual(['succeeded']);
    expect(report.diagnostics.map((d) => d.code)).toEqual(['SOURCE_UNREADABLE']);
    expect(report.diagnostics[0].details?.path).toBe(unreadable);
    expect(readdirSync(dirs.out)).toEqual(['main.so']);
  });

  it('fails only the broken unit and exits with 1', async () => {
    const dirs = project(APP);
    const request = createBuildRequest({ entry: join(dirs.src, 'main.py'), outDir: dirs.out, format: 'so' });

    const report = await buildPackage(request, options(dirs, { backends: { compile: fakeCompiler(['util']) } }));

    expect(report.ok).toBe(false);
    expect(exitCodeFor(report)).toBe(1);
    const util = report.results.find((r) => r.unit === join(dirs.src, 'util.py'));
    expect(util?.status).toBe('failed');
    expect(util?.output).toBe('E\n');
    expect(util?.intermediates).toBeDefined();
    expect(report.results.filter((r) => r.status === 'succeeded')).toHaveLength(3);
  });

  it('bundles dependencies as additional inputs of one executable step', async () => {
    const dirs = project(APP);
    const withDeps: BundleStep[] = [];
    const withoutDeps: BundleStep[] = [];
    const entry = join(dirs.src, 'main.py');

    await buildPackage(
      createBuildRequest({ entry, outDir: dirs.out, format: 'exe' }),
      options(dirs, { backends: { bundle: fakeBundler(withDeps) } }),
    );
    const report = await buildPackage(
      createBuildRequest({ entry, outDir: dirs.out, format: 'exe', includeDeps: false }),
      options(dirs, { backends: { bundle: fakeBundler(withoutDeps) } }),
    );

    expect(withDeps).toHaveLength(1);
    expect(withoutDeps).toHaveLength(1);
    expect(withDeps[0].additional.map((a) => a.moduleName)).toEqual(['util', 'pkg', 'pkg.mod']);
    expect(withoutDeps[0].additional).toEqual([]);
    expect({ ...withDeps[0], additional: [] }).toEqual(withoutDeps[0]);
    expect(report.results[0].artifactPath).toBe(join(dirs.out, 'main'));
  });

  it('round-trips sources through a zip archive', async () => {
    const dirs = project(APP);
    const request = createBuildRequest({ entry: join(dirs.src, 'main.py'), outDir: dirs.out, format: 'zip' });

    const report = await buildPackage(request, options(dirs));

    expect(report.ok).toBe(true);
    const entries = unzipSync(readFileSync(join(dirs.out, 'main_with_deps.zip')));
    expect(Object.keys(entries)).toEqual(['main.py', 'util.py', 'pkg/__init__.py', 'pkg/mod.py']);
    for (const [name, bytes] of Object.entries(entries)) {
      expect(Buffer.from(bytes).equals(readFileSync(join(dirs.src, name)))).toBe(true);
    }
  });

  it('stamps a banner into the archive', async () => {
    const dirs = project(APP);
    const banner = join(dirs.src, 'NOTICE.txt');
    writeFileSync(banner, 'Built by pyship');
    const request = createBuildRequest({
      entry: join(dirs.src, 'main.py'),
      outDir: dirs.out,
      format: 'zip',
      includeDeps: false,
      banner,
    });

    const report = await buildPackage(request, options(dirs));

    expect(report.warnings).toEqual([]);
    const entries = unzipSync(readFileSync(join(dirs.out, 'main.zip')));
    expect(Object.keys(entries)).toEqual(['main.py', 'PYSHIP_BANNER.txt']);
    expect(Buffer.from(entries['PYSHIP_BANNER.txt']).toString('utf8')).toBe('Built by pyship');
  });

  it('keeps the artifact and success when the banner cannot be injected', async () => {
    const dirs = project(APP);
    const request = createBuildRequest({
      entry: join(dirs.src, 'main.py'),
      outDir: dirs.out,
      format: 'zip',
      banner: join(dirs.src, 'no-such-banner.txt'),
    });

    const report = await buildPackage(request, options(dirs));

    expect(report.ok).toBe(true);
    expect(exitCodeFor(report)).toBe(0);
    expect(report.warnings.map((w) => w.code)).toEqual(['BANNER_INJECTION_FAILED']);
    const entries = unzipSync(readFileSync(join(dirs.out, 'main_with_deps.zip')));
    expect(Object.keys(entries)).not.toContain('PYSHIP_BANNER.txt');
  });

  it('skips every unit when cancelled before start', async () => {
    const dirs = project(APP);
    const controller = new AbortController();
    controller.abort();
    const request = createBuildRequest({ entry: join(dirs.src, 'main.py'), outDir: dirs.out, format: 'so' });

    const report = await buildPackage(
      request,
      options(dirs, { signal: controller.signal, backends: { compile: fakeCompiler() } }),
    );

    expect(report.cancelled).toBe(true);
    expect(report.ok).toBe(false);
    expect(exitCodeFor(report)).toBe(130);
    expect(report.results.every((r) => r.status === 'skipped')).toBe(true);
  });

  it('is not cancelled by an interrupt after every unit finished', async () => {
    const dirs = project({ 'main.py': 'print(1)\n' });
    const controller = new AbortController();
    const inner = fakeCompiler();
    const lateInterrupt: BuildBackend<CompileStep> = {
      ...inner,
      async run(step, ctx) {
        const out = await inner.run(step, ctx);
        controller.abort();
        return out;
      },
    };
    const request = createBuildRequest({ entry: join(dirs.src, 'main.py'), outDir: dirs.out, format: 'so' });

    const report = await buildPackage(
      request,
      options(dirs, { signal: controller.signal, backends: { compile: lateInterrupt } }),
    );

    expect(report.results.map((r) => r.status)).toEqual(['succeeded']);
    expect(report.cancelled).toBe(false);
    expect(report.ok).toBe(true);
    expect(exitCodeFor(report)).toBe(0);
  });

  it('throws ENTRY_UNRESOLVABLE for a missing entry', async () => {
    const dirs = project(APP);
    const request = createBuildRequest({ entry: join(dirs.src, 'nope.py'), outDir: dirs.out, format: 'so' });

    const err = await buildPackage(request, options(dirs)).catch((e: unknown) => e);

    expect(isPackagerError(err) && err.code).toBe('ENTRY_UNRESOLVABLE');
    expect(err instanceof Error && exitCodeFor(err)).toBe(2);
  });

  it('throws BACKEND_UNAVAILABLE before producing anything', async () => {
    const dirs = project(APP);
    const request = createBuildRequest({ entry: join(dirs.src, 'main.py'), outDir: dirs.out, format: 'so' });
    const unavailable: BuildBackend<CompileStep> = {
      name: 'absent',
      kind: 'compile',
      ensureAvailable() {
        throw new PackagerError('BACKEND_UNAVAILABLE', 'Cython is not importable', { tool: 'cython' });
      },
      async run() {
        throw new Error('must not run');
      },
    };

    const err = await buildPackage(request, options(dirs, { backends: { compile: unavailable } })).catch(
      (e: unknown) => e,
    );

    expect(isPackagerError(err) && err.code).toBe('BACKEND_UNAVAILABLE');
    expect(err instanceof Error && exitCodeFor(err)).toBe(3);
  });
});
