import { describe, it, expect } from 'vitest';
import { mkdtempSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { createPyinstallerBackend } from './pyinstallerBackend.js';
import { detectPlatform } from './detectPlatform.js';
import { createFakePython } from './fakePython.vitest.js';
import type { BundleStep } from '../plan/planTypes.js';
import { isPackagerError } from '../errors.js';

const linux = detectPlatform('linux', 'x64');

const bundle: BundleStep = {
  kind: 'bundle',
  unit: '/src/app/main.py',
  name: 'main',
  additional: [{ path: '/src/app/util.py', moduleName: 'util' }],
  searchPaths: ['/src/app'],
  outputPath: '/out/main',
  optimize: false,
};

function scratchDir() {
  return mkdtempSync(join(tmpdir(), 'pyship-pyi-'));
}

async function rejection(p: Promise<unknown>): Promise<unknown> {
  try {
    await p;
  } catch (err) {
    return err;
  }
  throw new Error('expected a rejection');
}

describe.skipIf(process.platform === 'win32')('pyinstaller backend', () => {
  it('is unavailable when PyInstaller cannot be imported', () => {
    const python = createFakePython({ cython: '3.0.10' });
    const backend = createPyinstallerBackend({ python: python.path, platform: linux });

    let message: string | undefined;
    try {
      backend.ensureAvailable();
    } catch (err) {
      message = isPackagerError(err) && err.code === 'BACKEND_UNAVAILABLE' ? err.message : 'other';
    }
    expect(message).toBe(
      `PyInstaller is not importable from ${python.path}. Install it with: ${python.path} -m pip install pyinstaller`,
    );
  });

  it('returns the one-file executable from dist', async () => {
    const python = createFakePython({ pyinstaller: '6.3.0' });
    const scratch = scratchDir();
    const backend = createPyinstallerBackend({ python: python.path, platform: linux });

    const out = await backend.run(bundle, { scratchDir: scratch });

    expect(out.artifact).toBe(join(scratch, 'dist', 'main'));
    expect(out.output).toBe('pyinstaller ran\n');
    expect(readFileSync(out.artifact, 'utf8')).toBe('EXE');
    expect(python.builds()).toEqual(['pyinstaller']);
  });

  it('fails with the captured output on a non-zero exit', async () => {
    const python = createFakePython({ pyinstaller: '6.3.0', buildExit: 2 });
    const backend = createPyinstallerBackend({ python: python.path, platform: linux });

    const err = await rejection(backend.run(bundle, { scratchDir: scratchDir() }));

    expect(isPackagerError(err) && err.code).toBe('BACKEND_INVOCATION_FAILED');
    expect(isPackagerError(err) && err.details?.output).toBe('pyinstaller ran\nerror: cannot bundle\n');
    expect(err instanceof Error && err.message).toBe('PyInstaller failed for /src/app/main.py (exit 2)');
  });

  it('fails when the executable is missing after a clean exit', async () => {
    const python = createFakePython({ pyinstaller: '6.3.0', writeArtifact: false });
    const scratch = scratchDir();
    const backend = createPyinstallerBackend({ python: python.path, platform: linux });

    const err = await rejection(backend.run(bundle, { scratchDir: scratch }));

    expect(isPackagerError(err) && err.code).toBe('BACKEND_INVOCATION_FAILED');
    expect(err instanceof Error && err.message).toBe(
      `PyInstaller reported success but ${join(scratch, 'dist', 'main')} is missing`,
    );
  });
});
