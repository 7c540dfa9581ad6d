import { existsSync } from 'node:fs';
import { join } from 'node:path';

import { PackagerError } from '../errors.js';
import type { BundleStep } from '../plan/planTypes.js';
import { getExecutableName } from '../plan/outputNaming.js';
import type { BackendOutput, BackendRunContext, BuildBackend, PythonToolchain } from './backendTypes.js';
import { pyinstallerArgs } from './buildCommand.js';
import { detectPlatform, type PlatformInfo } from './detectPlatform.js';
import { detectToolchain } from './detectToolchain.js';
import { combinedOutput, runProcess } from './runProcess.js';

export type PyinstallerBackendOptions = {
  python?: string;
  platform?: PlatformInfo;
};

export function createPyinstallerBackend(options: PyinstallerBackendOptions = {}): BuildBackend<BundleStep> {
  const platform = options.platform ?? detectPlatform();
  let toolchain: PythonToolchain | null = null;

  function ensure(): PythonToolchain {
    if (toolchain) return toolchain;
    const tc = detectToolchain(options.python);
    if (!tc.pyinstaller) {
      throw new PackagerError(
        'BACKEND_UNAVAILABLE',
        `PyInstaller is not importable from ${tc.python.path}. Install it with: ${tc.python.path} -m pip install pyinstaller`,
        { tool: 'pyinstaller' },
      );
    }
    toolchain = tc;
    return tc;
  }

  async function run(step: BundleStep, ctx: BackendRunContext): Promise<BackendOutput> {
    const tc = ensure();
    const res = await runProcess(tc.python.path, pyinstallerArgs(step, ctx.scratchDir, platform), {
      cwd: ctx.scratchDir,
      signal: ctx.signal,
    });
    const output = combinedOutput(res);

    if (res.code !== 0) {
      throw new PackagerError(
        'BACKEND_INVOCATION_FAILED',
        `PyInstaller failed for ${step.unit} (exit ${res.code ?? res.signal})`,
        { path: step.unit, tool: 'pyinstaller', exitCode: res.code, output },
      );
    }

    const artifact = join(ctx.scratchDir, 'dist', getExecutableName(step.name, platform));
    if (!existsSync(artifact)) {
      throw new PackagerError(
        'BACKEND_INVOCATION_FAILED',
        `PyInstaller reported success but ${artifact} is missing`,
        { path: step.unit, tool: 'pyinstaller', exitCode: res.code, output },
      );
    }
    return { artifact, output };
  }

  return {
    name: 'pyinstaller',
    kind: 'bundle',
    ensureAvailable() {
      ensure();
    },
    run,
  };
}
