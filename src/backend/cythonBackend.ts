import { copyFileSync, writeFileSync } from 'node:fs';
import { basename, join } from 'node:path';

import { PackagerError, errorMessage } from '../errors.js';
import type { CompileStep } from '../plan/planTypes.js';
import { getExtensionSuffix } from '../plan/outputNaming.js';
import { computeHash } from '../cache/hash.js';
import { lookupCachedArtifact, saveCacheEntry } from '../cache/cacheManager.js';
import { getCacheRoot } from '../cache/cachePaths.js';
import { logDebug } from '../dx/logger.js';
import { warn } from '../dx/warnings.js';
import type { BackendOutput, BackendRunContext, BuildBackend, PythonToolchain } from './backendTypes.js';
import { buildExtArgs, renderSetupScript } from './buildCommand.js';
import { detectPlatform, type PlatformInfo } from './detectPlatform.js';
import { detectToolchain } from './detectToolchain.js';
import { combinedOutput, runProcess } from './runProcess.js';
import { copySourceInto, findFileBySuffix } from './scratch.js';

export type CythonBackendOptions = {
  python?: string;
  platform?: PlatformInfo;
  /** Compile cache root; `null` disables caching. */
  cacheRoot?: string | null;
};

function lastSegment(moduleName: string): string {
  const parts = moduleName.split('.');
  return parts[parts.length - 1];
}

export function createCythonBackend(options: CythonBackendOptions = {}): BuildBackend<CompileStep> {
  const platform = options.platform ?? detectPlatform();
  const cacheRoot = options.cacheRoot === null ? null : getCacheRoot(options.cacheRoot);
  let toolchain: PythonToolchain | null = null;

  function ensure(): PythonToolchain {
    if (toolchain) return toolchain;
    const tc = detectToolchain(options.python);
    if (!tc.cython) {
      throw new PackagerError(
        'BACKEND_UNAVAILABLE',
        `Cython is not importable from ${tc.python.path}. Install it with: ${tc.python.path} -m pip install Cython`,
        { tool: 'cython' },
      );
    }
    toolchain = tc;
    return tc;
  }

  function storeInCache(hash: string, step: CompileStep, tc: PythonToolchain, artifact: string, name: string) {
    if (!cacheRoot) return;
    try {
      saveCacheEntry(
        {
          hash,
          sourcePath: step.unit,
          moduleName: step.moduleName,
          artifact: name,
          pythonPath: tc.python.path,
          pythonVersion: tc.python.version,
          optimize: step.optimize,
          platform: platform.tag,
          createdAt: Date.now(),
        },
        artifact,
        cacheRoot,
      );
    } catch (err) {
      warn({ code: 'CACHE_WRITE_FAILED', message: `Could not cache ${step.unit}: ${errorMessage(err)}` });
    }
  }

  async function run(step: CompileStep, ctx: BackendRunContext): Promise<BackendOutput> {
    const tc = ensure();
    const source = copySourceInto(step.unit, ctx.scratchDir);
    const suffix = getExtensionSuffix(platform);
    const artifactName = `${lastSegment(step.moduleName)}${suffix}`;

    const hash = cacheRoot
      ? computeHash({
          sourcePath: source,
          moduleName: step.moduleName,
          python: tc.python,
          optimize: step.optimize,
          platform: platform.tag,
        })
      : null;

    const cached = hash && cacheRoot ? lookupCachedArtifact(hash, cacheRoot) : null;
    if (cached) {
      logDebug('cache hit', { hash, sourcePath: step.unit });
      const artifact = join(ctx.scratchDir, artifactName);
      copyFileSync(cached, artifact);
      return { artifact, output: '', cached: true };
    }

    writeFileSync(join(ctx.scratchDir, 'setup.py'), renderSetupScript(step, basename(source)));
    const res = await runProcess(tc.python.path, buildExtArgs(ctx.scratchDir), {
      cwd: ctx.scratchDir,
      signal: ctx.signal,
    });
    const output = combinedOutput(res);

    if (res.code !== 0) {
      throw new PackagerError(
        'BACKEND_INVOCATION_FAILED',
        `Cython build failed for ${step.unit} (exit ${res.code ?? res.signal})`,
        { path: step.unit, tool: 'cython', exitCode: res.code, output },
      );
    }

    const built = findFileBySuffix(join(ctx.scratchDir, 'build_lib'), suffix);
    if (!built) {
      throw new PackagerError(
        'BACKEND_INVOCATION_FAILED',
        `Cython reported success but produced no ${suffix} file for ${step.unit}`,
        { path: step.unit, tool: 'cython', exitCode: res.code, output },
      );
    }

    if (hash) storeInCache(hash, step, tc, built, artifactName);
    return { artifact: built, output };
  }

  return {
    name: 'cython',
    kind: 'compile',
    ensureAvailable() {
      ensure();
    },
    run,
  };
}
