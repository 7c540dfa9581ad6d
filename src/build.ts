import { mkdirSync, mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { PackagerError } from './errors.js';
import type { BuildRequest } from './request.js';
import type { DependencyGraph } from './resolver/graphTypes.js';
import { resolveGraph } from './resolver/resolveGraph.js';
import type { BuildPlan } from './plan/planTypes.js';
import { selectBuildPlan } from './plan/selectPlan.js';
import type { BackendSet, BuildUnitResult } from './backend/backendTypes.js';
import { createDefaultBackends } from './backend/defaultBackends.js';
import { detectPlatform, type PlatformInfo } from './backend/detectPlatform.js';
import { assertBackendsAvailable, invokeBuildPlan } from './backend/invokeSteps.js';
import { assembleArtifacts, prepareOutputDir } from './assemble/assembleArtifacts.js';
import type { BannerInjector } from './assemble/banner.js';
import type { PyshipConfig } from './dx/config.js';
import { logInfo, setDebugEnabled } from './dx/logger.js';
import { traceInfo } from './dx/trace.js';
import type { PyshipWarning } from './dx/warnings.js';

export type BuildOptions = {
  config?: PyshipConfig | null;
  /** Replaces tool detection; kinds left out fall back to the defaults. */
  backends?: BackendSet;
  signal?: AbortSignal;
  platform?: PlatformInfo;
  /** Compile cache on/off (default on). */
  useCache?: boolean;
  /** Project root for import resolution; defaults to the entry's directory. */
  root?: string;
  /** Source reader for the scanner. */
  readFile?: (path: string) => string;
  /** Overrides the format's banner injector. */
  injector?: BannerInjector;
  /** Overrides `config.concurrency`. */
  concurrency?: number;
};

export type BuildReport = {
  request: BuildRequest;
  graph: DependencyGraph;
  plan: BuildPlan;
  /** Sorted by unit path. */
  results: BuildUnitResult[];
  warnings: PyshipWarning[];
  /** Unreadable sources found while resolving. */
  diagnostics: readonly PackagerError[];
  ok: boolean;
  cancelled: boolean;
};

function backendsFor(options: BuildOptions, platform: PlatformInfo): BackendSet {
  const config = options.config ?? {};
  const defaults = createDefaultBackends({
    python: config.python,
    platform,
    cacheRoot: options.useCache === false ? null : config.cacheDir,
  });
  return { ...defaults, ...options.backends };
}

function createScratchRoot(config: PyshipConfig): string {
  const parent = config.scratchDir ?? tmpdir();
  mkdirSync(parent, { recursive: true });
  return mkdtempSync(join(parent, 'pyship-'));
}

/**
 * Resolve, plan, invoke and assemble one build.
 *
 * Throws only for problems that stop the whole build before any unit runs
 * (ENTRY_UNRESOLVABLE, UNSUPPORTED_FORMAT, BACKEND_UNAVAILABLE). Everything
 * per unit lands in the returned report.
 */
export async function buildPackage(request: BuildRequest, options: BuildOptions = {}): Promise<BuildReport> {
  const config = options.config ?? {};
  if (config.debug) setDebugEnabled(true);
  const platform = options.platform ?? detectPlatform();

  traceInfo('build.begin', { entry: request.entry, format: request.format, includeDeps: request.includeDeps });

  const graph = resolveGraph(request.entry, { root: options.root, readFile: options.readFile });
  const plan = selectBuildPlan(request, graph, platform);
  const backends = backendsFor(options, platform);
  assertBackendsAvailable(plan, backends);

  prepareOutputDir(request.outDir);
  const scratchRoot = createScratchRoot(config);

  const invoked = await invokeBuildPlan(plan, backends, {
    scratchRoot,
    concurrency: options.concurrency ?? config.concurrency,
    signal: options.signal,
  });
  const { results, warnings } = assembleArtifacts(invoked, request, {
    scratchRoot,
    injector: options.injector,
  });

  // An interrupt that lands after the last unit finished cancels nothing.
  const cancelled = results.some((r) => r.status === 'skipped' && r.error?.code === 'BUILD_CANCELLED');
  const ok = !cancelled && results.every((r) => r.status === 'succeeded');

  logInfo(`build ${cancelled ? 'cancelled' : ok ? 'succeeded' : 'failed'}`, { entry: request.entry, outDir: request.outDir });
  traceInfo('build.end', { ok, cancelled, units: results.length, warnings: warnings.length });
  return { request, graph, plan, results, warnings, diagnostics: graph.diagnostics, ok, cancelled };
}
