import { mkdirSync } from 'node:fs';
import { basename, join } from 'node:path';

import { PackagerError, errorMessage, isPackagerError } from '../errors.js';
import type { BuildPlan, BuildStep, BuildStepKind } from '../plan/planTypes.js';
import { atomicCopy } from '../assemble/atomicWrite.js';
import { runTaskPool } from '../worker/taskPool.js';
import { traceDebug, traceInfo, traceWarn } from '../dx/trace.js';
import type { BackendOutput, BackendRunContext, BackendSet, BuildBackend, BuildUnitResult } from './backendTypes.js';

export type InvokeOptions = {
  /** Parent of the per-step scratch directories. */
  scratchRoot: string;
  concurrency?: number;
  signal?: AbortSignal;
};

function requireBackend<B>(backend: B | undefined, kind: BuildStepKind): B {
  if (!backend) {
    throw new PackagerError('BACKEND_UNAVAILABLE', `No backend configured for ${kind} steps`, { tool: kind });
  }
  return backend;
}

function backendFor(backends: BackendSet, kind: BuildStepKind): Pick<BuildBackend, 'name' | 'ensureAvailable'> {
  switch (kind) {
    case 'compile':
      return requireBackend(backends.compile, kind);
    case 'bundle':
      return requireBackend(backends.bundle, kind);
    case 'archive':
      return requireBackend(backends.archive, kind);
  }
}

function runStep(step: BuildStep, backends: BackendSet, ctx: BackendRunContext): Promise<BackendOutput> {
  switch (step.kind) {
    case 'compile':
      return requireBackend(backends.compile, step.kind).run(step, ctx);
    case 'bundle':
      return requireBackend(backends.bundle, step.kind).run(step, ctx);
    case 'archive':
      return requireBackend(backends.archive, step.kind).run(step, ctx);
  }
}

/**
 * Check every backend the plan needs before anything runs, so a missing
 * tool surfaces as BACKEND_UNAVAILABLE rather than a failed subprocess.
 */
export function assertBackendsAvailable(plan: BuildPlan, backends: BackendSet): void {
  const kinds = new Set(plan.steps.map((s) => s.kind));
  for (const kind of kinds) backendFor(backends, kind).ensureAvailable();
}

function scratchName(step: BuildStep, index: number): string {
  return `${String(index).padStart(3, '0')}-${basename(step.unit).replace(/\.py$/i, '')}`;
}

function toUnitError(err: unknown, step: BuildStep): PackagerError {
  if (isPackagerError(err)) return err;
  return new PackagerError('BACKEND_INVOCATION_FAILED', `${step.kind} of ${step.unit} failed: ${errorMessage(err)}`, {
    path: step.unit,
    cause: errorMessage(err),
  });
}

export function compareByUnit(a: BuildUnitResult, b: BuildUnitResult): number {
  if (a.unit < b.unit) return -1;
  if (a.unit > b.unit) return 1;
  return 0;
}

async function runUnit(
  step: BuildStep,
  index: number,
  backends: BackendSet,
  options: InvokeOptions,
): Promise<BuildUnitResult> {
  const scratchDir = join(options.scratchRoot, scratchName(step, index));
  let scratchCreated = false;
  traceDebug('invoke.unit.begin', { kind: step.kind, unit: step.unit, scratchDir });

  try {
    mkdirSync(scratchDir, { recursive: true });
    scratchCreated = true;
    const out = await runStep(step, backends, { scratchDir, signal: options.signal });
    // Publish under the final name only once the backend is done.
    atomicCopy(out.artifact, step.outputPath);
    traceDebug('invoke.unit.done', { unit: step.unit, artifact: step.outputPath, cached: out.cached ?? false });
    return {
      unit: step.unit,
      step: step.kind,
      status: 'succeeded',
      artifactPath: step.outputPath,
      output: out.output,
      intermediates: scratchDir,
      ...(out.cached ? { cached: true } : {}),
    };
  } catch (err) {
    const error = toUnitError(err, step);
    traceWarn('invoke.unit.failed', { unit: step.unit, code: error.code, message: error.message });
    return {
      unit: step.unit,
      step: step.kind,
      status: error.code === 'BUILD_CANCELLED' ? 'skipped' : 'failed',
      output: error.details?.output ?? '',
      error,
      ...(scratchCreated ? { intermediates: scratchDir } : {}),
    };
  }
}

/**
 * Run every planned step, at most `concurrency` at a time. A failing unit
 * never stops its siblings; cancellation stops new units from starting and
 * kills the running ones. Results come back sorted by unit path.
 */
export async function invokeBuildPlan(
  plan: BuildPlan,
  backends: BackendSet,
  options: InvokeOptions,
): Promise<BuildUnitResult[]> {
  assertBackendsAvailable(plan, backends);
  traceInfo('invoke.begin', { steps: plan.steps.length, concurrency: options.concurrency });

  const tasks = plan.steps.map((step, i) => () => runUnit(step, i, backends, options));
  const outcomes = await runTaskPool(tasks, { concurrency: options.concurrency, signal: options.signal });

  const results = outcomes.map((o, i): BuildUnitResult => {
    if (o.status === 'done') return o.value;
    const step = plan.steps[i];
    return {
      unit: step.unit,
      step: step.kind,
      status: 'skipped',
      output: '',
      error: new PackagerError('BUILD_CANCELLED', `Not started: build cancelled before ${step.unit}`, {
        path: step.unit,
      }),
    };
  });

  traceInfo('invoke.end', {
    succeeded: results.filter((r) => r.status === 'succeeded').length,
    failed: results.filter((r) => r.status === 'failed').length,
    skipped: results.filter((r) => r.status === 'skipped').length,
  });
  return results.sort(compareByUnit);
}
