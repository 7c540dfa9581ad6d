import type { BuildStep, BuildStepKind } from '../plan/planTypes.js';
import type { PackagerError } from '../errors.js';

export type ToolInfo = {
  path: string;
  version: string;
};

/** Python interpreter plus the packaging modules found under it. */
export type PythonToolchain = {
  python: ToolInfo;
  cython?: string;
  pyinstaller?: string;
};

export type BackendRunContext = {
  /** Unit-scoped scratch directory; the backend may write anything here. */
  scratchDir: string;
  signal?: AbortSignal;
};

export type BackendOutput = {
  /** File produced inside the scratch directory. */
  artifact: string;
  /** Captured stdout + stderr, verbatim. */
  output: string;
  /** Served from the compile cache without running the tool. */
  cached?: boolean;
};

export interface BuildBackend<S extends BuildStep = BuildStep> {
  readonly name: string;
  readonly kind: S['kind'];
  /** Throws PackagerError('BACKEND_UNAVAILABLE') when the tool cannot run. */
  ensureAvailable(): void;
  /**
   * Runs one step. Rejects with a PackagerError carrying the captured output
   * in `output` when the tool fails.
   */
  run(step: S, ctx: BackendRunContext): Promise<BackendOutput>;
}

export type BackendSet = {
  [K in BuildStepKind]?: BuildBackend<Extract<BuildStep, { kind: K }>>;
};

export type UnitStatus = 'succeeded' | 'failed' | 'skipped';

export type BuildUnitResult = {
  /** Unit path; the entry for bundle and archive steps. */
  unit: string;
  step: BuildStepKind;
  status: UnitStatus;
  artifactPath?: string;
  /** Captured backend output, verbatim. */
  output: string;
  error?: PackagerError;
  /** Scratch directory kept for diagnosis when the unit failed. */
  intermediates?: string;
  cached?: boolean;
};
