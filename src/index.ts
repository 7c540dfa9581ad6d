export { buildPackage, type BuildOptions, type BuildReport } from './build.js';
export {
  createBuildRequest,
  defaultFormat,
  parseFormat,
  TARGET_FORMATS,
  type BuildRequest,
  type BuildRequestInput,
  type TargetFormat,
} from './request.js';
export { PackagerError, isPackagerError, type PackagerErrorCode, type PackagerErrorDetails } from './errors.js';

export { scanImports, scanSource } from './scanner/scanImports.js';
export type { ImportedName, ScanOptions } from './scanner/scannerTypes.js';
export { resolveGraph, includedUnits } from './resolver/resolveGraph.js';
export type { DependencyGraph, DependencyEdge, ImportResolution, ResolveOptions, SourceUnit } from './resolver/graphTypes.js';
export { selectBuildPlan } from './plan/selectPlan.js';
export type { ArchiveStep, BuildPlan, BuildStep, BundleStep, CompileStep } from './plan/planTypes.js';

export { invokeBuildPlan } from './backend/invokeSteps.js';
export { createDefaultBackends } from './backend/defaultBackends.js';
export { createCythonBackend } from './backend/cythonBackend.js';
export { createPyinstallerBackend } from './backend/pyinstallerBackend.js';
export { createArchiveBackend } from './backend/archiveBackend.js';
export { detectToolchain } from './backend/detectToolchain.js';
export { runProcess } from './backend/runProcess.js';
export type { BackendSet, BuildBackend, BuildUnitResult, UnitStatus } from './backend/backendTypes.js';

export { assembleArtifacts } from './assemble/assembleArtifacts.js';
export { bannerInjectorFor, readBannerTrailer, type BannerInjector } from './assemble/banner.js';
export { exitCodeFor, formatBuildReport, reportToJson } from './report.js';
export { loadOptionalConfig, type PyshipConfig } from './dx/config.js';
