import type { TargetFormat } from '../request.js';

export type CompileStep = {
  kind: 'compile';
  /** Unit being compiled. */
  unit: string;
  /** Dotted module name; Cython derives the init symbol from its last part. */
  moduleName: string;
  outputPath: string;
  optimize: boolean;
};

export type BundleInput = {
  path: string;
  moduleName: string;
};

export type BundleStep = {
  kind: 'bundle';
  /** Entry script. */
  unit: string;
  name: string;
  /** Local modules embedded alongside the entry; empty without dependencies. */
  additional: BundleInput[];
  /** Module search paths handed to the bundler. */
  searchPaths: string[];
  outputPath: string;
  optimize: boolean;
};

export type ArchiveMember = {
  source: string;
  /** Entry name inside the archive, `/` separated. */
  name: string;
};

export type ArchiveStep = {
  kind: 'archive';
  /** Entry script. */
  unit: string;
  members: ArchiveMember[];
  outputPath: string;
};

export type BuildStep = CompileStep | BundleStep | ArchiveStep;

export type BuildStepKind = BuildStep['kind'];

export type BuildPlan = {
  format: TargetFormat;
  root: string;
  outDir: string;
  steps: BuildStep[];
};
