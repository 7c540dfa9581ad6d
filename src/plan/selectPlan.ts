import { dirname, join } from 'node:path';

import { PackagerError } from '../errors.js';
import type { BuildRequest } from '../request.js';
import type { DependencyGraph } from '../resolver/graphTypes.js';
import { includedUnits } from '../resolver/resolveGraph.js';
import { detectPlatform, type PlatformInfo } from '../backend/detectPlatform.js';
import { traceInfo } from '../dx/trace.js';
import type { BuildPlan, BuildStep } from './planTypes.js';
import {
  getArchiveName,
  getExecutableName,
  getExtensionSuffix,
  isUnderRoot,
  moduleNameFor,
  sourceStem,
  unitRelativePath,
} from './outputNaming.js';

function compileSteps(request: BuildRequest, graph: DependencyGraph, platform: PlatformInfo): BuildStep[] {
  const suffix = getExtensionSuffix(platform);
  return includedUnits(graph, request.includeDeps).map((unit): BuildStep => ({
    kind: 'compile',
    unit: unit.path,
    moduleName: moduleNameFor(graph.root, unit.path),
    outputPath: join(request.outDir, unitRelativePath(graph.root, unit.path).replace(/\.py$/i, suffix)),
    optimize: request.optimize,
  }));
}

function bundleStep(request: BuildRequest, graph: DependencyGraph, platform: PlatformInfo): BuildStep {
  const deps = includedUnits(graph, request.includeDeps).filter((u) => u.path !== graph.entry);
  const searchPaths = [graph.root];
  for (const dep of deps) {
    const dir = dirname(dep.path);
    if (!isUnderRoot(graph.root, dep.path) && !searchPaths.includes(dir)) searchPaths.push(dir);
  }

  const name = sourceStem(graph.entry);
  return {
    kind: 'bundle',
    unit: graph.entry,
    name,
    additional: deps.map((u) => ({ path: u.path, moduleName: moduleNameFor(graph.root, u.path) })),
    searchPaths,
    outputPath: join(request.outDir, getExecutableName(name, platform)),
    optimize: request.optimize,
  };
}

function archiveStep(request: BuildRequest, graph: DependencyGraph): BuildStep {
  return {
    kind: 'archive',
    unit: graph.entry,
    members: includedUnits(graph, request.includeDeps).map((u) => ({
      source: u.path,
      name: unitRelativePath(graph.root, u.path),
    })),
    outputPath: join(request.outDir, getArchiveName(sourceStem(graph.entry), request.includeDeps)),
  };
}

/**
 * Map a request and its resolved graph to backend steps.
 *
 * - `pyd`/`so`: one compile step per included unit
 * - `exe`: one bundle step; dependencies ride along as additional inputs
 * - `zip`: one archive step over the sources
 */
export function selectBuildPlan(
  request: BuildRequest,
  graph: DependencyGraph,
  platform: PlatformInfo = detectPlatform(),
): BuildPlan {
  let steps: BuildStep[];
  switch (request.format) {
    case 'pyd':
    case 'so':
      steps = compileSteps(request, graph, platform);
      break;
    case 'exe':
      steps = [bundleStep(request, graph, platform)];
      break;
    case 'zip':
      steps = [archiveStep(request, graph)];
      break;
    default: {
      const value: string = request.format;
      throw new PackagerError('UNSUPPORTED_FORMAT', `Unsupported format "${value}"`, { value });
    }
  }

  traceInfo('plan.selected', { format: request.format, steps: steps.map((s) => `${s.kind}:${s.unit}`) });
  return { format: request.format, root: graph.root, outDir: request.outDir, steps };
}
