import { realpathSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

import { PackagerError, isPackagerError } from '../errors.js';
import { scanImports } from '../scanner/scanImports.js';
import { logDebug } from '../dx/logger.js';
import { traceDebug, traceInfo } from '../dx/trace.js';
import { warn } from '../dx/warnings.js';
import type { DependencyEdge, DependencyGraph, ResolveOptions, SourceUnit } from './graphTypes.js';
import { isFile, resolveImport } from './resolveModule.js';

function newUnit(path: string): SourceUnit {
  return { path, importedNames: [], imports: [], resolved: false };
}

function resolveEntry(entry: string): string {
  const abs = resolve(entry);
  if (!abs.toLowerCase().endsWith('.py')) {
    throw new PackagerError('ENTRY_UNRESOLVABLE', `Entry must be a Python source file (.py): ${abs}`, {
      path: abs,
    });
  }
  if (!isFile(abs)) {
    throw new PackagerError('ENTRY_UNRESOLVABLE', `Entry file does not exist: ${abs}`, { path: abs });
  }
  return realpathSync(abs);
}

/**
 * Build the transitive closure of locally resolvable imports, breadth first.
 *
 * Units are keyed by canonical path and registered before they are enqueued,
 * so every file is scanned at most once and import cycles terminate.
 */
export function resolveGraph(entry: string, options: ResolveOptions = {}): DependencyGraph {
  const entryPath = resolveEntry(entry);
  const root = realpathSync(resolve(options.root ?? dirname(entryPath)));

  traceInfo('resolve.begin', { entry: entryPath, root });

  const units = new Map<string, SourceUnit>([[entryPath, newUnit(entryPath)]]);
  const edges: DependencyEdge[] = [];
  const edgeKeys = new Set<string>();
  const externals = new Map<string, string[]>();
  const diagnostics: PackagerError[] = [];
  const queue: string[] = [entryPath];

  for (let head = 0; head < queue.length; head++) {
    const path = queue[head];
    const unit = units.get(path);
    if (!unit || unit.resolved) continue;

    try {
      unit.imports = scanImports(path, { readFile: options.readFile });
    } catch (err) {
      if (!isPackagerError(err)) throw err;
      unit.error = err;
      unit.resolved = true;
      if (path === entryPath) {
        throw new PackagerError('ENTRY_UNRESOLVABLE', `Entry file cannot be scanned: ${err.message}`, {
          path,
          cause: err.message,
        });
      }
      diagnostics.push(err);
      warn({ code: 'SOURCE_UNREADABLE', message: err.message });
      continue;
    }
    unit.importedNames = unit.imports.map((i) => i.module);

    for (const imported of unit.imports) {
      for (const r of resolveImport(imported, path, root)) {
        if (r.kind === 'external') {
          const list = externals.get(path) ?? [];
          if (!list.includes(r.name)) list.push(r.name);
          externals.set(path, list);
          continue;
        }

        const target = realpathSync(r.path);
        const key = `${path}\0${target}`;
        if (target !== path && !edgeKeys.has(key)) {
          edgeKeys.add(key);
          edges.push({ from: path, to: target, name: r.name });
        }
        if (!units.has(target)) {
          units.set(target, newUnit(target));
          queue.push(target);
          traceDebug('resolve.discovered', { from: path, name: r.name, path: target });
        }
      }
    }

    unit.resolved = true;
  }

  logDebug('dependency graph', { entry: entryPath, units: units.size, edges: edges.length });
  traceInfo('resolve.end', { units: units.size, edges: edges.length, unreadable: diagnostics.length });

  return { entry: entryPath, root, units, edges, externals, diagnostics };
}

/** Units in discovery order; the entry is always first. */
export function unitsInOrder(graph: DependencyGraph): SourceUnit[] {
  return [...graph.units.values()];
}

/** The units a build acts on: the entry alone, or every local unit. */
export function includedUnits(graph: DependencyGraph, includeDeps: boolean): SourceUnit[] {
  const all = unitsInOrder(graph);
  return includeDeps ? all : all.filter((u) => u.path === graph.entry);
}
