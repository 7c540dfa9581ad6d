import { statSync } from 'node:fs';
import { dirname, join } from 'node:path';

import type { ImportedName } from '../scanner/scannerTypes.js';
import type { ImportResolution } from './graphTypes.js';

type ModuleLookup = {
  path: string;
  /** The module is a package (`__init__.py`). */
  isPackage: boolean;
  /** Parent package `__init__.py` files between the base and the module. */
  packageInits: { name: string; path: string }[];
};

type ParsedName = {
  /** Leading dot count; 0 for absolute imports. */
  level: number;
  segments: string[];
};

export function isFile(p: string): boolean {
  return statSync(p, { throwIfNoEntry: false })?.isFile() ?? false;
}

function isDirectory(p: string): boolean {
  return statSync(p, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

export function parseModuleName(name: string): ParsedName {
  const m = name.match(/^(\.*)(.*)$/);
  const dots = m?.[1] ?? '';
  const rest = m?.[2] ?? '';
  return {
    level: dots.length,
    segments: rest ? rest.split('.').filter(Boolean) : [],
  };
}

function raise(dir: string, levels: number): string {
  let out = dir;
  for (let i = 0; i < levels; i++) out = dirname(out);
  return out;
}

function lookupUnder(base: string, parsed: ParsedName): ModuleLookup | null {
  const prefix = '.'.repeat(parsed.level);
  const { segments } = parsed;

  const candidates: { path: string; isPackage: boolean }[] = segments.length
    ? [
        { path: `${join(base, ...segments)}.py`, isPackage: false },
        { path: join(base, ...segments, '__init__.py'), isPackage: true },
      ]
    : [{ path: join(base, '__init__.py'), isPackage: true }];

  const hit = candidates.find((c) => isFile(c.path));
  if (!hit) return null;

  const packageInits: ModuleLookup['packageInits'] = [];
  for (let i = 1; i < segments.length; i++) {
    const init = join(base, ...segments.slice(0, i), '__init__.py');
    if (isFile(init)) packageInits.push({ name: prefix + segments.slice(0, i).join('.'), path: init });
  }

  return { ...hit, packageInits };
}

/**
 * Directories searched for a name imported from `fromFile`, in order.
 *
 * Absolute names: the importing file's directory, then the project root.
 * Relative names: only the importing package raised by (dots - 1) levels.
 */
export function searchBases(name: string, fromFile: string, root: string): string[] {
  const { level } = parseModuleName(name);
  const dir = dirname(fromFile);
  if (level > 0) return [raise(dir, level - 1)];
  return dir === root ? [dir] : [dir, root];
}

/** First base holding `a/b/` as a plain directory: a package without `__init__.py`. */
function findNamespaceDir(bases: readonly string[], parsed: ParsedName): string | null {
  if (parsed.segments.length === 0) return null;
  for (const base of bases) {
    const dir = join(base, ...parsed.segments);
    if (isDirectory(dir)) return dir;
  }
  return null;
}

/**
 * Resolve one scanned import to local files or an external marker.
 *
 * Members of a `from` import are tried as submodules when the module is a
 * package, a directory without `__init__.py`, or dots only. In a package with
 * an `__init__.py` a member that is not a file is an attribute and yields
 * nothing; elsewhere it is recorded as external.
 */
export function resolveImport(imported: ImportedName, fromFile: string, root: string): ImportResolution[] {
  const parsed = parseModuleName(imported.module);
  const bases = searchBases(imported.module, fromFile, root);
  const bareRelative = parsed.level > 0 && parsed.segments.length === 0;

  let found: ModuleLookup | null = null;
  let foundBase = bases[0];
  for (const base of bases) {
    found = lookupUnder(base, parsed);
    if (found) {
      foundBase = base;
      break;
    }
  }

  const out: ImportResolution[] = [];
  const namespaceDir = found || bareRelative ? null : findNamespaceDir(bases, parsed);

  if (found) {
    out.push({ kind: 'local', name: imported.module, path: found.path });
    for (const init of found.packageInits) out.push({ kind: 'local', ...init });
  } else if (!bareRelative && !namespaceDir) {
    out.push({ kind: 'external', name: imported.module });
    return out;
  }

  if (!(found?.isPackage || bareRelative || namespaceDir)) return out;

  const pkgDir = found ? dirname(found.path) : namespaceDir ?? foundBase;
  const sep = bareRelative ? '' : '.';
  for (const member of imported.members) {
    if (member === '*') continue;
    const name = `${imported.module}${sep}${member}`;
    const sub = lookupUnder(pkgDir, { level: 0, segments: member.split('.') });
    if (sub) out.push({ kind: 'local', name, path: sub.path });
    else if (!found) out.push({ kind: 'external', name });
  }

  // A directory that supplied no submodule is not a local dependency.
  if (namespaceDir && !out.some((r) => r.kind === 'local')) {
    return [{ kind: 'external', name: imported.module }];
  }
  return out;
}
