import { basename, relative, sep } from 'node:path';

import type { PlatformInfo } from '../backend/detectPlatform.js';

/** Suffix the host Python loads extension modules from. */
export function getExtensionSuffix(platform: PlatformInfo): '.pyd' | '.so' {
  return platform.isWindows ? '.pyd' : '.so';
}

export function getExecutableName(stem: string, platform: PlatformInfo): string {
  return platform.isWindows ? `${stem}.exe` : stem;
}

export function getArchiveName(stem: string, includeDeps: boolean): string {
  return includeDeps ? `${stem}_with_deps.zip` : `${stem}.zip`;
}

export function sourceStem(path: string): string {
  return basename(path).replace(/\.py$/i, '');
}

/**
 * Path of a unit relative to the project root with `/` separators. Units that
 * live above the root keep their shape, with each `..` segment spelled
 * `_parent` so nothing escapes the output directory.
 */
export function unitRelativePath(root: string, path: string): string {
  return relative(root, path)
    .split(sep)
    .map((s) => (s === '..' ? '_parent' : s))
    .join('/');
}

export function isUnderRoot(root: string, path: string): boolean {
  const rel = relative(root, path);
  return rel !== '' && !rel.startsWith('..');
}

/** Dotted import name of a unit: `pkg/sub/__init__.py` -> `pkg.sub`. */
export function moduleNameFor(root: string, path: string): string {
  if (!isUnderRoot(root, path)) return sourceStem(path);
  const parts = unitRelativePath(root, path).replace(/\.py$/i, '').split('/');
  if (parts.length > 1 && parts[parts.length - 1] === '__init__') parts.pop();
  return parts.join('.');
}
