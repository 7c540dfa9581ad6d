import { copyFileSync, existsSync, mkdirSync, readFileSync, readdirSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import type { CacheEntry } from './cacheTypes.js';
import { getCacheEntry, getCacheRoot } from './cachePaths.js';

function metaPath(hash: string, root: string) {
  return join(getCacheEntry(hash, root), 'meta.json');
}

function isCacheEntry(v: unknown): v is CacheEntry {
  if (typeof v !== 'object' || v === null) return false;
  return 'hash' in v && typeof v.hash === 'string' && 'artifact' in v && typeof v.artifact === 'string';
}

export function cacheExists(hash: string, root: string = getCacheRoot()): boolean {
  return existsSync(metaPath(hash, root));
}

/** Artifact path of a usable entry, or null when missing or corrupt. */
export function lookupCachedArtifact(hash: string, root: string = getCacheRoot()): string | null {
  if (!cacheExists(hash, root)) return null;
  const entry = loadCacheEntry(hash, root);
  if (!entry) return null;
  const artifact = join(getCacheEntry(hash, root), entry.artifact);
  return existsSync(artifact) ? artifact : null;
}

export function loadCacheEntry(hash: string, root: string = getCacheRoot()): CacheEntry | null {
  const p = metaPath(hash, root);
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(p, 'utf8'));
  } catch {
    return null;
  }
  if (!isCacheEntry(parsed)) return null;

  // Update "last access" in metadata so UX doesn't depend on filesystem atime.
  // Best-effort: failure to write should never break normal loads.
  const next: CacheEntry = { ...parsed, lastAccessAt: Date.now() };
  try {
    writeFileSync(p, JSON.stringify(next, null, 2));
    return next;
  } catch {
    return parsed;
  }
}

/** Store a built artifact next to its metadata. */
export function saveCacheEntry(entry: CacheEntry, artifactFile: string, root: string = getCacheRoot()): void {
  const dir = getCacheEntry(entry.hash, root);
  mkdirSync(dir, { recursive: true });
  copyFileSync(artifactFile, join(dir, entry.artifact));
  // meta.json last: an entry without it is treated as absent.
  writeFileSync(join(dir, 'meta.json'), JSON.stringify(entry, null, 2));
}

export type CacheStats = {
  entries: number;
  bytes: number;
  lastAccessAt: number | null;
};

function folderSizeBytes(dir: string): number {
  let bytes = 0;
  for (const ent of readdirSync(dir, { withFileTypes: true })) {
    const p = join(dir, ent.name);
    if (ent.isDirectory()) bytes += folderSizeBytes(p);
    else if (ent.isFile()) bytes += statSync(p).size;
  }
  return bytes;
}

export function cacheStats(root: string = getCacheRoot()): CacheStats {
  if (!existsSync(root)) return { entries: 0, bytes: 0, lastAccessAt: null };

  let entries = 0;
  let lastAccessAt: number | null = null;
  for (const ent of readdirSync(root, { withFileTypes: true })) {
    if (!ent.isDirectory()) continue;
    entries++;
    try {
      const meta: unknown = JSON.parse(readFileSync(join(root, ent.name, 'meta.json'), 'utf8'));
      if (isCacheEntry(meta) && typeof meta.lastAccessAt === 'number') {
        lastAccessAt = Math.max(lastAccessAt ?? 0, meta.lastAccessAt);
      }
    } catch {
      // broken entries still count toward size
    }
  }
  return { entries, bytes: folderSizeBytes(root), lastAccessAt };
}

export function cleanCache(root: string = getCacheRoot()): void {
  rmSync(root, { recursive: true, force: true });
}
