import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { logDebug } from './logger.js';

export type PyshipConfig = {
  /** Python interpreter used to drive Cython and PyInstaller. */
  python?: string;
  /** Backend worker count. Defaults to the host's available parallelism. */
  concurrency?: number;
  /** Override the compile cache root (default: ~/.pyship/cache). */
  cacheDir?: string;
  /** Parent directory for per-build scratch directories (default: os.tmpdir()). */
  scratchDir?: string;
  /** Enable debug logs without env var */
  debug?: boolean;
};

export const CONFIG_FILE_NAME = 'pyship.config.js';

let cached:
  | { loaded: true; config: PyshipConfig | null }
  | { loaded: false } = { loaded: false };

function configPath(projectRoot: string) {
  return join(projectRoot, CONFIG_FILE_NAME);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null;
}

function optionalString(raw: Record<string, unknown>, key: keyof PyshipConfig, p: string): string | undefined {
  const v = raw[key];
  if (v === undefined) return undefined;
  if (typeof v !== 'string' || !v) throw new Error(`${p}: "${key}" must be a non-empty string`);
  return v;
}

/**
 * Checks the shape of a loaded config module. Unknown keys are ignored so
 * older configs keep working.
 */
export function normalizeConfig(raw: unknown, p = CONFIG_FILE_NAME): PyshipConfig {
  if (!isRecord(raw)) throw new Error(`${p}: default export must be an object`);

  const config: PyshipConfig = {
    python: optionalString(raw, 'python', p),
    cacheDir: optionalString(raw, 'cacheDir', p),
    scratchDir: optionalString(raw, 'scratchDir', p),
  };

  if (raw.concurrency !== undefined) {
    const n = raw.concurrency;
    if (typeof n !== 'number' || !Number.isInteger(n) || n < 1) {
      throw new Error(`${p}: "concurrency" must be a positive integer`);
    }
    config.concurrency = n;
  }
  if (raw.debug !== undefined) {
    if (typeof raw.debug !== 'boolean') throw new Error(`${p}: "debug" must be a boolean`);
    config.debug = raw.debug;
  }
  return config;
}

/**
 * Loads optional `pyship.config.js` from the project root.
 *
 * - Optional: if missing, returns null
 * - Cached: reads at most once per process
 */
export async function loadOptionalConfig(
  projectRoot: string = process.cwd(),
): Promise<PyshipConfig | null> {
  if (cached.loaded) return cached.config;

  const p = configPath(projectRoot);
  if (!existsSync(p)) {
    cached = { loaded: true, config: null };
    return null;
  }

  // Dynamic import so there is zero cost when config isn't present.
  const url = pathToFileURL(resolve(p)).href;
  const mod: unknown = await import(url);
  const raw = isRecord(mod) && 'default' in mod ? mod.default : mod;
  const config = normalizeConfig(raw, p);
  cached = { loaded: true, config };
  logDebug('loaded config', { path: p });
  return config;
}

/** For tests only. */
export function __resetConfigCacheForTests() {
  cached = { loaded: false };
}
