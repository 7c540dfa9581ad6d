import { execFileSync } from 'node:child_process';

import { PackagerError } from '../errors.js';
import { which } from '../utils/which.js';
import { logDebug } from '../dx/logger.js';
import type { PythonToolchain, ToolInfo } from './backendTypes.js';

const detected = new Map<string, PythonToolchain>();

function getVersion(path: string): string {
  try {
    return execFileSync(path, ['--version'], { encoding: 'utf8', stdio: ['ignore', 'pipe', 'pipe'] })
      .split('\n')[0]
      .trim();
  } catch {
    return 'unknown';
  }
}

/** Version of an importable module, or null when the import fails. */
function moduleVersion(python: string, module: string): string | null {
  try {
    const out = execFileSync(python, ['-c', `import ${module}; print(getattr(${module}, '__version__', 'unknown'))`], {
      encoding: 'utf8',
      stdio: ['ignore', 'pipe', 'ignore'],
    });
    return out.trim() || 'unknown';
  } catch {
    return null;
  }
}

export function detectPython(preferred?: string): ToolInfo {
  const candidates = [preferred, process.env.PYSHIP_PYTHON, 'python3', 'python'].filter(
    (c): c is string => Boolean(c),
  );

  for (const name of candidates) {
    const resolved = name.includes('/') || name.includes('\\') ? name : which(name);
    if (!resolved) continue;
    return { path: resolved, version: getVersion(resolved) };
  }

  throw new PackagerError('BACKEND_UNAVAILABLE', 'No Python interpreter found (tried python3, python)', {
    tool: 'python',
  });
}

/**
 * Find the interpreter and the packaging modules importable from it.
 * Results are memoized per interpreter for the life of the process.
 */
export function detectToolchain(preferred?: string): PythonToolchain {
  const python = detectPython(preferred);
  const hit = detected.get(python.path);
  if (hit) return hit;

  const toolchain: PythonToolchain = {
    python,
    cython: moduleVersion(python.path, 'Cython') ?? undefined,
    pyinstaller: moduleVersion(python.path, 'PyInstaller') ?? undefined,
  };
  logDebug('toolchain', toolchain);
  detected.set(python.path, toolchain);
  return toolchain;
}
