import type { BackendSet } from './backendTypes.js';
import type { PlatformInfo } from './detectPlatform.js';
import { createArchiveBackend } from './archiveBackend.js';
import { createCythonBackend } from './cythonBackend.js';
import { createPyinstallerBackend } from './pyinstallerBackend.js';

export type DefaultBackendOptions = {
  python?: string;
  platform?: PlatformInfo;
  /** Compile cache root; `null` disables caching. */
  cacheRoot?: string | null;
};

/**
 * Cython for dynamic libraries, PyInstaller for executables, fflate for
 * archives. Tool detection is deferred to `ensureAvailable`, so only the
 * backends a plan uses ever query the interpreter.
 */
export function createDefaultBackends(options: DefaultBackendOptions = {}): BackendSet {
  return {
    compile: createCythonBackend(options),
    bundle: createPyinstallerBackend(options),
    archive: createArchiveBackend(),
  };
}
