// Test-only stand-in for a Python interpreter: a POSIX shell script that
// answers the version checks and build commands pyship sends.
import { chmodSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export type FakePythonOptions = {
  /** Version printed for `import Cython`; omit to make the import fail. */
  cython?: string;
  /** Version printed for `import PyInstaller`; omit to make the import fail. */
  pyinstaller?: string;
  /** Exit status of `setup.py build_ext` and `-m PyInstaller`. */
  buildExit?: number;
  /** When false the build "succeeds" without writing its artifact. */
  writeArtifact?: boolean;
};

export type FakePython = {
  path: string;
  /** Build commands run so far, one per line. */
  builds(): string[];
};

export function createFakePython(options: FakePythonOptions = {}): FakePython {
  const dir = mkdtempSync(join(tmpdir(), 'pyship-fakepy-'));
  const path = join(dir, 'python3');
  const log = join(dir, 'builds.log');
  const exit = options.buildExit ?? 0;
  const write = options.writeArtifact ?? true;
  const versionCheck = (version: string | undefined) => (version ? `echo ${version}; exit 0` : 'exit 1');

  const script = `#!/bin/sh
case "$1" in
  --version)
    echo "Python 3.12.1"
    exit 0
    ;;
  -c)
    case "$2" in
      *Cython*) ${versionCheck(options.cython)} ;;
      *PyInstaller*) ${versionCheck(options.pyinstaller)} ;;
    esac
    exit 1
    ;;
  setup.py)
    echo "setup.py" >> "${log}"
    echo "cython ran"
    if [ ${exit} -ne 0 ]; then echo "error: cannot compile" >&2; exit ${exit}; fi
    if [ ${write ? 1 : 0} -eq 1 ]; then mkdir -p "$6/pkg"; printf 'EXT' > "$6/pkg/mod.cpython-312-x86_64-linux-gnu.so"; fi
    exit 0
    ;;
  -m)
    echo "pyinstaller" >> "${log}"
    name=""
    dist=""
    while [ $# -gt 0 ]; do
      case "$1" in
        --name) name="$2"; shift ;;
        --distpath) dist="$2"; shift ;;
      esac
      shift
    done
    echo "pyinstaller ran"
    if [ ${exit} -ne 0 ]; then echo "error: cannot bundle" >&2; exit ${exit}; fi
    if [ ${write ? 1 : 0} -eq 1 ]; then mkdir -p "$dist"; printf 'EXE' > "$dist/$name"; fi
    exit 0
    ;;
esac
exit 2
`;
  writeFileSync(path, script);
  chmodSync(path, 0o755);

  return {
    path,
    builds() {
      try {
        return readFileSync(log, 'utf8').split('\n').filter(Boolean);
      } catch {
        return [];
      }
    },
  };
}
