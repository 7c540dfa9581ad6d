import { join } from 'node:path';

import type { BundleStep, CompileStep } from '../plan/planTypes.js';
import type { PlatformInfo } from './detectPlatform.js';

// JSON string literals are valid Python string literals.
const py = (s: string) => JSON.stringify(s);

/**
 * setup.py driving `cythonize` for one module. The source is copied next to
 * the script so relative paths stay inside the scratch directory.
 */
export function renderSetupScript(step: CompileStep, sourceName: string): string {
  const directives = step.optimize
    ? `{"language_level": 3, "boundscheck": False, "wraparound": False, "optimize.use_switch": True}`
    : `{"language_level": 3}`;
  const compileArgs = step.optimize ? `["/O2"] if os.name == "nt" else ["-O3"]` : `["/Od"] if os.name == "nt" else ["-O0"]`;

  return [
    'import os',
    'from setuptools import Extension, setup',
    'from Cython.Build import cythonize',
    '',
    `extra_compile_args = ${compileArgs}`,
    '',
    'setup(',
    `    name=${py(step.moduleName)},`,
    '    ext_modules=cythonize(',
    `        [Extension(${py(step.moduleName)}, [${py(sourceName)}], extra_compile_args=extra_compile_args)],`,
    `        compiler_directives=${directives},`,
    '    ),',
    ')',
    '',
  ].join('\n');
}

export function buildExtArgs(scratchDir: string): string[] {
  return [
    'setup.py',
    'build_ext',
    '--build-temp',
    join(scratchDir, 'build_temp'),
    '--build-lib',
    join(scratchDir, 'build_lib'),
  ];
}

/** `python -m PyInstaller` arguments for a single-file executable. */
export function pyinstallerArgs(step: BundleStep, scratchDir: string, platform: PlatformInfo): string[] {
  const args = [
    '-m',
    'PyInstaller',
    '--noconfirm',
    '--clean',
    '--onefile',
    '--name',
    step.name,
    '--distpath',
    join(scratchDir, 'dist'),
    '--workpath',
    join(scratchDir, 'work'),
    '--specpath',
    scratchDir,
  ];

  for (const p of step.searchPaths) args.push('--paths', p);
  for (const dep of step.additional) args.push('--hidden-import', dep.moduleName);

  if (step.optimize) {
    // strip(1) does not exist on Windows.
    if (!platform.isWindows) args.push('--strip');
    args.push('--optimize', '2');
  }

  args.push(step.unit);
  return args;
}
