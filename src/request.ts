import { resolve } from 'node:path';

import { PackagerError } from './errors.js';

export const TARGET_FORMATS = ['pyd', 'so', 'exe', 'zip'] as const;

export type TargetFormat = (typeof TARGET_FORMATS)[number];

export type BuildRequest = Readonly<{
  entry: string;
  outDir: string;
  format: TargetFormat;
  includeDeps: boolean;
  optimize: boolean;
  banner?: string;
}>;

export type BuildRequestInput = {
  entry: string;
  outDir?: string;
  format?: string;
  includeDeps?: boolean;
  optimize?: boolean;
  banner?: string;
};

export function isTargetFormat(value: string): value is TargetFormat {
  return (TARGET_FORMATS as readonly string[]).includes(value);
}

/** The host's native extension flavour: `pyd` on Windows, `so` elsewhere. */
export function defaultFormat(platform: NodeJS.Platform = process.platform): TargetFormat {
  return platform === 'win32' ? 'pyd' : 'so';
}

export function parseFormat(value: string): TargetFormat {
  const v = value.trim().toLowerCase();
  if (!isTargetFormat(v)) {
    throw new PackagerError(
      'UNSUPPORTED_FORMAT',
      `Unsupported format "${value}" (expected one of: ${TARGET_FORMATS.join(', ')})`,
      { value },
    );
  }
  return v;
}

/**
 * Validate user input into the immutable request for one build.
 * Paths are made absolute against the current directory.
 */
export function createBuildRequest(input: BuildRequestInput, cwd: string = process.cwd()): BuildRequest {
  const request: BuildRequest = {
    entry: resolve(cwd, input.entry),
    outDir: resolve(cwd, input.outDir ?? '.'),
    format: input.format === undefined ? defaultFormat() : parseFormat(input.format),
    includeDeps: input.includeDeps ?? true,
    optimize: input.optimize ?? true,
    ...(input.banner ? { banner: resolve(cwd, input.banner) } : {}),
  };
  return Object.freeze(request);
}
