import type { BuildRequestInput } from './request.js';

export type BuildCommand = {
  command: 'build';
  input: BuildRequestInput;
  useCache: boolean;
  concurrency?: number;
  json: boolean;
};

export type CliCommand =
  | BuildCommand
  | { command: 'doctor' }
  | { command: 'cache'; action: 'status' | 'clean' }
  | { command: 'help' };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const VALUE_FLAGS = new Map<string, 'outDir' | 'format' | 'banner' | 'concurrency'>([
  ['-o', 'outDir'],
  ['--output', 'outDir'],
  ['-f', 'format'],
  ['--format', 'format'],
  ['-b', 'banner'],
  ['--banner', 'banner'],
  ['--concurrency', 'concurrency'],
]);

export const USAGE = `pyship

Usage:
  pyship <source.py> [-o|--output <dir>] [-f|--format pyd|so|exe|zip]
                     [--no-deps] [--no-optimize] [-b|--banner <file>]
                     [--no-cache] [--concurrency <n>] [--json]
  pyship doctor
  pyship cache status
  pyship cache clean

Examples:
  pyship app.py -f exe -o dist
  pyship tool.py -f zip --no-deps
  pyship lib.py -b NOTICE.txt

Notes:
  - Output defaults to the current directory
  - Format defaults to pyd on Windows and so elsewhere
  - Compiled units are cached under ~/.pyship/cache (disable with --no-cache)
`;

function parsePositiveInt(flag: string, raw: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) throw new CliUsageError(`Invalid ${flag} (expected a positive integer): ${raw}`);
  return n;
}

function parseBuild(argv: readonly string[]): BuildCommand {
  const input: Partial<BuildRequestInput> = {};
  const cmd: Omit<BuildCommand, 'input'> = { command: 'build', useCache: true, json: false };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    const valueKey = VALUE_FLAGS.get(a);
    if (valueKey) {
      const v = argv[i + 1];
      if (v === undefined || v.startsWith('-')) throw new CliUsageError(`Missing value for ${a}`);
      i++;
      if (valueKey === 'concurrency') cmd.concurrency = parsePositiveInt(a, v);
      else input[valueKey] = v;
      continue;
    }
    switch (a) {
      case '--no-deps':
        input.includeDeps = false;
        break;
      case '--no-optimize':
        input.optimize = false;
        break;
      case '--no-cache':
        cmd.useCache = false;
        break;
      case '--json':
        cmd.json = true;
        break;
      default:
        if (a.startsWith('-')) throw new CliUsageError(`Unknown option: ${a}`);
        if (input.entry !== undefined) throw new CliUsageError(`Unexpected argument: ${a}`);
        input.entry = a;
    }
  }

  const { entry } = input;
  if (entry === undefined) throw new CliUsageError('Missing source file');
  return { ...cmd, input: { ...input, entry } };
}

/** Parse `process.argv.slice(2)`. Throws CliUsageError on bad input. */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [first, ...rest] = argv;
  if (first === undefined || first === '-h' || first === '--help') return { command: 'help' };

  if (first === 'doctor') {
    if (rest.length) throw new CliUsageError(`Unexpected argument: ${rest[0]}`);
    return { command: 'doctor' };
  }
  if (first === 'cache') {
    const [action, extra] = rest;
    if (action !== 'status' && action !== 'clean') throw new CliUsageError('Usage: pyship cache <status|clean>');
    if (extra !== undefined) throw new CliUsageError(`Unexpected argument: ${extra}`);
    return { command: 'cache', action };
  }
  return parseBuild(argv);
}
