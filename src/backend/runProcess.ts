import { spawn } from 'node:child_process';

import { PackagerError } from '../errors.js';
import { logDebug } from '../dx/logger.js';

export type ProcessResult = {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
};

export type RunProcessOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Aborting kills the child and rejects with BUILD_CANCELLED. */
  signal?: AbortSignal;
};

function cancelled(cmd: string): PackagerError {
  return new PackagerError('BUILD_CANCELLED', `Cancelled while running ${cmd}`, { tool: cmd });
}

/**
 * Spawn a backend tool and capture its output verbatim.
 *
 * Resolves with the exit status whatever it is; interpreting a non-zero
 * code is up to the caller. Rejects only when the tool cannot be started or
 * the run was cancelled.
 */
export function runProcess(cmd: string, args: string[], options: RunProcessOptions = {}): Promise<ProcessResult> {
  const { signal } = options;

  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelled(cmd));
      return;
    }

    logDebug('spawn', { cmd, args, cwd: options.cwd });
    const child = spawn(cmd, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      signal,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.on('error', (err) => {
      if (signal?.aborted) {
        reject(cancelled(cmd));
        return;
      }
      reject(
        new PackagerError('BACKEND_INVOCATION_FAILED', `Failed to start ${cmd}: ${err.message}`, {
          tool: cmd,
          cause: err.message,
        }),
      );
    });

    child.on('close', (code, sig) => {
      if (signal?.aborted) {
        reject(cancelled(cmd));
        return;
      }
      resolve({
        code,
        signal: sig,
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
      });
    });
  });
}

export function combinedOutput(result: Pick<ProcessResult, 'stdout' | 'stderr'>): string {
  return [result.stdout, result.stderr].filter(Boolean).join('');
}
