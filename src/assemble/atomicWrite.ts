import { randomBytes } from 'node:crypto';
import { copyFileSync, mkdirSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';

function tempNameFor(dest: string): string {
  return join(dirname(dest), `.${basename(dest)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`);
}

function replaceVia(dest: string, write: (tmp: string) => void): void {
  mkdirSync(dirname(dest), { recursive: true });
  const tmp = tempNameFor(dest);
  try {
    write(tmp);
    renameSync(tmp, dest);
  } catch (err) {
    rmSync(tmp, { force: true });
    throw err;
  }
}

/**
 * Copy `src` over `dest` so that `dest` is either the old file or the
 * complete new one, never a partial write. The temporary file lives in the
 * destination directory so the rename stays on one filesystem.
 */
export function atomicCopy(src: string, dest: string): void {
  replaceVia(dest, (tmp) => copyFileSync(src, tmp));
}

export function atomicWriteFile(dest: string, data: Uint8Array, mode?: number): void {
  replaceVia(dest, (tmp) => writeFileSync(tmp, data, mode === undefined ? undefined : { mode }));
}
