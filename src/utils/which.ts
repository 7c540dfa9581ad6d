import { accessSync, constants } from 'node:fs';
import { delimiter, join } from 'node:path';

const WINDOWS_EXTS = ['.exe', '.cmd', '.bat', ''];

export function which(cmd: string, pathEnv: string | undefined = process.env.PATH): string | null {
  const dirs = pathEnv?.split(delimiter).filter(Boolean) ?? [];
  const exts = process.platform === 'win32' ? WINDOWS_EXTS : [''];
  for (const dir of dirs) {
    for (const ext of exts) {
      const full = join(dir, `${cmd}${ext}`);
      try {
        accessSync(full, constants.X_OK);
        return full;
      } catch {
        // not here; keep looking
      }
    }
  }
  return null;
}
