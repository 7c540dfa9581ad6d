import { copyFileSync, existsSync, readdirSync } from 'node:fs';
import { basename, join } from 'node:path';

import { PackagerError, errorMessage } from '../errors.js';

/** Copy a unit's source into its scratch directory; unreadable sources fail the unit. */
export function copySourceInto(source: string, scratchDir: string): string {
  const dest = join(scratchDir, basename(source));
  try {
    copyFileSync(source, dest);
  } catch (err) {
    throw new PackagerError('SOURCE_UNREADABLE', `Cannot read source ${source}: ${errorMessage(err)}`, {
      path: source,
      cause: errorMessage(err),
    });
  }
  return dest;
}

/** First file under `dir` (depth first, sorted) whose name ends with `suffix`. */
export function findFileBySuffix(dir: string, suffix: string): string | null {
  if (!existsSync(dir)) return null;
  const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) => (a.name < b.name ? -1 : 1));
  for (const ent of entries) {
    const p = join(dir, ent.name);
    if (ent.isFile() && ent.name.endsWith(suffix)) return p;
    if (ent.isDirectory()) {
      const nested = findFileBySuffix(p, suffix);
      if (nested) return nested;
    }
  }
  return null;
}
