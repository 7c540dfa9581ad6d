import { readFileSync, writeFileSync } from 'node:fs';
import { basename, join } from 'node:path';
import { zipSync, type Zippable } from 'fflate';

import { PackagerError, errorMessage } from '../errors.js';
import type { ArchiveMember, ArchiveStep } from '../plan/planTypes.js';
import type { BackendOutput, BackendRunContext, BuildBackend } from './backendTypes.js';

/**
 * Every entry gets the same timestamp so two builds of the same sources are
 * byte-identical. ZIP (DOS) dates start in 1980.
 */
export const ARCHIVE_MTIME = new Date(1980, 0, 2);

export function buildArchive(members: readonly ArchiveMember[]): Uint8Array {
  const files: Zippable = {};
  for (const m of members) {
    let data: Uint8Array;
    try {
      data = readFileSync(m.source);
    } catch (err) {
      throw new PackagerError('SOURCE_UNREADABLE', `Cannot read source ${m.source}: ${errorMessage(err)}`, {
        path: m.source,
        cause: errorMessage(err),
      });
    }
    files[m.name] = [data, { mtime: ARCHIVE_MTIME }];
  }
  return zipSync(files, { level: 6 });
}

/** In-process zip backend; there is no external tool to go missing. */
export function createArchiveBackend(): BuildBackend<ArchiveStep> {
  return {
    name: 'zip',
    kind: 'archive',
    ensureAvailable() {
      // fflate is a dependency, always present.
    },
    async run(step: ArchiveStep, ctx: BackendRunContext): Promise<BackendOutput> {
      const bytes = buildArchive(step.members);
      const artifact = join(ctx.scratchDir, basename(step.outputPath));
      writeFileSync(artifact, bytes);
      const output = step.members.map((m) => `adding: ${m.name}\n`).join('');
      return { artifact, output };
    },
  };
}
