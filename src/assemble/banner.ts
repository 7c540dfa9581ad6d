import { readFileSync, statSync } from 'node:fs';
import { unzipSync, zipSync, type Zippable } from 'fflate';

import type { TargetFormat } from '../request.js';
import { ARCHIVE_MTIME } from '../backend/archiveBackend.js';
import { atomicWriteFile } from './atomicWrite.js';

export const BANNER_ENTRY_NAME = 'PYSHIP_BANNER.txt';
export const BANNER_BEGIN = '\n--PYSHIP-BANNER-BEGIN--\n';
export const BANNER_END = '\n--PYSHIP-BANNER-END--\n';

/** Post-processing step that stamps a banner into a finished artifact. */
export interface BannerInjector {
  readonly name: string;
  inject(artifactPath: string, banner: Uint8Array): void;
}

/** Re-packs the archive with the banner as an extra entry; existing entries are untouched. */
export const zipEntryInjector: BannerInjector = {
  name: 'zip-entry',
  inject(artifactPath, banner) {
    const existing = unzipSync(readFileSync(artifactPath));
    const files: Zippable = {};
    for (const [name, data] of Object.entries(existing)) {
      if (name === BANNER_ENTRY_NAME) continue;
      files[name] = [data, { mtime: ARCHIVE_MTIME }];
    }
    files[BANNER_ENTRY_NAME] = [banner, { mtime: ARCHIVE_MTIME }];
    atomicWriteFile(artifactPath, zipSync(files, { level: 6 }));
  },
};

/**
 * Appends a delimited trailer. Loaders of ELF, Mach-O and PE images ignore
 * bytes past the last section, so the binary keeps working.
 */
export const trailerInjector: BannerInjector = {
  name: 'trailer',
  inject(artifactPath, banner) {
    const { mode } = statSync(artifactPath);
    const body = readFileSync(artifactPath);
    const stamped = Buffer.concat([body, Buffer.from(BANNER_BEGIN), banner, Buffer.from(BANNER_END)]);
    atomicWriteFile(artifactPath, stamped, mode & 0o777);
  },
};

export function bannerInjectorFor(format: TargetFormat): BannerInjector {
  return format === 'zip' ? zipEntryInjector : trailerInjector;
}

/** Banner bytes of a trailer-stamped artifact, or null if there is none. */
export function readBannerTrailer(bytes: Uint8Array): Buffer | null {
  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (!buf.subarray(buf.length - BANNER_END.length).equals(Buffer.from(BANNER_END))) return null;
  const begin = buf.lastIndexOf(BANNER_BEGIN);
  if (begin < 0) return null;
  return buf.subarray(begin + BANNER_BEGIN.length, buf.length - BANNER_END.length);
}
