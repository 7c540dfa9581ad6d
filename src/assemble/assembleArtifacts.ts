import { existsSync, mkdirSync, readdirSync, readFileSync, rmdirSync, rmSync } from 'node:fs';

import { errorMessage } from '../errors.js';
import type { BuildRequest } from '../request.js';
import type { BuildUnitResult } from '../backend/backendTypes.js';
import { logDebug } from '../dx/logger.js';
import { traceDebug, traceWarn } from '../dx/trace.js';
import { warn, type PyshipWarning } from '../dx/warnings.js';
import { bannerInjectorFor, type BannerInjector } from './banner.js';

export type AssembleOptions = {
  /** Parent of the per-step scratch directories; removed when left empty. */
  scratchRoot: string;
  /** Replaces the format's default banner injector. */
  injector?: BannerInjector;
};

export type AssembleOutcome = {
  results: BuildUnitResult[];
  warnings: PyshipWarning[];
};

export function prepareOutputDir(outDir: string): void {
  mkdirSync(outDir, { recursive: true });
}

function record(warnings: PyshipWarning[], w: PyshipWarning) {
  warn(w);
  warnings.push(w);
}

function readBanner(path: string, warnings: PyshipWarning[]): Uint8Array | null {
  try {
    return readFileSync(path);
  } catch (err) {
    record(warnings, {
      code: 'BANNER_INJECTION_FAILED',
      message: `Cannot read banner ${path}: ${errorMessage(err)}`,
      hint: 'Artifacts were published without a banner.',
    });
    return null;
  }
}

function injectBanners(
  results: readonly BuildUnitResult[],
  request: BuildRequest,
  injector: BannerInjector,
  warnings: PyshipWarning[],
) {
  if (!request.banner) return;
  const targets = results.filter((r) => r.status === 'succeeded' && r.artifactPath);
  if (targets.length === 0) return;

  const banner = readBanner(request.banner, warnings);
  if (!banner) return;

  for (const r of targets) {
    if (!r.artifactPath) continue;
    try {
      injector.inject(r.artifactPath, banner);
      traceDebug('assemble.banner', { artifact: r.artifactPath, injector: injector.name });
    } catch (err) {
      record(warnings, {
        code: 'BANNER_INJECTION_FAILED',
        message: `Cannot stamp banner into ${r.artifactPath}: ${errorMessage(err)}`,
      });
    }
  }
}

function cleanIntermediates(result: BuildUnitResult, warnings: PyshipWarning[]): BuildUnitResult {
  if (!result.intermediates) return result;
  if (result.status === 'failed') {
    record(warnings, {
      code: 'INTERMEDIATES_KEPT',
      message: `Kept intermediates of ${result.unit} in ${result.intermediates}`,
    });
    return result;
  }
  rmSync(result.intermediates, { recursive: true, force: true });
  const cleaned = { ...result };
  delete cleaned.intermediates;
  return cleaned;
}

function removeIfEmpty(dir: string) {
  if (!existsSync(dir)) return;
  if (readdirSync(dir).length > 0) {
    logDebug('scratch root kept', { dir });
    return;
  }
  rmdirSync(dir);
}

/**
 * Final stage: stamp banners into published artifacts and clear scratch
 * space. Nothing here changes a unit's status; banner problems become
 * warnings and the unbannered artifact stays in place.
 */
export function assembleArtifacts(
  results: readonly BuildUnitResult[],
  request: BuildRequest,
  options: AssembleOptions,
): AssembleOutcome {
  prepareOutputDir(request.outDir);
  const warnings: PyshipWarning[] = [];

  injectBanners(results, request, options.injector ?? bannerInjectorFor(request.format), warnings);

  const cleaned = results.map((r) => cleanIntermediates(r, warnings));
  removeIfEmpty(options.scratchRoot);

  if (warnings.length > 0) traceWarn('assemble.warnings', { count: warnings.length });
  return { results: cleaned, warnings };
}
