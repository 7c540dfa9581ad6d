import { isPackagerError } from './errors.js';
import type { BuildReport } from './build.js';
import type { BuildUnitResult, UnitStatus } from './backend/backendTypes.js';

export const EXIT_OK = 0;
export const EXIT_UNIT_FAILED = 1;
export const EXIT_FATAL = 2;
export const EXIT_BACKEND_UNAVAILABLE = 3;
export const EXIT_CANCELLED = 130;

const MARKS: Record<UnitStatus, string> = {
  succeeded: '✓',
  failed: '✗',
  skipped: '-',
};

function indent(text: string, prefix: string): string[] {
  return text
    .replace(/\n$/, '')
    .split('\n')
    .map((l) => `${prefix}${l}`);
}

function unitLines(r: BuildUnitResult): string[] {
  const mark = MARKS[r.status];
  if (r.status === 'succeeded') {
    return [`${mark} ${r.step} ${r.unit} -> ${r.artifactPath ?? '?'}${r.cached ? ' (cached)' : ''}`];
  }
  const lines = [`${mark} ${r.step} ${r.unit}: ${r.error?.message ?? r.status}`];
  if (r.status === 'failed') {
    if (r.intermediates) lines.push(`    intermediates: ${r.intermediates}`);
    if (r.output) lines.push(...indent(r.output, '    | '));
  }
  return lines;
}

function overallStatus(report: BuildReport): string {
  if (report.cancelled) return 'cancelled';
  return report.ok ? 'ok' : 'failed';
}

/** Human summary for the CLI. */
export function formatBuildReport(report: BuildReport): string {
  const { request } = report;
  const lines = [`pyship ${request.format} build of ${request.entry}${request.includeDeps ? '' : ' (no deps)'}`];

  for (const r of report.results) lines.push(...unitLines(r));

  if (report.diagnostics.length) {
    lines.push('', 'Diagnostics:');
    for (const d of report.diagnostics) lines.push(`  ${d.code}: ${d.message}`);
  }
  if (report.warnings.length) {
    lines.push('', 'Warnings:');
    for (const w of report.warnings) lines.push(`  ${w.code}: ${w.message}`);
  }

  const failed = report.results.filter((r) => r.status === 'failed').length;
  const succeeded = report.results.filter((r) => r.status === 'succeeded').length;
  lines.push('', `Status: ${overallStatus(report)} (${succeeded} succeeded, ${failed} failed)`);
  return lines.join('\n');
}

/** JSON-safe view of a report for `--json`. */
export function reportToJson(report: BuildReport) {
  return {
    request: report.request,
    graph: {
      entry: report.graph.entry,
      root: report.graph.root,
      units: [...report.graph.units.keys()],
      edges: report.graph.edges,
      externals: Object.fromEntries(report.graph.externals),
    },
    results: report.results.map((r) => ({
      unit: r.unit,
      step: r.step,
      status: r.status,
      artifactPath: r.artifactPath,
      cached: r.cached ?? false,
      intermediates: r.intermediates,
      output: r.output,
      error: r.error ? { code: r.error.code, message: r.error.message } : undefined,
    })),
    diagnostics: report.diagnostics.map((d) => ({ code: d.code, message: d.message, path: d.details?.path })),
    warnings: report.warnings,
    ok: report.ok,
    cancelled: report.cancelled,
  };
}

/** Process exit status for a finished build, or for the error that stopped it. */
export function exitCodeFor(outcome: BuildReport | Error): number {
  if (outcome instanceof Error) {
    if (!isPackagerError(outcome)) return EXIT_FATAL;
    if (outcome.code === 'BACKEND_UNAVAILABLE') return EXIT_BACKEND_UNAVAILABLE;
    if (outcome.code === 'BUILD_CANCELLED') return EXIT_CANCELLED;
    return outcome.fatal ? EXIT_FATAL : EXIT_UNIT_FAILED;
  }
  if (outcome.cancelled) return EXIT_CANCELLED;
  return outcome.ok ? EXIT_OK : EXIT_UNIT_FAILED;
}
