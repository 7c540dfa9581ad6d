import { performance } from 'node:perf_hooks';

export type TraceLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVELS: readonly TraceLevel[] = ['error', 'warn', 'info', 'debug'];

/** Index of the most verbose level to emit, or -1 when tracing is off. */
function threshold(): number {
  const on = process.env.PYSHIP_TRACE;
  if (on !== '1' && on !== 'true') return -1;
  const wanted = (process.env.PYSHIP_TRACE_LEVEL ?? '').toLowerCase();
  const i = LEVELS.findIndex((l) => l === wanted);
  return i < 0 ? LEVELS.indexOf('info') : i;
}

export function isTraceEnabled(): boolean {
  return threshold() >= 0;
}

export function shouldTrace(level: TraceLevel): boolean {
  return LEVELS.indexOf(level) <= threshold();
}

/**
 * One JSON line per pipeline event. Events are named `<stage>.<what>`
 * (`resolve.begin`, `invoke.unit.failed`) and the stage is split out so a
 * trace can be filtered per pipeline stage.
 */
function emit(level: TraceLevel, event: string, data: unknown) {
  if (!shouldTrace(level)) return;
  const dot = event.indexOf('.');
  const line = {
    t: Number(performance.now().toFixed(3)),
    level,
    stage: dot < 0 ? event : event.slice(0, dot),
    event,
    ...(data === undefined ? {} : { data }),
  };
  // eslint-disable-next-line no-console
  console.log('[pyship:trace]', JSON.stringify(line));
}

export function traceError(event: string, data?: unknown) {
  emit('error', event, data);
}

export function traceWarn(event: string, data?: unknown) {
  emit('warn', event, data);
}

export function traceInfo(event: string, data?: unknown) {
  emit('info', event, data);
}

export function traceDebug(event: string, data?: unknown) {
  emit('debug', event, data);
}
