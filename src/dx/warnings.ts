import { logWarn } from './logger.js';

export type PyshipWarningCode =
  | 'BANNER_INJECTION_FAILED'
  | 'SOURCE_UNREADABLE'
  | 'INTERMEDIATES_KEPT'
  | 'CACHE_WRITE_FAILED';

export type PyshipWarning = {
  code: PyshipWarningCode;
  message: string;
  hint?: string;
};

/**
 * Emit a non-fatal warning.
 *
 * This must never throw and must not print unless debug logging is enabled.
 * Callers that need the warning later (the build report) keep their own copy.
 */
export function warn(w: PyshipWarning) {
  try {
    const hint = w.hint ? ` Hint: ${w.hint}` : '';
    logWarn(`warning(${w.code}): ${w.message}${hint}`);
  } catch {
    // Never throw from warnings.
  }
}
