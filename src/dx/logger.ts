let enabled = false;

// Keep this extremely low overhead when disabled.
export function isDebugEnabled(): boolean {
  return enabled || process.env.PYSHIP_DEBUG === '1';
}

/**
 * Enable/disable pyship debug logging programmatically.
 *
 * The CLI flips this on when `pyship.config.js` sets `debug: true`.
 */
export function setDebugEnabled(v: boolean) {
  enabled = v;
}

export function logDebug(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.log('[pyship]', ...args);
}

export function logInfo(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.log('[pyship]', ...args);
}

export function logWarn(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.warn('[pyship]', ...args);
}
