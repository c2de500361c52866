let enabled = false;

// Checked on every call; stays a flag read and an env lookup.
export function isDebugEnabled(): boolean {
  return enabled || process.env.ENGINEBIND_DEBUG === '1';
}

/**
 * Enable/disable enginebind debug logging programmatically.
 *
 * Used by the CLI (`debug` config key) and by tests.
 */
export function setDebugEnabled(v: boolean) {
  enabled = v;
}

export function logDebug(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.log('[enginebind]', ...args);
}

export function logWarn(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.warn('[enginebind]', ...args);
}
