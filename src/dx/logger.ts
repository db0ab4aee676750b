const PREFIX = '[compdb-wrap]';

let enabled = false;

// Keep this extremely low overhead when disabled.
export function isDebugEnabled(): boolean {
  return enabled || process.env.COMPDB_WRAP_DEBUG === '1';
}

/**
 * Enable/disable debug logging programmatically.
 *
 * Used by the config loader (`debug: true`) and by tests.
 */
export function setDebugEnabled(v: boolean) {
  enabled = v;
}

export function logDebug(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.error(PREFIX, ...args);
}

// Warnings and errors always reach stderr: stdout belongs to make and the compiler.
export function logWarn(...args: unknown[]) {
  // eslint-disable-next-line no-console
  console.warn(PREFIX, 'warning:', ...args);
}

export function logError(...args: unknown[]) {
  // eslint-disable-next-line no-console
  console.error(PREFIX, 'error:', ...args);
}
