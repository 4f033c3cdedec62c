/**
 * Per-invocation debug output. Set DEBUG_SWEEP=true to enable.
 */

export function isDebugEnabled(): boolean {
  return process.env.DEBUG_SWEEP === "true" || process.env.DEBUG_SWEEP === "1";
}

export function debugLog(...args: unknown[]): void {
  if (isDebugEnabled()) {
    console.log(...args);
  }
}
