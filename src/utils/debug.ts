/**
 * Check if debug mode is enabled.
 * Debug mode can be enabled via:
 * - ARGTREE_DEBUG=1 environment variable
 * - `debug: true` in the parser configuration
 */
export function isDebugMode(configFlag?: boolean): boolean {
  return process.env.ARGTREE_DEBUG === '1' || configFlag === true;
}

/**
 * Write a trace line to stderr
 */
export function debugLog(scope: string, message: string): void {
  console.error(`[DEBUG] ${scope}: ${message}`);
}
