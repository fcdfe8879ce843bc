/**
 * ID generation utilities
 */

/**
 * Generate a unique identifier optionally prefixed with a label.
 *
 * @example
 *   generateId()           // "1714000000000_k3j8f9d2x"
 *   generateId('session')  // "session_1714000000000_k3j8f9d2x"
 */
export function generateId(prefix = ''): string {
  const ts = Date.now();
  const rand = Math.random().toString(36).slice(2, 11);
  return prefix ? `${prefix}_${ts}_${rand}` : `${ts}_${rand}`;
}
