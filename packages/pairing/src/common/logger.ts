/**
 * Debug logger setup for pairing.
 *
 * Uses the 'debug' library for configurable, namespace-based logging.
 */

import debug from 'debug';

const ROOT_NAMESPACE = 'anchorwatch:pairing';

/**
 * Create a namespaced logger.
 *
 * @param namespace - Sub-namespace (e.g., 'session', 'role', 'sync')
 */
export function createLogger(namespace: string): debug.Debugger {
  return debug(`${ROOT_NAMESPACE}:${namespace}`);
}

/**
 * Turn on debug output for the given namespaces (all anchorwatch output by default).
 */
export function enableLogging(namespaces = 'anchorwatch:*'): void {
  debug.enable(namespaces);
}

// Pre-created loggers for common namespaces
export const sessionLog = createLogger('session');
export const roleLog = createLogger('role');
export const syncLog = createLogger('sync');
export const streamLog = createLogger('streams');
export const persistenceLog = createLogger('persistence');
export const configLog = createLogger('config');
export const clientLog = createLogger('client');
