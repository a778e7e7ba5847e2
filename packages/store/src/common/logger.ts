/**
 * Debug logger setup for the remote store adapter.
 *
 * Uses the 'debug' library for configurable, namespace-based logging.
 */

import debug from 'debug';

const ROOT_NAMESPACE = 'anchorwatch:store';

/**
 * Create a namespaced logger.
 *
 * @param namespace - Sub-namespace (e.g., 'memory', 'ws', 'retry')
 */
export function createLogger(namespace: string): debug.Debugger {
  return debug(`${ROOT_NAMESPACE}:${namespace}`);
}

export const memoryLog = createLogger('memory');
export const wsLog = createLogger('ws');
export const retryLog = createLogger('retry');
