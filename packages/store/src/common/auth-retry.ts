import { setTimeout as sleep } from 'node:timers/promises';
import { isPermissionDenied } from './errors.js';
import { retryLog } from './logger.js';
import type { StoreAuthenticator } from './types.js';

export const DEFAULT_AUTH_RETRIES = 1;
export const DEFAULT_AUTH_RETRY_DELAY_MS = 2000;

export interface AuthRetryOptions {
  /** Retries after a permission failure (default 1) */
  maxRetries?: number;
  /** Pause after refreshing credentials (default 2000) */
  retryDelayMs?: number;
  /** Label used in log output */
  label?: string;
}

/**
 * Run a store operation after making sure the device is signed in. A
 * permission failure refreshes the credentials and retries; once the
 * retries are used up the failure surfaces unchanged.
 */
export async function withAuthRetry<T>(
  auth: StoreAuthenticator,
  operation: () => Promise<T>,
  options: AuthRetryOptions = {}
): Promise<T> {
  const maxRetries = options.maxRetries ?? DEFAULT_AUTH_RETRIES;
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_AUTH_RETRY_DELAY_MS;
  const label = options.label ?? 'operation';

  await auth.ensureAuthenticated();

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (err) {
      if (!isPermissionDenied(err) || attempt >= maxRetries) {
        throw err;
      }
      retryLog('%s denied (attempt %d), refreshing credentials', label, attempt + 1);
      await auth.refreshAuthentication();
      if (retryDelayMs > 0) {
        await sleep(retryDelayMs);
      }
    }
  }
}
