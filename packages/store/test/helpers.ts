import { expect } from 'chai';

/**
 * Await a promise that must reject and return what it rejected with.
 */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  expect.fail('Should have thrown');
}

/** Let queued microtasks and timers run. */
export function flush(ms = 0): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
