import { expect } from 'chai';
import type { MemoryBackend, MemoryRemoteStore, StoreObject } from '@anchorwatch/store';
import { createPairingClient, type PairingClient } from '../src/client/pairing-client.js';
import { DEFAULT_PAIRING_CONFIG, type PairingConfig } from '../src/config/types.js';
import { mergePairingConfig } from '../src/config/loader.js';
import { MemoryLocalPersistence } from '../src/persistence/local-persistence.js';
import { DomainDataSource } from '../src/sync/domain-source.js';

export const DAY_MS = 24 * 60 * 60 * 1000;
export const START_TIME = 1_700_000_000_000;

/** No pause between auth retries. */
export const testConfig: PairingConfig = mergePairingConfig(DEFAULT_PAIRING_CONFIG, {
  auth: { retryDelayMs: 0 },
});

export class TestClock {
  time: number;

  constructor(time = START_TIME) {
    this.time = time;
  }

  readonly now = (): number => this.time;

  advance(ms: number): void {
    this.time += ms;
  }
}

/** A valid 32-character token: prefix then zero-padded number. */
export function token(n: number, prefix = 'T'): string {
  return `${prefix}${String(n).padStart(32 - prefix.length, '0')}`;
}

export function tokenSequence(prefix = 'T'): () => string {
  let n = 0;
  return () => token(++n, prefix);
}

/**
 * A stored session record owned by `owner`.
 */
export function sessionRecord(owner: string, createdAt: number, overrides: StoreObject = {}): StoreObject {
  return {
    ownerIdentity: owner,
    devices: { [owner]: { deviceId: owner, role: 'primary', joinedAt: createdAt } },
    createdAt,
    expiresAt: createdAt + DAY_MS,
    isActive: true,
    ...overrides,
  };
}

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

export async function settle(): Promise<void> {
  await flush();
  await flush();
}

export interface TestDevice {
  store: MemoryRemoteStore;
  persistence: MemoryLocalPersistence;
  producer: DomainDataSource;
  client: PairingClient;
}

/**
 * One simulated device on a shared backend.
 */
export async function openDevice(
  backend: MemoryBackend,
  identity: string,
  clock: TestClock,
  options: { persistence?: MemoryLocalPersistence; tokenPrefix?: string; config?: PairingConfig } = {}
): Promise<TestDevice> {
  const store = backend.connect(identity);
  const persistence = options.persistence ?? new MemoryLocalPersistence();
  const producer = new DomainDataSource();
  const client = await createPairingClient({
    store,
    persistence,
    producer,
    config: options.config ?? testConfig,
    now: clock.now,
    generateToken: tokenSequence(options.tokenPrefix ?? 'T'),
  });
  return { store, persistence, producer, client };
}

/**
 * Poll until `check` holds; background cleanup runs over several ticks.
 */
export async function waitUntil(check: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) expect.fail('Condition not met in time');
    await flush(5);
  }
}
