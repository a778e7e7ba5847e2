/**
 * Local key-value persistence for the device's pairing state.
 */

/** A null value removes the key. */
export type PersistenceEntries = Record<string, string | null>;

export interface LocalPersistence {
  getString(key: string): Promise<string | undefined>;
  setString(key: string, value: string | null): Promise<void>;
  /** Write several keys as one unit: all land or none do. */
  setStrings(entries: PersistenceEntries): Promise<void>;
}

/**
 * In-memory persistence for tests and hosts without a disk.
 */
export class MemoryLocalPersistence implements LocalPersistence {
  private values: Map<string, string> = new Map();
  private failures = 0;

  constructor(initial: Record<string, string> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  /** Make the next `times` writes fail. */
  failWrites(times = 1): void {
    this.failures = times;
  }

  async getString(key: string): Promise<string | undefined> {
    return this.values.get(key);
  }

  async setString(key: string, value: string | null): Promise<void> {
    await this.setStrings({ [key]: value });
  }

  async setStrings(entries: PersistenceEntries): Promise<void> {
    if (this.failures > 0) {
      this.failures--;
      throw new Error('Persistence write failed');
    }
    for (const [key, value] of Object.entries(entries)) {
      if (value === null) {
        this.values.delete(key);
      } else {
        this.values.set(key, value);
      }
    }
  }

  /** Current contents (test inspection). */
  snapshot(): Record<string, string> {
    return Object.fromEntries(this.values);
  }
}
