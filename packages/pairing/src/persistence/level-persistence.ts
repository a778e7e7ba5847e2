/**
 * LevelDB-backed persistence for Node.js.
 *
 * Uses classic-level for LevelDB bindings.
 */

import { ClassicLevel } from 'classic-level';
import { persistenceLog } from '../common/logger.js';
import type { LocalPersistence, PersistenceEntries } from './local-persistence.js';

export interface LevelPersistenceOptions {
  /** Database directory */
  path: string;
  createIfMissing?: boolean;
}

type BatchOperation =
  | { type: 'put'; key: string; value: string }
  | { type: 'del'; key: string };

export class LevelLocalPersistence implements LocalPersistence {
  private db: ClassicLevel<string, string>;
  private closed = false;

  private constructor(db: ClassicLevel<string, string>) {
    this.db = db;
  }

  /**
   * Open (creating if needed) the database at the given path.
   */
  static async open(options: LevelPersistenceOptions): Promise<LevelLocalPersistence> {
    const db = new ClassicLevel<string, string>(options.path, {
      keyEncoding: 'utf8',
      valueEncoding: 'utf8',
      createIfMissing: options.createIfMissing ?? true,
    });

    await db.open();
    persistenceLog('Opened %s', options.path);
    return new LevelLocalPersistence(db);
  }

  async getString(key: string): Promise<string | undefined> {
    this.checkOpen();
    // classic-level returns undefined for missing keys
    return await this.db.get(key);
  }

  async setString(key: string, value: string | null): Promise<void> {
    this.checkOpen();
    if (value === null) {
      await this.db.del(key);
    } else {
      await this.db.put(key, value);
    }
  }

  async setStrings(entries: PersistenceEntries): Promise<void> {
    this.checkOpen();
    const ops: BatchOperation[] = Object.entries(entries).map(([key, value]): BatchOperation =>
      value === null ? { type: 'del', key } : { type: 'put', key, value }
    );
    if (ops.length > 0) {
      await this.db.batch(ops);
    }
  }

  async close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      await this.db.close();
    }
  }

  private checkOpen(): void {
    if (this.closed) {
      throw new Error('LevelLocalPersistence is closed');
    }
  }
}
