/**
 * In-memory JSON document tree with path watches.
 *
 * Shared by the in-process backend and the relay server. Removing a node
 * prunes any ancestors left empty; empty objects are never stored.
 */

import { StoreError } from './errors.js';
import { pathsOverlap, splitPath } from './paths.js';
import {
  cloneValue,
  isStoreObject,
  valuesEqual,
  type StoreObject,
  type StorePath,
  type StoreUpdate,
  type StoreValue,
  type Unsubscribe,
} from './types.js';

export type TreeListener = (value: StoreValue | undefined) => void;

interface TreeWatch {
  path: string[];
  listener: TreeListener;
  last: StoreValue | undefined;
}

/**
 * Drop empty objects recursively; undefined means "nothing left".
 */
function normalize(value: StoreValue): StoreValue | undefined {
  if (!isStoreObject(value)) return value;
  const result: StoreObject = {};
  let empty = true;
  for (const [key, child] of Object.entries(value)) {
    const normalized = normalize(child);
    if (normalized !== undefined) {
      result[key] = normalized;
      empty = false;
    }
  }
  return empty ? undefined : result;
}

export class DocumentTree {
  private root: StoreObject = {};
  private watches: Set<TreeWatch> = new Set();

  get(path: StorePath): StoreValue | undefined {
    return cloneValue(this.read(splitPath(path)));
  }

  set(path: StorePath, value: StoreValue | undefined): void {
    const segments = splitPath(path);
    this.write(segments, value === undefined ? undefined : normalize(cloneValue(value)));
    this.notify([segments]);
  }

  /**
   * Apply several child writes as one change; watchers see a single update.
   */
  update(path: StorePath, changes: StoreUpdate): void {
    const base = splitPath(path);
    const touched: string[][] = [];
    for (const [key, value] of Object.entries(changes)) {
      const segments = [...base, ...splitPath(key)];
      if (segments.length === base.length) {
        throw new StoreError('invalid-argument', 'Update keys must name a child');
      }
      this.write(segments, value === null ? undefined : normalize(cloneValue(value)));
      touched.push(segments);
    }
    this.notify(touched);
  }

  delete(path: StorePath): void {
    this.set(path, undefined);
  }

  /**
   * Observe a path. The listener is called synchronously with the current
   * value and then on every change that alters it.
   */
  watch(path: StorePath, listener: TreeListener): Unsubscribe {
    const entry: TreeWatch = {
      path: splitPath(path),
      listener,
      last: undefined,
    };
    entry.last = cloneValue(this.read(entry.path));
    this.watches.add(entry);
    listener(cloneValue(entry.last));
    return () => {
      this.watches.delete(entry);
    };
  }

  /** Number of child keys under a path (0 when absent or not an object). */
  childCount(path: StorePath): number {
    const node = this.read(splitPath(path));
    return isStoreObject(node) ? Object.keys(node).length : 0;
  }

  get watchCount(): number {
    return this.watches.size;
  }

  clear(): void {
    this.root = {};
    this.notify([[]]);
  }

  // ==========================================================================
  // Private
  // ==========================================================================

  private read(segments: readonly string[]): StoreValue | undefined {
    let node: StoreValue | undefined = this.root;
    for (const segment of segments) {
      if (!isStoreObject(node)) return undefined;
      node = node[segment];
    }
    return node;
  }

  private write(segments: readonly string[], value: StoreValue | undefined): void {
    if (segments.length === 0) {
      if (value !== undefined && !isStoreObject(value)) {
        throw new StoreError('invalid-argument', 'The root must be an object');
      }
      this.root = value ?? {};
      return;
    }

    // Collect the chain of parents, creating them only when writing
    const parents: StoreObject[] = [this.root];
    for (const segment of segments.slice(0, -1)) {
      const parent = parents[parents.length - 1];
      const child = parent[segment];
      if (isStoreObject(child)) {
        parents.push(child);
      } else if (value === undefined) {
        return;
      } else {
        const created: StoreObject = {};
        parent[segment] = created;
        parents.push(created);
      }
    }

    const leafParent = parents[parents.length - 1];
    const leafKey = segments[segments.length - 1];
    if (value === undefined) {
      delete leafParent[leafKey];
    } else {
      leafParent[leafKey] = value;
    }

    // Prune ancestors that became empty
    for (let depth = parents.length - 1; depth > 0; depth--) {
      if (Object.keys(parents[depth]).length > 0) break;
      delete parents[depth - 1][segments[depth - 1]];
    }
  }

  private notify(changed: readonly string[][]): void {
    for (const entry of [...this.watches]) {
      if (!changed.some(path => pathsOverlap(path, entry.path))) continue;
      const current = this.read(entry.path);
      if (valuesEqual(current, entry.last)) continue;
      entry.last = cloneValue(current);
      entry.listener(cloneValue(current));
    }
  }
}
