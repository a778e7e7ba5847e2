/**
 * Minimal observable value holders used for role state and session views.
 */

import type { Unsubscribe } from '@anchorwatch/store';
import { createLogger } from './logger.js';

const log = createLogger('streams:listener');

export type Listener<T> = (value: T) => void;

export interface SubscribeOptions {
  /** Call the listener with the current value right away */
  emitCurrent?: boolean;
}

export interface ReadonlyValueStream<T> {
  readonly value: T;
  subscribe(listener: Listener<T>, options?: SubscribeOptions): Unsubscribe;
}

export type Equality<T> = (a: T, b: T) => boolean;

/**
 * Holds a value and notifies listeners when it changes. Setting an equal
 * value is ignored.
 */
export class ValueStream<T> implements ReadonlyValueStream<T> {
  private current: T;
  private readonly equals: Equality<T>;
  private listeners: Set<Listener<T>> = new Set();

  constructor(initial: T, equals: Equality<T> = Object.is) {
    this.current = initial;
    this.equals = equals;
  }

  get value(): T {
    return this.current;
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  /**
   * Replace the value. Returns false when it was equal to the current one.
   */
  set(next: T): boolean {
    if (this.equals(this.current, next)) return false;
    this.current = next;
    for (const listener of [...this.listeners]) {
      try {
        listener(next);
      } catch (err) {
        log('Listener threw: %O', err);
      }
    }
    return true;
  }

  subscribe(listener: Listener<T>, options: SubscribeOptions = {}): Unsubscribe {
    this.listeners.add(listener);
    if (options.emitCurrent) {
      listener(this.current);
    }
    return () => {
      this.listeners.delete(listener);
    };
  }

  clear(): void {
    this.listeners.clear();
  }
}

/**
 * A stream computed from another one. Holds a subscription on its source
 * until disposed.
 */
export class DerivedStream<S, T> implements ReadonlyValueStream<T> {
  private readonly target: ValueStream<T>;
  private readonly detach: Unsubscribe;

  constructor(source: ReadonlyValueStream<S>, project: (value: S) => T, equals?: Equality<T>) {
    this.target = new ValueStream(project(source.value), equals);
    this.detach = source.subscribe(value => {
      this.target.set(project(value));
    });
  }

  get value(): T {
    return this.target.value;
  }

  subscribe(listener: Listener<T>, options?: SubscribeOptions): Unsubscribe {
    return this.target.subscribe(listener, options);
  }

  dispose(): void {
    this.detach();
    this.target.clear();
  }
}

/**
 * Equality by JSON form, for plain data values.
 */
export function jsonEqual<T>(a: T, b: T): boolean {
  return a === b || JSON.stringify(a) === JSON.stringify(b);
}
