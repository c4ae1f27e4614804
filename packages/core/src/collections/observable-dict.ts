import { type Observable, Subject } from 'rxjs';
import { type ObservableConfig, resolveObservableConfig } from '../config.js';
import { KeyNotFoundError } from '../errors/observa-error.js';
import { raiseFailures } from '../observers/dispatcher.js';
import type { Observer, ObserverOptions } from '../observers/types.js';
import { ReentrantLock } from '../sync/reentrant-lock.js';
import { ModificationObservers } from './modification-observers.js';

/**
 * How an {@link ObservableDict} was mutated. `ALL` is the catch-all
 * subscription key.
 */
export const DictModificationType = {
  ALL: 'all',
  UPDATED: 'updated',
  EXTEND: 'extend',
  REMOVE: 'remove',
  CLEAR: 'clear',
} as const;

export type DictModificationType = (typeof DictModificationType)[keyof typeof DictModificationType];

export type DictChangeType = Exclude<DictModificationType, 'all'>;

const DICT_MODIFICATION_TYPES: readonly DictModificationType[] = Object.values(DictModificationType);

/**
 * Description of one dict mutation.
 */
export interface DictChange<K, V> {
  readonly type: DictChangeType;
  /** Entries written, with their new values */
  readonly entries: readonly (readonly [K, V])[];
  /** Entries that left the dict or were overwritten, with their old values */
  readonly removed: readonly (readonly [K, V])[];
}

/**
 * Observer of dict mutations: called with `()`, `(change)` or
 * `(before, after)` snapshots.
 */
export type DictObserver<K, V> = Observer<DictChange<K, V>, ReadonlyMap<K, V>, ReadonlyMap<K, V>>;

/**
 * A `Map`-backed dictionary that notifies observers of every mutation,
 * with the same locking and dispatch rules as {@link ObservableList}.
 *
 * | Method                     | Type      |
 * | -------------------------- | --------- |
 * | `set`                      | `UPDATED` |
 * | `update`                   | `EXTEND`  |
 * | `delete`, `pop`, `popItem` | `REMOVE`  |
 * | `clear`                    | `CLEAR`   |
 *
 * @example
 * ```typescript
 * const settings = new ObservableDict<string, boolean>([['darkMode', false]]);
 * const onToggle = (change: DictChange<string, boolean>) => console.log(change.entries);
 *
 * settings.addObserver(onToggle, DictModificationType.UPDATED);
 * settings.set('darkMode', true); // logs [['darkMode', true]]
 * ```
 *
 * @typeParam K - Key type
 * @typeParam V - Value type
 */
export class ObservableDict<K, V> implements Iterable<[K, V]> {
  private cells: Map<K, { value: V }>;
  private readonly lock: ReentrantLock;
  private readonly observers: ModificationObservers<DictModificationType>;
  private readonly changes$$ = new Subject<DictChange<K, V>>();

  /**
   * Every mutation, after its observers have run. Subscribers are not observers:
   * an error one throws never reaches the writer and goes to rxjs's
   * `config.onUnhandledError`, which rethrows it asynchronously by default.
   */
  readonly changes$: Observable<DictChange<K, V>> = this.changes$$.asObservable();

  constructor(initial: Iterable<readonly [K, V]> = [], config: ObservableConfig = {}) {
    const typeName = new.target.name || 'ObservableDict';
    const resolved = resolveObservableConfig(config, typeName);

    this.cells = new Map();
    for (const [key, value] of initial) {
      this.cells.set(key, { value });
    }
    this.lock = new ReentrantLock({
      maxDepth: resolved.maxNotificationDepth,
      context: { owner: typeName },
    });
    this.observers = new ModificationObservers(
      DictModificationType.ALL,
      DICT_MODIFICATION_TYPES,
      resolved.logger
    );
  }

  // ── Observers ────────────────────────────────────────────────────────

  /**
   * @throws {@link InvalidModificationTypeError} for unknown types
   */
  addObserver(
    observer: DictObserver<K, V>,
    type: DictModificationType = DictModificationType.ALL,
    options?: ObserverOptions
  ): void {
    this.lock.runExclusive(() => this.observers.add(observer, type, options));
  }

  removeObserver(observer: DictObserver<K, V>, type: DictModificationType = DictModificationType.ALL): void {
    this.lock.runExclusive(() => this.observers.remove(observer, type));
  }

  hasObserver(observer: DictObserver<K, V>, type: DictModificationType = DictModificationType.ALL): boolean {
    return this.observers.has(observer, type);
  }

  /** Number of live observers registered for exactly `type` */
  observerCount(type: DictModificationType = DictModificationType.ALL): number {
    return this.observers.count(type);
  }

  // ── Reads ────────────────────────────────────────────────────────────

  get size(): number {
    return this.cells.size;
  }

  get(key: K): V | undefined {
    return this.cells.get(key)?.value;
  }

  has(key: K): boolean {
    return this.cells.has(key);
  }

  keys(): IterableIterator<K> {
    return this.cells.keys();
  }

  *values(): IterableIterator<V> {
    for (const cell of this.cells.values()) {
      yield cell.value;
    }
  }

  *entries(): IterableIterator<[K, V]> {
    for (const [key, cell] of this.cells) {
      yield [key, cell.value];
    }
  }

  toMap(): Map<K, V> {
    return new Map(this.entries());
  }

  [Symbol.iterator](): Iterator<[K, V]> {
    return this.entries();
  }

  // ── Mutations ────────────────────────────────────────────────────────

  set(key: K, value: V): void {
    this.mutate(DictModificationType.UPDATED, () => {
      const removed = this.existing([key]);
      this.cells.set(key, { value });
      return { result: undefined, entries: [[key, value]], removed };
    });
  }

  /**
   * Write several entries as one `EXTEND` change.
   */
  update(entries: Iterable<readonly [K, V]>): void {
    const written = [...entries];
    this.mutate(DictModificationType.EXTEND, () => {
      const removed = this.existing(written.map(([key]) => key));
      for (const [key, value] of written) {
        this.cells.set(key, { value });
      }
      return { result: undefined, entries: written, removed };
    });
  }

  /**
   * @throws {@link KeyNotFoundError} when the key is absent
   */
  delete(key: K): void {
    this.mutate(DictModificationType.REMOVE, () => {
      const removed = this.take('delete', key);
      return { result: undefined, entries: [], removed: [[key, removed]] };
    });
  }

  /**
   * Remove `key` and return its value. When the key is absent, the
   * fallback is returned if one was given and nobody is notified.
   *
   * @throws {@link KeyNotFoundError} when the key is absent and no fallback was given
   */
  pop(key: K, ...fallback: [] | [V]): V {
    if (!this.cells.has(key) && fallback.length === 1) {
      return fallback[0];
    }

    return this.mutate(DictModificationType.REMOVE, () => {
      const value = this.take('pop', key);
      return { result: value, entries: [], removed: [[key, value]] };
    });
  }

  /**
   * Remove and return the most recently inserted entry.
   *
   * @throws {@link KeyNotFoundError} when the dict is empty
   */
  popItem(): [K, V] {
    return this.mutate(DictModificationType.REMOVE, () => {
      const last = [...this.entries()].pop();
      if (!last) {
        throw new KeyNotFoundError('popItem');
      }
      this.cells.delete(last[0]);
      return { result: last, entries: [], removed: [last] };
    });
  }

  clear(): void {
    this.mutate(DictModificationType.CLEAR, () => {
      const removed = [...this.entries()];
      this.cells = new Map();
      return { result: undefined, entries: [], removed };
    });
  }

  /**
   * Unregister every observer and complete {@link changes$}.
   */
  dispose(): void {
    this.lock.runExclusive(() => {
      this.observers.clear();
      this.changes$$.complete();
    });
  }

  // ── Private ──────────────────────────────────────────────────────────

  private mutate<R>(
    type: DictChangeType,
    apply: () => { result: R; entries: readonly (readonly [K, V])[]; removed: readonly (readonly [K, V])[] }
  ): R {
    return this.lock.runExclusive(() => {
      const before = this.observers.wantsSnapshots(type) ? this.toMap() : null;

      const { result, entries, removed } = apply();
      const change: DictChange<K, V> = { type, entries, removed };

      let after: ReadonlyMap<K, V> | null = null;
      const snapshot = (): ReadonlyMap<K, V> => (after ??= this.toMap());

      const failures = this.observers.dispatch(type, {
        key: type,
        payload: () => change,
        previous: () => before ?? snapshot(),
        next: snapshot,
      });

      this.changes$$.next(change);
      raiseFailures(type, failures);
      return result;
    });
  }

  private existing(keys: readonly K[]): [K, V][] {
    const found: [K, V][] = [];
    for (const key of new Set(keys)) {
      const cell = this.cells.get(key);
      if (cell) found.push([key, cell.value]);
    }
    return found;
  }

  private take(operation: string, key: K): V {
    const cell = this.cells.get(key);
    if (!cell) {
      throw new KeyNotFoundError(operation, key);
    }
    this.cells.delete(key);
    return cell.value;
  }
}
