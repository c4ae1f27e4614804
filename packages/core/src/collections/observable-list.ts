import { type Observable, Subject } from 'rxjs';
import { type ObservableConfig, resolveObservableConfig } from '../config.js';
import { InvalidArgumentError, ItemNotFoundError, ListIndexError } from '../errors/observa-error.js';
import { raiseFailures } from '../observers/dispatcher.js';
import type { Observer, ObserverOptions } from '../observers/types.js';
import { ReentrantLock } from '../sync/reentrant-lock.js';
import { ModificationObservers } from './modification-observers.js';

/**
 * How an {@link ObservableList} was mutated. `ALL` is the catch-all
 * subscription key and is never the type of a change.
 */
export const ListModificationType = {
  ALL: 'all',
  APPEND: 'append',
  EXTEND: 'extend',
  INSERT: 'insert',
  REMOVE: 'remove',
  UPDATE: 'update',
  CLEAR: 'clear',
} as const;

export type ListModificationType = (typeof ListModificationType)[keyof typeof ListModificationType];

/** Types a list change can actually have */
export type ListChangeType = Exclude<ListModificationType, 'all'>;

const LIST_MODIFICATION_TYPES: readonly ListModificationType[] = Object.values(ListModificationType);

function compareValues<V extends number | bigint | string>(a: V, b: V): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function naturalOrder(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') return compareValues(a, b);
  if (typeof a === 'bigint' && typeof b === 'bigint') return compareValues(a, b);
  if (a instanceof Date && b instanceof Date) return compareValues(a.getTime(), b.getTime());
  return compareValues(String(a), String(b));
}

/**
 * Description of one list mutation.
 */
export interface ListChange<T> {
  readonly type: ListChangeType;
  /** Position where the mutation starts */
  readonly index: number;
  /** Items that entered the list, in list order */
  readonly added: readonly T[];
  /** Items that left the list, in their former order */
  readonly removed: readonly T[];
}

/**
 * Observer of list mutations: called with `()`, `(change)` or
 * `(before, after)` where `before` and `after` are snapshots of the
 * contents.
 */
export type ListObserver<T> = Observer<ListChange<T>, readonly T[], readonly T[]>;

interface Mutation<T, R> {
  readonly result: R;
  readonly index: number;
  readonly added: readonly T[];
  readonly removed: readonly T[];
}

/**
 * An ordered, mutable list that notifies observers of every mutation.
 *
 * Each mutating method validates its arguments, applies the mutation,
 * classifies it with one {@link ListModificationType} and notifies the
 * catch-all (`ALL`) observers followed by the observers of that type, all
 * under the list's re-entrant lock. A mutation that fails validation leaves
 * the list untouched and notifies nobody. Reads are neither locked nor
 * observed.
 *
 * Negative indexes count from the end, as with `Array.prototype.at`.
 *
 * | Method                            | Type     |
 * | --------------------------------- | -------- |
 * | `append`                          | `APPEND` |
 * | `extend`, `repeat`                | `EXTEND` |
 * | `insert`                          | `INSERT` |
 * | `remove`, `pop`, `delete`, `deleteSlice` | `REMOVE` |
 * | `set`, `setSlice`, `reverse`, `sort` | `UPDATE` |
 * | `clear`                           | `CLEAR`  |
 *
 * @example
 * ```typescript
 * const list = new ObservableList([1, 2, 3]);
 *
 * const onAnyChange = () => console.log('List modified!');
 * const onAppend = () => console.log('Item appended!');
 *
 * list.addObserver(onAnyChange);
 * list.addObserver(onAppend, ListModificationType.APPEND);
 *
 * list.append(4);
 * // "List modified!"
 * // "Item appended!"
 * ```
 *
 * @typeParam T - Item type
 */
export class ObservableList<T> implements Iterable<T> {
  private items: T[];
  private readonly lock: ReentrantLock;
  private readonly observers: ModificationObservers<ListModificationType>;
  private readonly changes$$ = new Subject<ListChange<T>>();

  /**
   * Every mutation, after its observers have run. Subscribers are not observers:
   * an error one throws never reaches the writer and goes to rxjs's
   * `config.onUnhandledError`, which rethrows it asynchronously by default.
   */
  readonly changes$: Observable<ListChange<T>> = this.changes$$.asObservable();

  constructor(initial: Iterable<T> = [], config: ObservableConfig = {}) {
    const typeName = new.target.name || 'ObservableList';
    const resolved = resolveObservableConfig(config, typeName);

    this.items = [...initial];
    this.lock = new ReentrantLock({
      maxDepth: resolved.maxNotificationDepth,
      context: { owner: typeName },
    });
    this.observers = new ModificationObservers(
      ListModificationType.ALL,
      LIST_MODIFICATION_TYPES,
      resolved.logger
    );
  }

  // ── Observers ────────────────────────────────────────────────────────

  /**
   * Register an observer for one modification type, or for every mutation
   * when `type` is omitted.
   *
   * @throws {@link InvalidModificationTypeError} for unknown types
   * @throws {@link InvalidObserverError} for callbacks declaring more than two parameters
   */
  addObserver(
    observer: ListObserver<T>,
    type: ListModificationType = ListModificationType.ALL,
    options?: ObserverOptions
  ): void {
    this.lock.runExclusive(() => this.observers.add(observer, type, options));
  }

  /**
   * Unregister an observer from one modification type. Registrations for
   * other types, including `ALL`, are kept.
   */
  removeObserver(observer: ListObserver<T>, type: ListModificationType = ListModificationType.ALL): void {
    this.lock.runExclusive(() => this.observers.remove(observer, type));
  }

  hasObserver(observer: ListObserver<T>, type: ListModificationType = ListModificationType.ALL): boolean {
    return this.observers.has(observer, type);
  }

  /** Number of live observers registered for exactly `type` */
  observerCount(type: ListModificationType = ListModificationType.ALL): number {
    return this.observers.count(type);
  }

  // ── Reads ────────────────────────────────────────────────────────────

  get length(): number {
    return this.items.length;
  }

  /**
   * @throws {@link ListIndexError} when `index` is out of range
   */
  get(index: number): T {
    const position = this.position('get', index);
    return this.items[position];
  }

  /** Like {@link get}, but `undefined` instead of an error when out of range */
  at(index: number): T | undefined {
    return this.items.at(index);
  }

  indexOf(item: T, fromIndex?: number): number {
    return this.items.indexOf(item, fromIndex);
  }

  includes(item: T): boolean {
    return this.items.includes(item);
  }

  count(item: T): number {
    return this.items.filter((candidate) => candidate === item).length;
  }

  slice(start?: number, end?: number): T[] {
    return this.items.slice(start, end);
  }

  toArray(): T[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }

  // ── Mutations ────────────────────────────────────────────────────────

  append(item: T): void {
    this.mutate(ListModificationType.APPEND, () => {
      this.items.push(item);
      return { result: undefined, index: this.items.length - 1, added: [item], removed: [] };
    });
  }

  extend(items: Iterable<T>): void {
    const added = [...items];
    this.mutate(ListModificationType.EXTEND, () => {
      const index = this.items.length;
      this.items.push(...added);
      return { result: undefined, index, added, removed: [] };
    });
  }

  /**
   * Repeat the current contents in place `times` times in total. Zero or a
   * negative count empties the list.
   */
  repeat(times: number): void {
    if (!Number.isInteger(times)) {
      throw new InvalidArgumentError(`repeat count must be an integer, got ${times}`, { times });
    }

    this.mutate(ListModificationType.EXTEND, () => {
      const before = this.items;
      const repeated: T[] = [];
      for (let i = 0; i < times; i++) repeated.push(...before);
      this.items = repeated;

      return times > 0
        ? { result: undefined, index: before.length, added: repeated.slice(before.length), removed: [] }
        : { result: undefined, index: 0, added: [], removed: before };
    });
  }

  /**
   * Insert before `index`. Indexes past either end are clamped, so inserting
   * never fails.
   */
  insert(index: number, item: T): void {
    this.assertInteger('insert', index);

    this.mutate(ListModificationType.INSERT, () => {
      const position = clamp(index < 0 ? index + this.items.length : index, this.items.length);
      this.items.splice(position, 0, item);
      return { result: undefined, index: position, added: [item], removed: [] };
    });
  }

  /**
   * Remove the first occurrence of `item` (compared with `===`).
   *
   * @throws {@link ItemNotFoundError} when the item is not in the list
   */
  remove(item: T): void {
    this.mutate(ListModificationType.REMOVE, () => {
      const index = this.items.indexOf(item);
      if (index === -1) {
        throw new ItemNotFoundError('remove', item);
      }
      const removed = this.items.splice(index, 1);
      return { result: undefined, index, added: [], removed };
    });
  }

  /**
   * Remove and return the item at `index` (default: the last one).
   *
   * @throws {@link ListIndexError} when the list is empty or `index` is out of range
   */
  pop(index = -1): T {
    return this.mutate(ListModificationType.REMOVE, () => {
      const position = this.position('pop', index);
      const removed = this.items.splice(position, 1);
      return { result: removed[0], index: position, added: [], removed };
    });
  }

  /**
   * Remove the item at `index`.
   *
   * @throws {@link ListIndexError} when `index` is out of range
   */
  delete(index: number): void {
    this.mutate(ListModificationType.REMOVE, () => {
      const position = this.position('delete', index);
      const removed = this.items.splice(position, 1);
      return { result: undefined, index: position, added: [], removed };
    });
  }

  /**
   * Remove the items from `start` up to, not including, `end`. Bounds are
   * clamped like `Array.prototype.slice`.
   */
  deleteSlice(start = 0, end = this.items.length): void {
    this.assertInteger('deleteSlice', start);
    this.assertInteger('deleteSlice', end);

    this.mutate(ListModificationType.REMOVE, () => {
      const [from, to] = this.sliceBounds(start, end);
      const removed = this.items.splice(from, to - from);
      return { result: undefined, index: from, added: [], removed };
    });
  }

  /**
   * Replace the item at `index`.
   *
   * @throws {@link ListIndexError} when `index` is out of range
   */
  set(index: number, item: T): void {
    this.mutate(ListModificationType.UPDATE, () => {
      const position = this.position('set', index);
      const removed = this.items.splice(position, 1, item);
      return { result: undefined, index: position, added: [item], removed };
    });
  }

  /**
   * Replace the items from `start` up to, not including, `end` with
   * `items`; the list grows or shrinks as needed. Bounds are clamped like
   * `Array.prototype.slice`.
   */
  setSlice(start: number, end: number, items: Iterable<T>): void {
    this.assertInteger('setSlice', start);
    this.assertInteger('setSlice', end);
    const added = [...items];

    this.mutate(ListModificationType.UPDATE, () => {
      const [from, to] = this.sliceBounds(start, end);
      const removed = this.items.splice(from, to - from, ...added);
      return { result: undefined, index: from, added, removed };
    });
  }

  reverse(): void {
    this.mutate(ListModificationType.UPDATE, () => {
      const removed = [...this.items];
      this.items.reverse();
      return { result: undefined, index: 0, added: [...this.items], removed };
    });
  }

  /**
   * Sort in place. Without a comparator numbers, bigints and dates are
   * ordered by value; anything else by its string form.
   */
  sort(compare: (a: T, b: T) => number = naturalOrder): void {
    this.mutate(ListModificationType.UPDATE, () => {
      const removed = [...this.items];
      const sorted = [...this.items].sort(compare);
      this.items = sorted;
      return { result: undefined, index: 0, added: [...sorted], removed };
    });
  }

  clear(): void {
    this.mutate(ListModificationType.CLEAR, () => {
      const removed = this.items;
      this.items = [];
      return { result: undefined, index: 0, added: [], removed };
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

  private mutate<R>(type: ListChangeType, apply: () => Mutation<T, R>): R {
    return this.lock.runExclusive(() => {
      const before = this.observers.wantsSnapshots(type) ? [...this.items] : null;

      const mutation = apply();
      const change: ListChange<T> = {
        type,
        index: mutation.index,
        added: mutation.added,
        removed: mutation.removed,
      };

      let after: readonly T[] | null = null;
      const snapshot = (): readonly T[] => (after ??= [...this.items]);

      const failures = this.observers.dispatch(type, {
        key: type,
        payload: () => change,
        previous: () => before ?? snapshot(),
        next: snapshot,
      });

      this.changes$$.next(change);
      raiseFailures(type, failures);
      return mutation.result;
    });
  }

  private position(operation: string, index: number): number {
    this.assertInteger(operation, index);

    const position = index < 0 ? index + this.items.length : index;
    if (position < 0 || position >= this.items.length) {
      throw new ListIndexError(operation, index, this.items.length);
    }
    return position;
  }

  private sliceBounds(start: number, end: number): [number, number] {
    const length = this.items.length;
    const from = clamp(start < 0 ? start + length : start, length);
    const to = clamp(end < 0 ? end + length : end, length);
    return [from, Math.max(from, to)];
  }

  private assertInteger(operation: string, index: number): void {
    if (!Number.isInteger(index)) {
      throw new ListIndexError(operation, index, this.items.length);
    }
  }
}

function clamp(value: number, max: number): number {
  return Math.min(Math.max(value, 0), max);
}
