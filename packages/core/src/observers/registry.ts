import type { ObservaLogger } from '../observability/logger.js';
import { resolveArity } from './arity.js';
import type { AnyObserver, ObserverArity, ObserverOptions } from './types.js';

/**
 * Handle through which a registry reaches a callback. `deref()` returns
 * `undefined` once the callback has been collected.
 */
export interface ObserverRef<C> {
  deref(): C | undefined;
}

/** Creates the handle a registry stores for each callback */
export type ObserverRefFactory = <C extends AnyObserver>(callback: C) => ObserverRef<C>;

/**
 * Options for {@link ObserverRegistry}
 */
export interface ObserverRegistryOptions {
  /** Key the registry serves (property name or modification type) */
  key: string;
  logger?: ObservaLogger;
  /** Handle factory (default: `new WeakRef(callback)`) */
  createRef?: ObserverRefFactory;
}

/**
 * A callback that was alive when {@link ObserverRegistry.live} was called.
 */
export interface LiveObserver<C> {
  readonly callback: C;
  readonly arity: ObserverArity;
  /** False once the callback has been removed, even mid-dispatch */
  isRegistered(): boolean;
}

interface RegistryEntry<C> {
  readonly ref: ObserverRef<C>;
  readonly arity: ObserverArity;
  readonly owner: WeakRef<object> | null;
  registered: boolean;
}

const weakRef: ObserverRefFactory = (callback) => new WeakRef(callback);

// owner -> callbacks kept alive on its behalf, with a count per registration
const retainedByOwner = new WeakMap<object, Map<AnyObserver, number>>();

function retain(owner: object, callback: AnyObserver): void {
  let retained = retainedByOwner.get(owner);
  if (!retained) {
    retained = new Map();
    retainedByOwner.set(owner, retained);
  }
  retained.set(callback, (retained.get(callback) ?? 0) + 1);
}

function release(owner: object, callback: AnyObserver): void {
  const retained = retainedByOwner.get(owner);
  const count = retained?.get(callback);
  if (!retained || count === undefined) return;

  if (count > 1) {
    retained.set(callback, count - 1);
  } else {
    retained.delete(callback);
  }
}

/**
 * Ordered set of weakly held observers for one key.
 *
 * The registry is never the reason a callback stays alive: once nothing
 * else references a callback it is collected, skipped by {@link live} and
 * dropped from the set on the next access or when the runtime reports the
 * collection. Registering the same callback twice has no effect.
 *
 * @example
 * ```typescript
 * const registry = new ObserverRegistry({ key: 'age' });
 * const onAge = (next: number) => console.log(next);
 *
 * registry.add(onAge);     // true
 * registry.add(onAge);     // false, already registered
 * registry.live()[0].arity; // 1
 * ```
 */
export class ObserverRegistry<C extends AnyObserver = AnyObserver> {
  private entries: RegistryEntry<C>[] = [];
  private readonly key: string;
  private readonly logger: ObservaLogger | undefined;
  private readonly createRef: ObserverRefFactory;
  private readonly finalizer = new FinalizationRegistry<RegistryEntry<C>>((entry) => {
    if (entry.registered) this.prune();
  });

  constructor(options: ObserverRegistryOptions) {
    this.key = options.key;
    this.logger = options.logger;
    this.createRef = options.createRef ?? weakRef;
  }

  /** Number of live observers */
  get size(): number {
    return this.live().length;
  }

  /**
   * Register a callback.
   *
   * @returns `false` if the callback was already registered
   * @throws {@link InvalidObserverError} for non-functions and callbacks
   * declaring more than two parameters
   */
  add(callback: C, options: ObserverOptions = {}): boolean {
    const arity = resolveArity(callback);
    if (this.find(callback)) return false;

    const entry: RegistryEntry<C> = {
      ref: this.createRef(callback),
      arity,
      owner: options.owner ? new WeakRef(options.owner) : null,
      registered: true,
    };

    if (options.owner) retain(options.owner, callback);
    this.finalizer.register(callback, entry, entry);
    this.entries.push(entry);

    this.logger?.debug('Observer registered', { key: this.key, arity, observers: this.entries.length });
    return true;
  }

  /**
   * Unregister a callback.
   *
   * @returns `false` if the callback was not registered
   */
  remove(callback: C): boolean {
    const entry = this.find(callback);
    if (!entry) {
      this.logger?.debug('Observer not registered, nothing to remove', { key: this.key });
      return false;
    }

    this.detach(entry, callback);
    this.entries = this.entries.filter((candidate) => candidate !== entry);

    this.logger?.debug('Observer removed', { key: this.key, observers: this.entries.length });
    return true;
  }

  has(callback: C): boolean {
    return this.find(callback) !== undefined;
  }

  /** Whether any live observer takes the given number of arguments */
  hasArity(arity: ObserverArity): boolean {
    return this.live().some((observer) => observer.arity === arity);
  }

  /**
   * Snapshot of the live observers in registration order. Collected
   * callbacks found along the way are pruned.
   */
  live(): LiveObserver<C>[] {
    const result: LiveObserver<C>[] = [];
    let collected = 0;

    for (const entry of this.entries) {
      const callback = entry.ref.deref();
      if (callback === undefined) {
        collected++;
        continue;
      }
      result.push({
        callback,
        arity: entry.arity,
        isRegistered: () => entry.registered,
      });
    }

    if (collected > 0) this.prune();
    return result;
  }

  /** Unregister every callback */
  clear(): void {
    for (const entry of this.entries) {
      this.detach(entry, entry.ref.deref());
    }
    this.entries = [];
  }

  // ── Private ──────────────────────────────────────────────────────────

  private find(callback: C): RegistryEntry<C> | undefined {
    return this.entries.find((entry) => entry.ref.deref() === callback);
  }

  private detach(entry: RegistryEntry<C>, callback: C | undefined): void {
    entry.registered = false;
    this.finalizer.unregister(entry);

    const owner = entry.owner?.deref();
    if (owner && callback) release(owner, callback);
  }

  private prune(): void {
    const before = this.entries.length;

    this.entries = this.entries.filter((entry) => {
      if (entry.ref.deref() !== undefined) return true;
      entry.registered = false;
      this.finalizer.unregister(entry);
      return false;
    });

    const pruned = before - this.entries.length;
    if (pruned > 0) {
      this.logger?.debug('Pruned collected observers', { key: this.key, pruned });
    }
  }
}
