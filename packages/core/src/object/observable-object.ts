import { type Observable, Subject, filter } from 'rxjs';
import { type ObservableConfig, resolveObservableConfig } from '../config.js';
import { InvalidArgumentError, UnknownPropertyError } from '../errors/observa-error.js';
import type { ObservaLogger } from '../observability/logger.js';
import { dispatch, raiseFailures } from '../observers/dispatcher.js';
import { ObserverRegistry } from '../observers/registry.js';
import type { AnyObserver, Observer, ObserverOptions } from '../observers/types.js';
import { ReentrantLock } from '../sync/reentrant-lock.js';
import {
  type ObservableProperty,
  type PropertyDeclarations,
  type PropertyName,
  changeHookName,
} from './observable-property.js';

/**
 * Observer of one property: called with `()`, `(next)` or `(previous, next)`.
 */
export type PropertyObserver<T> = Observer<T, T, T>;

/**
 * One write to one property, as emitted on {@link ObservableObject.changes$}.
 */
export interface PropertyChange<P, K extends PropertyName<P> = PropertyName<P>> {
  readonly property: K;
  readonly previous: P[K];
  readonly next: P[K];
}

/**
 * Base class for objects with observable properties.
 *
 * Every write goes through {@link set}, which, under the instance's
 * re-entrant lock:
 *
 * 1. captures the previous value (the default if never written)
 * 2. stores the new value, even when it equals the previous one
 * 3. calls the instance's `on<Name>Changed(previous, next)` hook, if any
 * 4. calls every registered observer of the property in registration order,
 *    each with `()`, `(next)` or `(previous, next)` according to its arity
 * 5. emits the change on {@link changes$}
 *
 * An observer may write other properties of the same instance; the nested
 * write runs to completion inside the outer one. Observer failures do not
 * stop the remaining observers; they are rethrown to the writer afterwards.
 *
 * Observers are held weakly. Keep a reference to the callback, or pass an
 * `owner` whose lifetime the callback should share.
 *
 * Most code declares classes with {@link defineObservable}, which also
 * installs a property accessor per declaration. Subclassing directly works
 * too:
 *
 * @example
 * ```typescript
 * interface CounterProps { count: number }
 *
 * class Counter extends ObservableObject<CounterProps> {
 *   constructor() {
 *     super({ count: observableProperty(0) });
 *   }
 *
 *   increment(): void {
 *     this.set('count', this.get('count') + 1);
 *   }
 * }
 *
 * const counter = new Counter();
 * const onCount = (previous: number, next: number) => console.log(previous, '->', next);
 * counter.addObserver('count', onCount);
 * counter.increment(); // logs "0 -> 1"
 * ```
 *
 * @typeParam P - Map of property names to value types
 */
export class ObservableObject<P extends object> {
  private readonly declarations: PropertyDeclarations<P>;
  private readonly cells: { [K in keyof P]?: { value: P[K] } } = {};
  private readonly registries = new Map<string, ObserverRegistry<AnyObserver>>();
  private readonly hooks = new Map<string, Function | null>();
  private readonly lock: ReentrantLock;
  private readonly logger: ObservaLogger;
  private readonly typeName: string;
  private readonly changes$$ = new Subject<PropertyChange<P>>();

  /**
   * Every write to any property, after its observers have run. Subscribers are not observers:
   * an error one throws never reaches the writer and goes to rxjs's
   * `config.onUnhandledError`, which rethrows it asynchronously by default.
   */
  readonly changes$: Observable<PropertyChange<P>> = this.changes$$.asObservable();

  /**
   * @param declarations - One {@link ObservableProperty} per property
   * @param initial - Starting values, stored without notifying
   * @param config - Logger and nesting limit
   */
  constructor(declarations: PropertyDeclarations<P>, initial: Partial<P> = {}, config: ObservableConfig = {}) {
    this.typeName = new.target.name || 'ObservableObject';
    this.declarations = declarations;

    for (const name in declarations) {
      if (Object.hasOwn(declarations, name)) declarations[name].bind(name);
    }

    const resolved = resolveObservableConfig(config, this.typeName);
    this.logger = resolved.logger;
    this.lock = new ReentrantLock({
      maxDepth: resolved.maxNotificationDepth,
      context: { owner: this.typeName },
    });

    for (const name in initial) {
      if (!Object.hasOwn(initial, name)) continue;
      this.declarationOf(name);
      const value = initial[name];
      if (value !== undefined) this.cells[name] = { value };
    }
  }

  /** Names of the declared properties */
  get propertyNames(): PropertyName<P>[] {
    const names: PropertyName<P>[] = [];
    for (const name in this.declarations) {
      if (Object.hasOwn(this.declarations, name)) names.push(name);
    }
    return names;
  }

  /**
   * Current value of a property, or its default if it was never written.
   *
   * @throws {@link UnknownPropertyError} for undeclared names
   */
  get<K extends PropertyName<P>>(name: K): P[K] {
    const property = this.declarationOf(name);
    const cell = this.cells[name];
    return cell ? cell.value : property.defaultValue;
  }

  /**
   * Write a property and notify. Always notifies, even when the value is
   * unchanged.
   *
   * @throws {@link UnknownPropertyError} for undeclared names
   * @throws The observer's error when one observer fails, an
   * {@link ObserverError} when several do
   * @throws {@link NotificationDepthError} when nested writes exceed
   * `maxNotificationDepth`
   */
  set<K extends PropertyName<P>>(name: K, value: P[K]): void {
    this.declarationOf(name);

    this.lock.runExclusive(() => {
      const previous = this.get(name);
      this.cells[name] = { value };

      const failures = this.runChangeHook(name, previous, value);
      failures.push(...this.dispatchChange(name, previous, value));
      raiseFailures(name, failures);
    });
  }

  /**
   * Register an observer of a property. Registering the same callback again
   * has no effect.
   *
   * @throws {@link UnknownPropertyError} for undeclared names
   * @throws {@link InvalidObserverError} for callbacks declaring more than two parameters
   */
  addObserver<K extends PropertyName<P>>(
    name: K,
    observer: PropertyObserver<P[K]>,
    options?: ObserverOptions
  ): void {
    this.declarationOf(name);

    this.lock.runExclusive(() => {
      let registry = this.registries.get(name);
      if (!registry) {
        registry = new ObserverRegistry({ key: name, logger: this.logger });
        this.registries.set(name, registry);
      }
      registry.add(observer, options);
    });
  }

  /**
   * Unregister an observer. Does nothing if it is not registered.
   */
  removeObserver<K extends PropertyName<P>>(name: K, observer: PropertyObserver<P[K]>): void {
    this.lock.runExclusive(() => {
      const registry = this.registries.get(name);
      if (!registry) return;

      registry.remove(observer);
      if (registry.size === 0) this.registries.delete(name);
    });
  }

  hasObserver<K extends PropertyName<P>>(name: K, observer: PropertyObserver<P[K]>): boolean {
    return this.registries.get(name)?.has(observer) ?? false;
  }

  /** Number of live observers of a property */
  observerCount(name: PropertyName<P>): number {
    return this.registries.get(name)?.size ?? 0;
  }

  /**
   * Dispatch a change of `name` to its observers and to {@link changes$},
   * without storing anything or running the change hook. {@link set} uses
   * this after storing the value.
   */
  notify<K extends PropertyName<P>>(name: K, previous: P[K], next: P[K]): void {
    this.declarationOf(name);

    this.lock.runExclusive(() => {
      raiseFailures(name, this.dispatchChange(name, previous, next));
    });
  }

  /**
   * Changes of a single property.
   */
  property$<K extends PropertyName<P>>(name: K): Observable<PropertyChange<P, K>> {
    this.declarationOf(name);
    return this.changes$.pipe(filter((change): change is PropertyChange<P, K> => change.property === name));
  }

  /**
   * Unregister every observer and complete {@link changes$}. Property values
   * stay readable and writable.
   */
  dispose(): void {
    this.lock.runExclusive(() => {
      for (const registry of this.registries.values()) {
        registry.clear();
      }
      this.registries.clear();
      this.changes$$.complete();
    });
  }

  // ── Private ──────────────────────────────────────────────────────────

  private declarationOf<K extends PropertyName<P>>(name: K): ObservableProperty<P[K]> {
    if (!Object.hasOwn(this.declarations, name)) {
      throw new UnknownPropertyError(this.typeName, name);
    }
    return this.declarations[name];
  }

  private runChangeHook(name: string, previous: unknown, next: unknown): unknown[] {
    let hook = this.hooks.get(name);
    if (hook === undefined) {
      const candidate: unknown = Reflect.get(this, changeHookName(name));
      hook = typeof candidate === 'function' ? candidate : null;
      this.hooks.set(name, hook);
    }
    if (hook === null) return [];

    try {
      Reflect.apply(hook, this, [previous, next]);
      return [];
    } catch (error) {
      this.logger.error(`Error in ${changeHookName(name)}`, error, { key: name });
      return [error];
    }
  }

  private dispatchChange<K extends PropertyName<P>>(name: K, previous: P[K], next: P[K]): unknown[] {
    const registry = this.registries.get(name);
    const failures = registry
      ? dispatch(
          registry.live(),
          { key: name, payload: () => next, previous: () => previous, next: () => next },
          this.logger
        )
      : [];

    this.changes$$.next({ property: name, previous, next });
    return failures;
  }
}

/** Instance of a class created by {@link defineObservable} */
export type ObservableInstance<P extends object> = ObservableObject<P> & P;

// What the class expression is known to be before its accessors exist
interface BaseObservableClass<P extends object> {
  new (initial?: Partial<P>, config?: ObservableConfig): ObservableObject<P>;
  readonly properties: PropertyDeclarations<P>;
}

/** Class created by {@link defineObservable} */
export interface ObservableClass<P extends object> {
  new (initial?: Partial<P>, config?: ObservableConfig): ObservableInstance<P>;
  readonly properties: PropertyDeclarations<P>;
}

// Own fields of ObservableObject instances; an accessor of the same name
// would be shadowed by them
const INSTANCE_FIELDS = new Set([
  'declarations',
  'cells',
  'registries',
  'hooks',
  'lock',
  'logger',
  'typeName',
  'changes$$',
  'changes$',
]);

/**
 * Create an observable class from property declarations. Each declared
 * property becomes an accessor on the class prototype whose setter is
 * {@link ObservableObject.set}, so plain assignment notifies.
 *
 * @example
 * ```typescript
 * class Person extends defineObservable({
 *   name: observableProperty(''),
 *   age: observableProperty(0),
 * }) {
 *   onAgeChanged(previous: number, next: number): void {
 *     console.log(`${this.name} aged from ${previous} to ${next}`);
 *   }
 * }
 *
 * const alice = new Person({ name: 'Alice' });
 * const onAge = (next: number) => console.log('age is now', next);
 * alice.addObserver('age', onAge);
 *
 * alice.age = 30;
 * // "Alice aged from 0 to 30"
 * // "age is now 30"
 * ```
 *
 * @throws {@link InvalidArgumentError} when a property name collides with an
 * {@link ObservableObject} member
 */
export function defineObservable<P extends object>(declarations: PropertyDeclarations<P>): ObservableClass<P> {
  class DefinedObservable extends ObservableObject<P> {
    static readonly properties = declarations;

    constructor(initial?: Partial<P>, config?: ObservableConfig) {
      super(declarations, initial, config);
    }
  }

  for (const name in declarations) {
    if (!Object.hasOwn(declarations, name)) continue;
    if (name in ObservableObject.prototype || INSTANCE_FIELDS.has(name)) {
      throw new InvalidArgumentError(`Property "${name}" collides with an ObservableObject member`, { name });
    }
    declarations[name].bind(name);

    Object.defineProperty(DefinedObservable.prototype, name, {
      configurable: true,
      enumerable: true,
      get(this: ObservableObject<P>) {
        return this.get(name);
      },
      set(this: ObservableObject<P>, value: P[PropertyName<P>]) {
        this.set(name, value);
      },
    });
  }

  const defined: BaseObservableClass<P> = DefinedObservable;
  // The accessors installed above provide the P half of the instance type
  return defined as ObservableClass<P>;
}
