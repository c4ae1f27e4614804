import { InvalidModificationTypeError } from '../errors/observa-error.js';
import type { ObservaLogger } from '../observability/logger.js';
import { dispatch } from '../observers/dispatcher.js';
import { ObserverRegistry } from '../observers/registry.js';
import type { AnyObserver, Notification, ObserverOptions } from '../observers/types.js';

/**
 * Observer registries of a collection, one per modification type plus the
 * catch-all type. The registries are independent: a callback registered for
 * the catch-all type and for a specific type is called once by each.
 *
 * @typeParam TType - Modification type tags, including the catch-all tag
 */
export class ModificationObservers<TType extends string> {
  private readonly registries = new Map<TType, ObserverRegistry<AnyObserver>>();

  constructor(
    private readonly catchAll: TType,
    private readonly allowed: readonly TType[],
    private readonly logger: ObservaLogger
  ) {}

  /**
   * @throws {@link InvalidModificationTypeError} for unknown tags
   */
  add(observer: AnyObserver, type: TType, options?: ObserverOptions): void {
    this.assertType(type);

    let registry = this.registries.get(type);
    if (!registry) {
      registry = new ObserverRegistry({ key: type, logger: this.logger });
      this.registries.set(type, registry);
    }
    registry.add(observer, options);
  }

  remove(observer: AnyObserver, type: TType): void {
    this.assertType(type);
    this.registries.get(type)?.remove(observer);
  }

  has(observer: AnyObserver, type: TType): boolean {
    return this.registries.get(type)?.has(observer) ?? false;
  }

  count(type: TType): number {
    return this.registries.get(type)?.size ?? 0;
  }

  /** Whether a `(before, after)` observer would be reached by a `type` change */
  wantsSnapshots(type: TType): boolean {
    return this.relevant(type).some((registry) => registry.hasArity(2));
  }

  /**
   * Notify the catch-all observers, then the observers of `type`.
   *
   * @returns The observer failures, in call order
   */
  dispatch<TPayload, TPrevious, TNext>(
    type: TType,
    notification: Notification<TPayload, TPrevious, TNext>
  ): unknown[] {
    const observers = this.relevant(type).flatMap((registry) => registry.live());
    return dispatch(observers, notification, this.logger);
  }

  clear(): void {
    for (const registry of this.registries.values()) {
      registry.clear();
    }
    this.registries.clear();
  }

  // ── Private ──────────────────────────────────────────────────────────

  private relevant(type: TType): ObserverRegistry<AnyObserver>[] {
    const registries: ObserverRegistry<AnyObserver>[] = [];
    const catchAll = this.registries.get(this.catchAll);
    if (catchAll) registries.push(catchAll);

    if (type !== this.catchAll) {
      const specific = this.registries.get(type);
      if (specific) registries.push(specific);
    }
    return registries;
  }

  private assertType(type: TType): void {
    if (!this.allowed.includes(type)) {
      throw new InvalidModificationTypeError(type, this.allowed);
    }
  }
}
