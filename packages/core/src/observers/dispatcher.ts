import { ObserverError } from '../errors/observa-error.js';
import type { ObservaLogger } from '../observability/logger.js';
import type { LiveObserver } from './registry.js';
import type { AnyObserver, Notification, ObserverArity } from './types.js';

function argumentsFor<TPayload, TPrevious, TNext>(
  arity: ObserverArity,
  notification: Notification<TPayload, TPrevious, TNext>
): unknown[] {
  switch (arity) {
    case 0:
      return [];
    case 1:
      return [notification.payload()];
    case 2:
      return [notification.previous(), notification.next()];
  }
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Call every observer with the arguments its arity asks for, one after
 * another on the calling stack, in the given order.
 *
 * A throwing observer does not stop the sweep: the failure is logged and
 * collected, and the remaining observers still run. Observers that were
 * removed after the snapshot was taken are skipped. A promise returned by
 * an async observer is not awaited; if it rejects, the rejection is logged.
 *
 * @returns The failures, in call order (empty when every observer succeeded)
 */
export function dispatch<TPayload, TPrevious, TNext>(
  observers: readonly LiveObserver<AnyObserver>[],
  notification: Notification<TPayload, TPrevious, TNext>,
  logger: ObservaLogger
): unknown[] {
  const failures: unknown[] = [];

  for (const observer of observers) {
    if (!observer.isRegistered()) continue;

    try {
      const result: unknown = Reflect.apply(
        observer.callback,
        undefined,
        argumentsFor(observer.arity, notification)
      );

      if (isPromiseLike(result)) {
        void Promise.resolve(result).catch((error: unknown) => {
          logger.error(`Async observer for "${notification.key}" rejected`, error, {
            key: notification.key,
            observer: observer.callback.name || 'anonymous',
          });
        });
      }
    } catch (error) {
      logger.error(`Error in observer for "${notification.key}"`, error, {
        key: notification.key,
        observer: observer.callback.name || 'anonymous',
      });
      failures.push(error);
    }
  }

  return failures;
}

/**
 * Rethrow what a dispatch collected: the error itself when one observer
 * failed, an {@link ObserverError} carrying all of them when several did.
 */
export function raiseFailures(key: string, failures: readonly unknown[]): void {
  if (failures.length === 0) return;
  if (failures.length === 1) throw failures[0];
  throw new ObserverError(key, failures);
}
