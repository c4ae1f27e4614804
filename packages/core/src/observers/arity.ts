import { InvalidObserverError } from '../errors/observa-error.js';
import type { ObserverArity } from './types.js';

/**
 * Determine how an observer wants to be called from its declared
 * parameter count.
 *
 * @throws {@link InvalidObserverError} if `observer` is not a function or
 * declares more than two parameters
 */
export function resolveArity(observer: unknown): ObserverArity {
  if (typeof observer !== 'function') {
    throw new InvalidObserverError(`Observer must be a function, got ${typeof observer}`, {
      type: typeof observer,
    });
  }

  switch (observer.length) {
    case 0:
      return 0;
    case 1:
      return 1;
    case 2:
      return 2;
    default:
      throw new InvalidObserverError(
        `Observer must accept zero, one or two parameters, "${observer.name || 'anonymous'}" declares ${observer.length}`,
        { observer: observer.name || 'anonymous', parameters: observer.length }
      );
  }
}
