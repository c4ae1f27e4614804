/**
 * Number of positional arguments an observer is called with.
 *
 * - `0`: called with no arguments
 * - `1`: called with the notification payload (the new value for properties)
 * - `2`: called with `(previous, next)`
 */
export type ObserverArity = 0 | 1 | 2;

/**
 * A change callback. Which form is called is decided by the function's
 * declared parameter count (`callback.length`), so rest parameters and
 * parameters with default values are not counted.
 *
 * @typeParam TPayload - Argument of the one-parameter form
 * @typeParam TPrevious - First argument of the two-parameter form
 * @typeParam TNext - Second argument of the two-parameter form
 */
export type Observer<TPayload, TPrevious = TPayload, TNext = TPrevious> =
  | (() => void)
  | ((payload: TPayload) => void)
  | ((previous: TPrevious, next: TNext) => void);

/** Common supertype of every observer form */
export type AnyObserver = (...args: never[]) => unknown;

/**
 * Options for observer registration
 */
export interface ObserverOptions {
  /**
   * Object whose lifetime the callback should share.
   *
   * Registries hold callbacks weakly, so an inline arrow function with no
   * other reference is collected and silently stops firing. Passing an
   * owner keeps the callback alive exactly as long as the owner is
   * reachable, without the registry keeping the owner alive.
   */
  owner?: object;
}

/**
 * What a dispatch hands to observers. Arguments are produced lazily so
 * that snapshots are only built when an observer asks for them.
 */
export interface Notification<TPayload, TPrevious, TNext> {
  /** Registry key, used in log entries and errors */
  readonly key: string;
  payload(): TPayload;
  previous(): TPrevious;
  next(): TNext;
}
