import { NotificationDepthError } from '../errors/observa-error.js';

/**
 * Options for {@link ReentrantLock}
 */
export interface ReentrantLockOptions {
  /** Maximum hold count; acquiring past it throws {@link NotificationDepthError} */
  maxDepth?: number;
  /** Extra context attached to the depth error */
  context?: Record<string, unknown>;
}

/**
 * Re-entrant mutual exclusion for one observable instance.
 *
 * JavaScript runs each synchronous call stack to completion, so two
 * callers can never hold the lock at the same time; what the lock adds is
 * the scoped acquire/release contract and a hold count. The call stack that
 * holds the lock may acquire it again (an observer writing another property
 * of the same instance), and every acquisition is released on the way out,
 * including when the guarded function throws.
 *
 * The guarded function must be synchronous. A promise it returns is handed
 * back to the caller after the lock has been released.
 *
 * @example
 * ```typescript
 * const lock = new ReentrantLock({ maxDepth: 8 });
 *
 * lock.runExclusive(() => {
 *   lock.runExclusive(() => {
 *     console.log(lock.holdCount); // 2
 *   });
 * });
 *
 * console.log(lock.isLocked); // false
 * ```
 */
export class ReentrantLock {
  private depth = 0;
  private readonly maxDepth: number;
  private readonly context: Record<string, unknown>;

  constructor(options: ReentrantLockOptions = {}) {
    this.maxDepth = options.maxDepth ?? Number.POSITIVE_INFINITY;
    this.context = options.context ?? {};
  }

  /** Number of nested acquisitions currently held */
  get holdCount(): number {
    return this.depth;
  }

  get isLocked(): boolean {
    return this.depth > 0;
  }

  /**
   * Run `fn` while holding the lock and return its result.
   *
   * @throws {@link NotificationDepthError} when the hold count would exceed `maxDepth`
   */
  runExclusive<T>(fn: () => T): T {
    if (this.depth >= this.maxDepth) {
      throw new NotificationDepthError(this.maxDepth, this.context);
    }

    this.depth++;
    try {
      return fn();
    } finally {
      this.depth--;
    }
  }
}
