/**
 * ObservaError - Error class with structured error information
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating an ObservaError
 */
export interface ObservaErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of an ObservaError
 */
export interface SerializedObservaError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedObservaError | { name: string; message: string; stack?: string };
}

/**
 * Base error class for observa with structured error information.
 *
 * ObservaError provides:
 * - Unique error codes for categorization
 * - Helpful suggestions for resolution
 * - Context information for debugging
 * - Proper error chaining with cause
 *
 * @example
 * ```typescript
 * try {
 *   person.addObserver('height', onHeight);
 * } catch (error) {
 *   if (ObservaError.isCode(error, 'OBSERVA_P100')) {
 *     console.log(error.format());
 *   }
 * }
 * ```
 */
export class ObservaError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: ObservaErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'ObservaError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    // Maintain proper stack trace for V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ObservaError);
    }
  }

  /**
   * Create an ObservaError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): ObservaError {
    return new ObservaError({ code, context });
  }

  /**
   * Wrap an existing error with an ObservaError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): ObservaError {
    return new ObservaError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  /**
   * Check if an error is an ObservaError
   */
  static isObservaError(error: unknown): error is ObservaError {
    return error instanceof ObservaError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: ErrorCode): boolean {
    return ObservaError.isObservaError(error) && error.code === code;
  }

  /**
   * Check if an error matches a specific category
   */
  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return ObservaError.isObservaError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedObservaError {
    const result: SerializedObservaError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      if (ObservaError.isObservaError(this.cause)) {
        result.cause = this.cause.toJSON();
      } else {
        result.cause = {
          name: this.cause.name,
          message: this.cause.message,
          stack: this.cause.stack,
        };
      }
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * Observer registration or access against a property the class never declared
 */
export class UnknownPropertyError extends ObservaError {
  /** The property name that was requested */
  readonly property: string;
  /** Name of the class that was asked */
  readonly owner: string;

  constructor(owner: string, property: string) {
    super({
      code: 'OBSERVA_P100',
      message: `"${owner}" has no observable property "${property}"`,
      context: { owner, property },
    });

    this.name = 'UnknownPropertyError';
    this.property = property;
    this.owner = owner;
  }
}

/**
 * An ObservableProperty was read or written before it received a name
 */
export class UnboundPropertyError extends ObservaError {
  constructor() {
    super({ code: 'OBSERVA_P101' });
    this.name = 'UnboundPropertyError';
  }
}

/**
 * Observer is not callable, or declares more parameters than can be supplied
 */
export class InvalidObserverError extends ObservaError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({ code: 'OBSERVA_O200', message, context });
    this.name = 'InvalidObserverError';
  }
}

/**
 * Several observers threw during one notification.
 *
 * A single failing observer is rethrown as-is; this error is only used
 * when two or more fail in the same sweep.
 */
export class ObserverError extends ObservaError {
  /** Every failure, in the order the observers were called */
  readonly errors: readonly unknown[];

  constructor(key: string, errors: readonly unknown[]) {
    const first = errors[0];
    super({
      code: 'OBSERVA_O201',
      message: `${errors.length} observers failed while notifying "${key}"`,
      context: { key, failures: errors.length },
      cause: first instanceof Error ? first : undefined,
    });

    this.name = 'ObserverError';
    this.errors = errors;
  }
}

/**
 * Registration against a tag that is not a known modification type
 */
export class InvalidModificationTypeError extends ObservaError {
  /** The rejected tag */
  readonly modificationType: unknown;

  constructor(modificationType: unknown, allowed: readonly string[]) {
    super({
      code: 'OBSERVA_M300',
      message: `Invalid modification type "${String(modificationType)}", expected one of: ${allowed.join(', ')}`,
      context: { modificationType: String(modificationType), allowed },
    });

    this.name = 'InvalidModificationTypeError';
    this.modificationType = modificationType;
  }
}

/**
 * List index outside the current bounds
 */
export class ListIndexError extends ObservaError {
  readonly index: number;
  readonly length: number;

  constructor(operation: string, index: number, length: number) {
    super({
      code: 'OBSERVA_L400',
      message: `${operation} index ${index} out of range for list of length ${length}`,
      context: { operation, index, length },
    });

    this.name = 'ListIndexError';
    this.index = index;
    this.length = length;
  }
}

/**
 * Item looked up by value is not in the list
 */
export class ItemNotFoundError extends ObservaError {
  constructor(operation: string, item: unknown) {
    super({
      code: 'OBSERVA_L401',
      message: `${operation}(x): x not in list`,
      context: { operation, item: describeValue(item) },
    });
    this.name = 'ItemNotFoundError';
  }
}

/**
 * Key is not present in the dict
 */
export class KeyNotFoundError extends ObservaError {
  constructor(operation: string, key?: unknown) {
    super({
      code: 'OBSERVA_L402',
      message:
        key === undefined ? `${operation}: dictionary is empty` : `${operation}: key ${describeValue(key)} not found`,
      context: { operation, ...(key === undefined ? {} : { key: describeValue(key) }) },
    });
    this.name = 'KeyNotFoundError';
  }
}

/**
 * Nested notifications went deeper than the configured limit
 */
export class NotificationDepthError extends ObservaError {
  readonly maxDepth: number;

  constructor(maxDepth: number, context?: Record<string, unknown>) {
    super({
      code: 'OBSERVA_N500',
      message: `Notification depth exceeded the limit of ${maxDepth}`,
      context: { ...context, maxDepth },
    });

    this.name = 'NotificationDepthError';
    this.maxDepth = maxDepth;
  }
}

/**
 * Malformed or mutually exclusive arguments
 */
export class InvalidArgumentError extends ObservaError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({ code: 'OBSERVA_A600', message, context });
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Helper function to ensure errors are ObservaErrors
 */
export function ensureObservaError(
  error: unknown,
  defaultCode: ErrorCode = 'OBSERVA_X900'
): ObservaError {
  if (ObservaError.isObservaError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return ObservaError.wrap(error, defaultCode);
  }

  return new ObservaError({
    code: defaultCode,
    message: String(error),
  });
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'object' && value !== null) return Object.prototype.toString.call(value);
  return String(value);
}
