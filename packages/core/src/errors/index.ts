/**
 * Observa Error System
 *
 * This module provides structured error handling with:
 * - Unique error codes (OBSERVA_P100, OBSERVA_L400, etc.)
 * - Helpful suggestions for resolution
 * - Error categorization
 * - Proper error chaining
 *
 * @example
 * ```typescript
 * import { ObservaError, ListIndexError } from '@observa/core';
 *
 * try {
 *   list.pop(10);
 * } catch (error) {
 *   if (error instanceof ListIndexError) {
 *     console.log('Nothing at index', error.index);
 *   } else if (ObservaError.isCategory(error, 'observer')) {
 *     console.log('An observer failed:', error.format());
 *   }
 * }
 * ```
 *
 * @module errors
 */

// Error codes
export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

// Error classes
export {
  InvalidArgumentError,
  InvalidModificationTypeError,
  InvalidObserverError,
  ItemNotFoundError,
  KeyNotFoundError,
  ListIndexError,
  NotificationDepthError,
  ObservaError,
  ObserverError,
  UnboundPropertyError,
  UnknownPropertyError,
  ensureObservaError,
  type ObservaErrorOptions,
  type SerializedObservaError,
} from './observa-error.js';
