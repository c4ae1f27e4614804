/**
 * Observa Error Codes
 *
 * Error codes are structured as OBSERVA_[CATEGORY][NUMBER]:
 * - P: Property errors (P100-P199)
 * - O: Observer errors (O200-O299)
 * - M: Modification type errors (M300-M399)
 * - L: Collection errors (L400-L499)
 * - N: Notification errors (N500-N599)
 * - A: Argument errors (A600-A699)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Property errors (P100-P199)
  OBSERVA_P100: {
    code: 'OBSERVA_P100',
    message: 'Unknown observable property',
    suggestion: 'Declare the property with observableProperty() before observing it.',
  },
  OBSERVA_P101: {
    code: 'OBSERVA_P101',
    message: 'Observable property is not attached to a class',
    suggestion: 'Declare the property through defineObservable() or an ObservableObject constructor first.',
  },

  // Observer errors (O200-O299)
  OBSERVA_O200: {
    code: 'OBSERVA_O200',
    message: 'Invalid observer',
    suggestion: 'Observers must be functions taking zero, one or two parameters.',
  },
  OBSERVA_O201: {
    code: 'OBSERVA_O201',
    message: 'Observers failed during notification',
    suggestion: 'Inspect the errors property for the individual observer failures.',
  },

  // Modification type errors (M300-M399)
  OBSERVA_M300: {
    code: 'OBSERVA_M300',
    message: 'Invalid modification type',
    suggestion: 'Use one of the ListModificationType or DictModificationType members.',
  },

  // Collection errors (L400-L499)
  OBSERVA_L400: {
    code: 'OBSERVA_L400',
    message: 'Index out of range',
    suggestion: 'Check the index against the current length of the list.',
  },
  OBSERVA_L401: {
    code: 'OBSERVA_L401',
    message: 'Item not found',
    suggestion: 'Check includes() before removing an item.',
  },
  OBSERVA_L402: {
    code: 'OBSERVA_L402',
    message: 'Key not found',
    suggestion: 'Check has() first, or pass a default value to pop().',
  },

  // Notification errors (N500-N599)
  OBSERVA_N500: {
    code: 'OBSERVA_N500',
    message: 'Notification depth exceeded',
    suggestion:
      'An observer probably writes a property that triggers itself again. Break the cycle or raise maxNotificationDepth.',
  },

  // Argument errors (A600-A699)
  OBSERVA_A600: {
    code: 'OBSERVA_A600',
    message: 'Invalid argument',
    suggestion: 'Check the documented constraints of the function arguments.',
  },

  // Internal errors (X900-X999)
  OBSERVA_X900: {
    code: 'OBSERVA_X900',
    message: 'Internal error',
    suggestion: 'An unexpected error occurred. Please report this issue.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory =
  | 'property'
  | 'observer'
  | 'modification'
  | 'collection'
  | 'notification'
  | 'argument'
  | 'internal';

const CODE_PREFIX = 'OBSERVA_';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(CODE_PREFIX.length);
  switch (letter) {
    case 'P':
      return 'property';
    case 'O':
      return 'observer';
    case 'M':
      return 'modification';
    case 'L':
      return 'collection';
    case 'N':
      return 'notification';
    case 'A':
      return 'argument';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
