/**
 * Error classes raised by the helpers in this package
 */

/**
 * Base error class for all errors raised by tidybits helpers
 */
export class UtilityError extends Error {
  constructor(message: string, public readonly code: string, public readonly context?: unknown) {
    super(message);
    this.name = 'UtilityError';

    // maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error thrown when an operation is invoked at a time it cannot be honoured
 */
export class IllegalStateError extends UtilityError {
  constructor(message: string, code = 'ILLEGAL_STATE', context?: unknown) {
    super(message, code, context);
    this.name = 'IllegalStateError';
  }
}

/**
 * Error thrown when a singleton reducer observes a second element
 */
export class CardinalityError extends IllegalStateError {
  static readonly MESSAGE = 'Expected stream to contain exactly 0 or 1 elements';

  constructor() {
    super(CardinalityError.MESSAGE, 'CARDINALITY_VIOLATION', { expected: '0 or 1' });
    this.name = 'CardinalityError';
  }
}

/**
 * Error thrown when an argument has an unacceptable value
 */
export class IllegalArgumentError extends UtilityError {
  constructor(message: string, context?: unknown) {
    super(message, 'ILLEGAL_ARGUMENT', context);
    this.name = 'IllegalArgumentError';
  }
}

/**
 * Error thrown when a required value is null or undefined
 */
export class NullValueError extends UtilityError {
  constructor(message: string, context?: unknown) {
    super(message, 'NULL_VALUE', context);
    this.name = 'NullValueError';
  }
}

/**
 * Error thrown when mutating a container that does not allow it
 */
export class UnsupportedOperationError extends UtilityError {
  constructor(public readonly operation: string) {
    super(`Operation '${operation}' is not supported`, 'UNSUPPORTED_OPERATION', { operation });
    this.name = 'UnsupportedOperationError';
  }
}
