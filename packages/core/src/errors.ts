/**
 * Error taxonomy for the analytics engine.
 *
 * - ConfigurationError: fatal, surfaced immediately, never retried
 * - ValidationError: one input record is malformed
 * - ModelUnavailableError: a clustering codepath cannot run; callers fall back
 * - PerItemError: any failure while analysing one item of a batch
 */

/**
 * Base application error; `code` travels into per-item failure records
 */
export class AppError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid input
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Invalid or inconsistent configuration: unknown strategy, bad threshold,
 * weights that do not sum to 1.0
 */
export class ConfigurationError extends AppError {
  public readonly key: string | undefined;

  constructor(message: string, key?: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
    this.key = key;
  }
}

/**
 * A model codepath (clustering, ensemble) cannot produce a result for the
 * given batch
 */
export class ModelUnavailableError extends AppError {
  public readonly model: string;

  constructor(model: string, message: string) {
    super(`${model} unavailable: ${message}`, 'MODEL_UNAVAILABLE');
    this.name = 'ModelUnavailableError';
    this.model = model;
  }
}

/**
 * Failure while analysing a single item of a batch
 */
export class PerItemError extends AppError {
  public readonly itemCode: string;
  public readonly originalError: Error | undefined;

  constructor(itemCode: string, message: string, originalError?: Error) {
    super(`Item ${itemCode}: ${message}`, 'PER_ITEM_ERROR');
    this.name = 'PerItemError';
    this.itemCode = itemCode;
    this.originalError = originalError;
  }

  static from(itemCode: string, error: unknown): PerItemError {
    if (error instanceof PerItemError) {
      return error;
    }
    if (error instanceof Error) {
      return new PerItemError(itemCode, error.message, error);
    }
    return new PerItemError(itemCode, String(error));
  }
}
