/**
 * @fileoverview Result type for per-item outcomes
 *
 * Batch operations analyse many items independently; each item yields either a
 * value or a typed failure without aborting the batch.
 *
 * @module @invenlytics/types/result
 */

// =============================================================================
// RESULT TYPE - Success or Failure with Typed Errors
// =============================================================================

/**
 * Represents a successful result containing a value
 */
export interface Ok<T> {
  readonly _tag: 'Ok';
  readonly value: T;
}

/**
 * Represents a failed result containing an error
 */
export interface Err<E> {
  readonly _tag: 'Err';
  readonly error: E;
}

/**
 * Result type - represents either success (Ok) or failure (Err)
 *
 * @example
 * const prepared = safePrepareItem(raw);
 * if (isErr(prepared)) failures.push(prepared.error);
 */
export type Result<T, E> = Ok<T> | Err<E>;

/**
 * Creates a successful Result
 */
export function Ok<T>(value: T): Ok<T> {
  return { _tag: 'Ok', value };
}

/**
 * Creates a failed Result
 */
export function Err<E>(error: E): Err<E> {
  return { _tag: 'Err', error };
}

// =============================================================================
// RESULT TYPE GUARDS
// =============================================================================

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result._tag === 'Ok';
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result._tag === 'Err';
}

// =============================================================================
// RESULT OPERATIONS
// =============================================================================

export const Result = {
  /**
   * Returns the value, throwing the error of an Err
   */
  unwrap<T, E>(result: Result<T, E>): T {
    if (isErr(result)) {
      throw result.error;
    }
    return result.value;
  },

  /**
   * Runs a function, catching a thrown value into Err
   */
  try<T>(fn: () => T): Result<T, unknown> {
    try {
      return Ok(fn());
    } catch (error) {
      return Err(error);
    }
  },

  /**
   * Transforms the error value of a Result
   */
  mapErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
    return isErr(result) ? Err(fn(result.error)) : result;
  },

  /**
   * Splits Results into success values and errors, preserving order
   */
  partition<T, E>(results: readonly Result<T, E>[]): { values: T[]; errors: E[] } {
    const values: T[] = [];
    const errors: E[] = [];
    for (const result of results) {
      if (isOk(result)) {
        values.push(result.value);
      } else {
        errors.push(result.error);
      }
    }
    return { values, errors };
  },
};
