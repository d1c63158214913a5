/**
 * @fileoverview Per-item failure records
 *
 * @module domain/shared/failures
 */

import { AppError, PerItemError } from '@invenlytics/core';
import type { ItemFailure } from '@invenlytics/types';

/**
 * Wrap any error raised for one item of a batch into a failure record.
 * The code is the underlying AppError's code when there is one.
 */
export function toItemFailure(itemCode: string, error: unknown): ItemFailure {
  const failure = PerItemError.from(itemCode, error);
  const cause = failure.originalError;
  return {
    itemCode: failure.itemCode,
    code: cause instanceof AppError ? cause.code : failure.code,
    message: failure.message,
  };
}
