/**
 * @fileoverview Zod validation helpers for domain inputs
 *
 * @module domain/shared/validation
 */

import type { z } from 'zod';
import { ConfigurationError, ValidationError } from '@invenlytics/core';
import { Err, Ok, type Result } from '@invenlytics/types';

/**
 * Render zod issues as `path: message` fragments
 */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Validate input against a schema, returning a Result
 *
 * @example
 * ```typescript
 * const parsed = validateWithResult(ItemMetricsSchema, raw, 'item metrics');
 * if (isErr(parsed)) {
 *   failures.push(parsed.error);
 * }
 * ```
 */
export function validateWithResult<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  label: string
): Result<z.output<T>, ValidationError> {
  const result = schema.safeParse(data);
  if (result.success) {
    // eslint-disable-next-line @typescript-eslint/no-unsafe-assignment -- Zod safeParse returns properly typed data
    return Ok(result.data);
  }
  return Err(
    new ValidationError(`Invalid ${label}: ${formatZodIssues(result.error)}`, result.error.flatten())
  );
}

/**
 * Parse a configuration record, throwing ConfigurationError on the first
 * invalid key
 */
export function parseConfig<T extends z.ZodTypeAny>(
  schema: T,
  overrides: unknown,
  label: string
): z.output<T> {
  const result = schema.safeParse(overrides);
  if (result.success) {
    // eslint-disable-next-line @typescript-eslint/no-unsafe-assignment -- Zod safeParse returns properly typed data
    return result.data;
  }
  const key = result.error.issues[0]?.path.join('.');
  throw new ConfigurationError(
    `Invalid ${label} configuration: ${formatZodIssues(result.error)}`,
    key === '' ? undefined : key
  );
}
