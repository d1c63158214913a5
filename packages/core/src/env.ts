import { z } from 'zod';
import { ClassificationStrategyNameSchema, HybridDbscanScopeSchema } from '@invenlytics/types';

import { ConfigurationError } from './errors.js';

/**
 * Environment Variable Validation
 * Parsed once at engine construction; the analytics values have defaults
 */

// Runtime config; LOG_LEVEL, when set, also applies to each analysis run's logger
const RuntimeEnvSchema = z.object({
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
});

// Analytics defaults that a deployment may tune without code changes
const AnalyticsEnvSchema = z.object({
  /** Strategy used when a caller does not name one */
  ANALYTICS_DEFAULT_METHOD: ClassificationStrategyNameSchema.default('hybrid'),
  /** Supplier lead time used for reorder points */
  ANALYTICS_LEAD_TIME_DAYS: z
    .string()
    .optional()
    .transform((v) => (v ? parseInt(v, 10) : 7))
    .pipe(z.number().int().positive()),
  /** Population the hybrid ensemble runs DBSCAN over */
  ANALYTICS_HYBRID_DBSCAN_SCOPE: HybridDbscanScopeSchema.default('singleton'),
  /** Currency label used in insight text */
  ANALYTICS_CURRENCY: z.string().min(1).default('AED'),
});

export const EnvSchema = RuntimeEnvSchema.merge(AnalyticsEnvSchema);

export type Env = z.infer<typeof EnvSchema>;

/**
 * Validate environment variables
 * @param source - Variables to validate (defaults to process.env)
 */
export function validateEnv(source: Record<string, string | undefined> = process.env): Env {
  const result = EnvSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const errorMessages = Object.entries(errors)
      .map(([field, messages]) => `  ${field}: ${(messages ?? []).join(', ')}`)
      .join('\n');

    throw new ConfigurationError(`Environment validation failed:\n${errorMessages}`);
  }

  return result.data;
}
