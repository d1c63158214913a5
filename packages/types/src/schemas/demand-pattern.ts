/**
 * Demand Pattern Schemas
 *
 * Syntetos-Boylan-Croston classification of a 12-month sales series and the
 * replenishment parameters derived from it.
 */
import { z } from 'zod';

import { ActionPrioritySchema, ItemCodeSchema, NonNegativeNumberSchema } from './common.js';

export const DemandPatternSchema = z.enum(['SMOOTH', 'ERRATIC', 'INTERMITTENT', 'LUMPY']);

export const ForecastMethodSchema = z.enum([
  'MOVING_AVERAGE',
  'WEIGHTED_AVERAGE',
  'CROSTONS',
  'EXPONENTIAL_SMOOTHING',
]);

/**
 * Twelve monthly quantities, oldest first
 */
export const MonthlySeriesSchema = z.array(NonNegativeNumberSchema).length(12);

export const DemandPatternInputSchema = z.object({
  itemCode: ItemCodeSchema,
  itemName: z.string().optional(),
  monthlySales: MonthlySeriesSchema,
  leadTimeDays: z.number().int().positive().optional(),
});

// =============================================================================
// Configuration
// =============================================================================

export const DemandPatternConfigSchema = z.object({
  /** ADI boundary between regular and intermittent demand */
  adiThreshold: z.number().positive().default(1.32),
  /** CV² boundary between stable and variable quantities */
  cv2Threshold: z.number().positive().default(0.49),

  // Service-level z-scores per pattern
  smoothServiceZ: z.number().positive().default(1.65),
  erraticServiceZ: z.number().positive().default(2.33),
  intermittentServiceZ: z.number().positive().default(2.33),
  lumpyServiceZ: z.number().positive().default(2.58),

  /** Width of the SMOOTH forecast interval in standard deviations */
  forecastIntervalZ: z.number().positive().default(1.96),

  orderingCost: z.number().positive().default(50),
  holdingCostRate: z.number().positive().max(1).default(0.2),
  leadTimeDays: z.number().int().positive().default(7),
});

// =============================================================================
// Output
// =============================================================================

export const PatternClassificationSchema = z.object({
  adi: NonNegativeNumberSchema,
  cvSquared: NonNegativeNumberSchema,
  pattern: DemandPatternSchema,
});

export const DemandForecastSchema = z.object({
  value: NonNegativeNumberSchema,
  lower: NonNegativeNumberSchema,
  upper: NonNegativeNumberSchema,
  method: ForecastMethodSchema,
});

export const ReorderParametersSchema = z.object({
  reorderPoint: NonNegativeNumberSchema,
  safetyStock: NonNegativeNumberSchema,
  economicOrderQty: NonNegativeNumberSchema,
  recommendedOrderQty: NonNegativeNumberSchema,
  orderFrequency: NonNegativeNumberSchema,
  leadTimeDays: z.number().int().positive(),
});

export const PatternRecommendationSchema = z.object({
  action: z.string(),
  priority: ActionPrioritySchema,
  guidance: z.array(z.string()),
});

export const DemandPatternResultSchema = z.object({
  itemCode: ItemCodeSchema,
  itemName: z.string(),
  pattern: DemandPatternSchema,
  adi: NonNegativeNumberSchema,
  cvSquared: NonNegativeNumberSchema,
  /** Plain-language reading of the pattern with its ADI and CV² */
  reason: z.string(),
  avgMonthlyDemand: NonNegativeNumberSchema,
  /** Sum of the twelve months */
  totalAnnualDemand: NonNegativeNumberSchema,
  stdDevDemand: NonNegativeNumberSchema,
  /** Coefficient of variation over all twelve months, in percent */
  demandVariability: NonNegativeNumberSchema,
  forecast: DemandForecastSchema,
  reorder: ReorderParametersSchema,
  recommendation: PatternRecommendationSchema,
  analyzedAt: z.string(),
});

export type DemandPattern = z.infer<typeof DemandPatternSchema>;
export type ForecastMethod = z.infer<typeof ForecastMethodSchema>;
export type MonthlySeries = z.infer<typeof MonthlySeriesSchema>;
export type DemandPatternInput = z.infer<typeof DemandPatternInputSchema>;
export type DemandPatternConfig = z.infer<typeof DemandPatternConfigSchema>;
export type DemandPatternConfigInput = z.input<typeof DemandPatternConfigSchema>;
export type PatternClassification = z.infer<typeof PatternClassificationSchema>;
export type DemandForecast = z.infer<typeof DemandForecastSchema>;
export type ReorderParameters = z.infer<typeof ReorderParametersSchema>;
export type PatternRecommendation = z.infer<typeof PatternRecommendationSchema>;
export type DemandPatternResult = z.infer<typeof DemandPatternResultSchema>;
