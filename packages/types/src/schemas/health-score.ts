/**
 * New Item Health Schemas
 *
 * Composite 0-100 health score for recently launched items.
 *
 * COMPONENTS (default weights):
 * - Sales performance vs target (40%)
 * - Customer acquisition and retention (30%)
 * - Stock adequacy in days of stock (20%)
 * - Week-over-week growth (10%)
 */
import { z } from 'zod';

import {
  ActionPrioritySchema,
  ItemCodeSchema,
  LifeStageSchema,
  NonNegativeNumberSchema,
} from './common.js';

export const HealthStatusSchema = z.enum(['CRITICAL', 'AT_RISK', 'CAUTION', 'HEALTHY']);

export const HealthActionSchema = z.enum([
  'URGENT_INTERVENTION',
  'CLOSE_MONITORING',
  'OPTIMIZE_INVENTORY',
  'MAINTAIN',
  'AGGRESSIVE_MARKETING',
  'MARKET_EXPANSION',
  'OPTIMIZE_SUPPLY_CHAIN',
]);

export const NewItemMetricsSchema = z.object({
  item_code: ItemCodeSchema,
  item_name: z.string().nullish(),
  item_age_days: NonNegativeNumberSchema,
  // Counters a young item may not have yet; denominators default to 1
  actual_sales_qty: NonNegativeNumberSchema.default(0),
  target_sales_qty: NonNegativeNumberSchema.default(1),
  unique_customers: z.number().int().min(0).default(0),
  repeat_customers: z.number().int().min(0).default(0),
  current_stock: NonNegativeNumberSchema.default(0),
  stock_value: NonNegativeNumberSchema.nullish(),
  avg_monthly_sales: NonNegativeNumberSchema.default(1),
  sales_last_week: NonNegativeNumberSchema.default(0),
  sales_prior_week: NonNegativeNumberSchema.default(1),
});

// =============================================================================
// Configuration
// =============================================================================

export const HealthScoringConfigSchema = z.object({
  // Component weights (must sum to 1.0)
  weightSalesPerformance: z.number().min(0).max(1).default(0.4),
  weightCustomerAcquisition: z.number().min(0).max(1).default(0.3),
  weightStockAdequacy: z.number().min(0).max(1).default(0.2),
  weightGrowthTrend: z.number().min(0).max(1).default(0.1),

  // Sales vs target ratio
  salesExcellent: z.number().min(0).default(1.2),
  salesGood: z.number().min(0).default(0.95),
  salesFair: z.number().min(0).default(0.7),
  salesPoor: z.number().min(0).default(0.5),
  salesCritical: z.number().min(0).default(0.3),

  // Unique customers
  customersExcellent: z.number().int().min(0).default(50),
  customersGood: z.number().int().min(0).default(30),
  customersFair: z.number().int().min(0).default(15),
  customersPoor: z.number().int().min(0).default(5),
  retentionBonusMinRatio: z.number().min(0).max(1).default(0.5),
  retentionBonus: z.number().min(0).default(15),

  // Days of stock
  dosOptimalMin: z.number().positive().default(7),
  dosOptimalMax: z.number().positive().default(60),
  dosWarningMax: z.number().positive().default(90),
  dosCriticalMax: z.number().positive().default(180),
  /** Floor applied to average monthly sales before dividing */
  stockEpsilon: z.number().positive().default(0.01),

  // Week-over-week growth
  growthExcellent: z.number().default(0.2),
  growthGood: z.number().default(0.1),
  growthFair: z.number().default(0),
  growthPoor: z.number().default(-0.1),
  growthCritical: z.number().default(-0.2),

  // Life stages (days, inclusive upper bounds)
  launchMaxDays: z.number().positive().default(30),
  learningMaxDays: z.number().positive().default(90),
  graduationMaxDays: z.number().positive().default(180),

  // Status bands on the rounded score
  criticalMaxScore: z.number().min(0).max(100).default(30),
  atRiskMaxScore: z.number().min(0).max(100).default(60),
  healthyMinScore: z.number().min(0).max(100).default(80),

  /** Tolerance when checking the weight sum */
  weightSumTolerance: z.number().positive().default(1e-6),
});

// =============================================================================
// Output
// =============================================================================

export const ComponentScoreSchema = z.object({
  score: z.number().int().min(0).max(100),
  reason: z.string(),
});

export const HealthScoreResultSchema = z.object({
  itemCode: ItemCodeSchema,
  itemName: z.string(),
  itemAgeDays: NonNegativeNumberSchema,
  healthScore: z.number().int().min(0).max(100),
  healthStatus: HealthStatusSchema,
  lifeStage: LifeStageSchema,

  components: z.object({
    salesPerformance: ComponentScoreSchema,
    customerAcquisition: ComponentScoreSchema,
    stockAdequacy: ComponentScoreSchema,
    growthTrend: ComponentScoreSchema,
  }),

  totalCustomers: z.number().int().min(0),
  salesVsTargetPct: NonNegativeNumberSchema,
  repeatCustomersPct: NonNegativeNumberSchema,
  daysOfStock: NonNegativeNumberSchema,
  /** Fractional week-over-week change, e.g. 0.1 for +10% */
  weekOverWeekGrowth: z.number(),

  recommendedAction: HealthActionSchema,
  actionPriority: ActionPrioritySchema,
  keyMetrics: z.array(z.string()),
  warningFlags: z.array(z.string()),
  analyzedAt: z.string(),
});

export type HealthStatus = z.infer<typeof HealthStatusSchema>;
export type HealthAction = z.infer<typeof HealthActionSchema>;
export type NewItemMetrics = z.input<typeof NewItemMetricsSchema>;
export type ParsedNewItemMetrics = z.infer<typeof NewItemMetricsSchema>;
export type HealthScoringConfig = z.infer<typeof HealthScoringConfigSchema>;
export type HealthScoringConfigInput = z.input<typeof HealthScoringConfigSchema>;
export type ComponentScore = z.infer<typeof ComponentScoreSchema>;
export type HealthScoreResult = z.infer<typeof HealthScoreResultSchema>;
