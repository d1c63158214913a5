/**
 * Item Classification Schemas
 *
 * Operational categories for warehouse items and the configuration of the
 * four classification strategies.
 *
 * CATEGORIES:
 * - FAST: high velocity, high turnover
 * - SLOW: low velocity but still selling
 * - MEDIUM: mid-range characteristics
 * - NEW_ITEM: launched less than 90 days ago
 * - DEAD_STOCK: no sale for 180+ days or negligible annual sales
 */
import { z } from 'zod';

import {
  ActionPrioritySchema,
  ConfidenceSchema,
  ItemCodeSchema,
  ItemFailureSchema,
  LifeStageSchema,
  NonNegativeNumberSchema,
  TimestampSchema,
} from './common.js';

// =============================================================================
// Labels
// =============================================================================

export const ClassificationSchema = z.enum(['FAST', 'SLOW', 'MEDIUM', 'NEW_ITEM', 'DEAD_STOCK']);

/**
 * Method tag stamped on each result
 */
export const ClassificationMethodSchema = z.enum([
  'RULE_BASED',
  'DBSCAN_CLUSTERING',
  'KMEANS_CLUSTERING',
  'HYBRID',
]);

/**
 * Strategy names a caller may request
 */
export const ClassificationStrategyNameSchema = z.enum(['rule_based', 'dbscan', 'kmeans', 'hybrid']);

/**
 * Population the hybrid ensemble runs DBSCAN over.
 * - singleton: each item alone (always an outlier at min samples > 1)
 * - batch: the full ML-eligible batch, fitted once
 */
export const HybridDbscanScopeSchema = z.enum(['singleton', 'batch']);

export const AbcCategorySchema = z.enum(['A', 'B', 'C']);

export const DormancyStatusSchema = z.enum(['ACTIVE', 'SLEEPY', 'DORMANT', 'DEAD']);

export const ItemActionSchema = z.enum([
  'INCREASE_STOCK',
  'REDUCE_STOCK',
  'MAINTAIN_STOCK',
  'LIQUIDATION',
  'MARKET_MORE',
]);

// =============================================================================
// Input
// =============================================================================

/**
 * Numeric fields every item record is expected to carry.
 * Missing ones are defaulted to 0 by the feature preparer.
 */
export const REQUIRED_ITEM_NUMERIC_FIELDS = [
  'annual_sales_qty',
  'annual_sales_value',
  'current_stock',
  'stock_value',
  'item_age_days',
  'days_since_last_sale',
] as const;

/**
 * Raw per-item metrics as delivered by the ingestion layer
 */
export const ItemMetricsSchema = z.object({
  item_code: ItemCodeSchema,
  item_name: z.string().nullish(),
  uom: z.string().nullish(),
  annual_sales_qty: NonNegativeNumberSchema.nullish(),
  annual_sales_value: NonNegativeNumberSchema.nullish(),
  current_stock: NonNegativeNumberSchema.nullish(),
  stock_value: NonNegativeNumberSchema.nullish(),
  item_age_days: NonNegativeNumberSchema.nullish(),
  days_since_last_sale: NonNegativeNumberSchema.nullish(),
  created_date: z.union([z.string(), z.date()]).nullish(),
  last_sale_date: z.union([z.string(), z.date()]).nullish(),

  /** Units per day; derived from annual quantity when absent */
  sales_velocity: NonNegativeNumberSchema.nullish(),
  /** Annual quantity over current stock; derived when absent */
  turnover_ratio: NonNegativeNumberSchema.nullish(),
  /** 0-100, defaults to 50 */
  consistency_score: z.number().min(0).max(100).nullish(),
  demand_variability: NonNegativeNumberSchema.nullish(),
});

/**
 * Item metrics after cleaning and feature derivation
 */
export const PreparedItemSchema = z.object({
  itemCode: ItemCodeSchema,
  itemName: z.string(),
  uom: z.string(),
  annualSalesQty: NonNegativeNumberSchema,
  annualSalesValue: NonNegativeNumberSchema,
  currentStock: NonNegativeNumberSchema,
  stockValue: NonNegativeNumberSchema,
  itemAgeDays: NonNegativeNumberSchema,
  daysSinceLastSale: NonNegativeNumberSchema,
  salesVelocity: NonNegativeNumberSchema,
  turnoverRatio: NonNegativeNumberSchema,
  consistencyScore: z.number().min(0).max(100),
  demandVariability: NonNegativeNumberSchema,
  defaultedFields: z.array(z.string()),
});

/**
 * Completeness of an item's source data. An item is valid for
 * classification once it has annual sales, a stock figure and a stock value.
 */
export const DataQualityReportSchema = z.object({
  itemCode: ItemCodeSchema,
  hasSalesData: z.boolean(),
  hasStockData: z.boolean(),
  hasPricing: z.boolean(),
  hasHistory: z.boolean(),
  isValid: z.boolean(),
});

// =============================================================================
// Configuration
// =============================================================================

/**
 * Thresholds of the ordered business-rule list. Overridden as a unit:
 * every field is required.
 */
export const RuleThresholdsSchema = z.object({
  newItemMaxAgeDays: z.number().positive(),
  deadStockMinDaysNoSales: z.number().positive(),
  deadStockMaxAnnualSales: z.number().min(0),
  fastMinSalesVelocity: z.number().positive(),
  fastMinTurnoverRatio: z.number().min(0),
  slowMaxSalesVelocity: z.number().positive(),
  slowMaxDaysSinceLastSale: z.number().positive(),
});

export const DEFAULT_RULE_THRESHOLDS: RuleThresholds = {
  newItemMaxAgeDays: 90,
  deadStockMinDaysNoSales: 180,
  deadStockMaxAnnualSales: 10,
  fastMinSalesVelocity: 2.7,
  fastMinTurnoverRatio: 0.7,
  slowMaxSalesVelocity: 0.5,
  slowMaxDaysSinceLastSale: 60,
};

export const DEFAULT_VOTE_TIE_BREAK_ORDER = [
  'FAST',
  'DEAD_STOCK',
  'NEW_ITEM',
  'SLOW',
  'MEDIUM',
] as const satisfies readonly Classification[];

/**
 * Flat configuration surface of the item classifier
 */
export const ItemClassificationConfigSchema = z.object({
  // Business rules
  newItemMaxAgeDays: z.number().positive().default(DEFAULT_RULE_THRESHOLDS.newItemMaxAgeDays),
  deadStockMinDaysNoSales: z
    .number()
    .positive()
    .default(DEFAULT_RULE_THRESHOLDS.deadStockMinDaysNoSales),
  deadStockMaxAnnualSales: z.number().min(0).default(DEFAULT_RULE_THRESHOLDS.deadStockMaxAnnualSales),
  fastMinSalesVelocity: z.number().positive().default(DEFAULT_RULE_THRESHOLDS.fastMinSalesVelocity),
  fastMinTurnoverRatio: z.number().min(0).default(DEFAULT_RULE_THRESHOLDS.fastMinTurnoverRatio),
  slowMaxSalesVelocity: z.number().positive().default(DEFAULT_RULE_THRESHOLDS.slowMaxSalesVelocity),
  slowMaxDaysSinceLastSale: z
    .number()
    .positive()
    .default(DEFAULT_RULE_THRESHOLDS.slowMaxDaysSinceLastSale),

  // Cluster labelling
  mediumMinClusterVelocity: z.number().min(0).default(1.0),
  clusterDefaultConfidence: z.number().min(0).max(100).default(75),

  // DBSCAN
  dbscanEps: z.number().positive().default(0.5),
  dbscanMinSamples: z.number().int().min(1).default(3),
  dbscanOutlierDeadStockDays: z.number().min(0).default(150),
  dbscanOutlierFastMultiplier: z.number().positive().default(1.5),

  // KMeans
  kmeansClusters: z.number().int().min(1).default(3),
  kmeansSeed: z.number().int().default(42),
  kmeansInitRuns: z.number().int().min(1).default(10),
  kmeansMaxIterations: z.number().int().min(1).default(300),
  kmeansFastConfidenceCap: z.number().min(0).max(100).default(95),

  // Hybrid ensemble
  hybridRuleConfidenceCutoff: z.number().min(0).max(1).default(0.9),
  hybridRuleWeight: z.number().min(0).default(0.5),
  hybridDbscanWeight: z.number().min(0).default(0.35),
  hybridFastBonus: z.number().min(0).default(0.15),
  hybridDbscanScope: HybridDbscanScopeSchema.default('singleton'),
  voteTieBreakOrder: z
    .array(ClassificationSchema)
    .length(5)
    .refine((order) => new Set(order).size === order.length, 'Labels must be unique')
    .default([...DEFAULT_VOTE_TIE_BREAK_ORDER]),

  // Enrichment
  holdingCostPctPerYear: z.number().min(0).max(1).default(0.2),
  abcAMinAnnualValue: z.number().min(0).default(100_000),
  abcBMinAnnualValue: z.number().min(0).default(20_000),
  currency: z.string().min(1).default('AED'),
  modelVersion: z.string().min(1).default('1.0.0'),
});

// =============================================================================
// Output
// =============================================================================

export const ClassificationResultSchema = z.object({
  itemCode: ItemCodeSchema,
  itemName: z.string(),
  uom: z.string(),
  classification: ClassificationSchema,
  confidence: ConfidenceSchema,
  method: ClassificationMethodSchema,
  reason: z.string(),

  // Features the decision was taken on
  annualSalesQty: NonNegativeNumberSchema,
  annualSalesValue: NonNegativeNumberSchema,
  salesVelocity: NonNegativeNumberSchema,
  turnoverRatio: NonNegativeNumberSchema,
  currentStock: NonNegativeNumberSchema,
  stockValue: NonNegativeNumberSchema,
  itemAgeDays: NonNegativeNumberSchema,
  daysSinceLastSale: NonNegativeNumberSchema,
  consistencyScore: z.number().min(0).max(100),
  demandVariability: NonNegativeNumberSchema,

  // Derived metrics
  holdingCostAnnually: NonNegativeNumberSchema,
  daysOfStock: NonNegativeNumberSchema,
  abcCategory: AbcCategorySchema,
  dormancyStatus: DormancyStatusSchema,
  newItemStatus: LifeStageSchema,

  // Recommendation
  recommendedAction: ItemActionSchema,
  actionPriority: ActionPrioritySchema,
  expectedImpact: z.number(),

  modelVersion: z.string(),
  analyzedAt: z.string(),
});

export const ClusteringDiagnosticsSchema = z.object({
  model: z.enum(['DBSCAN', 'KMEANS']),
  clusterCount: z.number().int().min(0),
  noiseCount: z.number().int().min(0),
  /** Mean silhouette over the batch; null when undefined for the partition */
  silhouetteScore: z.number().min(-1).max(1).nullable(),
  inertia: z.number().min(0).nullable(),
});

export const ClassificationBatchResultSchema = z.object({
  method: ClassificationStrategyNameSchema,
  total: z.number().int().min(0),
  results: z.array(ClassificationResultSchema),
  /** Item codes excluded from ML-based strategies (no annual sales) */
  skipped: z.array(z.string()),
  failures: z.array(ItemFailureSchema),
  /** True when a clustering codepath could not run and rules were used instead */
  fallbackApplied: z.boolean(),
  diagnostics: ClusteringDiagnosticsSchema.nullable(),
});

export const ClassificationSummarySchema = z.object({
  totalItems: z.number().int().min(0),
  counts: z.record(ClassificationSchema, z.number().int().min(0)),
  averageConfidence: z.number().min(0).max(100),
  totalExpectedImpact: z.number(),
  deadStockValue: NonNegativeNumberSchema,
  annualHoldingCost: NonNegativeNumberSchema,
  generatedAt: TimestampSchema,
});

// =============================================================================
// Type Exports
// =============================================================================

export type Classification = z.infer<typeof ClassificationSchema>;
export type ClassificationMethod = z.infer<typeof ClassificationMethodSchema>;
export type ClassificationStrategyName = z.infer<typeof ClassificationStrategyNameSchema>;
export type HybridDbscanScope = z.infer<typeof HybridDbscanScopeSchema>;
export type AbcCategory = z.infer<typeof AbcCategorySchema>;
export type DormancyStatus = z.infer<typeof DormancyStatusSchema>;
export type ItemAction = z.infer<typeof ItemActionSchema>;
export type ItemMetrics = z.input<typeof ItemMetricsSchema>;
export type PreparedItem = z.infer<typeof PreparedItemSchema>;
export type DataQualityReport = z.infer<typeof DataQualityReportSchema>;
export type RuleThresholds = z.infer<typeof RuleThresholdsSchema>;
export type ItemClassificationConfig = z.infer<typeof ItemClassificationConfigSchema>;
export type ItemClassificationConfigInput = z.input<typeof ItemClassificationConfigSchema>;
export type ClassificationResult = z.infer<typeof ClassificationResultSchema>;
export type ClusteringDiagnostics = z.infer<typeof ClusteringDiagnosticsSchema>;
export type ClassificationBatchResult = z.infer<typeof ClassificationBatchResultSchema>;
export type ClassificationSummary = z.infer<typeof ClassificationSummarySchema>;
