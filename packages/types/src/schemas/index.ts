/**
 * Consolidated schemas for the analytics models
 */

// =============================================================================
// Common
// =============================================================================
export {
  ItemCodeSchema,
  NonNegativeNumberSchema,
  ConfidenceSchema,
  ActionPrioritySchema,
  TimestampSchema,
  LifeStageSchema,
  ItemFailureSchema,
  type ItemCode,
  type Confidence,
  type ActionPriority,
  type LifeStage,
  type ItemFailure,
} from './common.js';

// =============================================================================
// Item Classification
// =============================================================================
export {
  ClassificationSchema,
  ClassificationMethodSchema,
  ClassificationStrategyNameSchema,
  HybridDbscanScopeSchema,
  AbcCategorySchema,
  DormancyStatusSchema,
  ItemActionSchema,
  REQUIRED_ITEM_NUMERIC_FIELDS,
  ItemMetricsSchema,
  PreparedItemSchema,
  RuleThresholdsSchema,
  DEFAULT_RULE_THRESHOLDS,
  DEFAULT_VOTE_TIE_BREAK_ORDER,
  ItemClassificationConfigSchema,
  ClassificationResultSchema,
  ClusteringDiagnosticsSchema,
  DataQualityReportSchema,
  ClassificationBatchResultSchema,
  ClassificationSummarySchema,
  type Classification,
  type ClassificationMethod,
  type ClassificationStrategyName,
  type HybridDbscanScope,
  type AbcCategory,
  type DormancyStatus,
  type ItemAction,
  type ItemMetrics,
  type PreparedItem,
  type RuleThresholds,
  type ItemClassificationConfig,
  type ItemClassificationConfigInput,
  type ClassificationResult,
  type ClusteringDiagnostics,
  type DataQualityReport,
  type ClassificationBatchResult,
  type ClassificationSummary,
} from './item-classification.js';

// =============================================================================
// Demand Pattern
// =============================================================================
export {
  DemandPatternSchema,
  ForecastMethodSchema,
  MonthlySeriesSchema,
  DemandPatternInputSchema,
  DemandPatternConfigSchema,
  PatternClassificationSchema,
  DemandForecastSchema,
  ReorderParametersSchema,
  PatternRecommendationSchema,
  DemandPatternResultSchema,
  type DemandPattern,
  type ForecastMethod,
  type MonthlySeries,
  type DemandPatternInput,
  type DemandPatternConfig,
  type DemandPatternConfigInput,
  type PatternClassification,
  type DemandForecast,
  type ReorderParameters,
  type PatternRecommendation,
  type DemandPatternResult,
} from './demand-pattern.js';

// =============================================================================
// New Item Health
// =============================================================================
export {
  HealthStatusSchema,
  HealthActionSchema,
  NewItemMetricsSchema,
  HealthScoringConfigSchema,
  ComponentScoreSchema,
  HealthScoreResultSchema,
  type HealthStatus,
  type HealthAction,
  type NewItemMetrics,
  type ParsedNewItemMetrics,
  type HealthScoringConfig,
  type HealthScoringConfigInput,
  type ComponentScore,
  type HealthScoreResult,
} from './health-score.js';
