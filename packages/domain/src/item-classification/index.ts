/**
 * @fileoverview Item Classification Module
 *
 * @module domain/item-classification
 */

export {
  ItemClassificationService,
  createItemClassificationService,
  type ItemClassificationServiceOptions,
} from './item-classification-service.js';

export {
  DEFAULT_ITEM_CLASSIFICATION_CONFIG,
  resolveItemClassificationConfig,
  ruleThresholdsOf,
  withRuleThresholds,
} from './config.js';

export {
  prepareItem,
  safePrepareItem,
  assessDataQuality,
  isMlEligible,
  itemCodeOf,
} from './feature-preparer.js';

export {
  fitScaler,
  transform,
  fitTransform,
  isFiniteMatrix,
  type ScalerParams,
  type FeatureMatrix,
} from './scaler.js';

export { dbscan, NOISE_LABEL, type DbscanOptions, type DbscanResult } from './dbscan.js';

export {
  kmeans,
  silhouetteScore,
  createSeededRandom,
  type KMeansOptions,
  type KMeansResult,
} from './kmeans.js';

export { applyRules, CLASSIFICATION_RULES, type ClassificationRule, type RuleOutcome } from './rules.js';

export {
  buildClassificationResult,
  recommendAction,
  abcCategoryOf,
  dormancyStatusOf,
  newItemStatusOf,
  daysOfStock,
  holdingCost,
  type ClassificationDecision,
  type ActionRecommendation,
} from './enrichment.js';

export {
  buildClassificationInsights,
  type ClassificationInsights,
  type InsightActionItem,
  type InsightOptions,
} from './insights.js';
