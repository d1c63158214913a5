/**
 * @fileoverview Domain Package Exports
 *
 * Inventory analytics models: item classification, demand pattern
 * classification and new item health scoring, plus the engine facade.
 *
 * @module @invenlytics/domain
 *
 * @example
 * ```typescript
 * import { createAnalyticsEngine } from '@invenlytics/domain';
 *
 * const engine = createAnalyticsEngine();
 * const report = engine.analyzeInventory({ items, method: 'hybrid' });
 * ```
 */

// ============================================================================
// ITEM CLASSIFICATION
// ============================================================================
export * from './item-classification/index.js';

// ============================================================================
// DEMAND PATTERN
// ============================================================================
export * from './demand-pattern/index.js';

// ============================================================================
// NEW ITEM HEALTH
// ============================================================================
export * from './health-scoring/index.js';

// ============================================================================
// ENGINE
// ============================================================================
export {
  AnalyticsEngine,
  createAnalyticsEngine,
  type AnalyticsEngineOptions,
  type InventoryAnalysisInput,
  type InventoryAnalysisReport,
} from './analytics-engine.js';

// ============================================================================
// SHARED
// ============================================================================
export {
  mean,
  populationStdDev,
  euclideanDistance,
  squaredEuclidean,
  roundTo,
  formatZodIssues,
  validateWithResult,
  parseConfig,
  toItemFailure,
  type Vector,
} from './shared/index.js';
