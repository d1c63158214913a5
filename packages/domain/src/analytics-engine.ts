/**
 * @fileoverview Analytics Engine
 *
 * Facade wiring the item classifier, demand pattern classifier and health
 * scorer from one environment and one set of configuration overrides.
 *
 * @module domain/analytics-engine
 */

import {
  createLogger,
  generateCorrelationId,
  validateEnv,
  withCorrelationId,
  type Env,
} from '@invenlytics/core';
import type {
  ClassificationBatchResult,
  ClassificationStrategyName,
  ClassificationSummary,
  DemandPatternConfigInput,
  HealthScoringConfigInput,
  ItemClassificationConfigInput,
  ItemMetrics,
  NewItemMetrics,
} from '@invenlytics/types';

import {
  createDemandPatternService,
  type DemandPatternBatchResult,
  type DemandPatternService,
} from './demand-pattern/index.js';
import {
  createHealthScoringService,
  type HealthScoreBatchResult,
  type HealthScoringService,
} from './health-scoring/index.js';
import {
  buildClassificationInsights,
  createItemClassificationService,
  type ClassificationInsights,
  type ItemClassificationService,
} from './item-classification/index.js';

const logger = createLogger({ name: 'analytics-engine' });

export interface AnalyticsEngineOptions {
  /** Environment source; defaults to process.env */
  readonly env?: Record<string, string | undefined>;
  readonly itemClassification?: ItemClassificationConfigInput;
  readonly demandPattern?: DemandPatternConfigInput;
  readonly healthScoring?: HealthScoringConfigInput;
  readonly clock?: () => Date;
}

export interface InventoryAnalysisInput {
  readonly items: readonly ItemMetrics[];
  /** Strategy name; defaults to ANALYTICS_DEFAULT_METHOD */
  readonly method?: string;
  /** Twelve monthly quantities per item code, oldest first */
  readonly monthlySales?: Readonly<Record<string, readonly number[]>>;
  /** Launch metrics, scored for items classified NEW_ITEM */
  readonly newItemMetrics?: readonly NewItemMetrics[];
}

export interface InventoryAnalysisReport {
  readonly correlationId: string;
  readonly classification: ClassificationBatchResult;
  readonly summary: ClassificationSummary;
  readonly insights: readonly ClassificationInsights[];
  readonly demandPatterns: DemandPatternBatchResult;
  readonly health: HealthScoreBatchResult;
}

/**
 * Analytics Engine
 *
 * @example
 * ```typescript
 * const engine = createAnalyticsEngine({ itemClassification: { kmeansClusters: 4 } });
 * const report = engine.analyzeInventory({ items, monthlySales, newItemMetrics });
 * ```
 */
export class AnalyticsEngine {
  readonly env: Env;
  readonly defaultMethod: ClassificationStrategyName;
  readonly itemClassification: ItemClassificationService;
  readonly demandPattern: DemandPatternService;
  readonly healthScoring: HealthScoringService;
  private readonly clock: () => Date;

  constructor(options: AnalyticsEngineOptions = {}) {
    this.env = validateEnv(options.env ?? process.env);
    this.defaultMethod = this.env.ANALYTICS_DEFAULT_METHOD;
    this.clock = options.clock ?? (() => new Date());

    this.itemClassification = createItemClassificationService({
      config: {
        hybridDbscanScope: this.env.ANALYTICS_HYBRID_DBSCAN_SCOPE,
        currency: this.env.ANALYTICS_CURRENCY,
        ...options.itemClassification,
      },
      clock: this.clock,
    });
    this.demandPattern = createDemandPatternService({
      config: { leadTimeDays: this.env.ANALYTICS_LEAD_TIME_DAYS, ...options.demandPattern },
      clock: this.clock,
    });
    this.healthScoring = createHealthScoringService({
      config: options.healthScoring,
      clock: this.clock,
    });
  }

  /**
   * Classify the batch, then analyse demand for items with a monthly series
   * and score the health of new items with launch metrics
   *
   * @throws ConfigurationError for an unknown method
   */
  analyzeInventory(input: InventoryAnalysisInput): InventoryAnalysisReport {
    const correlationId = generateCorrelationId();
    const runLogger = withCorrelationId(logger, correlationId, this.env.LOG_LEVEL);
    const method = input.method ?? this.defaultMethod;

    runLogger.info({ items: input.items.length, method }, 'Inventory analysis started');

    const classification = this.itemClassification.classify(input.items, method);
    const summary = this.itemClassification.summarize(classification);
    const now = this.clock();
    const insights = classification.results.map((result) =>
      buildClassificationInsights(result, {
        currency: this.itemClassification.getConfig().currency,
        now,
      })
    );

    const names = new Map(classification.results.map((result) => [result.itemCode, result.itemName]));
    const demandPatterns = this.demandPattern.analyzeBatch(
      Object.entries(input.monthlySales ?? {}).map(([itemCode, series]) => ({
        itemCode,
        itemName: names.get(itemCode),
        monthlySales: [...series],
      }))
    );

    const newItems = new Set(
      classification.results
        .filter((result) => result.classification === 'NEW_ITEM')
        .map((result) => result.itemCode)
    );
    const health = this.healthScoring.scoreBatch(
      (input.newItemMetrics ?? []).filter((metrics) => newItems.has(metrics.item_code))
    );

    runLogger.info(
      {
        classified: classification.results.length,
        demandAnalyzed: demandPatterns.results.length,
        healthScored: health.results.length,
        failures:
          classification.failures.length + demandPatterns.failures.length + health.failures.length,
      },
      'Inventory analysis completed'
    );

    return { correlationId, classification, summary, insights, demandPatterns, health };
  }
}

export function createAnalyticsEngine(options?: AnalyticsEngineOptions): AnalyticsEngine {
  return new AnalyticsEngine(options);
}
