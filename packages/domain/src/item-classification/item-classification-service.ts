/**
 * @fileoverview Item Classification Service
 *
 * Classifies warehouse items as FAST, SLOW, MEDIUM, NEW_ITEM or DEAD_STOCK
 * using one of four strategies:
 *
 * - rule_based: ordered business rules over every prepared item
 * - dbscan: density clustering over standardised velocity, turnover,
 *   recency and revenue
 * - kmeans: centroid clustering over standardised velocity, turnover and
 *   revenue
 * - hybrid: rules first; below the confidence cutoff, a weighted vote
 *   between the rule label, a DBSCAN label and a velocity bonus
 *
 * Clustering strategies only see items with annual sales. When a clustering
 * codepath cannot run, the affected items are classified by the rules and
 * the batch is flagged with `fallbackApplied`. Any other error raised while
 * deciding an item is recorded against that item in `failures`.
 *
 * @module domain/item-classification/item-classification-service
 */

import { createLogger, ConfigurationError, ModelUnavailableError } from '@invenlytics/core';
import {
  ClassificationStrategyNameSchema,
  isErr,
  type Classification,
  type ClassificationBatchResult,
  type ClassificationMethod,
  type ClassificationResult,
  type ClassificationStrategyName,
  type ClassificationSummary,
  type ClusteringDiagnostics,
  type DataQualityReport,
  type ItemClassificationConfig,
  type ItemClassificationConfigInput,
  type ItemFailure,
  type ItemMetrics,
  type PreparedItem,
} from '@invenlytics/types';

import { toItemFailure } from '../shared/failures.js';
import { mean, roundTo } from '../shared/statistics.js';
import { resolveItemClassificationConfig, ruleThresholdsOf } from './config.js';
import { dbscan, NOISE_LABEL } from './dbscan.js';
import {
  buildClassificationResult,
  toConfidencePercent,
  type ClassificationDecision,
} from './enrichment.js';
import { assessDataQuality, itemCodeOf, isMlEligible, safePrepareItem } from './feature-preparer.js';
import { kmeans, silhouetteScore } from './kmeans.js';
import { applyRules } from './rules.js';
import { fitTransform, isFiniteMatrix, type FeatureMatrix } from './scaler.js';

const logger = createLogger({ name: 'item-classification' });

// ============================================================================
// TYPES
// ============================================================================

export interface ItemClassificationServiceOptions {
  readonly config?: ItemClassificationConfigInput;
  /** Source of the `analyzedAt` timestamp */
  readonly clock?: () => Date;
}

interface StrategyOutcome {
  readonly decisions: readonly ClassificationDecision[];
  readonly diagnostics: ClusteringDiagnostics | null;
}

interface TaggedDecision {
  readonly item: PreparedItem;
  readonly decision: ClassificationDecision;
  readonly method: ClassificationMethod;
}

interface DecidedItems {
  readonly tagged: TaggedDecision[];
  readonly failures: ItemFailure[];
}

interface StrategyRun extends DecidedItems {
  readonly diagnostics: ClusteringDiagnostics | null;
  readonly fallbackApplied: boolean;
}

const METHOD_TAGS: Record<ClassificationStrategyName, ClassificationMethod> = {
  rule_based: 'RULE_BASED',
  dbscan: 'DBSCAN_CLUSTERING',
  kmeans: 'KMEANS_CLUSTERING',
  hybrid: 'HYBRID',
};


function formatPct(fraction: number): string {
  return `${Math.round(fraction * 100)}%`;
}

// ============================================================================
// SERVICE
// ============================================================================

/**
 * Item Classification Service
 *
 * @example
 * ```typescript
 * const service = createItemClassificationService({ config: { dbscanEps: 0.7 } });
 * const batch = service.classify(items, 'kmeans');
 * const summary = service.summarize(batch);
 * ```
 */
export class ItemClassificationService {
  private readonly config: ItemClassificationConfig;
  private readonly clock: () => Date;

  constructor(options: ItemClassificationServiceOptions = {}) {
    this.config = resolveItemClassificationConfig(options.config);
    this.clock = options.clock ?? (() => new Date());
  }

  getConfig(): ItemClassificationConfig {
    return this.config;
  }

  /**
   * Resolve a strategy name
   *
   * @throws ConfigurationError for an unknown name
   */
  resolveStrategy(method: string): ClassificationStrategyName {
    const parsed = ClassificationStrategyNameSchema.safeParse(method);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Unknown classification method "${method}". Use one of: ${ClassificationStrategyNameSchema.options.join(', ')}`,
        'method'
      );
    }
    return parsed.data;
  }

  /**
   * Classify a batch of items
   *
   * @throws ConfigurationError for an unknown method
   */
  classify(items: readonly ItemMetrics[], method = 'hybrid'): ClassificationBatchResult {
    const strategy = this.resolveStrategy(method);
    const analyzedAt = this.clock().toISOString();

    const failures: ItemFailure[] = [];
    const prepared: PreparedItem[] = [];
    for (const raw of items) {
      const result = safePrepareItem(raw);
      if (isErr(result)) {
        const failure = toItemFailure(itemCodeOf(raw), result.error);
        logger.error({ itemCode: failure.itemCode, err: failure.message }, 'Item failed validation');
        failures.push(failure);
      } else {
        prepared.push(result.value);
      }
    }

    const population = strategy === 'rule_based' ? prepared : prepared.filter(isMlEligible);
    const skipped =
      strategy === 'rule_based'
        ? []
        : prepared.filter((item) => !isMlEligible(item)).map((item) => item.itemCode);

    logger.info(
      { method: strategy, total: items.length, eligible: population.length, skipped: skipped.length },
      'Classification batch started'
    );

    const run = this.runStrategy(strategy, population);
    const { tagged, diagnostics, fallbackApplied } = run;
    failures.push(...run.failures);

    const results: ClassificationResult[] = [];
    for (const entry of tagged) {
      try {
        results.push(
          buildClassificationResult(entry.item, entry.decision, entry.method, this.config, analyzedAt)
        );
        logger.debug(
          { itemCode: entry.item.itemCode, classification: entry.decision.classification },
          'Item classified'
        );
      } catch (error) {
        failures.push(this.itemFailed(entry.item.itemCode, error));
      }
    }

    logger.info(
      {
        method: strategy,
        classified: results.length,
        failed: failures.length,
        skipped: skipped.length,
        fallbackApplied,
      },
      'Classification batch completed'
    );

    return {
      method: strategy,
      total: items.length,
      results,
      skipped,
      failures,
      fallbackApplied,
      diagnostics,
    };
  }

  /**
   * Rule-based classification of a single item
   *
   * @throws ValidationError when the record is invalid
   */
  classifyItem(item: ItemMetrics): ClassificationResult {
    const prepared = safePrepareItem(item);
    if (isErr(prepared)) {
      throw prepared.error;
    }
    return buildClassificationResult(
      prepared.value,
      this.ruleDecision(prepared.value),
      'RULE_BASED',
      this.config,
      this.clock().toISOString()
    );
  }

  /**
   * Report which source fields of an item are present
   *
   * @throws ValidationError when the record is invalid
   */
  validateItemData(item: ItemMetrics): DataQualityReport {
    const report = assessDataQuality(item);
    if (!report.isValid) {
      logger.warn({ ...report }, 'Item data incomplete');
    }
    return report;
  }

  /**
   * Aggregate counts and financial exposure of a classified batch
   */
  summarize(batch: ClassificationBatchResult | readonly ClassificationResult[]): ClassificationSummary {
    const results = 'results' in batch ? batch.results : batch;

    const counts: Record<Classification, number> = {
      FAST: 0,
      SLOW: 0,
      MEDIUM: 0,
      NEW_ITEM: 0,
      DEAD_STOCK: 0,
    };
    for (const result of results) {
      counts[result.classification] += 1;
    }

    const deadStock = results.filter((result) => result.classification === 'DEAD_STOCK');

    return {
      totalItems: results.length,
      counts,
      averageConfidence: roundTo(mean(results.map((result) => result.confidence)), 2),
      totalExpectedImpact: roundTo(
        results.reduce((sum, result) => sum + result.expectedImpact, 0),
        2
      ),
      deadStockValue: roundTo(
        deadStock.reduce((sum, result) => sum + result.stockValue, 0),
        2
      ),
      annualHoldingCost: roundTo(
        results.reduce((sum, result) => sum + result.holdingCostAnnually, 0),
        2
      ),
      generatedAt: this.clock(),
    };
  }

  // ==========================================================================
  // STRATEGIES
  // ==========================================================================

  private runStrategy(strategy: ClassificationStrategyName, items: readonly PreparedItem[]): StrategyRun {
    if (strategy === 'rule_based' || items.length === 0) {
      return { ...this.tagRules(items, METHOD_TAGS[strategy]), diagnostics: null, fallbackApplied: false };
    }

    if (strategy === 'hybrid') {
      return this.runHybrid(items);
    }

    let outcome: StrategyOutcome;
    try {
      outcome = strategy === 'dbscan' ? this.runDbscan(items) : this.runKMeans(items);
    } catch (error) {
      return this.batchModelFailed(strategy, items, error);
    }

    return {
      ...this.decideEach(items, (item, i) => ({
        item,
        decision: outcome.decisions[i] ?? this.ruleDecision(item),
        method: METHOD_TAGS[strategy],
      })),
      diagnostics: outcome.diagnostics,
      fallbackApplied: false,
    };
  }

  /**
   * A clustering model that cannot run falls back to the rules for the whole
   * population; any other error fails every item it would have classified.
   */
  private batchModelFailed(
    strategy: ClassificationStrategyName,
    items: readonly PreparedItem[],
    error: unknown
  ): StrategyRun {
    if (error instanceof ModelUnavailableError) {
      logger.warn(
        { method: strategy, items: items.length, reason: error.message },
        'Clustering unavailable, falling back to rule-based classification'
      );
      return { ...this.tagRules(items, 'RULE_BASED'), diagnostics: null, fallbackApplied: true };
    }
    return {
      tagged: [],
      failures: items.map((item) => this.itemFailed(item.itemCode, error)),
      diagnostics: null,
      fallbackApplied: false,
    };
  }

  /**
   * Decide each item on its own; an item whose decision throws becomes a failure
   */
  private decideEach(
    items: readonly PreparedItem[],
    decide: (item: PreparedItem, index: number) => TaggedDecision
  ): DecidedItems {
    const tagged: TaggedDecision[] = [];
    const failures: ItemFailure[] = [];
    items.forEach((item, i) => {
      try {
        tagged.push(decide(item, i));
      } catch (error) {
        failures.push(this.itemFailed(item.itemCode, error));
      }
    });
    return { tagged, failures };
  }

  private itemFailed(itemCode: string, error: unknown): ItemFailure {
    const failure = toItemFailure(itemCode, error);
    logger.error({ itemCode: failure.itemCode, err: failure.message }, 'Item classification failed');
    return failure;
  }

  private ruleDecision(item: PreparedItem): ClassificationDecision {
    const outcome = applyRules(item, ruleThresholdsOf(this.config));
    return {
      classification: outcome.classification,
      confidence: toConfidencePercent(outcome.confidence),
      reason: outcome.reason,
    };
  }

  private tagRules(items: readonly PreparedItem[], method: ClassificationMethod): DecidedItems {
    return this.decideEach(items, (item) => ({ item, decision: this.ruleDecision(item), method }));
  }

  private standardise(model: 'DBSCAN' | 'KMEANS', features: FeatureMatrix): number[][] {
    const { scaled } = fitTransform(features);
    if (!isFiniteMatrix(scaled)) {
      throw new ModelUnavailableError(model, 'standardised features are not finite');
    }
    return scaled;
  }

  private clusterMeanVelocities(
    items: readonly PreparedItem[],
    labels: readonly number[]
  ): Map<number, number> {
    const velocities = new Map<number, number[]>();
    items.forEach((item, i) => {
      const label = labels[i] ?? NOISE_LABEL;
      const list = velocities.get(label) ?? [];
      list.push(item.salesVelocity);
      velocities.set(label, list);
    });
    return new Map([...velocities].map(([label, values]) => [label, mean(values)]));
  }

  private velocityTier(meanVelocity: number): Classification {
    if (meanVelocity > this.config.fastMinSalesVelocity) return 'FAST';
    if (meanVelocity > this.config.mediumMinClusterVelocity) return 'MEDIUM';
    return 'SLOW';
  }

  /**
   * DBSCAN over velocity, turnover, recency and revenue
   *
   * @throws ModelUnavailableError when features cannot be standardised
   */
  runDbscan(items: readonly PreparedItem[]): StrategyOutcome {
    const scaled = this.standardise(
      'DBSCAN',
      items.map((item) => [
        item.salesVelocity,
        item.turnoverRatio,
        item.daysSinceLastSale,
        item.annualSalesValue,
      ])
    );

    const clustering = dbscan(scaled, {
      eps: this.config.dbscanEps,
      minSamples: this.config.dbscanMinSamples,
    });
    const means = this.clusterMeanVelocities(items, clustering.labels);
    const confidence = this.config.clusterDefaultConfidence;

    const decisions = items.map((item, i): ClassificationDecision => {
      const label = clustering.labels[i] ?? NOISE_LABEL;

      if (label === NOISE_LABEL) {
        if (item.daysSinceLastSale > this.config.dbscanOutlierDeadStockDays) {
          return {
            classification: 'DEAD_STOCK',
            confidence,
            reason: `DBSCAN outlier: no sale for ${item.daysSinceLastSale} days`,
          };
        }
        const fastCutoff = this.config.fastMinSalesVelocity * this.config.dbscanOutlierFastMultiplier;
        if (item.salesVelocity > fastCutoff) {
          return {
            classification: 'FAST',
            confidence,
            reason: `DBSCAN outlier: velocity ${item.salesVelocity.toFixed(2)} units/day above ${fastCutoff.toFixed(2)}`,
          };
        }
        return {
          classification: 'SLOW',
          confidence,
          reason: `DBSCAN outlier: velocity ${item.salesVelocity.toFixed(2)} units/day`,
        };
      }

      const meanVelocity = means.get(label) ?? 0;
      return {
        classification: this.velocityTier(meanVelocity),
        confidence,
        reason: `DBSCAN cluster ${label}: mean velocity ${meanVelocity.toFixed(2)} units/day`,
      };
    });

    const silhouette = silhouetteScore(scaled, clustering.labels);
    logger.debug(
      { clusters: clustering.clusterCount, noise: clustering.noiseCount, silhouette },
      'DBSCAN clustering completed'
    );

    return {
      decisions,
      diagnostics: {
        model: 'DBSCAN',
        clusterCount: clustering.clusterCount,
        noiseCount: clustering.noiseCount,
        silhouetteScore: silhouette,
        inertia: null,
      },
    };
  }

  /**
   * K-means over velocity, turnover and revenue
   *
   * @throws ModelUnavailableError with fewer items than clusters
   */
  runKMeans(items: readonly PreparedItem[]): StrategyOutcome {
    const scaled = this.standardise(
      'KMEANS',
      items.map((item) => [item.salesVelocity, item.turnoverRatio, item.annualSalesValue])
    );

    const clustering = kmeans(scaled, {
      k: this.config.kmeansClusters,
      seed: this.config.kmeansSeed,
      initRuns: this.config.kmeansInitRuns,
      maxIterations: this.config.kmeansMaxIterations,
    });
    const means = this.clusterMeanVelocities(items, clustering.labels);

    const decisions = items.map((_, i): ClassificationDecision => {
      const label = clustering.labels[i] ?? 0;
      const meanVelocity = means.get(label) ?? 0;
      const classification = this.velocityTier(meanVelocity);
      return {
        classification,
        confidence:
          classification === 'FAST'
            ? Math.min(this.config.kmeansFastConfidenceCap, 70 + meanVelocity / 10)
            : this.config.clusterDefaultConfidence,
        reason: `KMeans cluster ${label}: mean velocity ${meanVelocity.toFixed(2)} units/day`,
      };
    });

    const silhouette = silhouetteScore(scaled, clustering.labels);
    logger.info(
      { silhouette, inertia: clustering.inertia, iterations: clustering.iterations },
      'KMeans clustering completed'
    );

    return {
      decisions,
      diagnostics: {
        model: 'KMEANS',
        clusterCount: new Set(clustering.labels).size,
        noiseCount: 0,
        silhouetteScore: silhouette,
        inertia: clustering.inertia,
      },
    };
  }

  private runHybrid(items: readonly PreparedItem[]): StrategyRun {
    let batchOutcome: StrategyOutcome | null = null;
    if (this.config.hybridDbscanScope === 'batch') {
      try {
        batchOutcome = this.runDbscan(items);
      } catch (error) {
        return this.batchModelFailed('hybrid', items, error);
      }
    }

    let fallbackApplied = false;
    const decided = this.decideEach(items, (item, i): TaggedDecision => {
      const rule = applyRules(item, ruleThresholdsOf(this.config));
      if (rule.confidence > this.config.hybridRuleConfidenceCutoff) {
        return {
          item,
          decision: {
            classification: rule.classification,
            confidence: toConfidencePercent(rule.confidence),
            reason: rule.reason,
          },
          method: 'HYBRID',
        };
      }

      let clustered: ClassificationDecision | undefined;
      try {
        clustered = batchOutcome ? batchOutcome.decisions[i] : this.runDbscan([item]).decisions[0];
      } catch (error) {
        // Anything else fails this item only
        if (!(error instanceof ModelUnavailableError)) throw error;
        logger.warn({ itemCode: item.itemCode, reason: error.message }, 'Hybrid DBSCAN vote unavailable');
      }
      if (!clustered) {
        fallbackApplied = true;
        return { item, decision: this.ruleDecision(item), method: 'RULE_BASED' };
      }

      return {
        item,
        decision: this.vote(item, rule.classification, rule.confidence, clustered),
        method: 'HYBRID',
      };
    });

    return { ...decided, diagnostics: batchOutcome?.diagnostics ?? null, fallbackApplied };
  }

  /**
   * Weighted vote between the rule label, the DBSCAN label and the velocity bonus.
   * Votes for the same label accumulate; ties follow `voteTieBreakOrder`.
   */
  private vote(
    item: PreparedItem,
    ruleLabel: Classification,
    ruleConfidence: number,
    clustered: ClassificationDecision
  ): ClassificationDecision {
    const dbscanConfidence = clustered.confidence / 100;
    const votes = new Map<Classification, number>();
    const add = (label: Classification, weight: number): void => {
      votes.set(label, (votes.get(label) ?? 0) + weight);
    };

    add(ruleLabel, ruleConfidence * this.config.hybridRuleWeight);
    add(clustered.classification, dbscanConfidence * this.config.hybridDbscanWeight);
    if (item.salesVelocity > this.config.fastMinSalesVelocity) {
      add('FAST', this.config.hybridFastBonus);
    }

    let winner: Classification = ruleLabel;
    let winningVote = -Infinity;
    for (const label of this.config.voteTieBreakOrder) {
      const vote = votes.get(label);
      if (vote !== undefined && vote > winningVote) {
        winner = label;
        winningVote = vote;
      }
    }

    const total = [...votes.values()].reduce((sum, vote) => sum + vote, 0);
    return {
      classification: winner,
      confidence: total > 0 ? (winningVote / total) * 100 : 0,
      reason: `Ensemble: ${ruleLabel}(${formatPct(ruleConfidence)}) + DBSCAN(${formatPct(dbscanConfidence)}) -> ${winner}`,
    };
  }
}

/**
 * Factory function for the item classification service
 */
export function createItemClassificationService(
  options?: ItemClassificationServiceOptions
): ItemClassificationService {
  return new ItemClassificationService(options);
}

