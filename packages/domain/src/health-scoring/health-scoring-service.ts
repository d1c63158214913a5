/**
 * @fileoverview New Item Health Scoring Service
 *
 * Composite 0-100 health score for recently launched items, combining four
 * weighted components:
 *
 * 1. Sales performance (40%): actual vs target quantity
 *    - >= 120%: 100 | >= 95%: 85 | >= 70%: 60 | >= 50%: 35 | >= 30%: 15 | else 0
 *
 * 2. Customer acquisition (30%): unique customers
 *    - >= 50: 100 | >= 30: 85 | >= 15: 60 | >= 5: 35 | else 15
 *    - +15 (capped at 100) when more than half are repeat customers
 *
 * 3. Stock adequacy (20%): days of stock
 *    - 7-60: 100 | < 7: max(30, 100 - 2 x shortfall%) | 60-90: 75 | 90-180: 45 | > 180: 15
 *
 * 4. Growth trend (10%): week-over-week change
 *    - >= 20%: 100 | >= 10%: 85 | >= 0%: 70 | >= -10%: 45 | >= -20%: 20 | else 5
 *
 * The composite is rounded half to even (92.5 -> 92).
 *
 * STATUS (on the rounded score):
 * - 0-30: CRITICAL | 31-60: AT_RISK | 61-79: CAUTION | 80-100: HEALTHY
 *
 * @module domain/health-scoring/health-scoring-service
 */

import { ConfigurationError, createLogger } from '@invenlytics/core';
import {
  HealthScoringConfigSchema,
  isErr,
  NewItemMetricsSchema,
  Result,
  type ComponentScore,
  type HealthAction,
  type HealthScoreResult,
  type HealthScoringConfig,
  type HealthScoringConfigInput,
  type HealthStatus,
  type ItemFailure,
  type LifeStage,
  type NewItemMetrics,
  type ParsedNewItemMetrics,
} from '@invenlytics/types';

import { toItemFailure } from '../shared/failures.js';
import { roundHalfEven } from '../shared/statistics.js';
import { parseConfig, validateWithResult } from '../shared/validation.js';

const logger = createLogger({ name: 'health-scoring' });

const DAYS_PER_MONTH = 30;

export interface HealthScoringServiceOptions {
  readonly config?: HealthScoringConfigInput;
  readonly clock?: () => Date;
}

export interface HealthScoreBatchResult {
  readonly results: HealthScoreResult[];
  readonly failures: ItemFailure[];
}

interface RawComponent {
  /** Unrounded score; feeds the composite */
  readonly score: number;
  readonly reason: string;
}

interface HealthRecommendation {
  action: HealthAction;
  priority: number;
  keyMetrics: string[];
  warnings: string[];
}

function pct(ratio: number, decimals = 0): string {
  return (ratio * 100).toFixed(decimals);
}

/**
 * Resolve and validate the scoring configuration
 *
 * @throws ConfigurationError when weights do not sum to 1 or bands overlap
 */
export function resolveHealthScoringConfig(
  overrides: HealthScoringConfigInput = {}
): HealthScoringConfig {
  const config = parseConfig(HealthScoringConfigSchema, overrides, 'health scoring');

  const weightSum =
    config.weightSalesPerformance +
    config.weightCustomerAcquisition +
    config.weightStockAdequacy +
    config.weightGrowthTrend;
  if (Math.abs(weightSum - 1) > config.weightSumTolerance) {
    throw new ConfigurationError(
      `Health score weights must sum to 1.0 (got ${weightSum.toFixed(4)})`,
      'weightSalesPerformance'
    );
  }

  if (
    !(
      config.dosOptimalMin < config.dosOptimalMax &&
      config.dosOptimalMax <= config.dosWarningMax &&
      config.dosWarningMax <= config.dosCriticalMax
    )
  ) {
    throw new ConfigurationError('Days-of-stock bands must be increasing', 'dosOptimalMin');
  }

  if (!(config.criticalMaxScore < config.atRiskMaxScore && config.atRiskMaxScore < config.healthyMinScore)) {
    throw new ConfigurationError('Health status bands must be increasing', 'criticalMaxScore');
  }

  return Object.freeze(config);
}

/**
 * New Item Health Scoring Service
 *
 * @example
 * ```typescript
 * const scorer = createHealthScoringService();
 * const health = scorer.score(metrics);
 * if (health.healthStatus === 'CRITICAL') escalate(health);
 * ```
 */
export class HealthScoringService {
  private readonly config: HealthScoringConfig;
  private readonly clock: () => Date;

  constructor(options: HealthScoringServiceOptions = {}) {
    this.config = resolveHealthScoringConfig(options.config);
    this.clock = options.clock ?? (() => new Date());
  }

  getConfig(): HealthScoringConfig {
    return this.config;
  }

  /**
   * Score one item
   *
   * @throws ValidationError when the metrics are invalid
   */
  score(metrics: NewItemMetrics): HealthScoreResult {
    const parsed = validateWithResult(NewItemMetricsSchema, metrics, 'new item metrics');
    if (isErr(parsed)) {
      throw parsed.error;
    }
    const item = parsed.value;
    const c = this.config;

    const sales = this.scoreSalesPerformance(item);
    const customers = this.scoreCustomerAcquisition(item);
    const stock = this.scoreStockAdequacy(item);
    const growth = this.scoreGrowthTrend(item);

    const composite =
      sales.score * c.weightSalesPerformance +
      customers.score * c.weightCustomerAcquisition +
      stock.score * c.weightStockAdequacy +
      growth.score * c.weightGrowthTrend;
    const healthScore = Math.min(100, Math.max(0, roundHalfEven(composite)));

    const healthStatus = this.healthStatusOf(healthScore);
    const lifeStage = this.lifeStageOf(item.item_age_days);
    const recommendation = this.recommend(healthStatus, lifeStage);

    logger.debug(
      { itemCode: item.item_code, healthScore, healthStatus, lifeStage },
      'Health score calculated'
    );

    return Object.freeze({
      itemCode: item.item_code,
      itemName: item.item_name ?? '',
      itemAgeDays: item.item_age_days,
      healthScore,
      healthStatus,
      lifeStage,
      components: {
        salesPerformance: this.rounded(sales),
        customerAcquisition: this.rounded(customers),
        stockAdequacy: this.rounded(stock),
        growthTrend: this.rounded(growth),
      },
      totalCustomers: item.unique_customers,
      salesVsTargetPct: this.salesRatio(item) * 100,
      repeatCustomersPct: (item.repeat_customers / Math.max(item.unique_customers, 1)) * 100,
      daysOfStock: this.daysOfStock(item),
      weekOverWeekGrowth: this.growthRate(item),
      recommendedAction: recommendation.action,
      actionPriority: recommendation.priority,
      keyMetrics: recommendation.keyMetrics,
      warningFlags: recommendation.warnings,
      analyzedAt: this.clock().toISOString(),
    });
  }

  /**
   * Score many items; a bad item is reported without stopping the batch
   */
  scoreBatch(items: readonly NewItemMetrics[]): HealthScoreBatchResult {
    logger.info({ total: items.length }, 'Health scoring batch started');

    const { values: results, errors: failures } = Result.partition(
      items.map((item) =>
        Result.mapErr(Result.try(() => this.score(item)), (error) => {
          const failure = toItemFailure(item.item_code || 'UNKNOWN', error);
          logger.error({ itemCode: failure.itemCode, err: failure.message }, 'Health scoring failed');
          return failure;
        })
      )
    );

    logger.info({ scored: results.length, failed: failures.length }, 'Health scoring batch completed');
    return { results, failures };
  }

  // ==========================================================================
  // DERIVED METRICS
  // ==========================================================================

  salesRatio(item: ParsedNewItemMetrics): number {
    return item.actual_sales_qty / Math.max(item.target_sales_qty, 1);
  }

  daysOfStock(item: ParsedNewItemMetrics): number {
    return (item.current_stock / Math.max(item.avg_monthly_sales, this.config.stockEpsilon)) * DAYS_PER_MONTH;
  }

  growthRate(item: ParsedNewItemMetrics): number {
    return (item.sales_last_week - item.sales_prior_week) / Math.max(item.sales_prior_week, 1);
  }

  healthStatusOf(healthScore: number): HealthStatus {
    if (healthScore <= this.config.criticalMaxScore) return 'CRITICAL';
    if (healthScore <= this.config.atRiskMaxScore) return 'AT_RISK';
    if (healthScore < this.config.healthyMinScore) return 'CAUTION';
    return 'HEALTHY';
  }

  lifeStageOf(itemAgeDays: number): LifeStage {
    if (itemAgeDays <= this.config.launchMaxDays) return 'LAUNCH';
    if (itemAgeDays <= this.config.learningMaxDays) return 'LEARNING';
    if (itemAgeDays <= this.config.graduationMaxDays) return 'GRADUATION';
    return 'ESTABLISHED';
  }

  // ==========================================================================
  // COMPONENT SCORES
  // ==========================================================================

  private rounded(component: RawComponent): ComponentScore {
    return { score: roundHalfEven(component.score), reason: component.reason };
  }

  private scoreSalesPerformance(item: ParsedNewItemMetrics): RawComponent {
    const c = this.config;
    const ratio = this.salesRatio(item);
    const achieved = `${pct(ratio)}% of target`;

    if (ratio >= c.salesExcellent) {
      return { score: 100, reason: `Excellent: ${achieved} (>${pct(c.salesExcellent)}%)` };
    }
    if (ratio >= c.salesGood) {
      return { score: 85, reason: `Good: ${achieved} (${pct(c.salesGood)}%-${pct(c.salesExcellent)}%)` };
    }
    if (ratio >= c.salesFair) {
      return { score: 60, reason: `Fair: ${achieved} (${pct(c.salesFair)}%-${pct(c.salesGood)}%)` };
    }
    if (ratio >= c.salesPoor) {
      return { score: 35, reason: `Poor: ${achieved} (${pct(c.salesPoor)}%-${pct(c.salesFair)}%)` };
    }
    if (ratio >= c.salesCritical) {
      return {
        score: 15,
        reason: `Critical: ${achieved} (${pct(c.salesCritical)}%-${pct(c.salesPoor)}%)`,
      };
    }
    return { score: 0, reason: `Failing: ${achieved} (<${pct(c.salesCritical)}%)` };
  }

  private scoreCustomerAcquisition(item: ParsedNewItemMetrics): RawComponent {
    const c = this.config;
    const unique = item.unique_customers;

    let score: number;
    let reason: string;
    if (unique >= c.customersExcellent) {
      score = 100;
      reason = `Excellent: ${unique} unique customers (>${c.customersExcellent})`;
    } else if (unique >= c.customersGood) {
      score = 85;
      reason = `Good: ${unique} unique customers`;
    } else if (unique >= c.customersFair) {
      score = 60;
      reason = `Fair: ${unique} unique customers`;
    } else if (unique >= c.customersPoor) {
      score = 35;
      reason = `Poor: ${unique} unique customers`;
    } else {
      score = 15;
      reason = `Critical: ${unique} unique customers (<${c.customersPoor})`;
    }

    if (unique > 0) {
      const retention = item.repeat_customers / unique;
      if (retention > c.retentionBonusMinRatio) {
        score = Math.min(100, score + c.retentionBonus);
        reason += ` | ${pct(retention)}% repeat customers (retention bonus)`;
      }
    }

    return { score, reason };
  }

  private scoreStockAdequacy(item: ParsedNewItemMetrics): RawComponent {
    const c = this.config;
    const dos = this.daysOfStock(item);
    const days = dos.toFixed(0);

    if (dos >= c.dosOptimalMin && dos <= c.dosOptimalMax) {
      return {
        score: 100,
        reason: `Optimal: ${days} days of stock (${c.dosOptimalMin}-${c.dosOptimalMax} day range)`,
      };
    }
    if (dos < c.dosOptimalMin) {
      const shortfallPct = ((c.dosOptimalMin - dos) / c.dosOptimalMin) * 100;
      return {
        score: Math.max(30, 100 - shortfallPct * 2),
        reason: `Low Stock: ${days} days (<${c.dosOptimalMin} days) - stockout risk`,
      };
    }
    if (dos <= c.dosWarningMax) {
      return {
        score: 75,
        reason: `Caution: ${days} days of stock (${c.dosOptimalMax}-${c.dosWarningMax} day range)`,
      };
    }
    if (dos <= c.dosCriticalMax) {
      return {
        score: 45,
        reason: `High Stock: ${days} days (${c.dosWarningMax}-${c.dosCriticalMax} days) - high holding cost`,
      };
    }
    return {
      score: 15,
      reason: `Excessive: ${days} days (>${c.dosCriticalMax} days) - excess inventory risk`,
    };
  }

  private scoreGrowthTrend(item: ParsedNewItemMetrics): RawComponent {
    const c = this.config;
    const growth = this.growthRate(item);
    const wow = `${pct(growth, 1)}% WoW growth`;

    if (growth >= c.growthExcellent) {
      return { score: 100, reason: `Excellent: +${wow} (>${pct(c.growthExcellent)}%)` };
    }
    if (growth >= c.growthGood) {
      return { score: 85, reason: `Good: +${wow}` };
    }
    if (growth >= c.growthFair) {
      return { score: 70, reason: `Stable: ${wow} (0-${pct(c.growthGood)}%)` };
    }
    if (growth >= c.growthPoor) {
      return { score: 45, reason: `Declining: ${wow} (${pct(c.growthPoor)}%-0%)` };
    }
    if (growth >= c.growthCritical) {
      return { score: 20, reason: `Steep Decline: ${wow}` };
    }
    return { score: 5, reason: `Collapsing: ${wow} (<${pct(c.growthCritical)}%)` };
  }

  // ==========================================================================
  // RECOMMENDATIONS
  // ==========================================================================

  private recommend(status: HealthStatus, stage: LifeStage): HealthRecommendation {
    const rec = this.baselineFor(status);

    switch (stage) {
      case 'LAUNCH':
        rec.action = 'AGGRESSIVE_MARKETING';
        rec.priority = Math.max(rec.priority, 7);
        rec.keyMetrics.push('Focus on customer acquisition', 'Expected: 20-30% weekly growth');
        break;
      case 'LEARNING':
        rec.action = 'MARKET_EXPANSION';
        rec.priority = Math.max(rec.priority, 6);
        rec.keyMetrics.push('Scale marketing campaigns', 'Target new customer segments');
        break;
      case 'GRADUATION':
        rec.action = 'OPTIMIZE_SUPPLY_CHAIN';
        rec.priority = Math.max(rec.priority, 4);
        rec.keyMetrics.push('Optimize ordering and inventory', 'Stabilize supply from suppliers');
        break;
      case 'ESTABLISHED':
        rec.keyMetrics.push('Monitor for market changes', 'Maintain competitive pricing');
        break;
    }

    return rec;
  }

  private baselineFor(status: HealthStatus): HealthRecommendation {
    const c = this.config;
    switch (status) {
      case 'CRITICAL':
        return {
          action: 'URGENT_INTERVENTION',
          priority: 10,
          keyMetrics: [],
          warnings: [
            `Health score <= ${c.criticalMaxScore} - item may fail`,
            'Review launch strategy and market positioning',
            'Consider product adjustments or discontinuation',
          ],
        };
      case 'AT_RISK':
        return {
          action: 'CLOSE_MONITORING',
          priority: 8,
          keyMetrics: [],
          warnings: [
            `Health score ${c.criticalMaxScore}-${c.atRiskMaxScore} - monitor closely`,
            'Increase marketing efforts',
            'Gather customer feedback for improvements',
          ],
        };
      case 'CAUTION':
        return {
          action: 'OPTIMIZE_INVENTORY',
          priority: 5,
          keyMetrics: [],
          warnings: [`Health score ${c.atRiskMaxScore}-${c.healthyMinScore} - needs optimization`],
        };
      case 'HEALTHY':
        return { action: 'MAINTAIN', priority: 2, keyMetrics: [], warnings: [] };
    }
  }
}

export function createHealthScoringService(
  options?: HealthScoringServiceOptions
): HealthScoringService {
  return new HealthScoringService(options);
}
