/**
 * @fileoverview Demand Pattern Service
 *
 * Syntetos-Boylan-Croston classification of 12 months of sales:
 *
 *                  CV² <= 0.49      CV² > 0.49
 *   ADI <= 1.32    SMOOTH           ERRATIC
 *   ADI >  1.32    INTERMITTENT     LUMPY
 *
 * ADI (average demand interval) = 12 / months with demand.
 * CV² = (population std / mean)² over the months with demand.
 *
 * Each pattern carries its own forecast method, service-level z-score and
 * ordering guidance.
 *
 * @module domain/demand-pattern/demand-pattern-service
 */

import { createLogger } from '@invenlytics/core';
import {
  DemandPatternConfigSchema,
  DemandPatternInputSchema,
  isErr,
  Result,
  MonthlySeriesSchema,
  type DemandForecast,
  type DemandPattern,
  type DemandPatternConfig,
  type DemandPatternConfigInput,
  type DemandPatternInput,
  type DemandPatternResult,
  type ItemFailure,
  type PatternClassification,
  type PatternRecommendation,
  type ReorderParameters,
} from '@invenlytics/types';

import { toItemFailure } from '../shared/failures.js';
import { mean, populationStdDev } from '../shared/statistics.js';
import { parseConfig, validateWithResult } from '../shared/validation.js';

const logger = createLogger({ name: 'demand-pattern' });

const MONTHS = 12;
const DAYS_PER_MONTH = 30;

/**
 * Ordering guidance per pattern
 */
export const PATTERN_RECOMMENDATIONS: Readonly<Record<DemandPattern, PatternRecommendation>> = {
  SMOOTH: {
    action: 'REGULAR_ORDERING - Implement standard reorder cycle',
    priority: 2,
    guidance: [
      'Stable demand allows for predictable ordering',
      'Use ROP-based ordering system',
      'Can negotiate long-term contracts with suppliers',
    ],
  },
  ERRATIC: {
    action: 'FLEXIBLE_ORDERING - Increase safety stock by 20-30%',
    priority: 5,
    guidance: [
      'High demand variability requires buffer inventory',
      'Monitor demand trends closely (weekly)',
      'Consider multiple suppliers for flexibility',
    ],
  },
  INTERMITTENT: {
    action: 'PERIODIC_ORDERING - Use time-based ordering',
    priority: 4,
    guidance: [
      'Sporadic demand but low variability',
      'Implement periodic review ordering (every 4 weeks)',
      'Keep minimum safety stock levels',
    ],
  },
  LUMPY: {
    action: 'SPECIAL_ORDERING - Collaborate on demand planning',
    priority: 8,
    guidance: [
      'Highly unpredictable demand',
      'Work with sales team on forecasts',
      'Maintain high safety stock (40-50% above average)',
      'Consider drop-shipping or make-to-order',
    ],
  },
};

const PATTERN_REASONS: Readonly<Record<DemandPattern, string>> = {
  SMOOTH: 'Regular, predictable demand',
  ERRATIC: 'Variable demand with high volatility',
  INTERMITTENT: 'Infrequent but consistent demand',
  LUMPY: 'Chaotic B2B demand pattern',
};

/**
 * One-line explanation of a classification, e.g.
 * "Regular, predictable demand (ADI: 1.00, CV²: 0.004)"
 */
export function classificationReason(classification: PatternClassification): string {
  const { adi, cvSquared, pattern } = classification;
  return `${PATTERN_REASONS[pattern]} (ADI: ${adi.toFixed(2)}, CV²: ${cvSquared.toFixed(3)})`;
}

export interface DemandPatternServiceOptions {
  readonly config?: DemandPatternConfigInput;
  readonly clock?: () => Date;
}

export interface DemandPatternBatchResult {
  readonly results: DemandPatternResult[];
  readonly failures: ItemFailure[];
}

function nonZero(monthly: readonly number[]): number[] {
  return monthly.filter((value) => value > 0);
}

/**
 * Demand Pattern Service
 *
 * @example
 * ```typescript
 * const service = createDemandPatternService({ config: { leadTimeDays: 14 } });
 * const result = service.analyze({ itemCode: 'PUMP-A', monthlySales });
 * ```
 */
export class DemandPatternService {
  private readonly config: DemandPatternConfig;
  private readonly clock: () => Date;

  constructor(options: DemandPatternServiceOptions = {}) {
    this.config = Object.freeze(
      parseConfig(DemandPatternConfigSchema, options.config ?? {}, 'demand pattern')
    );
    this.clock = options.clock ?? (() => new Date());
  }

  getConfig(): DemandPatternConfig {
    return this.config;
  }

  /**
   * SBC classification; an all-zero series is LUMPY with ADI and CV² of 0
   */
  classifyPattern(monthly: readonly number[]): PatternClassification {
    const demand = nonZero(monthly);
    if (demand.length === 0) {
      return { adi: 0, cvSquared: 0, pattern: 'LUMPY' };
    }

    const adi = MONTHS / demand.length;
    const avg = mean(demand);
    const cv = avg > 0 ? populationStdDev(demand) / avg : 0;
    const cvSquared = cv * cv;

    const regular = adi <= this.config.adiThreshold;
    const stable = cvSquared <= this.config.cv2Threshold;
    let pattern: DemandPattern;
    if (regular) {
      pattern = stable ? 'SMOOTH' : 'ERRATIC';
    } else {
      pattern = stable ? 'INTERMITTENT' : 'LUMPY';
    }

    return { adi, cvSquared, pattern };
  }

  /**
   * 30-day forecast with a pattern-specific method and interval
   */
  forecast(monthly: readonly number[], pattern: DemandPattern): DemandForecast {
    const demand = nonZero(monthly);
    const avgNonZero = mean(demand);

    switch (pattern) {
      case 'SMOOTH': {
        const spread = this.config.forecastIntervalZ * populationStdDev(monthly);
        return {
          value: avgNonZero,
          lower: Math.max(0, avgNonZero - spread),
          upper: avgNonZero + spread,
          method: 'MOVING_AVERAGE',
        };
      }
      case 'ERRATIC': {
        const [m10 = 0, m11 = 0, m12 = 0] = monthly.slice(-3);
        const value = 0.5 * m12 + 0.3 * m11 + 0.2 * m10;
        return { value, lower: value * 0.5, upper: value * 1.5, method: 'WEIGHTED_AVERAGE' };
      }
      case 'INTERMITTENT': {
        const value = demand.length > 0 ? (avgNonZero / demand.length) * DAYS_PER_MONTH : 0;
        return { value, lower: 0, upper: value * 2, method: 'CROSTONS' };
      }
      case 'LUMPY':
        return { value: avgNonZero, lower: 0, upper: avgNonZero * 3, method: 'EXPONENTIAL_SMOOTHING' };
    }
  }

  private serviceZ(pattern: DemandPattern): number {
    switch (pattern) {
      case 'SMOOTH':
        return this.config.smoothServiceZ;
      case 'ERRATIC':
        return this.config.erraticServiceZ;
      case 'INTERMITTENT':
        return this.config.intermittentServiceZ;
      case 'LUMPY':
        return this.config.lumpyServiceZ;
    }
  }

  /**
   * Safety stock, reorder point and economic order quantity
   */
  calculateReorderPoint(
    monthly: readonly number[],
    pattern: DemandPattern,
    leadTimeDays: number = this.config.leadTimeDays
  ): ReorderParameters {
    const avgMonthly = mean(nonZero(monthly));
    const leadTimeDemand = (avgMonthly / DAYS_PER_MONTH) * leadTimeDays;
    const stdDevLeadTime = populationStdDev(monthly) * Math.sqrt(leadTimeDays);
    const safetyStock = this.serviceZ(pattern) * stdDevLeadTime;
    const reorderPoint = leadTimeDemand + safetyStock;

    // An all-zero series leaves avgMonthly at 0: no EOQ, and orderFrequency
    // falls back to one order a month
    const annualDemand = avgMonthly * MONTHS;
    const economicOrderQty =
      annualDemand > 0
        ? Math.sqrt((2 * annualDemand * this.config.orderingCost) / this.config.holdingCostRate)
        : 0;
    const orderFrequency = economicOrderQty > 0 ? annualDemand / economicOrderQty : MONTHS;

    return {
      reorderPoint,
      safetyStock,
      economicOrderQty,
      recommendedOrderQty: Math.max(economicOrderQty, reorderPoint),
      orderFrequency,
      leadTimeDays,
    };
  }

  recommend(pattern: DemandPattern): PatternRecommendation {
    const recommendation = PATTERN_RECOMMENDATIONS[pattern];
    return { ...recommendation, guidance: [...recommendation.guidance] };
  }

  /**
   * Full analysis of one item
   *
   * @throws ValidationError when the series is not 12 non-negative numbers
   */
  analyze(input: DemandPatternInput): DemandPatternResult {
    const parsed = validateWithResult(DemandPatternInputSchema, input, 'demand series');
    if (isErr(parsed)) {
      throw parsed.error;
    }
    const { itemCode, itemName, monthlySales, leadTimeDays } = parsed.value;

    const classification = this.classifyPattern(monthlySales);
    const avgMonthlyDemand = mean(monthlySales);
    const stdDevDemand = populationStdDev(monthlySales);

    const result: DemandPatternResult = {
      itemCode,
      itemName: itemName ?? '',
      pattern: classification.pattern,
      adi: classification.adi,
      cvSquared: classification.cvSquared,
      reason: classificationReason(classification),
      avgMonthlyDemand,
      totalAnnualDemand: monthlySales.reduce((sum, value) => sum + value, 0),
      stdDevDemand,
      demandVariability: avgMonthlyDemand > 0 ? (stdDevDemand / avgMonthlyDemand) * 100 : 0,
      forecast: this.forecast(monthlySales, classification.pattern),
      reorder: this.calculateReorderPoint(
        monthlySales,
        classification.pattern,
        leadTimeDays ?? this.config.leadTimeDays
      ),
      recommendation: this.recommend(classification.pattern),
      analyzedAt: this.clock().toISOString(),
    };

    logger.debug({ itemCode, pattern: result.pattern, adi: result.adi }, 'Demand pattern classified');
    return Object.freeze(result);
  }

  /**
   * Analyse many items; a bad item is reported without stopping the batch
   */
  analyzeBatch(inputs: readonly DemandPatternInput[]): DemandPatternBatchResult {
    logger.info({ total: inputs.length }, 'Demand pattern batch started');

    const { values: results, errors: failures } = Result.partition(
      inputs.map((input) =>
        Result.mapErr(Result.try(() => this.analyze(input)), (error) => {
          const failure = toItemFailure(input.itemCode || 'UNKNOWN', error);
          logger.error({ itemCode: failure.itemCode, err: failure.message }, 'Demand pattern analysis failed');
          return failure;
        })
      )
    );

    logger.info(
      { analyzed: results.length, failed: failures.length },
      'Demand pattern batch completed'
    );
    return { results, failures };
  }
}

/**
 * Parse a raw monthly series
 *
 * @throws ValidationError unless it holds exactly 12 non-negative numbers
 */
export function parseMonthlySeries(values: unknown): number[] {
  const parsed = validateWithResult(MonthlySeriesSchema, values, 'monthly series');
  if (isErr(parsed)) {
    throw parsed.error;
  }
  return parsed.value;
}

export function createDemandPatternService(
  options?: DemandPatternServiceOptions
): DemandPatternService {
  return new DemandPatternService(options);
}
