/**
 * @fileoverview Classification insights
 *
 * Human-readable key metrics, recommendations and action items for one
 * classification result, as shown on the item classification record.
 *
 * @module domain/item-classification/insights
 */

import type { ClassificationResult, ItemAction } from '@invenlytics/types';

export interface InsightActionItem {
  readonly action: ItemAction | 'SCHEDULE_REVIEW';
  readonly priority: number;
  readonly impact: string;
  /** ISO date (YYYY-MM-DD) */
  readonly dueDate: string;
}

export interface ClassificationInsights {
  readonly title: string;
  readonly classification: ClassificationResult['classification'];
  readonly confidence: number;
  readonly keyMetrics: readonly string[];
  readonly recommendations: readonly string[];
  readonly actionItems: readonly InsightActionItem[];
}

export interface InsightOptions {
  readonly currency?: string;
  /** Reference date for action items; defaults to now */
  readonly now?: Date;
  readonly reviewAfterDays?: number;
}

const wholeNumber = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

function money(currency: string, amount: number): string {
  return `${currency} ${wholeNumber.format(amount)}`;
}

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function keyMetricsFor(result: ClassificationResult, currency: string): string[] {
  switch (result.classification) {
    case 'FAST':
      return [
        `High-revenue item: ${money(currency, result.annualSalesValue)}/year`,
        `Daily velocity: ${result.salesVelocity.toFixed(2)} units/day`,
        `Turnover ratio: ${result.turnoverRatio.toFixed(2)}`,
        `Days of stock: ${result.daysOfStock.toFixed(1)} days`,
        `ABC Category: ${result.abcCategory}`,
      ];
    case 'SLOW':
      return [
        `Steady demand: ${result.annualSalesQty} units/year`,
        `Daily velocity: ${result.salesVelocity.toFixed(2)} units/day`,
        `Demand consistency: ${result.consistencyScore}%`,
        `Days of stock: ${result.daysOfStock.toFixed(1)} days`,
        `Last sale: ${result.daysSinceLastSale} days ago`,
      ];
    case 'DEAD_STOCK':
      return [
        `No sales for ${result.daysSinceLastSale} days`,
        `Stock value: ${money(currency, result.stockValue)}`,
        `Annual holding cost: ${money(currency, result.holdingCostAnnually)}`,
        `Dormancy: ${result.dormancyStatus}`,
      ];
    case 'NEW_ITEM':
      return [
        `Item age: ${result.itemAgeDays} days`,
        `Status: ${result.newItemStatus}`,
        `Current sales: ${result.annualSalesQty} units (launch phase)`,
        `Stock: ${result.currentStock} units`,
      ];
    case 'MEDIUM':
      return [
        `Annual sales: ${result.annualSalesQty} units`,
        `Daily velocity: ${result.salesVelocity.toFixed(2)} units/day`,
        `Days of stock: ${result.daysOfStock.toFixed(1)} days`,
      ];
  }
}

function recommendationsFor(result: ClassificationResult, currency: string): string[] {
  switch (result.classification) {
    case 'FAST':
      return [
        'Increase safety stock by 20-30%',
        'Implement more frequent reordering',
        'Negotiate better supplier terms',
        'Consider bulk purchasing discounts',
      ];
    case 'SLOW':
      return result.daysOfStock > 180
        ? [
            `High Days of Stock (${result.daysOfStock.toFixed(0)} days) - reduce orders`,
            'Review with procurement',
            'Consider sales promotion',
          ]
        : ['Maintain current stock levels', 'Monitor demand trends', 'Plan quarterly reviews'];
    case 'DEAD_STOCK':
      return [
        `URGENT: Liquidate to recover ${money(currency, result.expectedImpact)}`,
        `Holding costs: ${money(currency, result.holdingCostAnnually)}/year`,
        'Consider donation for tax benefit',
        'Update demand forecast',
      ];
    case 'NEW_ITEM': {
      const growthPct = (result.expectedImpact / Math.max(result.annualSalesValue, 1)) * 100;
      return [
        'Increase marketing efforts',
        `Expected growth: ${growthPct.toFixed(0)}%`,
        'Monitor sales closely (weekly reviews)',
        'Gather customer feedback',
      ];
    }
    case 'MEDIUM':
      return ['Maintain current stock levels', 'Re-evaluate classification next quarter'];
  }
}

/**
 * Build insights for one classification result
 */
export function buildClassificationInsights(
  result: ClassificationResult,
  options: InsightOptions = {}
): ClassificationInsights {
  const currency = options.currency ?? 'AED';
  const now = options.now ?? new Date();
  const review = new Date(now.getTime());
  review.setUTCDate(review.getUTCDate() + (options.reviewAfterDays ?? 30));

  return {
    title: `Classification: ${result.classification}`,
    classification: result.classification,
    confidence: result.confidence,
    keyMetrics: keyMetricsFor(result, currency),
    recommendations: recommendationsFor(result, currency),
    actionItems: [
      {
        action: result.recommendedAction,
        priority: result.actionPriority,
        impact: money(currency, result.expectedImpact),
        dueDate: isoDate(now),
      },
      {
        action: 'SCHEDULE_REVIEW',
        priority: 5,
        impact: 'Data-driven insights',
        dueDate: isoDate(review),
      },
    ],
  };
}
