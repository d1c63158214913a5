/**
 * @fileoverview Business rules for item classification
 *
 * Ordered first-match list. Earlier rules take precedence: a new item is
 * never dead stock, a dead item is never fast.
 *
 * @module domain/item-classification/rules
 */

import type { Classification, PreparedItem, RuleThresholds } from '@invenlytics/types';

export interface RuleOutcome {
  readonly classification: Classification;
  /** Fraction in [0, 1] */
  readonly confidence: number;
  readonly reason: string;
}

export interface ClassificationRule {
  readonly name: string;
  matches(item: PreparedItem, thresholds: RuleThresholds): boolean;
  outcome(item: PreparedItem, thresholds: RuleThresholds): RuleOutcome;
}

export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    name: 'new-item',
    matches: (item, t) => item.itemAgeDays < t.newItemMaxAgeDays,
    outcome: (item, t) => ({
      classification: 'NEW_ITEM',
      confidence: 0.99,
      reason: `Item age ${item.itemAgeDays} days < ${t.newItemMaxAgeDays} threshold`,
    }),
  },
  {
    name: 'dead-stock',
    matches: (item, t) =>
      item.daysSinceLastSale > t.deadStockMinDaysNoSales ||
      item.annualSalesQty < t.deadStockMaxAnnualSales,
    outcome: (item, t) => ({
      classification: 'DEAD_STOCK',
      confidence: 0.95,
      reason:
        item.daysSinceLastSale > t.deadStockMinDaysNoSales
          ? `No sales for ${item.daysSinceLastSale} days (threshold: ${t.deadStockMinDaysNoSales})`
          : `Annual sales ${item.annualSalesQty} below ${t.deadStockMaxAnnualSales} units`,
    }),
  },
  {
    name: 'fast-mover',
    matches: (item, t) =>
      item.salesVelocity > t.fastMinSalesVelocity && item.turnoverRatio > t.fastMinTurnoverRatio,
    outcome: (item) => ({
      classification: 'FAST',
      confidence: Math.min(99, 70 + item.salesVelocity * 5 + item.turnoverRatio * 10) / 100,
      reason: `Velocity ${item.salesVelocity.toFixed(2)} units/day, Turnover ${item.turnoverRatio.toFixed(2)}`,
    }),
  },
  {
    name: 'slow-mover',
    matches: (item, t) =>
      item.salesVelocity < t.slowMaxSalesVelocity &&
      item.daysSinceLastSale < t.slowMaxDaysSinceLastSale,
    outcome: (item) => ({
      classification: 'SLOW',
      confidence: 0.85,
      reason: `Low velocity (${item.salesVelocity.toFixed(2)} units/day) but consistent (last sale ${item.daysSinceLastSale} days ago)`,
    }),
  },
];

const MEDIUM_OUTCOME: RuleOutcome = {
  classification: 'MEDIUM',
  confidence: 0.75,
  reason: 'Mid-range item characteristics',
};

export function applyRules(item: PreparedItem, thresholds: RuleThresholds): RuleOutcome {
  const rule = CLASSIFICATION_RULES.find((candidate) => candidate.matches(item, thresholds));
  return rule ? rule.outcome(item, thresholds) : MEDIUM_OUTCOME;
}
