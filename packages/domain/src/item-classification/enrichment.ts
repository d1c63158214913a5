/**
 * @fileoverview Result enrichment
 *
 * Turns a (classification, confidence, reason) decision into the full
 * result record: holding cost, days of stock, ABC class, dormancy,
 * life stage, recommended action and expected impact.
 *
 * @module domain/item-classification/enrichment
 */

import type {
  AbcCategory,
  Classification,
  ClassificationMethod,
  ClassificationResult,
  DormancyStatus,
  ItemAction,
  ItemClassificationConfig,
  LifeStage,
  PreparedItem,
} from '@invenlytics/types';

import { roundTo } from '../shared/statistics.js';

export interface ClassificationDecision {
  readonly classification: Classification;
  /** Percent, 0-100; rounded when the result is built */
  readonly confidence: number;
  readonly reason: string;
}

export interface ActionRecommendation {
  readonly action: ItemAction;
  readonly priority: number;
  readonly impact: number;
}

export function daysOfStock(item: PreparedItem): number {
  return item.salesVelocity > 0 ? item.currentStock / item.salesVelocity : 0;
}

export function holdingCost(item: PreparedItem, config: ItemClassificationConfig): number {
  return item.stockValue * config.holdingCostPctPerYear;
}

export function abcCategoryOf(item: PreparedItem, config: ItemClassificationConfig): AbcCategory {
  if (item.annualSalesValue > config.abcAMinAnnualValue) return 'A';
  if (item.annualSalesValue > config.abcBMinAnnualValue) return 'B';
  return 'C';
}

export function dormancyStatusOf(item: PreparedItem): DormancyStatus {
  const days = item.daysSinceLastSale;
  if (days < 90) return 'ACTIVE';
  if (days < 180) return 'SLEEPY';
  if (days < 365) return 'DORMANT';
  return 'DEAD';
}

export function newItemStatusOf(item: PreparedItem): LifeStage {
  const age = item.itemAgeDays;
  if (age < 30) return 'LAUNCH';
  if (age < 90) return 'LEARNING';
  if (age < 180) return 'GRADUATION';
  return 'ESTABLISHED';
}

export function recommendAction(
  item: PreparedItem,
  classification: Classification,
  config: ItemClassificationConfig
): ActionRecommendation {
  switch (classification) {
    case 'FAST':
      return { action: 'INCREASE_STOCK', priority: 8, impact: item.annualSalesValue * 0.1 };
    case 'SLOW':
      return daysOfStock(item) > 180
        ? { action: 'REDUCE_STOCK', priority: 5, impact: -holdingCost(item, config) * 0.5 }
        : { action: 'MAINTAIN_STOCK', priority: 2, impact: 0 };
    case 'DEAD_STOCK':
      return { action: 'LIQUIDATION', priority: 10, impact: item.stockValue * 0.3 };
    case 'NEW_ITEM':
      return { action: 'MARKET_MORE', priority: 7, impact: item.annualSalesValue * 0.2 };
    case 'MEDIUM':
      return { action: 'MAINTAIN_STOCK', priority: 1, impact: 0 };
  }
}

export function toConfidencePercent(fraction: number): number {
  return fraction * 100;
}

/**
 * Build the frozen result record for one item
 */
export function buildClassificationResult(
  item: PreparedItem,
  decision: ClassificationDecision,
  method: ClassificationMethod,
  config: ItemClassificationConfig,
  analyzedAt: string
): ClassificationResult {
  const recommendation = recommendAction(item, decision.classification, config);

  return Object.freeze({
    itemCode: item.itemCode,
    itemName: item.itemName,
    uom: item.uom,
    classification: decision.classification,
    confidence: Math.min(100, Math.max(0, Math.round(decision.confidence))),
    method,
    reason: decision.reason,

    annualSalesQty: item.annualSalesQty,
    annualSalesValue: item.annualSalesValue,
    salesVelocity: item.salesVelocity,
    turnoverRatio: item.turnoverRatio,
    currentStock: item.currentStock,
    stockValue: item.stockValue,
    itemAgeDays: item.itemAgeDays,
    daysSinceLastSale: item.daysSinceLastSale,
    consistencyScore: item.consistencyScore,
    demandVariability: item.demandVariability,

    holdingCostAnnually: roundTo(holdingCost(item, config), 2),
    daysOfStock: roundTo(daysOfStock(item), 2),
    abcCategory: abcCategoryOf(item, config),
    dormancyStatus: dormancyStatusOf(item),
    newItemStatus: newItemStatusOf(item),

    recommendedAction: recommendation.action,
    actionPriority: recommendation.priority,
    expectedImpact: roundTo(recommendation.impact, 2),

    modelVersion: config.modelVersion,
    analyzedAt,
  });
}
