/**
 * @fileoverview Item classifier configuration
 *
 * @module domain/item-classification/config
 */

import { ConfigurationError } from '@invenlytics/core';
import {
  ItemClassificationConfigSchema,
  RuleThresholdsSchema,
  type ItemClassificationConfig,
  type ItemClassificationConfigInput,
  type RuleThresholds,
} from '@invenlytics/types';

import { parseConfig } from '../shared/validation.js';

export const DEFAULT_ITEM_CLASSIFICATION_CONFIG: ItemClassificationConfig = Object.freeze(
  ItemClassificationConfigSchema.parse({})
);

/**
 * Merge overrides onto the defaults and validate the result
 *
 * @throws ConfigurationError on an invalid or inconsistent value
 */
export function resolveItemClassificationConfig(
  overrides: ItemClassificationConfigInput = {}
): ItemClassificationConfig {
  const config = parseConfig(ItemClassificationConfigSchema, overrides, 'item classification');

  if (config.abcBMinAnnualValue > config.abcAMinAnnualValue) {
    throw new ConfigurationError(
      'abcBMinAnnualValue must not exceed abcAMinAnnualValue',
      'abcBMinAnnualValue'
    );
  }
  if (config.hybridRuleWeight + config.hybridDbscanWeight + config.hybridFastBonus <= 0) {
    throw new ConfigurationError('Hybrid vote weights must not all be zero', 'hybridRuleWeight');
  }

  return Object.freeze(config);
}

export function ruleThresholdsOf(config: ItemClassificationConfig): RuleThresholds {
  return {
    newItemMaxAgeDays: config.newItemMaxAgeDays,
    deadStockMinDaysNoSales: config.deadStockMinDaysNoSales,
    deadStockMaxAnnualSales: config.deadStockMaxAnnualSales,
    fastMinSalesVelocity: config.fastMinSalesVelocity,
    fastMinTurnoverRatio: config.fastMinTurnoverRatio,
    slowMaxSalesVelocity: config.slowMaxSalesVelocity,
    slowMaxDaysSinceLastSale: config.slowMaxDaysSinceLastSale,
  };
}

/**
 * Replace every rule threshold at once
 *
 * @throws ConfigurationError when the threshold set is incomplete or invalid
 */
export function withRuleThresholds(
  config: ItemClassificationConfig,
  thresholds: RuleThresholds
): ItemClassificationConfig {
  const parsed = parseConfig(RuleThresholdsSchema, thresholds, 'rule thresholds');
  return resolveItemClassificationConfig({ ...config, ...parsed });
}
