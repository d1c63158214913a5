/**
 * @fileoverview Feature Preparer
 *
 * Cleans raw item metrics and derives the features every classification
 * strategy reads. Runs once per item before any strategy.
 *
 * @module domain/item-classification/feature-preparer
 */

import { createLogger, ValidationError } from '@invenlytics/core';
import {
  Err,
  isErr,
  ItemMetricsSchema,
  Ok,
  REQUIRED_ITEM_NUMERIC_FIELDS,
  Result,
  type DataQualityReport,
  type PreparedItem,
} from '@invenlytics/types';

import { validateWithResult } from '../shared/validation.js';

const logger = createLogger({ name: 'feature-preparer' });

const DAYS_PER_YEAR = 365;
const DEFAULT_CONSISTENCY_SCORE = 50;

/**
 * Best-effort item code for failure reporting
 */
export function itemCodeOf(raw: unknown): string {
  if (typeof raw === 'object' && raw !== null && 'item_code' in raw) {
    const code = raw.item_code;
    if (typeof code === 'string' && code.length > 0) return code;
  }
  return 'UNKNOWN';
}

/**
 * Validate and derive features for one raw record
 */
export function safePrepareItem(raw: unknown): Result<PreparedItem, ValidationError> {
  const parsed = validateWithResult(ItemMetricsSchema, raw, 'item metrics');
  if (isErr(parsed)) {
    return parsed;
  }
  const metrics = parsed.value;

  const defaultedFields = REQUIRED_ITEM_NUMERIC_FIELDS.filter(
    (field) => metrics[field] === undefined || metrics[field] === null
  );
  if (defaultedFields.length > 0) {
    logger.warn(
      { itemCode: metrics.item_code, fields: defaultedFields },
      'Missing numeric fields defaulted to 0'
    );
  }

  const annualSalesQty = metrics.annual_sales_qty ?? 0;
  const currentStock = metrics.current_stock ?? 0;

  const prepared: PreparedItem = {
    itemCode: metrics.item_code,
    itemName: metrics.item_name ?? '',
    uom: metrics.uom ?? '',
    annualSalesQty,
    annualSalesValue: metrics.annual_sales_value ?? 0,
    currentStock,
    stockValue: metrics.stock_value ?? 0,
    itemAgeDays: metrics.item_age_days ?? 0,
    daysSinceLastSale: metrics.days_since_last_sale ?? 0,
    salesVelocity: metrics.sales_velocity ?? annualSalesQty / DAYS_PER_YEAR,
    turnoverRatio: metrics.turnover_ratio ?? (currentStock > 0 ? annualSalesQty / currentStock : 0),
    consistencyScore: metrics.consistency_score ?? DEFAULT_CONSISTENCY_SCORE,
    demandVariability: metrics.demand_variability ?? 0,
    defaultedFields: [...defaultedFields],
  };

  if (!Number.isFinite(prepared.salesVelocity) || !Number.isFinite(prepared.turnoverRatio)) {
    return Err(new ValidationError(`Derived features are not finite for item ${prepared.itemCode}`));
  }

  return Ok(Object.freeze(prepared));
}

/**
 * Flag which parts of an item's source data are present
 *
 * @throws ValidationError when the record is invalid
 */
export function assessDataQuality(raw: unknown): DataQualityReport {
  const metrics = Result.unwrap(validateWithResult(ItemMetricsSchema, raw, 'item metrics'));
  const hasSalesData = (metrics.annual_sales_qty ?? 0) > 0;
  const hasPricing = (metrics.stock_value ?? 0) > 0;
  const stockRecorded = metrics.current_stock !== undefined && metrics.current_stock !== null;

  return {
    itemCode: metrics.item_code,
    hasSalesData,
    hasStockData: (metrics.current_stock ?? 0) > 0,
    hasPricing,
    hasHistory: Boolean(metrics.last_sale_date),
    // A recorded stock of zero still counts
    isValid: hasSalesData && hasPricing && stockRecorded,
  };
}

/**
 * Validate and derive features, throwing ValidationError on a bad record
 */
export function prepareItem(raw: unknown): PreparedItem {
  return Result.unwrap(safePrepareItem(raw));
}

/**
 * Clustering strategies only see items that sold in the last year
 */
export function isMlEligible(item: PreparedItem): boolean {
  return item.annualSalesQty > 0;
}
