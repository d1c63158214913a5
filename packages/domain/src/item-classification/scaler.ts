/**
 * @fileoverview Standard scaler
 *
 * Z-score standardisation fitted over a whole batch. Fitting returns an
 * explicit parameter object; there is no hidden scaler state between calls.
 *
 * @module domain/item-classification/scaler
 */

import { ValidationError } from '@invenlytics/core';

import { mean, populationStdDev, type Vector } from '../shared/statistics.js';

export type FeatureMatrix = readonly Vector[];

export interface ScalerParams {
  readonly means: readonly number[];
  readonly scales: readonly number[];
}

function columnOf(rows: FeatureMatrix, column: number): number[] {
  return rows.map((row) => row[column] ?? 0);
}

/**
 * Fit per-column mean and population standard deviation.
 * Constant columns get scale 1 so they standardise to 0.
 */
export function fitScaler(rows: FeatureMatrix): ScalerParams {
  const width = rows[0]?.length ?? 0;
  if (rows.some((row) => row.length !== width)) {
    throw new ValidationError('Feature rows must all have the same width');
  }

  const means: number[] = [];
  const scales: number[] = [];
  for (let column = 0; column < width; column++) {
    const values = columnOf(rows, column);
    const mu = mean(values);
    const std = populationStdDev(values);
    means.push(mu);
    // Float noise on a constant column counts as zero spread
    scales.push(std <= 10 * Number.EPSILON * Math.max(1, Math.abs(mu)) ? 1 : std);
  }

  return Object.freeze({ means: Object.freeze(means), scales: Object.freeze(scales) });
}

export function transform(params: ScalerParams, rows: FeatureMatrix): number[][] {
  return rows.map((row) =>
    row.map((value, column) => (value - (params.means[column] ?? 0)) / (params.scales[column] ?? 1))
  );
}

export function fitTransform(rows: FeatureMatrix): { params: ScalerParams; scaled: number[][] } {
  const params = fitScaler(rows);
  return { params, scaled: transform(params, rows) };
}

export function isFiniteMatrix(rows: FeatureMatrix): boolean {
  return rows.every((row) => row.every((value) => Number.isFinite(value)));
}
