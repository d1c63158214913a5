/**
 * @fileoverview Descriptive statistics and vector helpers
 *
 * @module domain/shared/statistics
 */

export type Vector = readonly number[];

/**
 * Arithmetic mean; 0 for an empty list
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

/**
 * Population standard deviation (divides by n); 0 for an empty list
 */
export function populationStdDev(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const mu = mean(values);
  let sumSq = 0;
  for (const value of values) {
    const diff = value - mu;
    sumSq += diff * diff;
  }
  return Math.sqrt(sumSq / values.length);
}

export function squaredEuclidean(a: Vector, b: Vector): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    sum += diff * diff;
  }
  return sum;
}

export function euclideanDistance(a: Vector, b: Vector): number {
  return Math.sqrt(squaredEuclidean(a, b));
}

/**
 * Round to a fixed number of decimals; never returns -0
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor + 0;
}

/**
 * Round to the nearest integer, halves to the even neighbour (92.5 -> 92, 93.5 -> 94)
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor + 0;
  return floor % 2 === 0 ? floor + 0 : floor + 1;
}
