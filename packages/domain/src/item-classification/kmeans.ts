/**
 * @fileoverview K-means clustering
 *
 * Lloyd's algorithm with k-means++ seeding. Seeding draws from a seeded
 * PRNG so identical input and options always give identical clusters. The
 * best of `initRuns` independent initialisations (lowest inertia) wins.
 *
 * @module domain/item-classification/kmeans
 */

import { ModelUnavailableError } from '@invenlytics/core';

import { euclideanDistance, mean, squaredEuclidean, type Vector } from '../shared/statistics.js';
import type { FeatureMatrix } from './scaler.js';

export interface KMeansOptions {
  readonly k: number;
  readonly seed: number;
  readonly initRuns: number;
  readonly maxIterations: number;
  /** Stop once the summed squared centroid shift falls below this */
  readonly tolerance?: number;
}

export interface KMeansResult {
  readonly labels: readonly number[];
  readonly centroids: readonly Vector[];
  /** Sum of squared distances of points to their centroid */
  readonly inertia: number;
  readonly iterations: number;
}

/**
 * mulberry32: small deterministic PRNG returning floats in [0, 1)
 */
export function createSeededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function nearestCentroid(point: Vector, centroids: readonly Vector[]): { index: number; distSq: number } {
  let index = 0;
  let distSq = Infinity;
  centroids.forEach((centroid, candidate) => {
    const d = squaredEuclidean(point, centroid);
    if (d < distSq) {
      distSq = d;
      index = candidate;
    }
  });
  return { index, distSq };
}

function pointAt(points: FeatureMatrix, index: number): Vector {
  return points[index] ?? [];
}

function seedCentroids(points: FeatureMatrix, k: number, random: () => number): Vector[] {
  const centroids: Vector[] = [pointAt(points, Math.floor(random() * points.length))];

  while (centroids.length < k) {
    const weights = points.map((point) => nearestCentroid(point, centroids).distSq);
    const total = weights.reduce((sum, w) => sum + w, 0);

    if (total === 0) {
      // All remaining points coincide with a centroid
      centroids.push(pointAt(points, Math.floor(random() * points.length)));
      continue;
    }

    let target = random() * total;
    let chosen = weights.length - 1;
    for (let i = 0; i < weights.length; i++) {
      target -= weights[i] ?? 0;
      if (target < 0) {
        chosen = i;
        break;
      }
    }
    centroids.push(pointAt(points, chosen));
  }

  return centroids;
}

function runLloyd(
  points: FeatureMatrix,
  initial: Vector[],
  maxIterations: number,
  tolerance: number
): KMeansResult {
  let centroids = initial;
  let labels = points.map((point) => nearestCentroid(point, centroids).index);
  let iterations = 0;

  while (iterations < maxIterations) {
    iterations++;

    const width = pointAt(points, 0).length;
    const next = centroids.map((previous, cluster) => {
      const members = points.filter((_, i) => labels[i] === cluster);
      if (members.length === 0) return previous;
      return Array.from({ length: width }, (_, column) => mean(members.map((m) => m[column] ?? 0)));
    });

    const shift = next.reduce((sum, centroid, i) => sum + squaredEuclidean(centroid, centroids[i] ?? []), 0);
    centroids = next;
    const nextLabels = points.map((point) => nearestCentroid(point, centroids).index);
    const stable = nextLabels.every((label, i) => label === labels[i]);
    labels = nextLabels;

    if (stable || shift <= tolerance) break;
  }

  const inertia = points.reduce(
    (sum, point, i) => sum + squaredEuclidean(point, centroids[labels[i] ?? 0] ?? []),
    0
  );
  return { labels, centroids, inertia, iterations };
}

/**
 * Partition points into k clusters
 *
 * @throws ModelUnavailableError when there are fewer points than clusters
 */
export function kmeans(points: FeatureMatrix, options: KMeansOptions): KMeansResult {
  if (points.length === 0 || options.k > points.length) {
    throw new ModelUnavailableError(
      'KMEANS',
      `${points.length} items cannot form ${options.k} clusters`
    );
  }

  const random = createSeededRandom(options.seed);
  const tolerance = options.tolerance ?? 1e-8;

  let best: KMeansResult | null = null;
  for (let run = 0; run < options.initRuns; run++) {
    const candidate = runLloyd(
      points,
      seedCentroids(points, options.k, random),
      options.maxIterations,
      tolerance
    );
    if (best === null || candidate.inertia < best.inertia) {
      best = candidate;
    }
  }

  if (best === null) {
    throw new ModelUnavailableError('KMEANS', 'no initialisation run completed');
  }
  return best;
}

/**
 * Mean silhouette coefficient over clustered points (noise labels < 0 ignored)
 *
 * @returns null when the partition has fewer than 2 or more than n - 1 clusters
 */
export function silhouetteScore(points: FeatureMatrix, labels: readonly number[]): number | null {
  const members = points
    .map((point, index) => ({ point, index, label: labels[index] ?? -1 }))
    .filter((entry) => entry.label >= 0);
  const clusters = [...new Set(members.map((m) => m.label))];

  if (clusters.length < 2 || clusters.length > members.length - 1) {
    return null;
  }

  const coefficients = members.map(({ point, index, label }) => {
    const sameCluster = members.filter((m) => m.label === label && m.index !== index);
    if (sameCluster.length === 0) return 0;

    const a = mean(sameCluster.map((m) => euclideanDistance(point, m.point)));
    const b = Math.min(
      ...clusters
        .filter((other) => other !== label)
        .map((other) =>
          mean(
            members.filter((m) => m.label === other).map((m) => euclideanDistance(point, m.point))
          )
        )
    );
    const denominator = Math.max(a, b);
    return denominator === 0 ? 0 : (b - a) / denominator;
  });

  return mean(coefficients);
}
