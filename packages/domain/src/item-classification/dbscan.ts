/**
 * @fileoverview DBSCAN density clustering
 *
 * Points with at least `minSamples` neighbours within `eps` (the point itself
 * included) are core points. Clusters grow from core points in index order;
 * border points join the first cluster that reaches them. Everything else is
 * noise, labelled -1.
 *
 * @module domain/item-classification/dbscan
 */

import { euclideanDistance } from '../shared/statistics.js';
import type { FeatureMatrix } from './scaler.js';

export const NOISE_LABEL = -1;

export interface DbscanOptions {
  readonly eps: number;
  readonly minSamples: number;
}

export interface DbscanResult {
  /** Cluster index per point, or NOISE_LABEL */
  readonly labels: readonly number[];
  readonly clusterCount: number;
  readonly noiseCount: number;
}

function regionQuery(points: FeatureMatrix, index: number, eps: number): number[] {
  const origin = points[index];
  if (!origin) return [];
  const neighbours: number[] = [];
  points.forEach((point, candidate) => {
    if (euclideanDistance(origin, point) <= eps) {
      neighbours.push(candidate);
    }
  });
  return neighbours;
}

export function dbscan(points: FeatureMatrix, options: DbscanOptions): DbscanResult {
  const UNVISITED = -2;
  const labels: number[] = points.map(() => UNVISITED);
  const neighbourhoods = points.map((_, index) => regionQuery(points, index, options.eps));
  const isCore = neighbourhoods.map((neighbours) => neighbours.length >= options.minSamples);

  let clusterCount = 0;
  for (let index = 0; index < points.length; index++) {
    if (labels[index] !== UNVISITED) continue;
    if (!isCore[index]) {
      labels[index] = NOISE_LABEL;
      continue;
    }

    const cluster = clusterCount++;
    labels[index] = cluster;
    const queue = [...(neighbourhoods[index] ?? [])];
    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined) break;
      const label = labels[next];
      if (label === NOISE_LABEL) {
        // Border point previously marked as noise
        labels[next] = cluster;
        continue;
      }
      if (label !== UNVISITED) continue;
      labels[next] = cluster;
      if (isCore[next]) {
        queue.push(...(neighbourhoods[next] ?? []));
      }
    }
  }

  const noiseCount = labels.filter((label) => label === NOISE_LABEL).length;
  return { labels, clusterCount, noiseCount };
}
