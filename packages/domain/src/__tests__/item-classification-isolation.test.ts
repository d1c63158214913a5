import { describe, it, expect, vi, beforeEach } from 'vitest';

import type * as DbscanModule from '../item-classification/dbscan.js';
import type * as KMeansModule from '../item-classification/kmeans.js';
import type * as RulesModule from '../item-classification/rules.js';
import { dbscan } from '../item-classification/dbscan.js';
import { kmeans } from '../item-classification/kmeans.js';
import { applyRules } from '../item-classification/rules.js';
import { createItemClassificationService } from '../item-classification/item-classification-service.js';
import { fixedClock, tieredItems } from './fixtures.js';

vi.mock('../item-classification/rules.js', async (importOriginal) => {
  const actual = await importOriginal<typeof RulesModule>();
  return { ...actual, applyRules: vi.fn(actual.applyRules) };
});

vi.mock('../item-classification/kmeans.js', async (importOriginal) => {
  const actual = await importOriginal<typeof KMeansModule>();
  return { ...actual, kmeans: vi.fn(actual.kmeans) };
});

vi.mock('../item-classification/dbscan.js', async (importOriginal) => {
  const actual = await importOriginal<typeof DbscanModule>();
  return { ...actual, dbscan: vi.fn(actual.dbscan) };
});

const actualRules = await vi.importActual<typeof RulesModule>('../item-classification/rules.js');
const actualKMeans = await vi.importActual<typeof KMeansModule>('../item-classification/kmeans.js');
const actualDbscan = await vi.importActual<typeof DbscanModule>('../item-classification/dbscan.js');

const ALL_CODES = tieredItems().map((entry) => entry.item_code);

function failRulesFor(itemCode: string): void {
  vi.mocked(applyRules).mockImplementation((item, thresholds) => {
    if (item.itemCode === itemCode) {
      throw new Error('rule table unavailable');
    }
    return actualRules.applyRules(item, thresholds);
  });
}

describe('Item classification failure isolation', () => {
  const service = createItemClassificationService({ clock: fixedClock });

  beforeEach(() => {
    vi.mocked(applyRules).mockImplementation(actualRules.applyRules);
    vi.mocked(kmeans).mockImplementation(actualKMeans.kmeans);
    vi.mocked(dbscan).mockImplementation(actualDbscan.dbscan);
  });

  it.each(['rule_based', 'hybrid'])(
    'should exclude an item whose %s decision throws and classify the rest',
    (method) => {
      failRulesFor('MID-2');

      const batch = service.classify(tieredItems(), method);

      expect(batch.results.map((result) => result.itemCode)).toEqual(
        ALL_CODES.filter((code) => code !== 'MID-2')
      );
      expect(batch.failures).toEqual([
        { itemCode: 'MID-2', code: 'PER_ITEM_ERROR', message: 'Item MID-2: rule table unavailable' },
      ]);
      expect(batch.fallbackApplied).toBe(false);
    }
  );

  it('should report every item when k-means fails unexpectedly', () => {
    vi.mocked(kmeans).mockImplementation(() => {
      throw new Error('centroids diverged');
    });

    const batch = service.classify(tieredItems(), 'kmeans');

    expect(batch.results).toEqual([]);
    expect(batch.fallbackApplied).toBe(false);
    expect(batch.failures.map((failure) => failure.itemCode)).toEqual(ALL_CODES);
    expect(batch.failures[0]).toEqual({
      itemCode: 'FAST-1',
      code: 'PER_ITEM_ERROR',
      message: 'Item FAST-1: centroids diverged',
    });
  });

  it('should report every item when batch DBSCAN fails unexpectedly in the hybrid', () => {
    vi.mocked(dbscan).mockImplementation(() => {
      throw new Error('neighbourhood index corrupted');
    });
    const batchScope = createItemClassificationService({
      clock: fixedClock,
      config: { hybridDbscanScope: 'batch' },
    });

    const batch = batchScope.classify(tieredItems(), 'hybrid');

    expect(batch.results).toEqual([]);
    expect(batch.failures).toHaveLength(ALL_CODES.length);
    expect(batch.failures[8]?.message).toBe('Item SLOW-3: neighbourhood index corrupted');
  });

  it('should isolate a single-item DBSCAN vote that throws', () => {
    vi.mocked(dbscan).mockImplementation((points, options) => {
      if (points.length === 1) {
        throw new Error('neighbourhood index corrupted');
      }
      return actualDbscan.dbscan(points, options);
    });

    const batch = service.classify(tieredItems(), 'hybrid');

    // FAST items clear the rule confidence cutoff and never reach DBSCAN
    expect(batch.results.map((result) => result.itemCode)).toEqual(['FAST-1', 'FAST-2', 'FAST-3']);
    expect(batch.failures.map((failure) => failure.itemCode)).toEqual([
      'MID-1',
      'MID-2',
      'MID-3',
      'SLOW-1',
      'SLOW-2',
      'SLOW-3',
    ]);
  });
});
