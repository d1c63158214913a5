import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import type { NewItemMetrics } from '@invenlytics/types';

import { createHealthScoringService } from '../health-scoring/health-scoring-service.js';
import { fixedClock } from './fixtures.js';

/**
 * Property-Based Tests for New Item Health Scoring
 *
 * Key properties tested:
 * 1. Score bounds: always an integer in 0-100
 * 2. Status consistency: status follows the score bands
 * 3. Component bounds: every component stays in 0-100
 * 4. Monotonicity: selling more never lowers the score
 */

const scorer = createHealthScoringService({ clock: fixedClock });

const metricsArbitrary: fc.Arbitrary<NewItemMetrics & { actual_sales_qty: number }> = fc
  .record({
    item_code: fc.stringMatching(/^NEW-\d{3}$/),
    item_age_days: fc.integer({ min: 0, max: 365 }),
    actual_sales_qty: fc.integer({ min: 0, max: 10_000 }),
    target_sales_qty: fc.integer({ min: 0, max: 10_000 }),
    unique_customers: fc.integer({ min: 0, max: 500 }),
    repeat_ratio: fc.double({ min: 0, max: 1, noNaN: true }),
    current_stock: fc.integer({ min: 0, max: 10_000 }),
    avg_monthly_sales: fc.double({ min: 0, max: 5_000, noNaN: true }),
    sales_last_week: fc.integer({ min: 0, max: 2_000 }),
    sales_prior_week: fc.integer({ min: 0, max: 2_000 }),
  })
  .map(({ repeat_ratio, ...rest }) => ({
    ...rest,
    repeat_customers: Math.floor(rest.unique_customers * repeat_ratio),
  }));

describe('Health scoring properties', () => {
  it('should always produce an integer score between 0 and 100', () => {
    fc.assert(
      fc.property(metricsArbitrary, (metrics) => {
        const result = scorer.score(metrics);
        expect(Number.isInteger(result.healthScore)).toBe(true);
        expect(result.healthScore).toBeGreaterThanOrEqual(0);
        expect(result.healthScore).toBeLessThanOrEqual(100);
      })
    );
  });

  it('should derive the status from the score bands', () => {
    fc.assert(
      fc.property(metricsArbitrary, (metrics) => {
        const { healthScore, healthStatus } = scorer.score(metrics);
        const expected =
          healthScore <= 30
            ? 'CRITICAL'
            : healthScore <= 60
              ? 'AT_RISK'
              : healthScore < 80
                ? 'CAUTION'
                : 'HEALTHY';
        expect(healthStatus).toBe(expected);
      })
    );
  });

  it('should keep every component within 0-100', () => {
    fc.assert(
      fc.property(metricsArbitrary, (metrics) => {
        const { components } = scorer.score(metrics);
        for (const component of Object.values(components)) {
          expect(component.score).toBeGreaterThanOrEqual(0);
          expect(component.score).toBeLessThanOrEqual(100);
        }
      })
    );
  });

  it('should never lower the sales component when more is sold', () => {
    fc.assert(
      fc.property(metricsArbitrary, fc.integer({ min: 1, max: 5_000 }), (metrics, extra) => {
        const base = scorer.score(metrics).components.salesPerformance.score;
        const boosted = scorer.score({
          ...metrics,
          actual_sales_qty: metrics.actual_sales_qty + extra,
        }).components.salesPerformance.score;
        expect(boosted).toBeGreaterThanOrEqual(base);
      })
    );
  });

  it('should be deterministic', () => {
    fc.assert(
      fc.property(metricsArbitrary, (metrics) => {
        expect(scorer.score(metrics)).toEqual(scorer.score(metrics));
      })
    );
  });
});
