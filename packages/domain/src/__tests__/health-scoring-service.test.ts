import { describe, it, expect } from 'vitest';
import { ConfigurationError, ValidationError } from '@invenlytics/core';
import type { NewItemMetrics } from '@invenlytics/types';

import {
  createHealthScoringService,
  resolveHealthScoringConfig,
} from '../health-scoring/health-scoring-service.js';
import { fixedClock } from './fixtures.js';

function metrics(overrides: Partial<NewItemMetrics> = {}): NewItemMetrics {
  return {
    item_code: 'NEW-1',
    item_name: 'Launch Kit',
    item_age_days: 15,
    actual_sales_qty: 500,
    target_sales_qty: 400,
    unique_customers: 35,
    repeat_customers: 15,
    current_stock: 200,
    avg_monthly_sales: 150,
    sales_last_week: 60,
    sales_prior_week: 55,
    ...overrides,
  };
}

describe('HealthScoringService', () => {
  const scorer = createHealthScoringService({ clock: fixedClock });

  describe('score', () => {
    it('should score a healthy launch', () => {
      const result = scorer.score(metrics());

      expect(result.components).toEqual({
        salesPerformance: { score: 100, reason: 'Excellent: 125% of target (>120%)' },
        customerAcquisition: { score: 85, reason: 'Good: 35 unique customers' },
        stockAdequacy: { score: 100, reason: 'Optimal: 40 days of stock (7-60 day range)' },
        growthTrend: { score: 70, reason: 'Stable: 9.1% WoW growth (0-10%)' },
      });
      // 40 + 25.5 + 20 + 7 = 92.5, rounded half to even
      expect(result.healthScore).toBe(92);
      expect(result.healthStatus).toBe('HEALTHY');
      expect(result.lifeStage).toBe('LAUNCH');
      expect(result.recommendedAction).toBe('AGGRESSIVE_MARKETING');
      expect(result.actionPriority).toBe(7);
      expect(result.keyMetrics).toEqual([
        'Focus on customer acquisition',
        'Expected: 20-30% weekly growth',
      ]);
      expect(result.warningFlags).toEqual([]);
    });

    it('should report the derived metrics', () => {
      const result = scorer.score(metrics());

      expect(result.itemCode).toBe('NEW-1');
      expect(result.itemName).toBe('Launch Kit');
      expect(result.totalCustomers).toBe(35);
      expect(result.salesVsTargetPct).toBeCloseTo(125, 10);
      expect(result.repeatCustomersPct).toBeCloseTo(42.857, 3);
      expect(result.daysOfStock).toBeCloseTo(40, 10);
      expect(result.weekOverWeekGrowth).toBeCloseTo(0.0909, 4);
      expect(result.analyzedAt).toBe('2026-01-15T00:00:00.000Z');
      expect(Object.isFrozen(result)).toBe(true);
    });

    it('should escalate a failing item', () => {
      const result = scorer.score(
        metrics({
          item_age_days: 100,
          actual_sales_qty: 0,
          target_sales_qty: 100,
          unique_customers: 0,
          repeat_customers: 0,
          current_stock: 0,
          avg_monthly_sales: 10,
          sales_last_week: 0,
          sales_prior_week: 10,
        })
      );

      expect(result.components.salesPerformance).toEqual({
        score: 0,
        reason: 'Failing: 0% of target (<30%)',
      });
      expect(result.components.customerAcquisition).toEqual({
        score: 15,
        reason: 'Critical: 0 unique customers (<5)',
      });
      expect(result.components.stockAdequacy).toEqual({
        score: 30,
        reason: 'Low Stock: 0 days (<7 days) - stockout risk',
      });
      expect(result.components.growthTrend.score).toBe(5);
      expect(result.healthScore).toBe(11);
      expect(result.healthStatus).toBe('CRITICAL');
      expect(result.lifeStage).toBe('GRADUATION');
      expect(result.recommendedAction).toBe('OPTIMIZE_SUPPLY_CHAIN');
      expect(result.actionPriority).toBe(10);
      expect(result.keyMetrics).toEqual([
        'Optimize ordering and inventory',
        'Stabilize supply from suppliers',
      ]);
      expect(result.warningFlags).toEqual([
        'Health score <= 30 - item may fail',
        'Review launch strategy and market positioning',
        'Consider product adjustments or discontinuation',
      ]);
    });

    it('should keep the baseline action for established items', () => {
      const result = scorer.score(metrics({ item_age_days: 200 }));
      expect(result.lifeStage).toBe('ESTABLISHED');
      expect(result.recommendedAction).toBe('MAINTAIN');
      expect(result.actionPriority).toBe(2);
      expect(result.keyMetrics).toEqual([
        'Monitor for market changes',
        'Maintain competitive pricing',
      ]);
    });

    it('should score an item that only has an age and some sales', () => {
      const result = scorer.score({ item_code: 'P-1', item_age_days: 10, actual_sales_qty: 50 });

      expect(result.components).toEqual({
        salesPerformance: { score: 100, reason: 'Excellent: 5000% of target (>120%)' },
        customerAcquisition: { score: 15, reason: 'Critical: 0 unique customers (<5)' },
        stockAdequacy: { score: 30, reason: 'Low Stock: 0 days (<7 days) - stockout risk' },
        growthTrend: { score: 5, reason: 'Collapsing: -100.0% WoW growth (<-20%)' },
      });
      expect(result.healthScore).toBe(51);
      expect(result.healthStatus).toBe('AT_RISK');
      expect(result.recommendedAction).toBe('AGGRESSIVE_MARKETING');
      expect(result.actionPriority).toBe(8);
      expect(result.salesVsTargetPct).toBe(5000);
      expect(result.daysOfStock).toBe(0);
    });

    it('should steer learning items toward market expansion', () => {
      const result = scorer.score(metrics({ item_age_days: 60 }));
      expect(result.recommendedAction).toBe('MARKET_EXPANSION');
      expect(result.actionPriority).toBe(6);
    });

    it('should default a missing name to an empty string', () => {
      expect(scorer.score(metrics({ item_name: undefined })).itemName).toBe('');
    });

    it('should reject invalid metrics', () => {
      expect(() => scorer.score(metrics({ unique_customers: 1.5 }))).toThrow(ValidationError);
      expect(() => scorer.score(metrics({ current_stock: -1 }))).toThrow(
        'Invalid new item metrics: current_stock: Must not be negative'
      );
    });
  });

  describe('sales performance', () => {
    it.each([
      [480, 100],
      [400, 85],
      [380, 85],
      [300, 60],
      [200, 35],
      [120, 15],
      [100, 0],
    ])('should score %i sold against a target of 400 as %i', (actual, expected) => {
      expect(scorer.score(metrics({ actual_sales_qty: actual })).components.salesPerformance.score).toBe(
        expected
      );
    });

    it('should treat a zero target as a target of 1', () => {
      const result = scorer.score(metrics({ target_sales_qty: 0, actual_sales_qty: 2 }));
      expect(result.salesVsTargetPct).toBe(200);
    });
  });

  describe('customer acquisition', () => {
    it('should add a retention bonus above half repeat customers', () => {
      expect(
        scorer.score(metrics({ unique_customers: 20, repeat_customers: 12 })).components.customerAcquisition
      ).toEqual({
        score: 75,
        reason: 'Fair: 20 unique customers | 60% repeat customers (retention bonus)',
      });
    });

    it('should not add the bonus at exactly half', () => {
      expect(
        scorer.score(metrics({ unique_customers: 20, repeat_customers: 10 })).components.customerAcquisition
          .score
      ).toBe(60);
    });

    it('should cap the bonus at 100', () => {
      expect(
        scorer.score(metrics({ unique_customers: 60, repeat_customers: 40 })).components.customerAcquisition
      ).toEqual({
        score: 100,
        reason: 'Excellent: 60 unique customers (>50) | 67% repeat customers (retention bonus)',
      });
    });

    it('should score a handful of customers as poor', () => {
      expect(
        scorer.score(metrics({ unique_customers: 5, repeat_customers: 0 })).components.customerAcquisition
      ).toEqual({ score: 35, reason: 'Poor: 5 unique customers' });
    });
  });

  describe('stock adequacy', () => {
    it('should penalise thin stock in proportion to the shortfall', () => {
      const result = scorer.score(metrics({ current_stock: 5, avg_monthly_sales: 30 }));
      expect(result.components.stockAdequacy).toEqual({
        score: 43,
        reason: 'Low Stock: 5 days (<7 days) - stockout risk',
      });
    });

    it.each([
      [75, 75, 'Caution: 75 days of stock (60-90 day range)'],
      [120, 45, 'High Stock: 120 days (90-180 days) - high holding cost'],
      [200, 15, 'Excessive: 200 days (>180 days) - excess inventory risk'],
    ])('should score %i days of stock as %i', (days, expected, reason) => {
      const result = scorer.score(metrics({ current_stock: days, avg_monthly_sales: 30 }));
      expect(result.components.stockAdequacy).toEqual({ score: expected, reason });
    });

    it('should not divide by zero without monthly sales', () => {
      const result = scorer.score(metrics({ current_stock: 10, avg_monthly_sales: 0 }));
      expect(result.daysOfStock).toBeCloseTo(30000, 6);
      expect(result.components.stockAdequacy.score).toBe(15);
    });
  });

  describe('growth trend', () => {
    it.each([
      [115, 100, 85, 'Good: +15.0% WoW growth'],
      [95, 100, 45, 'Declining: -5.0% WoW growth (-10%-0%)'],
      [85, 100, 20, 'Steep Decline: -15.0% WoW growth'],
      [50, 100, 5, 'Collapsing: -50.0% WoW growth (<-20%)'],
    ])('should score %i after %i as %i', (last, prior, expected, reason) => {
      const result = scorer.score(metrics({ sales_last_week: last, sales_prior_week: prior }));
      expect(result.components.growthTrend).toEqual({ score: expected, reason });
    });

    it('should measure growth from a silent week against a baseline of 1', () => {
      const result = scorer.score(metrics({ sales_last_week: 3, sales_prior_week: 0 }));
      expect(result.weekOverWeekGrowth).toBe(3);
      expect(result.components.growthTrend).toEqual({
        score: 100,
        reason: 'Excellent: +300.0% WoW growth (>20%)',
      });
    });
  });

  describe('bands', () => {
    it.each([
      [0, 'CRITICAL'],
      [30, 'CRITICAL'],
      [31, 'AT_RISK'],
      [60, 'AT_RISK'],
      [61, 'CAUTION'],
      [79, 'CAUTION'],
      [80, 'HEALTHY'],
      [100, 'HEALTHY'],
    ])('should map score %i to %s', (score, status) => {
      expect(scorer.healthStatusOf(score)).toBe(status);
    });

    it.each([
      [0, 'LAUNCH'],
      [30, 'LAUNCH'],
      [31, 'LEARNING'],
      [90, 'LEARNING'],
      [91, 'GRADUATION'],
      [180, 'GRADUATION'],
      [181, 'ESTABLISHED'],
    ])('should place an item aged %i days in %s', (age, stage) => {
      expect(scorer.lifeStageOf(age)).toBe(stage);
    });
  });

  describe('scoreBatch', () => {
    it('should report bad items without stopping', () => {
      const batch = scorer.scoreBatch([
        metrics(),
        metrics({ item_code: 'BAD-1', repeat_customers: -1 }),
        metrics({ item_code: 'NEW-2', item_age_days: 200 }),
      ]);

      expect(batch.results.map((result) => result.itemCode)).toEqual(['NEW-1', 'NEW-2']);
      expect(batch.failures).toHaveLength(1);
      expect(batch.failures[0]).toMatchObject({ itemCode: 'BAD-1', code: 'VALIDATION_ERROR' });
    });

    it('should score items with missing counters instead of failing them', () => {
      const batch = scorer.scoreBatch([{ item_code: 'P-1', item_age_days: 10, actual_sales_qty: 50 }]);
      expect(batch.failures).toEqual([]);
      expect(batch.results.map((result) => result.healthScore)).toEqual([51]);
    });
  });

  describe('configuration', () => {
    it('should reject weights that do not sum to 1', () => {
      try {
        resolveHealthScoringConfig({ weightGrowthTrend: 0.2 });
        expect.unreachable('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        if (error instanceof ConfigurationError) {
          expect(error.message).toBe('Health score weights must sum to 1.0 (got 1.1000)');
          expect(error.key).toBe('weightSalesPerformance');
        }
      }
    });

    it('should accept rebalanced weights', () => {
      const config = resolveHealthScoringConfig({
        weightSalesPerformance: 0.25,
        weightCustomerAcquisition: 0.25,
        weightStockAdequacy: 0.25,
        weightGrowthTrend: 0.25,
      });
      expect(config.weightGrowthTrend).toBe(0.25);
    });

    it('should reject overlapping days-of-stock bands', () => {
      expect(() => resolveHealthScoringConfig({ dosOptimalMin: 70 })).toThrow(
        'Days-of-stock bands must be increasing'
      );
    });

    it('should reject overlapping status bands', () => {
      expect(() => resolveHealthScoringConfig({ atRiskMaxScore: 85 })).toThrow(
        'Health status bands must be increasing'
      );
    });

    it('should reject values outside their schema', () => {
      expect(() => createHealthScoringService({ config: { weightSalesPerformance: 2 } })).toThrow(
        ConfigurationError
      );
    });
  });
});
