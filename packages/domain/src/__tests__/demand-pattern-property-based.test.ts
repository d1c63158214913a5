import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';

import { createDemandPatternService } from '../demand-pattern/demand-pattern-service.js';
import { fixedClock } from './fixtures.js';

const service = createDemandPatternService({ clock: fixedClock });

const seriesArbitrary = fc.array(fc.integer({ min: 0, max: 1_000 }), {
  minLength: 12,
  maxLength: 12,
});

describe('Demand pattern properties', () => {
  it('should place the pattern in the quadrant given by ADI and CV²', () => {
    fc.assert(
      fc.property(seriesArbitrary, (series) => {
        const { adi, cvSquared, pattern } = service.classifyPattern(series);
        if (series.every((value) => value === 0)) {
          expect(pattern).toBe('LUMPY');
          return;
        }
        const regular = adi <= 1.32;
        const stable = cvSquared <= 0.49;
        const expected = regular ? (stable ? 'SMOOTH' : 'ERRATIC') : stable ? 'INTERMITTENT' : 'LUMPY';
        expect(pattern).toBe(expected);
      })
    );
  });

  it('should keep forecasts and reorder parameters non-negative and ordered', () => {
    fc.assert(
      fc.property(seriesArbitrary, (series) => {
        const result = service.analyze({ itemCode: 'PROP-1', monthlySales: series });
        expect(result.forecast.lower).toBeGreaterThanOrEqual(0);
        expect(result.forecast.lower).toBeLessThanOrEqual(result.forecast.value);
        expect(result.forecast.upper).toBeGreaterThanOrEqual(result.forecast.value);
        expect(result.reorder.safetyStock).toBeGreaterThanOrEqual(0);
        expect(result.reorder.reorderPoint).toBeGreaterThanOrEqual(result.reorder.safetyStock);
        expect(result.reorder.recommendedOrderQty).toBeGreaterThanOrEqual(result.reorder.economicOrderQty);
      })
    );
  });

  it('should count demand months through the ADI', () => {
    fc.assert(
      fc.property(seriesArbitrary, (series) => {
        const months = series.filter((value) => value > 0).length;
        const { adi } = service.classifyPattern(series);
        expect(adi).toBe(months === 0 ? 0 : 12 / months);
      })
    );
  });
});
