/**
 * @fileoverview Demand Pattern Module
 *
 * @module domain/demand-pattern
 */

export {
  DemandPatternService,
  createDemandPatternService,
  parseMonthlySeries,
  classificationReason,
  PATTERN_RECOMMENDATIONS,
  type DemandPatternServiceOptions,
  type DemandPatternBatchResult,
} from './demand-pattern-service.js';
