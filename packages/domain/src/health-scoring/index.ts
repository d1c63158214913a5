/**
 * @fileoverview New Item Health Scoring Module
 *
 * @module domain/health-scoring
 */

export {
  HealthScoringService,
  createHealthScoringService,
  resolveHealthScoringConfig,
  type HealthScoringServiceOptions,
  type HealthScoreBatchResult,
} from './health-scoring-service.js';
