/**
 * @fileoverview Shared Domain Utilities
 *
 * @module domain/shared
 */

export * from './statistics.js';
export * from './validation.js';
export * from './failures.js';
