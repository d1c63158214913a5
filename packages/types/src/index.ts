/**
 * Invenlytics Types Package
 *
 * Zod schemas and inferred types for every input, output and configuration
 * record of the analytics engine.
 *
 * @module @invenlytics/types
 */

// =============================================================================
// Result helpers
// =============================================================================
export * from './lib/index.js';

// =============================================================================
// Schemas
// =============================================================================
export * from './schemas/index.js';
