/**
 * Vitest Setup File
 * Global test configuration
 */

// Quiet, deterministic environment for every test file
process.env.LOG_LEVEL = 'silent';
