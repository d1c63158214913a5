/**
 * @fileoverview Type system helpers
 *
 * @module @invenlytics/types/lib
 */
export { Ok, Err, isOk, isErr, Result } from './result.js';
