/**
 * @fileoverview Type exports.
 *
 * @module stepgraph/types
 */

export * from './core.types.js';
export * from './errors.js';
export * from './module.types.js';
