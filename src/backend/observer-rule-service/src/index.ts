/**
 * Observer Rule Service
 *
 * Filters the geo objects of a map for read-only observers according to
 * each observer's rule configuration.
 */

export const VERSION = '1.0.0';

export * from './config.js';
export * from './errors.js';

// Rule contracts and built-in rules
export * from './rules/index.js';

// Configuration validation
export * from './validation/schema-helpers.js';
export * from './validation/config-validator.js';

// Rule lookup and unit construction
export * from './registry/rule-registry.js';

// Evaluation pipeline
export * from './engine/observer-rule-engine.js';
