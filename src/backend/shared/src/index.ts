/**
 * Mapwatch Shared Package
 *
 * Models, collaborator contracts and observability utilities shared by the
 * observer rule service.
 */

// Rule configuration values
export * from './models/rule-config.js';

// Geo object and observer models
export * from './models/geo-object.js';

// Query collaborator
export * from './query/geo-object-query.js';

// Persistence collaborator
export * from './persistence/observer-persistence.js';

// Logging
export * from './logging/logger.js';

// Metrics
export * from './metrics/metrics-collector.js';
