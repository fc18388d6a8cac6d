/**
 * Temporal independence engine.
 * Filtering, canonical ordering, classification, event assignment and counts.
 */

export * from './exclusion.js';
export * from './canonical.js';
export * from './classifier.js';
export * from './events.js';
export * from './aggregate.js';
export * from './pipeline.js';
