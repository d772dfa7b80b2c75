/**
 * Resilience Layer
 *
 * Retry-with-backoff for unreliable external services.
 *
 * @module agent-orchestrator/resilience
 */

export * from './types.js';
export * from './errors.js';
export * from './predicates.js';
export * from './retry.js';
