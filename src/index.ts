/**
 * agent-orchestrator
 *
 * Discovers catalogs of external task agents and workflows, ranks them
 * against free-text intent and executes them as processes with
 * output-artifact propagation and retry-with-backoff.
 *
 * @module agent-orchestrator
 */

// Re-export all layers
export * from './catalog/index.js';
export * from './discovery/index.js';
export * from './resilience/index.js';
export * from './embedding/index.js';
export * from './process/index.js';
export * from './engine/index.js';
export * from './orchestrator/index.js';
export * from './config/index.js';

export { logger, createLogger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
