/**
 * Discovery Layer
 *
 * @module agent-orchestrator/discovery
 */

export * from './errors.js';
export * from './manifest.js';
export * from './catalog-discovery.js';
