/**
 * Catalog Model
 *
 * @module agent-orchestrator/catalog
 */

export * from './types.js';
export * from './catalog.js';
export * from './capabilities.js';
