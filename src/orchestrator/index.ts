/**
 * Orchestrator Layer
 *
 * @module agent-orchestrator/orchestrator
 */

export * from './errors.js';
export * from './keyword-matcher.js';
export * from './orchestrator.js';
export * from './factory.js';
export * from './agent-capabilities.js';
