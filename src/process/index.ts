/**
 * Process Layer
 *
 * Spawning and tracking of external agent programs.
 *
 * @module agent-orchestrator/process
 */

export * from './types.js';
export * from './manager.js';
export * from './simple-manager.js';
export * from './utils.js';
