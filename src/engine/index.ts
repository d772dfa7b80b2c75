/**
 * Execution Engine Layer
 *
 * Runs workflows and single agents as external processes with
 * placeholder propagation, fail-fast and cancellation.
 *
 * @module agent-orchestrator/engine
 */

export * from './types.js';
export * from './errors.js';
export * from './templates.js';
export * from './planner.js';
export * from './workflow-engine.js';
