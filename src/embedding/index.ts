/**
 * Embedding Layer
 *
 * @module agent-orchestrator/embedding
 */

export * from './types.js';
export * from './errors.js';
export * from './similarity.js';
export * from './embedding-index.js';
export * from './providers/openai-provider.js';
export * from './providers/keyword-provider.js';
export * from './stores/memory-store.js';
export * from './stores/sqlite-store.js';
