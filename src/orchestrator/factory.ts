/**
 * Orchestrator Factory
 *
 * Builds the whole component graph from configuration: discovery,
 * embedding provider and store, index, process manager and engine.
 *
 * @module agent-orchestrator/orchestrator/factory
 */

import type { AppConfig } from '../config/index.js';
import { Catalog } from '../catalog/catalog.js';
import { CapabilityRegistry } from '../catalog/capabilities.js';
import type { ExecutionContext } from '../catalog/types.js';
import { CatalogDiscovery } from '../discovery/catalog-discovery.js';
import { EmbeddingIndex } from '../embedding/embedding-index.js';
import { KeywordEmbeddingProvider } from '../embedding/providers/keyword-provider.js';
import { OpenAIEmbeddingProvider } from '../embedding/providers/openai-provider.js';
import { InMemoryVectorStore } from '../embedding/stores/memory-store.js';
import { SqliteVectorStore } from '../embedding/stores/sqlite-store.js';
import type { EmbeddingProvider, VectorStore } from '../embedding/types.js';
import { WorkflowEngine } from '../engine/workflow-engine.js';
import type { IProcessManager } from '../process/manager.js';
import { SimpleProcessManager } from '../process/simple-manager.js';
import { createLogger } from '../utils/logger.js';
import { registerAgentCapabilities } from './agent-capabilities.js';
import { Orchestrator } from './orchestrator.js';

const log = createLogger('orchestrator');

/**
 * Replacements for components the factory would otherwise build
 */
export interface OrchestratorOverrides {
  processManager?: IProcessManager;
  provider?: EmbeddingProvider;
  store?: VectorStore;
  capabilities?: CapabilityRegistry;
  context?: ExecutionContext;
}

/**
 * Embedding provider selected by configuration
 */
export function createEmbeddingProvider(config: AppConfig): EmbeddingProvider {
  const retry = {
    maxRetries: config.retry.maxRetries,
    initialDelayMs: config.retry.initialDelayMs,
  };
  const { embedding } = config;
  switch (embedding.provider) {
    case 'openai':
      return OpenAIEmbeddingProvider.fromConnection(
        { kind: 'openai', apiKey: embedding.apiKey },
        { model: embedding.model, retry },
      );
    case 'azure':
      return OpenAIEmbeddingProvider.fromConnection(
        {
          kind: 'azure',
          endpoint: embedding.endpoint,
          apiKey: embedding.apiKey,
          apiVersion: embedding.apiVersion,
        },
        { model: embedding.model, retry },
      );
    case 'keyword':
      return new KeywordEmbeddingProvider();
  }
}

export function createVectorStore(config: AppConfig): VectorStore {
  return config.vectorStorePath
    ? new SqliteVectorStore(config.vectorStorePath)
    : new InMemoryVectorStore();
}

/**
 * Discover the catalog and wire every component
 *
 * @example
 * ```typescript
 * import 'dotenv/config';
 *
 * const orchestrator = await createOrchestrator(loadConfig());
 * try {
 *   const result = await orchestrator.run({ intent: 'summarize my lecture' });
 * } finally {
 *   await orchestrator.close();
 * }
 * ```
 */
export async function createOrchestrator(
  config: AppConfig,
  overrides: OrchestratorOverrides = {},
): Promise<Orchestrator> {
  const context: ExecutionContext = overrides.context ?? {
    targetLanguage: config.targetLanguage,
    sourceLanguage: config.sourceLanguage,
  };

  const discovery = new CatalogDiscovery({ rootDir: config.catalogRoot });
  const { agents, workflows, errors } = await discovery.discover(context);
  const catalog = new Catalog(agents, workflows);
  log.info(
    { agents: agents.length, workflows: workflows.length, errors: errors.length, root: config.catalogRoot },
    'catalog loaded',
  );

  const provider = overrides.provider ?? createEmbeddingProvider(config);
  const store = overrides.store ?? createVectorStore(config);
  const index = new EmbeddingIndex(provider, store, { catalog });

  const processManager = overrides.processManager ?? new SimpleProcessManager();
  const engine = new WorkflowEngine(processManager, {
    outputRoot: config.outputRoot,
    stepTimeoutMs: config.stepTimeoutMs,
    maxParallelSteps: config.maxParallelSteps,
    context,
  });

  return new Orchestrator({
    catalog,
    engine,
    index,
    capabilities: overrides.capabilities ?? registerAgentCapabilities(new CapabilityRegistry(), catalog, engine),
    context,
    discoveryErrors: errors,
    resources: [{ close: () => processManager.shutdown() }, store],
  });
}
