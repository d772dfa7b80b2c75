/**
 * Orchestrator
 *
 * Entry point for callers: lists the catalog, ranks entries against
 * free-text intent and runs the selected agent or workflow. Holds only
 * references to its components.
 *
 * @module agent-orchestrator/orchestrator/orchestrator
 */

import type { Catalog } from '../catalog/catalog.js';
import type { CapabilityRegistry } from '../catalog/capabilities.js';
import type { CatalogEntry, ExecutionContext } from '../catalog/types.js';
import { DEFAULT_CONTEXT } from '../catalog/types.js';
import type { DiscoveryError } from '../discovery/errors.js';
import type { EmbeddingIndex } from '../embedding/embedding-index.js';
import { EmbeddingProviderError, VectorStoreError } from '../embedding/errors.js';
import type { ExecuteOptions, ExecutionResult, IExecutionEngine } from '../engine/types.js';
import { generateId } from '../process/utils.js';
import { RetryExhaustedError } from '../resilience/errors.js';
import { createLogger } from '../utils/logger.js';
import { CatalogEntryNotFoundError } from './errors.js';
import { rankByKeywords } from './keyword-matcher.js';

const log = createLogger('orchestrator');

export const DEFAULT_TOP_K = 3;

/**
 * How a ranking was produced
 *
 * - `semantic`: embedding similarity
 * - `keyword`: token overlap, used when semantic search failed or is not configured
 * - `catalog`: blank intent, entries in catalog order
 * - `explicit`: selected by name
 */
export type MatchStrategy = 'semantic' | 'keyword' | 'catalog' | 'explicit';

export interface RankedMatch {
  entry: CatalogEntry;
  score: number;
}

export interface SearchResult {
  strategy: Exclude<MatchStrategy, 'explicit'>;
  matches: RankedMatch[];
}

export interface SearchOptions {
  topK?: number;
  context?: ExecutionContext;
  signal?: AbortSignal;
}

/**
 * What to run: an entry name, or free text matched against the catalog
 */
export type Selection = { name: string } | { intent: string };

export interface Resolution {
  entry: CatalogEntry;
  strategy: MatchStrategy;
  score?: number;
}

export interface RunRequest {
  selection: Selection;
  options?: ExecuteOptions;
}

export type RunOutcome =
  | { status: 'fulfilled'; selection: Selection; invocationId: string; result: ExecutionResult }
  | { status: 'rejected'; selection: Selection; invocationId: string; error: unknown };

/** Something the orchestrator releases on close */
export interface Closeable {
  close(): Promise<void>;
}

export interface OrchestratorComponents {
  catalog: Catalog;
  engine: IExecutionEngine;
  /** Semantic ranking; keyword matching is used when absent */
  index?: EmbeddingIndex;
  capabilities?: CapabilityRegistry;
  context?: ExecutionContext;
  discoveryErrors?: readonly DiscoveryError[];
  /** Released after the engine shuts down, in order */
  resources?: readonly Closeable[];
}

function isSearchFailure(error: unknown): boolean {
  return (
    error instanceof EmbeddingProviderError ||
    error instanceof RetryExhaustedError ||
    error instanceof VectorStoreError
  );
}

function describeSelection(selection: Selection): string {
  return 'name' in selection ? selection.name : selection.intent;
}

/**
 * @example
 * ```typescript
 * const orchestrator = await createOrchestrator(loadConfig());
 *
 * const { strategy, matches } = await orchestrator.findRelevant('translate my lecture audio');
 * const result = await orchestrator.run({ name: matches[0].entry.descriptor.name });
 * ```
 */
export class Orchestrator {
  private readonly catalog: Catalog;
  private readonly engine: IExecutionEngine;
  private readonly index?: EmbeddingIndex;
  private readonly capabilities?: CapabilityRegistry;
  private readonly context: ExecutionContext;
  private readonly discoveryErrors: readonly DiscoveryError[];
  private readonly resources: readonly Closeable[];
  private closed = false;

  constructor(components: OrchestratorComponents) {
    this.catalog = components.catalog;
    this.engine = components.engine;
    this.index = components.index;
    this.capabilities = components.capabilities;
    this.context = components.context ?? DEFAULT_CONTEXT;
    this.discoveryErrors = components.discoveryErrors ?? [];
    this.resources = components.resources ?? [];
  }

  /**
   * Workflows, then agents, each sorted by name
   */
  listCatalog(): readonly CatalogEntry[] {
    return this.catalog.entries();
  }

  /** Manifests skipped when the catalog was loaded */
  getDiscoveryErrors(): readonly DiscoveryError[] {
    return this.discoveryErrors;
  }

  getEngine(): IExecutionEngine {
    return this.engine;
  }

  /**
   * Rank catalog entries against free-text intent
   *
   * Falls back to keyword matching when the embedding provider or the
   * vector store fails, and when semantic ranking comes back empty for a
   * non-empty catalog.
   */
  async findRelevant(intent: string, options: SearchOptions = {}): Promise<SearchResult> {
    const topK = options.topK ?? DEFAULT_TOP_K;
    const context = options.context ?? this.context;

    if (intent.trim().length === 0) {
      return {
        strategy: 'catalog',
        matches: this.catalog
          .entries()
          .slice(0, Math.max(0, topK))
          .map((entry) => ({ entry, score: 0 })),
      };
    }

    const query = await this.toCatalogLanguage(intent, context);

    if (this.index) {
      try {
        const ranked = await this.index.rank(query, topK, options.signal);
        const matches: RankedMatch[] = [];
        for (const { id, score } of ranked) {
          const entry = this.catalog.get(id);
          if (entry) matches.push({ entry, score });
        }
        if (matches.length > 0 || topK <= 0 || this.catalog.size === 0) {
          return { strategy: 'semantic', matches };
        }
        log.warn({ topK }, 'semantic search returned nothing, falling back to keyword matching');
      } catch (error) {
        if (!isSearchFailure(error)) {
          throw error;
        }
        log.warn({ err: error }, 'semantic search failed, falling back to keyword matching');
      }
    }

    return { strategy: 'keyword', matches: rankByKeywords(this.catalog, query, topK) };
  }

  /**
   * Turn a selection into a catalog entry
   *
   * @throws CatalogEntryNotFoundError for an unknown name or an intent
   *   nothing matches
   */
  async resolve(selection: Selection, options: Omit<SearchOptions, 'topK'> = {}): Promise<Resolution> {
    if ('name' in selection) {
      const entry = this.catalog.find(selection.name);
      if (!entry) {
        throw CatalogEntryNotFoundError.notFound(selection.name);
      }
      return { entry, strategy: 'explicit' };
    }

    const { strategy, matches } = await this.findRelevant(selection.intent, { ...options, topK: 1 });
    const best = matches[0];
    if (!best) {
      throw CatalogEntryNotFoundError.noMatch(selection.intent);
    }
    return { entry: best.entry, strategy, score: best.score };
  }

  /**
   * Resolve a selection and execute it
   */
  async run(selection: Selection, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    const context = options.context ?? this.context;
    const { entry, strategy } = await this.resolve(selection, { context, signal: options.signal });
    log.info(
      { target: entry.descriptor.name, kind: entry.kind, strategy },
      'running catalog entry',
    );

    const executeOptions: ExecuteOptions = { ...options, context };
    return entry.kind === 'workflow'
      ? this.engine.executeWorkflow(entry.descriptor, executeOptions)
      : this.engine.executeAgent(entry.descriptor, executeOptions);
  }

  /**
   * Run several selections concurrently and wait for all of them
   *
   * Every request gets an invocation id up front; one invocation failing
   * does not affect the others.
   */
  async runMany(requests: readonly RunRequest[]): Promise<RunOutcome[]> {
    const tracked = requests.map((request) => {
      const invocationId = request.options?.invocationId ?? generateId('run');
      return {
        selection: request.selection,
        invocationId,
        promise: this.run(request.selection, { ...request.options, invocationId }),
      };
    });

    const settled = await Promise.allSettled(tracked.map(({ promise }) => promise));

    return tracked.map(({ selection, invocationId }, index): RunOutcome => {
      const outcome = settled[index];
      if (outcome === undefined) {
        throw new Error(`Missing outcome for invocation ${invocationId}`);
      }
      if (outcome.status === 'fulfilled') {
        return { status: 'fulfilled', selection, invocationId, result: outcome.value };
      }
      log.warn({ selection: describeSelection(selection), err: outcome.reason }, 'invocation rejected');
      return { status: 'rejected', selection, invocationId, error: outcome.reason };
    });
  }

  /**
   * Translate a user-facing message into the context's target language.
   * Returns the text unchanged when no translator is registered or
   * translation fails.
   */
  async localize(text: string, context: ExecutionContext = this.context): Promise<string> {
    const translator = this.capabilities?.get('translator');
    if (!translator || context.targetLanguage === 'en' || text.trim().length === 0) {
      return text;
    }
    try {
      return await translator.translate(text, { targetLanguage: context.targetLanguage, sourceLanguage: 'en' });
    } catch (error) {
      log.warn({ err: error, targetLanguage: context.targetLanguage }, 'translation failed, using original text');
      return text;
    }
  }

  /**
   * Shut down the engine, then release every resource
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.engine.shutdown();
    for (const resource of this.resources) {
      await resource.close();
    }
  }

  /**
   * Catalog descriptions are English: an intent in another source
   * language goes through the translator first, when one is registered.
   */
  private async toCatalogLanguage(intent: string, context: ExecutionContext): Promise<string> {
    const translator = this.capabilities?.get('translator');
    if (!translator || !context.sourceLanguage || context.sourceLanguage === 'en') {
      return intent;
    }
    try {
      return await translator.translate(intent, { targetLanguage: 'en', sourceLanguage: context.sourceLanguage });
    } catch (error) {
      log.warn({ err: error }, 'could not translate intent, searching with the original text');
      return intent;
    }
  }
}
