/**
 * Catalog Model
 *
 * Descriptors for agents and workflows. Created once by discovery and
 * frozen for the rest of the session.
 *
 * @module agent-orchestrator/catalog/types
 */

/**
 * In-process services an agent can back, by key
 */
export const CAPABILITY_KEYS = ['translator', 'textExtractor'] as const;

export type CapabilityKey = (typeof CAPABILITY_KEYS)[number];

/**
 * An independently runnable external program performing one task
 */
export interface AgentDescriptor {
  /** Unique key across the whole catalog */
  readonly name: string;
  readonly description: string;
  /** Executable to launch (resolved through PATH when it has no slash) */
  readonly executablePath: string;
  /** Directory the process starts in */
  readonly workingDirectory: string;
  /** Variables layered over the base environment */
  readonly environmentVariables: Readonly<Record<string, string>>;
  /** Ordered arguments, may contain `{{placeholder}}` tokens */
  readonly arguments: readonly string[];
  /** De-duplicated search keywords */
  readonly keywords: readonly string[];
  readonly category: string;
  /** Capability this agent provides to the orchestrator itself */
  readonly capability?: CapabilityKey;
}

/**
 * Ordered composition of agents with declared output-to-input links
 */
export interface WorkflowDescriptor {
  /** Unique key across the whole catalog */
  readonly name: string;
  readonly description: string;
  /** Steps in declared order; step name = agent name */
  readonly steps: readonly AgentDescriptor[];
  /**
   * Producing step name -> placeholder names it satisfies for later steps
   */
  readonly outputMappings: Readonly<Record<string, readonly string[]>>;
  readonly keywords: readonly string[];
  readonly category: string;
}

/**
 * Anything the orchestrator can run
 */
export type CatalogEntry =
  | { readonly kind: 'agent'; readonly descriptor: AgentDescriptor }
  | { readonly kind: 'workflow'; readonly descriptor: WorkflowDescriptor };

export type CatalogEntryKind = CatalogEntry['kind'];

/**
 * Per-session values threaded explicitly through discovery, search and
 * execution. Never stored in module state, so concurrent sessions with
 * different languages cannot interfere.
 */
export interface ExecutionContext {
  /** Language agents should produce, e.g. 'en', 'es' */
  readonly targetLanguage: string;
  /** Language of the source material; empty string means auto-detect */
  readonly sourceLanguage: string;
}

export const DEFAULT_CONTEXT: ExecutionContext = Object.freeze({
  targetLanguage: 'en',
  sourceLanguage: '',
});
