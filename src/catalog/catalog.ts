/**
 * Catalog
 *
 * In-memory, immutable set of discovered agents and workflows for one
 * session. Entry order is stable (workflows, then agents, each sorted by
 * name) and is the tie-break order used by ranking.
 *
 * @module agent-orchestrator/catalog/catalog
 */

import type {
  AgentDescriptor,
  CatalogEntry,
  WorkflowDescriptor,
} from './types.js';
import { compareNames } from '../utils/text.js';

function byName<T extends { name: string }>(a: T, b: T): number {
  return compareNames(a.name, b.name);
}

/**
 * Freeze an agent descriptor and the collections it holds
 */
export function freezeAgent(agent: AgentDescriptor): AgentDescriptor {
  if (Object.isFrozen(agent)) {
    return agent;
  }
  return Object.freeze({
    ...agent,
    environmentVariables: Object.freeze({ ...agent.environmentVariables }),
    arguments: Object.freeze([...agent.arguments]),
    keywords: Object.freeze([...agent.keywords]),
  });
}

/**
 * Freeze a workflow descriptor, its steps and its output mappings
 */
export function freezeWorkflow(workflow: WorkflowDescriptor): WorkflowDescriptor {
  if (Object.isFrozen(workflow)) {
    return workflow;
  }
  const outputMappings: Record<string, readonly string[]> = {};
  for (const [step, placeholders] of Object.entries(workflow.outputMappings)) {
    outputMappings[step] = Object.freeze([...placeholders]);
  }
  return Object.freeze({
    ...workflow,
    steps: Object.freeze(workflow.steps.map(freezeAgent)),
    outputMappings: Object.freeze(outputMappings),
    keywords: Object.freeze([...workflow.keywords]),
  });
}

/**
 * Text used to embed and keyword-match a catalog entry
 *
 * @example
 * ```typescript
 * describeEntry(entry);
 * // 'Speech Translator. Translates lecture audio. Keywords: speech, audio. Category: Language'
 * ```
 */
export function describeEntry(entry: CatalogEntry): string {
  const { name, description, keywords, category } = entry.descriptor;
  const parts = [name];
  if (description) parts.push(description.replace(/\.+$/, ''));
  if (keywords.length > 0) parts.push(`Keywords: ${keywords.join(', ')}`);
  if (category) parts.push(`Category: ${category}`);
  return parts.join('. ');
}

export class Catalog {
  private readonly agents: readonly AgentDescriptor[];
  private readonly workflows: readonly WorkflowDescriptor[];
  private readonly ordered: readonly CatalogEntry[];
  private readonly byKey = new Map<string, CatalogEntry>();

  /**
   * @throws Error if two entries share a name
   */
  constructor(agents: readonly AgentDescriptor[], workflows: readonly WorkflowDescriptor[] = []) {
    this.agents = Object.freeze([...agents].sort(byName).map(freezeAgent));
    this.workflows = Object.freeze([...workflows].sort(byName).map(freezeWorkflow));

    const entries: CatalogEntry[] = [
      ...this.workflows.map((descriptor) => Object.freeze({ kind: 'workflow' as const, descriptor })),
      ...this.agents.map((descriptor) => Object.freeze({ kind: 'agent' as const, descriptor })),
    ];
    for (const entry of entries) {
      if (this.byKey.has(entry.descriptor.name)) {
        throw new Error(`Duplicate catalog entry '${entry.descriptor.name}'`);
      }
      this.byKey.set(entry.descriptor.name, entry);
    }
    this.ordered = Object.freeze(entries);
  }

  get size(): number {
    return this.ordered.length;
  }

  /** All entries in ranking tie-break order */
  entries(): readonly CatalogEntry[] {
    return this.ordered;
  }

  getAgents(): readonly AgentDescriptor[] {
    return this.agents;
  }

  getWorkflows(): readonly WorkflowDescriptor[] {
    return this.workflows;
  }

  /** Exact lookup by name */
  get(name: string): CatalogEntry | undefined {
    return this.byKey.get(name);
  }

  /** Exact lookup, then case-insensitive lookup on trimmed input */
  find(name: string): CatalogEntry | undefined {
    const exact = this.byKey.get(name);
    if (exact) {
      return exact;
    }
    const wanted = name.trim().toLowerCase();
    return this.ordered.find((entry) => entry.descriptor.name.toLowerCase() === wanted);
  }

  has(name: string): boolean {
    return this.byKey.has(name);
  }
}
