/**
 * Agent-backed Capabilities
 *
 * Adapters that fulfil a capability interface by running the catalog
 * agent whose manifest declares it. The input arrives as a placeholder
 * value (`{{text}}` for a translator, `{{image}}` for a text extractor,
 * also exported as `TEXT` / `IMAGE`), the requested languages as
 * `AGENT_TARGET_LANGUAGE` and `AGENT_SOURCE_LANGUAGE`. The agent answers
 * on stdout; `::output` directive lines are not part of the answer.
 *
 * @module agent-orchestrator/orchestrator/agent-capabilities
 */

import type { Catalog } from '../catalog/catalog.js';
import type { CapabilityRegistry, TextExtractor, Translator } from '../catalog/capabilities.js';
import type { AgentDescriptor, ExecutionContext } from '../catalog/types.js';
import { assertSucceeded, parseOutputDirective } from '../engine/workflow-engine.js';
import type { IExecutionEngine } from '../engine/types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('capabilities');

/**
 * Run an agent once and return what it printed on stdout
 *
 * @throws WorkflowAbortedError when the agent fails, times out or is cancelled
 */
export async function runForAnswer(
  engine: IExecutionEngine,
  agent: AgentDescriptor,
  inputs: Record<string, string>,
  context?: ExecutionContext,
): Promise<string> {
  const chunks: string[] = [];
  const result = await engine.executeAgent(agent, {
    inputs,
    context,
    onEvent: (event) => {
      if (event.type === 'step:output' && event.stream === 'stdout') {
        chunks.push(event.data);
      }
    },
  });
  assertSucceeded(result);

  return chunks
    .join('')
    .split('\n')
    .filter((line) => parseOutputDirective(line) === undefined)
    .join('\n')
    .trim();
}

export class AgentTranslator implements Translator {
  constructor(
    private readonly engine: IExecutionEngine,
    readonly agent: AgentDescriptor,
  ) {}

  async translate(text: string, context: ExecutionContext): Promise<string> {
    return runForAnswer(this.engine, this.agent, { text }, context);
  }
}

export class AgentTextExtractor implements TextExtractor {
  constructor(
    private readonly engine: IExecutionEngine,
    readonly agent: AgentDescriptor,
  ) {}

  async extractText(imagePath: string, context?: ExecutionContext): Promise<string> {
    return runForAnswer(this.engine, this.agent, { image: imagePath }, context);
  }
}

/**
 * Register an adapter for every agent that declares a capability.
 * The first agent in name order wins a key; later ones are logged and
 * left out.
 *
 * @returns The registry, for chaining
 */
export function registerAgentCapabilities(
  registry: CapabilityRegistry,
  catalog: Catalog,
  engine: IExecutionEngine,
): CapabilityRegistry {
  for (const agent of catalog.getAgents()) {
    const key = agent.capability;
    if (key === undefined) {
      continue;
    }
    if (registry.has(key)) {
      log.warn({ capability: key, agent: agent.name }, 'capability already provided, ignoring agent');
      continue;
    }
    switch (key) {
      case 'translator':
        registry.register(key, new AgentTranslator(engine, agent));
        break;
      case 'textExtractor':
        registry.register(key, new AgentTextExtractor(engine, agent));
        break;
    }
    log.debug({ capability: key, agent: agent.name }, 'capability registered');
  }
  return registry;
}
