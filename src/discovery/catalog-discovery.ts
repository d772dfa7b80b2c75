/**
 * Catalog Discovery
 *
 * Scans a catalog root for agent and workflow manifests:
 *
 * ```
 * <root>/agents/<dir>/agent.json
 * <root>/workflows/<name>.json
 * ```
 *
 * A broken manifest never aborts the scan. It is skipped, logged and
 * recorded as a {@link DiscoveryError}.
 *
 * @module agent-orchestrator/discovery/catalog-discovery
 */

import { readFile, readdir, stat } from 'fs/promises';
import * as path from 'path';
import type { AgentDescriptor, ExecutionContext, WorkflowDescriptor } from '../catalog/types.js';
import { DEFAULT_CONTEXT } from '../catalog/types.js';
import { freezeAgent, freezeWorkflow } from '../catalog/catalog.js';
import {
  collectPlaceholders,
  isBuiltinPlaceholder,
  renderEnvironment,
  renderTemplate,
} from '../engine/templates.js';
import { compareNames } from '../utils/text.js';
import { createLogger } from '../utils/logger.js';
import { DiscoveryError } from './errors.js';
import {
  agentManifestSchema,
  formatIssues,
  peekName,
  workflowManifestSchema,
  type WorkflowManifest,
} from './manifest.js';

const log = createLogger('discovery');

export const AGENT_MANIFEST_FILE = 'agent.json';
export const AGENTS_DIR = 'agents';
export const WORKFLOWS_DIR = 'workflows';

export interface CatalogDiscoveryOptions {
  /** Catalog root directory */
  rootDir: string;
}

export interface DiscoveryResult {
  agents: AgentDescriptor[];
  workflows: WorkflowDescriptor[];
  errors: DiscoveryError[];
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function directoryExists(dir: string): Promise<boolean> {
  try {
    return (await stat(dir)).isDirectory();
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Filesystem-backed catalog discovery
 *
 * @example
 * ```typescript
 * const discovery = new CatalogDiscovery({ rootDir: './catalog' });
 * const { agents, workflows, errors } = await discovery.discover({
 *   targetLanguage: 'es',
 *   sourceLanguage: '',
 * });
 * ```
 */
export class CatalogDiscovery {
  private lastErrors: DiscoveryError[] = [];

  constructor(private readonly options: CatalogDiscoveryOptions) {}

  get rootDir(): string {
    return this.options.rootDir;
  }

  /**
   * Discover every valid agent, sorted by name
   */
  async discoverAgents(context: ExecutionContext = DEFAULT_CONTEXT): Promise<AgentDescriptor[]> {
    const errors: DiscoveryError[] = [];
    const agents = await this.scanAgents(context, errors);
    this.lastErrors = errors;
    return agents;
  }

  /**
   * Discover every valid workflow, sorted by name
   *
   * @param agents - Agents to resolve step names against (scanned when omitted)
   */
  async discoverWorkflows(
    context: ExecutionContext = DEFAULT_CONTEXT,
    agents?: readonly AgentDescriptor[],
  ): Promise<WorkflowDescriptor[]> {
    const errors: DiscoveryError[] = [];
    const available = agents ?? (await this.scanAgents(context, errors));
    const workflows = await this.scanWorkflows(available, errors);
    this.lastErrors = errors;
    return workflows;
  }

  /**
   * Discover agents and workflows in one pass
   */
  async discover(context: ExecutionContext = DEFAULT_CONTEXT): Promise<DiscoveryResult> {
    const errors: DiscoveryError[] = [];
    const agents = await this.scanAgents(context, errors);
    const workflows = await this.scanWorkflows(agents, errors);
    this.lastErrors = errors;
    return { agents, workflows, errors: [...errors] };
  }

  /**
   * Errors recorded by the most recent discovery call
   */
  getErrors(): DiscoveryError[] {
    return [...this.lastErrors];
  }

  private async scanAgents(
    context: ExecutionContext,
    errors: DiscoveryError[],
  ): Promise<AgentDescriptor[]> {
    const agentsDir = path.join(this.options.rootDir, AGENTS_DIR);
    const dirs = await this.listEntries(agentsDir, 'directory', errors);

    const seen = new Map<string, string>();
    const agents: AgentDescriptor[] = [];

    for (const dir of dirs) {
      const manifestPath = path.join(agentsDir, dir, AGENT_MANIFEST_FILE);
      const agent = await this.loadAgent(manifestPath, context, errors);
      if (!agent) {
        continue;
      }

      const firstPath = seen.get(agent.name);
      if (firstPath !== undefined) {
        this.record(errors, DiscoveryError.duplicateName(manifestPath, agent.name, firstPath));
        continue;
      }
      seen.set(agent.name, manifestPath);
      agents.push(agent);
    }

    log.debug({ count: agents.length, root: this.options.rootDir }, 'agents discovered');
    return agents.sort((a, b) => compareNames(a.name, b.name));
  }

  private async loadAgent(
    manifestPath: string,
    context: ExecutionContext,
    errors: DiscoveryError[],
  ): Promise<AgentDescriptor | undefined> {
    const raw = await this.readJson(manifestPath, errors, { optional: true });
    if (raw === undefined) {
      return undefined;
    }

    const parsed = agentManifestSchema.safeParse(raw);
    if (!parsed.success) {
      this.record(
        errors,
        DiscoveryError.invalidManifest(manifestPath, formatIssues(parsed.error), peekName(raw), parsed.error),
      );
      return undefined;
    }

    const manifest = parsed.data;
    const manifestDir = path.dirname(manifestPath);
    const workingDirectory = path.resolve(manifestDir, manifest.workingDirectory ?? '.');
    if (!(await directoryExists(workingDirectory))) {
      log.warn(
        { agent: manifest.name, workingDirectory },
        'working directory does not exist; the agent will fail when run',
      );
    }

    // Bare command names are left for PATH lookup
    const executablePath =
      manifest.executablePath.includes('/') && !path.isAbsolute(manifest.executablePath)
        ? path.resolve(manifestDir, manifest.executablePath)
        : manifest.executablePath;

    const languages = {
      targetLanguage: context.targetLanguage,
      sourceLanguage: context.sourceLanguage,
    };

    return freezeAgent({
      name: manifest.name,
      description: manifest.description,
      executablePath,
      workingDirectory,
      environmentVariables: renderEnvironment(manifest.environment, languages),
      arguments: manifest.arguments.map((arg) => renderTemplate(arg, languages)),
      keywords: manifest.keywords,
      category: manifest.category,
      ...(manifest.capability ? { capability: manifest.capability } : {}),
    });
  }

  private async scanWorkflows(
    agents: readonly AgentDescriptor[],
    errors: DiscoveryError[],
  ): Promise<WorkflowDescriptor[]> {
    const workflowsDir = path.join(this.options.rootDir, WORKFLOWS_DIR);
    const files = (await this.listEntries(workflowsDir, 'file', errors)).filter((file) =>
      file.endsWith('.json'),
    );

    const agentsByName = new Map(agents.map((agent) => [agent.name, agent]));
    const seen = new Map<string, string>();
    const workflows: WorkflowDescriptor[] = [];

    for (const file of files) {
      const manifestPath = path.join(workflowsDir, file);
      const raw = await this.readJson(manifestPath, errors, { optional: false });
      if (raw === undefined) {
        continue;
      }

      const parsed = workflowManifestSchema.safeParse(raw);
      if (!parsed.success) {
        this.record(
          errors,
          DiscoveryError.invalidManifest(manifestPath, formatIssues(parsed.error), peekName(raw), parsed.error),
        );
        continue;
      }

      const manifest = parsed.data;
      if (agentsByName.has(manifest.name)) {
        this.record(errors, DiscoveryError.duplicateName(manifestPath, manifest.name, 'the agent catalog'));
        continue;
      }
      const firstPath = seen.get(manifest.name);
      if (firstPath !== undefined) {
        this.record(errors, DiscoveryError.duplicateName(manifestPath, manifest.name, firstPath));
        continue;
      }

      const workflow = this.resolveWorkflow(manifestPath, manifest, agentsByName, errors);
      if (!workflow) {
        continue;
      }
      seen.set(manifest.name, manifestPath);
      workflows.push(workflow);
    }

    log.debug({ count: workflows.length, root: this.options.rootDir }, 'workflows discovered');
    return workflows.sort((a, b) => compareNames(a.name, b.name));
  }

  /**
   * Resolve step names and check that every placeholder a step uses is
   * built in or produced by that step or an earlier one.
   */
  private resolveWorkflow(
    manifestPath: string,
    manifest: WorkflowManifest,
    agentsByName: ReadonlyMap<string, AgentDescriptor>,
    errors: DiscoveryError[],
  ): WorkflowDescriptor | undefined {
    const steps: AgentDescriptor[] = [];
    for (const stepName of manifest.steps) {
      const agent = agentsByName.get(stepName);
      if (!agent) {
        this.record(errors, DiscoveryError.unknownAgent(manifestPath, manifest.name, stepName));
        return undefined;
      }
      if (steps.includes(agent)) {
        this.record(
          errors,
          DiscoveryError.invalidWorkflow(manifestPath, manifest.name, `step '${stepName}' appears more than once`),
        );
        return undefined;
      }
      steps.push(agent);
    }

    const producers = new Map<string, string>();
    for (const [stepName, placeholders] of Object.entries(manifest.outputMappings)) {
      if (!manifest.steps.includes(stepName)) {
        this.record(
          errors,
          DiscoveryError.invalidWorkflow(manifestPath, manifest.name, `output mapping for unknown step '${stepName}'`),
        );
        return undefined;
      }
      for (const placeholder of placeholders) {
        if (isBuiltinPlaceholder(placeholder)) {
          this.record(
            errors,
            DiscoveryError.invalidWorkflow(
              manifestPath,
              manifest.name,
              `'${placeholder}' is a built-in placeholder and cannot be mapped`,
            ),
          );
          return undefined;
        }
        const existing = producers.get(placeholder);
        if (existing !== undefined && existing !== stepName) {
          this.record(
            errors,
            DiscoveryError.invalidWorkflow(
              manifestPath,
              manifest.name,
              `'${placeholder}' is produced by both '${existing}' and '${stepName}'`,
            ),
          );
          return undefined;
        }
        producers.set(placeholder, stepName);
      }
    }

    const available = new Set<string>();
    for (const step of steps) {
      for (const placeholder of manifest.outputMappings[step.name] ?? []) {
        available.add(placeholder);
      }
      const unresolved = collectPlaceholders(step.arguments, step.environmentVariables).filter(
        (name) => !isBuiltinPlaceholder(name) && !available.has(name),
      );
      if (unresolved.length > 0) {
        this.record(
          errors,
          DiscoveryError.unresolvedPlaceholder(manifestPath, manifest.name, step.name, unresolved),
        );
        return undefined;
      }
    }

    return freezeWorkflow({
      name: manifest.name,
      description: manifest.description,
      steps,
      outputMappings: manifest.outputMappings,
      keywords: manifest.keywords,
      category: manifest.category,
    });
  }

  /**
   * Sorted names of the subdirectories or files in `dir`. A missing
   * directory is an empty catalog section.
   */
  private async listEntries(
    dir: string,
    kind: 'directory' | 'file',
    errors: DiscoveryError[],
  ): Promise<string[]> {
    try {
      const entries = await readdir(dir, { withFileTypes: true });
      return entries
        .filter((entry) => (kind === 'directory' ? entry.isDirectory() : entry.isFile()))
        .map((entry) => entry.name)
        .sort(compareNames);
    } catch (error) {
      if (isNotFound(error)) {
        log.warn({ dir }, 'catalog directory not found');
        return [];
      }
      this.record(errors, DiscoveryError.unreadable(dir, error));
      return [];
    }
  }

  /**
   * Read and parse a JSON manifest. Records an error and returns
   * undefined when the file cannot be read or parsed.
   *
   * @param optional - A missing file is skipped without recording an error
   */
  private async readJson(
    file: string,
    errors: DiscoveryError[],
    { optional }: { optional: boolean },
  ): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(file, 'utf8');
    } catch (error) {
      if (optional && isNotFound(error)) {
        log.debug({ file }, 'no manifest, skipping directory');
        return undefined;
      }
      this.record(errors, DiscoveryError.unreadable(file, error));
      return undefined;
    }

    try {
      const value: unknown = JSON.parse(text);
      return value;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.record(errors, DiscoveryError.invalidManifest(file, `malformed JSON (${reason})`, undefined, error));
      return undefined;
    }
  }

  private record(errors: DiscoveryError[], error: DiscoveryError): void {
    log.warn({ path: error.path, code: error.code, entry: error.entryName }, error.message);
    errors.push(error);
  }
}
