/**
 * Workflow Engine
 *
 * Executes workflows as sequences of external processes through an
 * {@link IProcessManager}. Each invocation gets its own output directory,
 * so concurrent invocations never share files.
 *
 * @module agent-orchestrator/engine/workflow-engine
 */

import { access, mkdir } from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { AgentDescriptor, CatalogEntryKind, ExecutionContext, WorkflowDescriptor } from '../catalog/types.js';
import { DEFAULT_CONTEXT } from '../catalog/types.js';
import type { IProcessManager } from '../process/manager.js';
import type { ProcessExit } from '../process/types.js';
import { formatDuration, formatProcessError, generateId, tailLines, toEnvName } from '../process/utils.js';
import { slugify } from '../utils/text.js';
import { createLogger } from '../utils/logger.js';
import { StepFailureError, WorkflowAbortedError } from './errors.js';
import { findUnresolvedPlaceholders, groupStages, planWorkflow, type StepPlan } from './planner.js';
import { isBuiltinPlaceholder, renderEnvironment, renderTemplate } from './templates.js';
import type {
  EngineEvent,
  EngineEventHandler,
  EngineOptions,
  ExecuteOptions,
  ExecutionResult,
  ExecutionStatus,
  FailedStep,
  IExecutionEngine,
  StepOutcome,
} from './types.js';

const log = createLogger('engine');

export const DEFAULT_STEP_TIMEOUT_MS = 30 * 60 * 1000;
export const DEFAULT_OUTPUT_ROOT = path.join(os.tmpdir(), 'agent-orchestrator');
const DEFAULT_STDERR_TAIL_LINES = 20;
/** stderr bytes kept per step for diagnostics */
const STDERR_BUFFER_LIMIT = 64 * 1024;

const OUTPUT_DIRECTIVE = /^::output\s+([A-Za-z_][\w.-]*)=(.*)$/;

/**
 * Parse a `::output name=value` line printed by an agent
 */
export function parseOutputDirective(line: string): { name: string; value: string } | undefined {
  const match = OUTPUT_DIRECTIVE.exec(line.trim());
  if (!match || match[1] === undefined || match[2] === undefined) {
    return undefined;
  }
  return { name: match[1], value: match[2].trim() };
}

/**
 * Engine-provided environment variables of a step
 */
export function engineVariables(
  context: ExecutionContext,
  outputDir: string,
  stepOutputDir: string,
  invocationId: string,
): Record<string, string> {
  return {
    AGENT_OUTPUT_DIR: outputDir,
    AGENT_STEP_OUTPUT_DIR: stepOutputDir,
    AGENT_INVOCATION_ID: invocationId,
    AGENT_TARGET_LANGUAGE: context.targetLanguage,
    AGENT_SOURCE_LANGUAGE: context.sourceLanguage,
  };
}

/**
 * Throw the result's error unless the invocation succeeded
 *
 * Lets callers compose whole-invocation retries:
 *
 * @example
 * ```typescript
 * await executeWithRetry(
 *   async () => assertSucceeded(await engine.executeWorkflow(workflow)),
 *   { retryPredicate: (error) => error instanceof WorkflowAbortedError },
 * );
 * ```
 */
export function assertSucceeded(result: ExecutionResult): ExecutionResult {
  if (result.error) {
    throw result.error;
  }
  return result;
}

/** A step with a live process */
interface RunningStep {
  invocation: Invocation;
  plan: StepPlan;
  outcome: StepOutcome;
  processId: string;
  stdoutRemainder: string;
  stderr: string;
  directives: Map<string, string>;
  killReason?: 'timeout' | 'cancelled';
}

/** Mutable state of one invocation */
interface Invocation {
  id: string;
  workflow: WorkflowDescriptor;
  kind: CatalogEntryKind;
  context: ExecutionContext;
  outputDir: string;
  baseEnv: Record<string, string>;
  values: Record<string, string>;
  stepTimeoutMs: number;
  maxParallelSteps: number;
  controller: AbortController;
  outcomes: StepOutcome[];
  running: Set<RunningStep>;
  failure?: FailedStep;
  onEvent?: EngineEventHandler;
}

function toEnvRecord(env: NodeJS.ProcessEnv): Record<string, string> {
  const record: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      record[key] = value;
    }
  }
  return record;
}

async function pathExists(file: string): Promise<boolean> {
  try {
    await access(file);
    return true;
  } catch {
    return false;
  }
}

/**
 * @example
 * ```typescript
 * const engine = new WorkflowEngine(new SimpleProcessManager(), {
 *   outputRoot: './runs',
 *   stepTimeoutMs: 10 * 60 * 1000,
 * });
 * engine.onEvent((event) => console.log(event.type));
 *
 * const result = await engine.executeWorkflow(workflow, { signal: controller.signal });
 * if (result.status !== 'succeeded') {
 *   console.error(result.failedStep?.diagnostic);
 * }
 * ```
 */
export class WorkflowEngine implements IExecutionEngine {
  private readonly handlers = new Set<EngineEventHandler>();
  private readonly runningByProcess = new Map<string, RunningStep>();
  private readonly active = new Map<string, { invocation: Invocation; done: Promise<ExecutionResult> }>();
  private readonly unsubscribeOutput: () => void;
  private readonly options: Required<EngineOptions>;

  constructor(
    private readonly processManager: IProcessManager,
    options: EngineOptions = {},
  ) {
    this.options = {
      outputRoot: options.outputRoot ?? DEFAULT_OUTPUT_ROOT,
      stepTimeoutMs: options.stepTimeoutMs ?? DEFAULT_STEP_TIMEOUT_MS,
      maxParallelSteps: options.maxParallelSteps ?? 1,
      context: options.context ?? DEFAULT_CONTEXT,
      stderrTailLines: options.stderrTailLines ?? DEFAULT_STDERR_TAIL_LINES,
    };
    this.unsubscribeOutput = this.processManager.onOutput((processId, data, type) =>
      this.handleOutput(processId, data, type),
    );
  }

  async executeWorkflow(
    workflow: WorkflowDescriptor,
    options: ExecuteOptions = {},
  ): Promise<ExecutionResult> {
    return this.start(workflow, 'workflow', options);
  }

  async executeAgent(agent: AgentDescriptor, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    const workflow: WorkflowDescriptor = {
      name: agent.name,
      description: agent.description,
      steps: [agent],
      outputMappings: {},
      keywords: agent.keywords,
      category: agent.category,
    };
    return this.start(workflow, 'agent', options);
  }

  onEvent(handler: EngineEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  getActiveInvocations(): string[] {
    return Array.from(this.active.keys());
  }

  async shutdown(): Promise<void> {
    const pending = Array.from(this.active.values());
    for (const { invocation } of pending) {
      invocation.controller.abort(new Error('Engine shutting down'));
    }
    await Promise.allSettled(pending.map(({ done }) => done));
    this.unsubscribeOutput();
    this.handlers.clear();
  }

  private start(
    workflow: WorkflowDescriptor,
    kind: CatalogEntryKind,
    options: ExecuteOptions,
  ): Promise<ExecutionResult> {
    const invocationId = options.invocationId ?? generateId('run');
    if (this.active.has(invocationId)) {
      return Promise.reject(new Error(`Invocation ${invocationId} is already running`));
    }

    const context = options.context ?? this.options.context;
    const outputRoot = options.outputRoot ?? this.options.outputRoot;
    const outputDir = path.resolve(outputRoot, `${slugify(workflow.name)}-${invocationId}`);

    const values: Record<string, string> = {};
    for (const placeholders of Object.values(workflow.outputMappings)) {
      for (const placeholder of placeholders) {
        values[placeholder] = path.join(outputDir, placeholder);
      }
    }
    Object.assign(values, options.inputs ?? {}, {
      targetLanguage: context.targetLanguage,
      sourceLanguage: context.sourceLanguage,
      outputDir,
      invocationId,
    });

    const plans = planWorkflow(workflow);
    const invocation: Invocation = {
      id: invocationId,
      workflow,
      kind,
      context,
      outputDir,
      baseEnv: toEnvRecord(options.env ?? process.env),
      values,
      stepTimeoutMs: options.stepTimeoutMs ?? this.options.stepTimeoutMs,
      maxParallelSteps: Math.max(1, Math.floor(options.maxParallelSteps ?? this.options.maxParallelSteps)),
      controller: new AbortController(),
      outcomes: plans.map((plan) => ({
        position: plan.position,
        name: plan.agent.name,
        stage: plan.stage,
        status: 'pending',
        stepOutputDir: path.join(
          outputDir,
          `${String(plan.position).padStart(2, '0')}-${slugify(plan.agent.name)}`,
        ),
        exitCode: null,
        signal: null,
        artifacts: [],
      })),
      running: new Set(),
      onEvent: options.onEvent,
    };

    const external = options.signal;
    const forwardAbort = (): void => invocation.controller.abort(external?.reason);
    if (external?.aborted) {
      forwardAbort();
    } else {
      external?.addEventListener('abort', forwardAbort, { once: true });
    }

    const done = this.run(invocation, plans).finally(() => {
      external?.removeEventListener('abort', forwardAbort);
      this.active.delete(invocationId);
    });
    this.active.set(invocationId, { invocation, done });
    return done;
  }

  private async run(invocation: Invocation, plans: StepPlan[]): Promise<ExecutionResult> {
    const startedAt = new Date();
    const { workflow } = invocation;
    const signal = invocation.controller.signal;

    const onAbort = (): void => {
      log.info({ invocationId: invocation.id, workflow: workflow.name }, 'invocation cancelled');
      this.killRunning(invocation, 'cancelled');
    };
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      await mkdir(invocation.outputDir, { recursive: true });

      this.emit(invocation, {
        type: 'workflow:started',
        invocationId: invocation.id,
        target: workflow.name,
        kind: invocation.kind,
        outputDir: invocation.outputDir,
        stepCount: plans.length,
      });
      log.info(
        { invocationId: invocation.id, target: workflow.name, steps: plans.length },
        'invocation started',
      );

      for (const stage of groupStages(plans)) {
        if (this.shouldStop(invocation)) {
          break;
        }
        await this.runStage(invocation, stage);
      }
    } finally {
      signal.removeEventListener('abort', onAbort);
    }

    for (const outcome of invocation.outcomes) {
      if (outcome.status === 'pending') {
        outcome.status = 'skipped';
      }
    }

    const completedAt = new Date();
    const status: ExecutionStatus = invocation.failure
      ? 'failed'
      : signal.aborted
        ? 'cancelled'
        : 'succeeded';

    const result: ExecutionResult = {
      target: workflow.name,
      kind: invocation.kind,
      invocationId: invocation.id,
      status,
      steps: invocation.outcomes,
      artifacts: invocation.outcomes.flatMap((outcome) => outcome.artifacts),
      failedStep: invocation.failure,
      error: invocation.failure
        ? WorkflowAbortedError.stepFailed(workflow.name, invocation.failure.cause)
        : status === 'cancelled'
          ? WorkflowAbortedError.cancelled(workflow.name)
          : undefined,
      outputDir: invocation.outputDir,
      startedAt,
      completedAt,
      durationMs: completedAt.getTime() - startedAt.getTime(),
    };

    log.info(
      {
        invocationId: invocation.id,
        target: workflow.name,
        status,
        duration: formatDuration(result.durationMs),
        failedStep: result.failedStep?.position,
      },
      'invocation finished',
    );
    this.emit(invocation, { type: 'workflow:completed', invocationId: invocation.id, result });
    return result;
  }

  /**
   * Run the steps of one stage, at most `maxParallelSteps` at a time,
   * in declared order
   */
  private async runStage(invocation: Invocation, stage: StepPlan[]): Promise<void> {
    const queue = [...stage];
    const worker = async (): Promise<void> => {
      for (let plan = queue.shift(); plan; plan = queue.shift()) {
        if (this.shouldStop(invocation)) {
          return;
        }
        await this.runStep(invocation, plan);
      }
    };
    const workers = Math.min(invocation.maxParallelSteps, stage.length);
    await Promise.all(Array.from({ length: workers }, () => worker()));
  }

  private async runStep(invocation: Invocation, plan: StepPlan): Promise<void> {
    const outcome = this.outcomeOf(invocation, plan);
    const { agent } = plan;
    const values = { ...invocation.values, stepOutputDir: outcome.stepOutputDir };

    outcome.status = 'running';
    outcome.startedAt = new Date();

    const unresolved = findUnresolvedPlaceholders(agent, values);
    if (unresolved.length > 0) {
      const list = unresolved.map((name) => `{{${name}}}`).join(', ');
      this.failStep(invocation, plan, outcome, 'failed', `Unresolved placeholders: ${list}`, {
        exitCode: null,
        signal: null,
        duration: 0,
      });
      return;
    }

    const env: Record<string, string> = {
      ...invocation.baseEnv,
      ...renderEnvironment(agent.environmentVariables, values),
    };
    for (const [name, value] of Object.entries(values)) {
      if (!isBuiltinPlaceholder(name)) {
        env[toEnvName(name)] = value;
      }
    }
    Object.assign(
      env,
      engineVariables(invocation.context, invocation.outputDir, outcome.stepOutputDir, invocation.id),
    );

    let processId: string;
    let pid: number | undefined;
    try {
      await mkdir(outcome.stepOutputDir, { recursive: true });
      const managed = await this.processManager.acquireProcess({
        executablePath: agent.executablePath,
        args: agent.arguments.map((arg) => renderTemplate(arg, values)),
        workDir: agent.workingDirectory,
        env,
      });
      processId = managed.id;
      pid = managed.pid;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.failStep(
        invocation,
        plan,
        outcome,
        'failed',
        `Failed to start: ${reason}`,
        { exitCode: null, signal: null, duration: 0 },
        { cause: error },
      );
      return;
    }

    const running: RunningStep = {
      invocation,
      plan,
      outcome,
      processId,
      stdoutRemainder: '',
      stderr: '',
      directives: new Map(),
    };
    this.runningByProcess.set(processId, running);
    invocation.running.add(running);

    log.debug({ invocationId: invocation.id, step: agent.name, position: plan.position, pid }, 'step started');
    this.emit(invocation, {
      type: 'step:started',
      invocationId: invocation.id,
      position: plan.position,
      name: agent.name,
      pid,
    });

    // A sibling may have failed, or the signal fired, while this step was spawning
    if (this.shouldStop(invocation)) {
      this.kill(running, 'cancelled');
    }

    const timer = setTimeout(() => {
      log.warn(
        { invocationId: invocation.id, step: agent.name, timeout: formatDuration(invocation.stepTimeoutMs) },
        'step timed out',
      );
      this.kill(running, 'timeout');
    }, invocation.stepTimeoutMs);

    let exit: ProcessExit;
    try {
      exit = await this.processManager.waitForExit(processId);
    } finally {
      clearTimeout(timer);
      this.runningByProcess.delete(processId);
      invocation.running.delete(running);
    }

    this.flushStdout(running);
    outcome.exitCode = exit.exitCode;
    outcome.signal = exit.signal;

    if (running.killReason === 'cancelled') {
      this.completeStep(invocation, outcome, 'cancelled', exit.duration, this.cancelReason(invocation));
      return;
    }
    if (running.killReason === 'timeout') {
      this.failStep(
        invocation,
        plan,
        outcome,
        'timed_out',
        `Timed out after ${formatDuration(invocation.stepTimeoutMs)}`,
        exit,
        { stderr: running.stderr },
      );
      return;
    }
    if (exit.error || exit.exitCode !== 0) {
      this.failStep(
        invocation,
        plan,
        outcome,
        'failed',
        formatProcessError(exit),
        exit,
        { stderr: running.stderr, cause: exit.error },
      );
      return;
    }

    await this.collectArtifacts(invocation, running);
    this.completeStep(invocation, outcome, 'succeeded', exit.duration);
  }

  /**
   * Apply `::output` overrides, then record the step's mapped artifacts
   */
  private async collectArtifacts(invocation: Invocation, running: RunningStep): Promise<void> {
    const { plan, outcome } = running;

    for (const [name, value] of running.directives) {
      if (!plan.produces.includes(name)) {
        log.warn(
          { invocationId: invocation.id, step: plan.agent.name, placeholder: name },
          'ignoring output directive for a placeholder this step does not produce',
        );
        continue;
      }
      invocation.values[name] = path.resolve(plan.agent.workingDirectory, value);
    }

    for (const placeholder of plan.produces) {
      const artifact = invocation.values[placeholder];
      if (artifact === undefined) {
        continue;
      }
      if (running.directives.has(placeholder) || (await pathExists(artifact))) {
        outcome.artifacts.push(artifact);
      } else {
        log.warn(
          { invocationId: invocation.id, step: plan.agent.name, placeholder, path: artifact },
          'expected artifact was not produced',
        );
      }
    }
  }

  private failStep(
    invocation: Invocation,
    plan: StepPlan,
    outcome: StepOutcome,
    status: 'failed' | 'timed_out',
    message: string,
    exit: ProcessExit,
    { stderr, cause }: { stderr?: string; cause?: unknown } = {},
  ): void {
    const stderrTail = stderr ? tailLines(stderr, this.options.stderrTailLines) : '';
    const diagnostic = stderrTail ? `${message}\n${stderrTail}` : message;

    outcome.exitCode = exit.exitCode;
    outcome.signal = exit.signal;
    this.completeStep(invocation, outcome, status, exit.duration, diagnostic);

    if (invocation.failure) {
      return;
    }

    const failure = new StepFailureError(
      message,
      {
        position: plan.position,
        stepName: plan.agent.name,
        status,
        exitCode: exit.exitCode,
        signal: exit.signal,
        stderrTail: stderrTail || undefined,
      },
      cause,
    );
    invocation.failure = {
      position: plan.position,
      name: plan.agent.name,
      status,
      diagnostic,
      cause: failure,
    };
    log.warn(
      { invocationId: invocation.id, step: plan.agent.name, position: plan.position, status },
      'step failed, aborting workflow',
    );
    this.killRunning(invocation, 'cancelled');
  }

  private completeStep(
    invocation: Invocation,
    outcome: StepOutcome,
    status: 'succeeded' | 'failed' | 'timed_out' | 'cancelled',
    durationMs: number,
    diagnostic?: string,
  ): void {
    outcome.status = status;
    outcome.completedAt = new Date();
    outcome.durationMs = durationMs;
    if (diagnostic !== undefined) {
      outcome.diagnostic = diagnostic;
    }
    log.debug(
      { invocationId: invocation.id, step: outcome.name, status, duration: formatDuration(durationMs) },
      'step completed',
    );
    this.emit(invocation, { type: 'step:completed', invocationId: invocation.id, step: { ...outcome } });
  }

  private handleOutput(processId: string, data: Buffer, type: 'stdout' | 'stderr'): void {
    const running = this.runningByProcess.get(processId);
    if (!running) {
      return;
    }
    const text = data.toString('utf8');

    if (type === 'stdout') {
      const lines = (running.stdoutRemainder + text).split(/\r?\n/);
      running.stdoutRemainder = lines.pop() ?? '';
      for (const line of lines) {
        this.readDirective(running, line);
      }
    } else {
      running.stderr = (running.stderr + text).slice(-STDERR_BUFFER_LIMIT);
    }

    this.emit(running.invocation, {
      type: 'step:output',
      invocationId: running.invocation.id,
      position: running.plan.position,
      name: running.plan.agent.name,
      stream: type,
      data: text,
    });
  }

  private flushStdout(running: RunningStep): void {
    if (running.stdoutRemainder) {
      this.readDirective(running, running.stdoutRemainder);
      running.stdoutRemainder = '';
    }
  }

  private readDirective(running: RunningStep, line: string): void {
    const directive = parseOutputDirective(line);
    if (directive) {
      running.directives.set(directive.name, directive.value);
    }
  }

  private killRunning(invocation: Invocation, reason: 'cancelled'): void {
    for (const running of invocation.running) {
      this.kill(running, reason);
    }
  }

  private kill(running: RunningStep, reason: 'timeout' | 'cancelled'): void {
    if (running.killReason) {
      return;
    }
    running.killReason = reason;
    this.processManager.terminateProcess(running.processId, 'SIGKILL').catch((error: unknown) => {
      log.warn({ processId: running.processId, err: error }, 'failed to kill step process');
    });
  }

  private shouldStop(invocation: Invocation): boolean {
    return invocation.failure !== undefined || invocation.controller.signal.aborted;
  }

  private cancelReason(invocation: Invocation): string {
    return invocation.failure
      ? `Stopped after step ${invocation.failure.position} ('${invocation.failure.name}') failed`
      : 'Cancelled';
  }

  private outcomeOf(invocation: Invocation, plan: StepPlan): StepOutcome {
    const outcome = invocation.outcomes[plan.position - 1];
    if (!outcome) {
      throw new Error(`No outcome for step ${plan.position}`);
    }
    return outcome;
  }

  private emit(invocation: Invocation, event: EngineEvent): void {
    for (const handler of [...this.handlers, ...(invocation.onEvent ? [invocation.onEvent] : [])]) {
      try {
        handler(event);
      } catch (error) {
        log.warn({ event: event.type, err: error }, 'event handler threw');
      }
    }
  }
}
