/**
 * Execution Engine Types
 *
 * @module agent-orchestrator/engine/types
 */

import type { AgentDescriptor, CatalogEntryKind, ExecutionContext, WorkflowDescriptor } from '../catalog/types.js';
import type { StepFailureError, WorkflowAbortedError } from './errors.js';

/**
 * Per-step state machine:
 * `pending -> running -> succeeded | failed | timed_out`.
 * Steps never started end `skipped`; in-flight steps killed by
 * cancellation or a sibling's failure end `cancelled`.
 */
export type StepStatus =
  | 'pending'
  | 'running'
  | 'succeeded'
  | 'failed'
  | 'timed_out'
  | 'cancelled'
  | 'skipped';

export type TerminalStepStatus = Exclude<StepStatus, 'pending' | 'running'>;

export type ExecutionStatus = 'succeeded' | 'failed' | 'cancelled';

/**
 * Outcome of one workflow step
 */
export interface StepOutcome {
  /** 1-based position in the workflow */
  position: number;
  /** Step name (= agent name) */
  name: string;
  /** 0-based stage the step ran in */
  stage: number;
  status: StepStatus;
  /** Directory reserved for this step's scratch output */
  stepOutputDir: string;
  exitCode: number | null;
  signal: string | null;
  startedAt?: Date;
  completedAt?: Date;
  durationMs?: number;
  /** Why the step did not succeed */
  diagnostic?: string;
  /** Artifact paths produced by this step, in mapping order */
  artifacts: string[];
}

/**
 * The step that aborted a workflow
 */
export interface FailedStep {
  position: number;
  name: string;
  status: 'failed' | 'timed_out';
  diagnostic: string;
  cause: StepFailureError;
}

/**
 * Structured report of one invocation. Created fresh per invocation.
 */
export interface ExecutionResult {
  /** Workflow or agent name */
  target: string;
  kind: CatalogEntryKind;
  invocationId: string;
  status: ExecutionStatus;
  steps: StepOutcome[];
  /** Produced artifact paths, in step order */
  artifacts: string[];
  failedStep?: FailedStep;
  /** Set when status is not 'succeeded' */
  error?: WorkflowAbortedError;
  /** Per-invocation output directory */
  outputDir: string;
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
}

/**
 * Progress events, in emission order per invocation
 */
export type EngineEvent =
  | {
      type: 'workflow:started';
      invocationId: string;
      target: string;
      kind: CatalogEntryKind;
      outputDir: string;
      stepCount: number;
    }
  | { type: 'step:started'; invocationId: string; position: number; name: string; pid: number | undefined }
  | {
      type: 'step:output';
      invocationId: string;
      position: number;
      name: string;
      stream: 'stdout' | 'stderr';
      data: string;
    }
  | { type: 'step:completed'; invocationId: string; step: StepOutcome }
  | { type: 'workflow:completed'; invocationId: string; result: ExecutionResult };

export type EngineEventHandler = (event: EngineEvent) => void;

/**
 * Per-invocation options
 */
export interface ExecuteOptions {
  /** Base environment (default: `process.env`) */
  env?: NodeJS.ProcessEnv;
  /** Aborting kills in-flight steps and skips the rest */
  signal?: AbortSignal;
  context?: ExecutionContext;
  /** Per-step timeout; exceeding it kills the step (SIGKILL) */
  stepTimeoutMs?: number;
  /** Parent of the per-invocation output directory */
  outputRoot?: string;
  /** Unique id of this invocation (generated when omitted) */
  invocationId?: string;
  /** Steps of one stage allowed to run at once */
  maxParallelSteps?: number;
  /** Caller-supplied placeholder values */
  inputs?: Readonly<Record<string, string>>;
  /** Progress handler for this invocation only */
  onEvent?: EngineEventHandler;
}

/**
 * Engine-wide defaults, overridable per invocation
 */
export interface EngineOptions {
  outputRoot?: string;
  stepTimeoutMs?: number;
  maxParallelSteps?: number;
  context?: ExecutionContext;
  /** Lines of stderr kept in a failure diagnostic */
  stderrTailLines?: number;
}

export interface IExecutionEngine {
  /**
   * Run a workflow's steps as external processes. Never throws for a
   * step failure: the failure is reported in the result.
   */
  executeWorkflow(workflow: WorkflowDescriptor, options?: ExecuteOptions): Promise<ExecutionResult>;

  /** Run a single agent as a one-step workflow */
  executeAgent(agent: AgentDescriptor, options?: ExecuteOptions): Promise<ExecutionResult>;

  /**
   * Subscribe to progress events of every invocation
   *
   * @returns Function that removes the handler
   */
  onEvent(handler: EngineEventHandler): () => void;

  /** Ids of invocations still running */
  getActiveInvocations(): string[];

  /** Cancel every running invocation and wait for it to settle */
  shutdown(): Promise<void>;
}
