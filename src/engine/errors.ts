/**
 * Execution Engine Error Types
 *
 * @module agent-orchestrator/engine/errors
 */

export interface StepFailureDetails {
  /** 1-based position in the workflow */
  position: number;
  stepName: string;
  status: 'failed' | 'timed_out';
  exitCode: number | null;
  signal: string | null;
  /** Last stderr lines, ANSI codes removed */
  stderrTail?: string;
}

/**
 * A workflow step exited non-zero, failed to start or timed out
 */
export class StepFailureError extends Error {
  readonly code = 'STEP_FAILED';

  constructor(
    message: string,
    public readonly details: StepFailureDetails,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'StepFailureError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StepFailureError);
    }
  }

  get position(): number {
    return this.details.position;
  }

  get stepName(): string {
    return this.details.stepName;
  }
}

/**
 * A workflow stopped before all of its steps succeeded
 *
 * @example
 * ```typescript
 * const result = await engine.executeWorkflow(workflow);
 * if (result.error?.code === 'STEP_FAILED') {
 *   console.error(result.error.message, result.error.cause);
 * }
 * ```
 */
export class WorkflowAbortedError extends Error {
  constructor(
    message: string,
    public readonly code: 'STEP_FAILED' | 'CANCELLED',
    public readonly workflowName: string,
    public readonly cause?: StepFailureError,
  ) {
    super(message);
    this.name = 'WorkflowAbortedError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WorkflowAbortedError);
    }
  }

  static stepFailed(workflowName: string, failure: StepFailureError): WorkflowAbortedError {
    return new WorkflowAbortedError(
      `Workflow '${workflowName}' aborted at step ${failure.position} ('${failure.stepName}'): ${failure.message}`,
      'STEP_FAILED',
      workflowName,
      failure,
    );
  }

  static cancelled(workflowName: string): WorkflowAbortedError {
    return new WorkflowAbortedError(`Workflow '${workflowName}' was cancelled`, 'CANCELLED', workflowName);
  }
}
