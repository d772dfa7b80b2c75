/**
 * Discovery Error Types
 *
 * @module agent-orchestrator/discovery/errors
 */

export type DiscoveryErrorCode =
  | 'INVALID_MANIFEST'
  | 'UNREADABLE'
  | 'DUPLICATE_NAME'
  | 'UNKNOWN_AGENT'
  | 'UNRESOLVED_PLACEHOLDER'
  | 'INVALID_WORKFLOW';

/**
 * A manifest that was skipped during discovery.
 *
 * Recorded, never thrown out of a scan: the rest of the catalog still loads.
 *
 * @example
 * ```typescript
 * const { errors } = await discovery.discover(context);
 * for (const error of errors) {
 *   console.warn(`${error.path}: ${error.message}`);
 * }
 * ```
 */
export class DiscoveryError extends Error {
  /**
   * @param message - Human-readable error message
   * @param code - Machine-readable error code
   * @param path - Manifest file the error refers to
   * @param entryName - Agent or workflow name, when it could be read
   * @param cause - Optional underlying error
   */
  constructor(
    message: string,
    public readonly code: DiscoveryErrorCode,
    public readonly path: string,
    public readonly entryName?: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'DiscoveryError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DiscoveryError);
    }
  }

  static unreadable(path: string, cause: unknown): DiscoveryError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new DiscoveryError(`Cannot read manifest: ${reason}`, 'UNREADABLE', path, undefined, cause);
  }

  static invalidManifest(path: string, reason: string, entryName?: string, cause?: unknown): DiscoveryError {
    return new DiscoveryError(`Invalid manifest: ${reason}`, 'INVALID_MANIFEST', path, entryName, cause);
  }

  static duplicateName(path: string, entryName: string, firstPath: string): DiscoveryError {
    return new DiscoveryError(
      `Duplicate name '${entryName}' (already defined in ${firstPath})`,
      'DUPLICATE_NAME',
      path,
      entryName,
    );
  }

  static unknownAgent(path: string, workflowName: string, agentName: string): DiscoveryError {
    return new DiscoveryError(
      `Workflow '${workflowName}' references unknown agent '${agentName}'`,
      'UNKNOWN_AGENT',
      path,
      workflowName,
    );
  }

  static unresolvedPlaceholder(
    path: string,
    workflowName: string,
    stepName: string,
    placeholders: readonly string[],
  ): DiscoveryError {
    const list = placeholders.map((p) => `{{${p}}}`).join(', ');
    return new DiscoveryError(
      `Step '${stepName}' of workflow '${workflowName}' uses ${list}, which no earlier step produces`,
      'UNRESOLVED_PLACEHOLDER',
      path,
      workflowName,
    );
  }

  static invalidWorkflow(path: string, workflowName: string, reason: string): DiscoveryError {
    return new DiscoveryError(
      `Invalid workflow '${workflowName}': ${reason}`,
      'INVALID_WORKFLOW',
      path,
      workflowName,
    );
  }
}
