/**
 * Configuration Error Types
 *
 * @module agent-orchestrator/config/errors
 */

/**
 * Startup configuration is missing or inconsistent. Lists every problem
 * found, one per line.
 */
export class ConfigurationError extends Error {
  readonly code = 'CONFIGURATION_ERROR';

  constructor(
    public readonly issues: string[],
    public readonly cause?: unknown,
  ) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigurationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}
