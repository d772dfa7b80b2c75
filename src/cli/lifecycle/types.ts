/**
 * Lifecycle Types
 *
 * Type definitions for CLI lifecycle management.
 */

/**
 * Shutdown configuration options
 */
export interface ShutdownOptions {
  /**
   * Maximum time to wait for running steps to be killed and resources
   * released (milliseconds)
   * @default 5000
   */
  gracefulTimeoutMs?: number;

  /**
   * Whether to log shutdown messages
   * @default true
   */
  verbose?: boolean;
}

/**
 * Shutdown result
 */
export interface ShutdownResult {
  /** Whether shutdown was successful */
  success: boolean;

  /** How the shutdown ended */
  method: 'graceful' | 'timed-out' | 'already-shutting-down' | 'nothing-registered';

  /** Duration of shutdown in milliseconds */
  durationMs: number;

  /** Error message if shutdown failed */
  error?: string;
}

export type { Closeable } from '../../orchestrator/orchestrator.js';
