/**
 * Process Layer Types
 *
 * Core types for the Process Layer (Layer 1) of the orchestrator.
 * Generic over any external agent program: a transcriber, an OCR tool,
 * a shell script.
 *
 * @module agent-orchestrator/process/types
 */

import type { ChildProcess } from 'child_process';
import type { Readable, Writable } from 'stream';

/**
 * Status of a managed process throughout its lifecycle
 */
export type ProcessStatus =
  | 'busy'         // Running
  | 'terminating'  // Signal sent, waiting for exit
  | 'crashed'      // Exited non-zero, by signal, or failed to spawn
  | 'completed';   // Exited with code 0

/**
 * Configuration for spawning a new process
 */
export interface ProcessConfig {
  /** Path to the executable (e.g., 'python3', './run.sh') */
  executablePath: string;

  /** Command-line arguments, passed without a shell */
  args: string[];

  /** Working directory for the process */
  workDir: string;

  /**
   * Complete environment for the process.
   * When omitted the parent environment is inherited.
   */
  env?: Record<string, string>;

  /** Keep stdin open for the caller (default: closed right after spawn) */
  keepStdinOpen?: boolean;
}

/**
 * Represents a single managed process instance with its lifecycle state
 */
export interface ManagedProcess {
  // Identity
  /** Unique process identifier */
  id: string;
  /** Operating system process ID (undefined when the spawn failed) */
  pid: number | undefined;

  // Lifecycle
  /** Current status of the process */
  status: ProcessStatus;
  /** When the process was spawned */
  spawnedAt: Date;
  /** Last I/O activity timestamp */
  lastActivity: Date;
  /** Exit code if process has exited */
  exitCode: number | null;
  /** Signal that terminated the process if applicable */
  signal: string | null;

  // Resources
  /** Node.js ChildProcess handle (absent for stand-in managers) */
  process?: ChildProcess;
  /** Process I/O streams */
  streams?: {
    stdout: Readable;
    stderr: Readable;
    stdin: Writable;
  };
}

/**
 * How a process ended
 */
export interface ProcessExit {
  /** Exit code, null when killed by a signal or never started */
  exitCode: number | null;
  /** Terminating signal, if any */
  signal: string | null;
  /** Spawn error (ENOENT, EACCES, ...) when the process never started */
  error?: Error;
  /** Wall-clock duration in milliseconds */
  duration: number;
}

/**
 * Handler for process output (stdout/stderr)
 *
 * @param processId - Managed process identifier
 * @param data - Output data buffer
 * @param type - Stream type
 */
export type OutputHandler = (
  processId: string,
  data: Buffer,
  type: 'stdout' | 'stderr',
) => void;

/**
 * Aggregate metrics for all processes managed by a ProcessManager
 */
export interface ProcessMetrics {
  /** Total number of processes spawned */
  totalSpawned: number;
  /** Number of currently active processes */
  currentlyActive: number;
  /** Total number of processes that exited with code 0 */
  totalCompleted: number;
  /** Total number of processes that failed */
  totalFailed: number;
  /** Average process duration in milliseconds */
  averageDuration: number;
}
