/**
 * Process Manager Interface
 *
 * Contract between the execution engine and whatever launches agent
 * programs. The engine only ever talks to this interface, so tests can
 * substitute an in-process stand-in.
 *
 * @module agent-orchestrator/process/manager
 */

import type {
  ManagedProcess,
  OutputHandler,
  ProcessConfig,
  ProcessExit,
  ProcessMetrics,
} from './types.js';

export interface IProcessManager {
  /**
   * Spawn a new process
   *
   * Resolves once the process has been started. A spawn failure
   * (missing executable, permission denied) does not reject: it is
   * reported through {@link waitForExit} with `error` set.
   */
  acquireProcess(config: ProcessConfig): Promise<ManagedProcess>;

  /**
   * Wait for a process to exit
   *
   * Once the exit has been delivered the manager forgets the process:
   * {@link getProcess} returns null for it and metrics keep its totals.
   *
   * @throws Error if the process ID is unknown
   */
  waitForExit(processId: string): Promise<ProcessExit>;

  /**
   * Send a signal to a running process and everything it started.
   * No-op if it already exited.
   */
  terminateProcess(processId: string, signal?: NodeJS.Signals): Promise<void>;

  /**
   * Register a handler for output of every managed process
   *
   * @returns Function that removes the handler
   */
  onOutput(handler: OutputHandler): () => void;

  /** Look up a process by ID, until its exit has been collected */
  getProcess(processId: string): ManagedProcess | null;

  /** All processes that have not exited yet */
  getActiveProcesses(): ManagedProcess[];

  /** Aggregate metrics */
  getMetrics(): ProcessMetrics;

  /** Terminate every active process and wait for them to exit */
  shutdown(): Promise<void>;
}
