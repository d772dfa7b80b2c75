/**
 * Simple Process Manager
 *
 * Spawns one child process per request with piped stdio and tracks it
 * until its exit is collected. No pooling: every agent step is a fresh
 * process, started as the leader of its own process group so a signal
 * reaches everything the agent launched.
 *
 * @module agent-orchestrator/process/simple-manager
 */

import { spawn, type ChildProcess } from 'child_process';
import type { IProcessManager } from './manager.js';
import type {
  ManagedProcess,
  OutputHandler,
  ProcessConfig,
  ProcessExit,
  ProcessMetrics,
} from './types.js';
import { generateId } from './utils.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('process-manager');

interface TrackedProcess {
  managed: ManagedProcess;
  exited: Promise<ProcessExit>;
}

/**
 * Process manager backed by `child_process.spawn`
 *
 * @example
 * ```typescript
 * const manager = new SimpleProcessManager();
 * const proc = await manager.acquireProcess({
 *   executablePath: 'sh',
 *   args: ['-c', 'echo hello'],
 *   workDir: process.cwd(),
 * });
 * const exit = await manager.waitForExit(proc.id);
 * ```
 */
export class SimpleProcessManager implements IProcessManager {
  private processes = new Map<string, TrackedProcess>();
  private outputHandlers = new Set<OutputHandler>();
  private metrics = {
    totalSpawned: 0,
    totalCompleted: 0,
    totalFailed: 0,
    totalDuration: 0,
  };

  /**
   * @param defaultConfig - Values merged under every spawn request
   */
  constructor(private readonly defaultConfig: Partial<ProcessConfig> = {}) {}

  async acquireProcess(config: ProcessConfig): Promise<ManagedProcess> {
    const merged: ProcessConfig = { ...this.defaultConfig, ...config };
    const id = generateId('process');
    const spawnedAt = new Date();

    const child = spawn(merged.executablePath, merged.args, {
      cwd: merged.workDir,
      env: merged.env ?? process.env,
      detached: true,
    });

    const managed: ManagedProcess = {
      id,
      pid: child.pid,
      status: 'busy',
      spawnedAt,
      lastActivity: spawnedAt,
      exitCode: null,
      signal: null,
      process: child,
      streams: {
        stdout: child.stdout,
        stderr: child.stderr,
        stdin: child.stdin,
      },
    };

    const exited = new Promise<ProcessExit>((resolve) => {
      let spawnError: Error | undefined;

      child.once('error', (error) => {
        spawnError = error;
        log.debug({ processId: id, err: error }, 'process error');
      });

      child.once('close', (code, signal) => {
        const duration = Date.now() - spawnedAt.getTime();
        managed.exitCode = code;
        managed.signal = signal;
        managed.status = code === 0 && !spawnError ? 'completed' : 'crashed';

        this.metrics.totalDuration += duration;
        if (managed.status === 'completed') {
          this.metrics.totalCompleted++;
        } else {
          this.metrics.totalFailed++;
        }

        resolve({ exitCode: code, signal, error: spawnError, duration });
      });
    });

    // Ignore EPIPE when a program exits before reading its stdin
    child.stdin.on('error', (error) => {
      log.debug({ processId: id, err: error }, 'stdin error');
    });
    if (!merged.keepStdinOpen) {
      child.stdin.end();
    }

    child.stdout.on('data', (data: Buffer) => this.emitOutput(managed, data, 'stdout'));
    child.stderr.on('data', (data: Buffer) => this.emitOutput(managed, data, 'stderr'));

    this.processes.set(id, { managed, exited });
    this.metrics.totalSpawned++;

    log.debug(
      { processId: id, pid: child.pid, executable: merged.executablePath, cwd: merged.workDir },
      'process spawned',
    );

    return managed;
  }

  async waitForExit(processId: string): Promise<ProcessExit> {
    const tracked = this.processes.get(processId);
    if (!tracked) {
      throw new Error(`Process ${processId} not found`);
    }
    const exit = await tracked.exited;
    this.processes.delete(processId);
    return exit;
  }

  async terminateProcess(
    processId: string,
    signal: NodeJS.Signals = 'SIGTERM',
  ): Promise<void> {
    const tracked = this.processes.get(processId);
    if (!tracked) {
      return;
    }

    const { managed } = tracked;
    const child = managed.process;
    if (!child || managed.status === 'completed' || managed.status === 'crashed') {
      return;
    }

    managed.status = 'terminating';
    this.signalGroup(child, signal);
  }

  onOutput(handler: OutputHandler): () => void {
    this.outputHandlers.add(handler);
    return () => {
      this.outputHandlers.delete(handler);
    };
  }

  getProcess(processId: string): ManagedProcess | null {
    return this.processes.get(processId)?.managed ?? null;
  }

  getActiveProcesses(): ManagedProcess[] {
    return Array.from(this.processes.values())
      .map((tracked) => tracked.managed)
      .filter((managed) => managed.status === 'busy' || managed.status === 'terminating');
  }

  getMetrics(): ProcessMetrics {
    const finished = this.metrics.totalCompleted + this.metrics.totalFailed;
    return {
      totalSpawned: this.metrics.totalSpawned,
      currentlyActive: this.getActiveProcesses().length,
      totalCompleted: this.metrics.totalCompleted,
      totalFailed: this.metrics.totalFailed,
      averageDuration: finished > 0 ? this.metrics.totalDuration / finished : 0,
    };
  }

  async shutdown(): Promise<void> {
    const active = Array.from(this.processes.values()).filter(
      ({ managed }) => managed.status === 'busy' || managed.status === 'terminating',
    );
    await Promise.all(active.map(({ managed }) => this.terminateProcess(managed.id, 'SIGTERM')));
    await Promise.all(active.map(({ exited }) => exited));
    this.processes.clear();
    this.outputHandlers.clear();
  }

  /**
   * Signal the whole process group, so programs a shell script started
   * die with it and release the output pipes
   */
  private signalGroup(child: ChildProcess, signal: NodeJS.Signals): void {
    if (child.pid !== undefined) {
      try {
        process.kill(-child.pid, signal);
        return;
      } catch (error) {
        log.debug({ pid: child.pid, err: error }, 'process group already gone');
      }
    }
    child.kill(signal);
  }

  private emitOutput(managed: ManagedProcess, data: Buffer, type: 'stdout' | 'stderr'): void {
    managed.lastActivity = new Date();
    for (const handler of this.outputHandlers) {
      handler(managed.id, data, type);
    }
  }
}
