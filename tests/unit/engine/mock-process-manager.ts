/**
 * Mock Process Manager
 *
 * In-process stand-in for IProcessManager. Each spawn request is matched
 * to a scripted behavior by executable path; no real process is started.
 */

import type { IProcessManager } from '@/process/manager.js';
import type {
  ManagedProcess,
  OutputHandler,
  ProcessConfig,
  ProcessExit,
  ProcessMetrics,
} from '@/process/types.js';

export interface ScriptedBehavior {
  /** Lines written to stdout, each followed by a newline */
  stdout?: string[];
  /** Text written to stderr */
  stderr?: string;
  /** Exit code once output is written (default 0) */
  exitCode?: number;
  /** Never exit on its own; only terminateProcess ends it */
  hang?: boolean;
  /** Milliseconds before output and exit */
  delayMs?: number;
  /** Report a spawn failure instead of running */
  spawnError?: Error;
  /** Make acquireProcess itself reject */
  acquireError?: Error;
}

interface MockProcess {
  managed: ManagedProcess;
  exited: Promise<ProcessExit>;
  finish: (exit: Omit<ProcessExit, 'duration'>) => void;
}

export class MockProcessManager implements IProcessManager {
  readonly spawned: ProcessConfig[] = [];
  readonly terminated: Array<{ processId: string; signal: NodeJS.Signals }> = [];
  private readonly behaviors = new Map<string, ScriptedBehavior>();
  private readonly processes = new Map<string, MockProcess>();
  private readonly handlers = new Set<OutputHandler>();
  private nextId = 1;
  private active = 0;
  peakActive = 0;

  script(executablePath: string, behavior: ScriptedBehavior): this {
    this.behaviors.set(executablePath, behavior);
    return this;
  }

  async acquireProcess(config: ProcessConfig): Promise<ManagedProcess> {
    const behavior = this.behaviors.get(config.executablePath) ?? {};
    if (behavior.acquireError) {
      throw behavior.acquireError;
    }
    this.spawned.push(config);

    const id = `process-${this.nextId++}`;
    const spawnedAt = new Date();
    const managed: ManagedProcess = {
      id,
      pid: behavior.spawnError ? undefined : 10000 + this.nextId,
      status: 'busy',
      spawnedAt,
      lastActivity: spawnedAt,
      exitCode: null,
      signal: null,
    };

    let settled = false;
    let resolveExit: (exit: ProcessExit) => void = () => {};
    const exited = new Promise<ProcessExit>((resolve) => {
      resolveExit = resolve;
    });
    const finish = (exit: Omit<ProcessExit, 'duration'>): void => {
      if (settled) return;
      settled = true;
      this.active--;
      managed.exitCode = exit.exitCode;
      managed.signal = exit.signal;
      managed.status = exit.exitCode === 0 && !exit.error ? 'completed' : 'crashed';
      resolveExit({ ...exit, duration: Date.now() - spawnedAt.getTime() });
    };

    this.processes.set(id, { managed, exited, finish });
    this.active++;
    this.peakActive = Math.max(this.peakActive, this.active);

    setTimeout(() => {
      if (settled) return;
      if (behavior.spawnError) {
        finish({ exitCode: -2, signal: null, error: behavior.spawnError });
        return;
      }
      for (const line of behavior.stdout ?? []) {
        this.emit(id, Buffer.from(`${line}\n`), 'stdout');
      }
      if (behavior.stderr) {
        this.emit(id, Buffer.from(behavior.stderr), 'stderr');
      }
      if (!behavior.hang) {
        finish({ exitCode: behavior.exitCode ?? 0, signal: null });
      }
    }, behavior.delayMs ?? 0);

    return managed;
  }

  async waitForExit(processId: string): Promise<ProcessExit> {
    const proc = this.processes.get(processId);
    if (!proc) {
      throw new Error(`Process ${processId} not found`);
    }
    return proc.exited;
  }

  async terminateProcess(processId: string, signal: NodeJS.Signals = 'SIGTERM'): Promise<void> {
    this.terminated.push({ processId, signal });
    this.processes.get(processId)?.finish({ exitCode: null, signal });
  }

  onOutput(handler: OutputHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  getProcess(processId: string): ManagedProcess | null {
    return this.processes.get(processId)?.managed ?? null;
  }

  getActiveProcesses(): ManagedProcess[] {
    return Array.from(this.processes.values())
      .map((proc) => proc.managed)
      .filter((managed) => managed.status === 'busy');
  }

  getMetrics(): ProcessMetrics {
    const all = Array.from(this.processes.values()).map((proc) => proc.managed);
    return {
      totalSpawned: all.length,
      currentlyActive: this.active,
      totalCompleted: all.filter((m) => m.status === 'completed').length,
      totalFailed: all.filter((m) => m.status === 'crashed').length,
      averageDuration: 0,
    };
  }

  async shutdown(): Promise<void> {
    for (const managed of this.getActiveProcesses()) {
      await this.terminateProcess(managed.id, 'SIGTERM');
    }
  }

  /** Spawn request for an executable, in spawn order */
  spawnedFor(executablePath: string): ProcessConfig | undefined {
    return this.spawned.find((config) => config.executablePath === executablePath);
  }

  private emit(processId: string, data: Buffer, type: 'stdout' | 'stderr'): void {
    for (const handler of this.handlers) {
      handler(processId, data, type);
    }
  }
}
