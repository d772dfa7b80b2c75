/**
 * Tests for Process Spawning
 *
 * Tests the generic process spawning functionality including
 * process creation, output capture, exit reporting and metrics tracking.
 */

import { describe, it, beforeEach, afterEach, expect } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { realpathSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { SimpleProcessManager } from '@/process/simple-manager.js';
import type { ProcessConfig } from '@/process/types.js';

function shell(script: string, overrides: Partial<ProcessConfig> = {}): ProcessConfig {
  return {
    executablePath: 'sh',
    args: ['-c', script],
    workDir: process.cwd(),
    ...overrides,
  };
}

describe('Process Spawning', () => {
  let manager: SimpleProcessManager;

  beforeEach(() => {
    manager = new SimpleProcessManager();
  });

  afterEach(async () => {
    await manager.shutdown();
  });

  describe('acquireProcess', () => {
    it('spawns a process successfully', async () => {
      const managedProcess = await manager.acquireProcess({
        executablePath: 'echo',
        args: ['test'],
        workDir: process.cwd(),
      });

      expect(managedProcess.id).toMatch(/^process-[a-z0-9]{10}$/);
      expect(managedProcess.pid).toBeGreaterThan(0);
      expect(managedProcess.status).toBe('busy');
      expect(managedProcess.exitCode).toBe(null);
      expect(managedProcess.signal).toBe(null);
      expect(managedProcess.spawnedAt).toBeInstanceOf(Date);
    });

    it('generates unique process IDs', async () => {
      const first = await manager.acquireProcess(shell('true'));
      const second = await manager.acquireProcess(shell('true'));

      expect(first.id).not.toBe(second.id);
    });

    it('tracks the process until it exits', async () => {
      const managedProcess = await manager.acquireProcess(shell('true'));

      expect(manager.getProcess(managedProcess.id)?.pid).toBe(managedProcess.pid);
      expect(manager.getActiveProcesses().map((p) => p.id)).toContain(managedProcess.id);

      await manager.waitForExit(managedProcess.id);

      expect(managedProcess.status).toBe('completed');
      expect(manager.getActiveProcesses()).toHaveLength(0);
    });

    it('forgets a process once its exit has been collected', async () => {
      const managedProcess = await manager.acquireProcess(shell('true'));
      await manager.waitForExit(managedProcess.id);

      expect(manager.getProcess(managedProcess.id)).toBe(null);
      expect(manager.getMetrics().totalCompleted).toBe(1);
      await expect(manager.waitForExit(managedProcess.id)).rejects.toThrow(
        `Process ${managedProcess.id} not found`,
      );
    });

    it('runs in the requested working directory', async () => {
      const dir = await mkdtemp(path.join(tmpdir(), 'spawn-cwd-'));
      const chunks: string[] = [];
      manager.onOutput((_id, data, type) => {
        if (type === 'stdout') chunks.push(data.toString());
      });

      try {
        const managedProcess = await manager.acquireProcess(shell('pwd -P', { workDir: dir }));
        await manager.waitForExit(managedProcess.id);

        expect(chunks.join('').trim()).toBe(realpathSync(dir));
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });

    it('passes environment variables', async () => {
      const chunks: string[] = [];
      manager.onOutput((_id, data) => chunks.push(data.toString()));

      const managedProcess = await manager.acquireProcess(
        shell('echo "$TEST_VAR"', { env: { PATH: process.env.PATH ?? '', TEST_VAR: 'test_value' } }),
      );
      await manager.waitForExit(managedProcess.id);

      expect(chunks.join('').trim()).toBe('test_value');
    });

    it('closes stdin so programs reading it see end of input', async () => {
      const managedProcess = await manager.acquireProcess(shell('cat > /dev/null; echo done'));
      const exit = await manager.waitForExit(managedProcess.id);

      expect(exit.exitCode).toBe(0);
    });
  });

  describe('waitForExit', () => {
    it('reports a zero exit code', async () => {
      const managedProcess = await manager.acquireProcess(shell('exit 0'));
      const exit = await manager.waitForExit(managedProcess.id);

      expect(exit.exitCode).toBe(0);
      expect(exit.signal).toBe(null);
      expect(exit.error).toBeUndefined();
      expect(exit.duration).toBeGreaterThanOrEqual(0);
    });

    it('reports a nonzero exit code and marks the process crashed', async () => {
      const managedProcess = await manager.acquireProcess(shell('exit 3'));
      const exit = await manager.waitForExit(managedProcess.id);

      expect(exit.exitCode).toBe(3);
      expect(managedProcess.status).toBe('crashed');
    });

    it('reports a missing executable as a spawn error instead of rejecting', async () => {
      const managedProcess = await manager.acquireProcess({
        executablePath: './definitely-not-a-real-program',
        args: [],
        workDir: process.cwd(),
      });
      const exit = await manager.waitForExit(managedProcess.id);

      expect(exit.error).toBeInstanceOf(Error);
      expect(exit.exitCode).not.toBe(0);
      expect(managedProcess.status).toBe('crashed');
    });

    it('rejects for an unknown process ID', async () => {
      await expect(manager.waitForExit('process-unknown')).rejects.toThrow(
        'Process process-unknown not found',
      );
    });
  });

  describe('onOutput', () => {
    it('delivers stdout and stderr separately', async () => {
      const received: Array<{ type: string; text: string }> = [];
      manager.onOutput((_id, data, type) => received.push({ type, text: data.toString() }));

      const managedProcess = await manager.acquireProcess(shell('echo out; echo err 1>&2'));
      await manager.waitForExit(managedProcess.id);

      const stdout = received.filter((r) => r.type === 'stdout').map((r) => r.text).join('');
      const stderr = received.filter((r) => r.type === 'stderr').map((r) => r.text).join('');
      expect(stdout).toBe('out\n');
      expect(stderr).toBe('err\n');
    });

    it('stops delivering after the handler is removed', async () => {
      const received: string[] = [];
      const remove = manager.onOutput((_id, data) => received.push(data.toString()));
      remove();

      const managedProcess = await manager.acquireProcess(shell('echo ignored'));
      await manager.waitForExit(managedProcess.id);

      expect(received).toEqual([]);
    });
  });

  describe('terminateProcess', () => {
    it('kills a running process with the given signal', async () => {
      const managedProcess = await manager.acquireProcess(shell('exec sleep 30'));

      await manager.terminateProcess(managedProcess.id, 'SIGKILL');
      const exit = await manager.waitForExit(managedProcess.id);

      expect(exit.signal).toBe('SIGKILL');
      expect(exit.exitCode).toBe(null);
    });

    it('also kills programs the process started', async () => {
      const received: string[] = [];
      manager.onOutput((_id, data) => received.push(data.toString()));
      const managedProcess = await manager.acquireProcess(shell('sleep 30; echo done'));

      await manager.terminateProcess(managedProcess.id, 'SIGKILL');
      const exit = await manager.waitForExit(managedProcess.id);

      expect(exit.signal).toBe('SIGKILL');
      expect(exit.duration).toBeLessThan(5000);
      expect(received).toEqual([]);
    });

    it('is a no-op for an exited or unknown process', async () => {
      const managedProcess = await manager.acquireProcess(shell('true'));
      await manager.waitForExit(managedProcess.id);

      await expect(manager.terminateProcess(managedProcess.id)).resolves.toBeUndefined();
      await expect(manager.terminateProcess('process-unknown')).resolves.toBeUndefined();
    });
  });

  describe('getMetrics', () => {
    it('counts completed and failed processes', async () => {
      const ok = await manager.acquireProcess(shell('exit 0'));
      const bad = await manager.acquireProcess(shell('exit 1'));
      await Promise.all([manager.waitForExit(ok.id), manager.waitForExit(bad.id)]);

      const metrics = manager.getMetrics();
      expect(metrics.totalSpawned).toBe(2);
      expect(metrics.totalCompleted).toBe(1);
      expect(metrics.totalFailed).toBe(1);
      expect(metrics.currentlyActive).toBe(0);
    });
  });

  describe('shutdown', () => {
    it('terminates every active process', async () => {
      const first = await manager.acquireProcess(shell('exec sleep 30'));
      const second = await manager.acquireProcess(shell('exec sleep 30'));

      await manager.shutdown();

      expect(first.signal).toBe('SIGTERM');
      expect(second.signal).toBe('SIGTERM');
      expect(manager.getActiveProcesses()).toHaveLength(0);
    });
  });
});
