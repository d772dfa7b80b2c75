/**
 * Shutdown Manager
 *
 * Cancels the running invocation and releases the orchestrator when the
 * CLI is interrupted.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { Closeable, ShutdownOptions, ShutdownResult } from './types.js';

export class ShutdownManager {
  private controller: AbortController | null = null;
  private resource: Closeable | null = null;
  private shutdownInProgress = false;
  private options: Required<ShutdownOptions>;

  constructor(options: ShutdownOptions = {}) {
    this.options = {
      gracefulTimeoutMs: options.gracefulTimeoutMs ?? 5000,
      verbose: options.verbose ?? true,
    };
  }

  /**
   * Register the invocation's abort controller and the resource to
   * release on shutdown
   */
  register(controller: AbortController, resource: Closeable): void {
    this.controller = controller;
    this.resource = resource;
  }

  /** Whether an interrupt has already been handled */
  get interrupted(): boolean {
    return this.controller?.signal.aborted ?? false;
  }

  /**
   * Abort the invocation, then release resources, waiting at most
   * `gracefulTimeoutMs`
   */
  async shutdown(reason = 'interrupted'): Promise<ShutdownResult> {
    const startTime = Date.now();

    if (this.shutdownInProgress) {
      return { success: true, method: 'already-shutting-down', durationMs: 0 };
    }
    this.shutdownInProgress = true;

    if (!this.controller || !this.resource) {
      return { success: true, method: 'nothing-registered', durationMs: Date.now() - startTime };
    }

    if (this.options.verbose) {
      process.stderr.write('\n[i] Cancelling running steps...\n');
    }
    this.controller.abort(new Error(reason));

    const timeout = new AbortController();
    try {
      const finished = await Promise.race([
        this.resource.close().then(() => true),
        delay(this.options.gracefulTimeoutMs, false, { signal: timeout.signal }),
      ]);
      if (!finished && this.options.verbose) {
        process.stderr.write('[!] Timeout exceeded while shutting down\n');
      }
      return {
        success: finished,
        method: finished ? 'graceful' : 'timed-out',
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      return {
        success: false,
        method: 'graceful',
        durationMs: Date.now() - startTime,
        error: error instanceof Error ? error.message : String(error),
      };
    } finally {
      timeout.abort();
    }
  }
}
