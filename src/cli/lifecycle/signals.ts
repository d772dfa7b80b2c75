/**
 * Signal Handlers
 *
 * SIGINT/SIGTERM cancel the running invocation. A second signal exits
 * immediately.
 */

import type { ShutdownManager } from './shutdown.js';

export const EXIT_INTERRUPTED = 130;

/**
 * Install signal handlers
 *
 * @returns Function that removes the handlers
 */
export function setupSignalHandlers(shutdownManager: ShutdownManager): () => void {
  const onSignal = (signal: NodeJS.Signals): void => {
    if (shutdownManager.interrupted) {
      process.stderr.write(`\n[!] Received ${signal} again, exiting now\n`);
      process.exit(EXIT_INTERRUPTED);
    }
    process.stderr.write(`\n[!] Received ${signal}, cancelling...\n`);
    shutdownManager
      .shutdown(signal)
      .then((result) => {
        if (!result.success) {
          process.stderr.write(`[ERR] Shutdown failed: ${result.error ?? result.method}\n`);
        }
      })
      .catch((error: unknown) => {
        process.stderr.write(`[ERR] Shutdown failed: ${String(error)}\n`);
      });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  return () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  };
}
