/**
 * Process Layer Utilities
 *
 * @module agent-orchestrator/process/utils
 */

import { customAlphabet } from 'nanoid';
import stripAnsi from 'strip-ansi';

const nanoid = customAlphabet('0123456789abcdefghijklmnopqrstuvwxyz', 10);

/**
 * Generate a unique, URL-safe identifier
 *
 * @example
 * ```typescript
 * generateId('process'); // 'process-k3x9a0q2mz'
 * ```
 */
export function generateId(prefix: string): string {
  return `${prefix}-${nanoid()}`;
}

/**
 * Format a duration in milliseconds for humans
 *
 * @example
 * ```typescript
 * formatDuration(500);     // '500ms'
 * formatDuration(65000);   // '1m 5s'
 * formatDuration(3720000); // '1h 2m'
 * ```
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }

  const totalSeconds = Math.floor(ms / 1000);
  if (totalSeconds < 60) {
    return `${totalSeconds}s`;
  }

  const totalMinutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (totalMinutes < 60) {
    return seconds > 0 ? `${totalMinutes}m ${seconds}s` : `${totalMinutes}m`;
  }

  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return minutes > 0 ? `${hours}h ${minutes}m` : `${hours}h`;
}

/**
 * Build a one-line description of why a process failed
 */
export function formatProcessError(exit: {
  exitCode: number | null;
  signal: string | null;
  error?: Error;
}): string {
  if (exit.error) {
    const code = 'code' in exit.error ? exit.error.code : undefined;
    return typeof code === 'string'
      ? `Failed to start (${code}): ${exit.error.message}`
      : `Failed to start: ${exit.error.message}`;
  }
  if (exit.signal) {
    return `Terminated by ${exit.signal}`;
  }
  return `Exited with code ${exit.exitCode}`;
}

/**
 * Convert a placeholder name to an environment variable name
 *
 * @example
 * ```typescript
 * toEnvName('transcriptPath'); // 'TRANSCRIPT_PATH'
 * toEnvName('ocr-text');       // 'OCR_TEXT'
 * ```
 */
export function toEnvName(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/[^A-Za-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .toUpperCase();
}

/**
 * Last `maxLines` non-empty lines of program output, ANSI codes removed
 */
export function tailLines(text: string, maxLines: number): string {
  const lines = stripAnsi(text)
    .split(/\r?\n/)
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0);
  return lines.slice(-maxLines).join('\n');
}
