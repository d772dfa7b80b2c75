/**
 * CLI Bootstrap
 *
 * Loads configuration (after `dotenv/config` has populated the
 * environment) and builds the orchestrator for a command.
 */

import { InvalidArgumentError } from 'commander';
import { loadConfig, type AppConfig } from '../config/index.js';
import { createOrchestrator } from '../orchestrator/factory.js';
import type { Orchestrator } from '../orchestrator/orchestrator.js';
import { logger } from '../utils/logger.js';

/**
 * Command-line flags that override configuration
 */
export type ConfigOverrides = Partial<
  Pick<AppConfig, 'outputRoot' | 'targetLanguage' | 'sourceLanguage' | 'stepTimeoutMs' | 'maxParallelSteps'>
>;

/**
 * Drop undefined values so they do not mask configured ones
 */
function definedOnly(overrides: ConfigOverrides): ConfigOverrides {
  const result: ConfigOverrides = {};
  if (overrides.outputRoot !== undefined) result.outputRoot = overrides.outputRoot;
  if (overrides.targetLanguage !== undefined) result.targetLanguage = overrides.targetLanguage;
  if (overrides.sourceLanguage !== undefined) result.sourceLanguage = overrides.sourceLanguage;
  if (overrides.stepTimeoutMs !== undefined) result.stepTimeoutMs = overrides.stepTimeoutMs;
  if (overrides.maxParallelSteps !== undefined) result.maxParallelSteps = overrides.maxParallelSteps;
  return result;
}

export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  return { ...loadConfig(env), ...definedOnly(overrides) };
}

export async function openOrchestrator(overrides: ConfigOverrides = {}): Promise<Orchestrator> {
  const config = resolveConfig(overrides);
  logger.level = config.logLevel;
  return createOrchestrator(config);
}

/**
 * Commander parser for positive integer options
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Commander parser for non-negative integer options
 */
export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

/**
 * Print a command failure the way every command does
 */
export function reportError(error: unknown): void {
  console.error('[ERR] ' + (error instanceof Error ? error.message : String(error)));
}
