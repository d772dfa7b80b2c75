/**
 * Run Command
 *
 * Resolves a selection (entry name or free-text intent), executes it and
 * follows its progress until completion.
 */

import { InvalidArgumentError, type Command } from 'commander';
import type { ExecutionResult } from '../../engine/types.js';
import { WorkflowAbortedError } from '../../engine/errors.js';
import { assertSucceeded } from '../../engine/workflow-engine.js';
import type { Orchestrator, Selection } from '../../orchestrator/orchestrator.js';
import { executeWithRetry } from '../../resilience/retry.js';
import { createLogger } from '../../utils/logger.js';
import { openOrchestrator, parseNonNegativeInt, parsePositiveInt, reportError } from '../bootstrap.js';
import { ShutdownManager } from '../lifecycle/shutdown.js';
import { EXIT_INTERRUPTED, setupSignalHandlers } from '../lifecycle/signals.js';
import { renderHeader, renderStep, renderSummary, serializeResult } from '../renderer/output.js';

const log = createLogger('cli:run');

export interface RunCommandOptions {
  /** Per-step timeout in milliseconds */
  timeout?: number;
  outputRoot?: string;
  targetLanguage?: string;
  sourceLanguage?: string;
  parallel?: number;
  /** Whole-invocation retries after a step failure */
  retries?: number;
  /** Wait before the first retry, doubled with jitter after each one */
  retryDelay?: number;
  /** `name=value` placeholder values */
  input?: string[];
  format?: 'pretty' | 'json';
}

export interface RunCommandResult {
  exitCode: number;
  result?: ExecutionResult;
}

/**
 * Where command output goes
 */
export interface CommandOutput {
  log(text: string): void;
}

/**
 * Parse repeated `--input name=value` flags
 *
 * @example
 * ```typescript
 * parseInputs(['audioPath=/tmp/lecture.wav']); // { audioPath: '/tmp/lecture.wav' }
 * ```
 */
export function parseInputs(inputs: readonly string[] = []): Record<string, string> {
  const values: Record<string, string> = {};
  for (const input of inputs) {
    const separator = input.indexOf('=');
    const name = separator > 0 ? input.slice(0, separator).trim() : '';
    if (!name) {
      throw new InvalidArgumentError(`Expected name=value, got '${input}'.`);
    }
    values[name] = input.slice(separator + 1);
  }
  return values;
}

/**
 * A catalog name selects that entry; anything else is an intent
 */
export function toSelection(orchestrator: Orchestrator, text: string): Selection {
  const wanted = text.trim().toLowerCase();
  const isName = orchestrator
    .listCatalog()
    .some((entry) => entry.descriptor.name.toLowerCase() === wanted);
  return isName ? { name: text.trim() } : { intent: text };
}

export function exitCodeFor(result: ExecutionResult): number {
  switch (result.status) {
    case 'succeeded':
      return 0;
    case 'cancelled':
      return EXIT_INTERRUPTED;
    case 'failed':
      return 1;
  }
}

/**
 * Execute a selection, retrying the whole invocation after a step
 * failure up to `options.retries` times
 */
export async function runCommand(
  orchestrator: Orchestrator,
  selectionText: string,
  options: RunCommandOptions = {},
  signal?: AbortSignal,
  output: CommandOutput = console,
): Promise<RunCommandResult> {
  const pretty = options.format !== 'json';
  const inputs = parseInputs(options.input);
  const selection = toSelection(orchestrator, selectionText);

  const unsubscribe = pretty
    ? orchestrator.getEngine().onEvent((event) => {
        if (event.type === 'workflow:started') {
          output.log(
            renderHeader({
              invocationId: event.invocationId,
              target: event.target,
              kind: event.kind,
              outputDir: event.outputDir,
              stepCount: event.stepCount,
            }),
          );
        } else if (event.type === 'step:completed') {
          output.log(renderStep(event.step));
        }
      })
    : () => undefined;

  const results: ExecutionResult[] = [];
  try {
    await executeWithRetry(
      async () => {
        const result = await orchestrator.run(selection, { signal, inputs });
        results.push(result);
        return assertSucceeded(result);
      },
      {
        maxRetries: options.retries ?? 0,
        initialDelayMs: options.retryDelay,
        signal,
        retryPredicate: (error) => error instanceof WorkflowAbortedError && error.code === 'STEP_FAILED',
        onRetry: (attempt) => {
          if (pretty) {
            output.log(`[!] Retrying (${attempt.retry}/${options.retries ?? 0}) in ${attempt.delayMs}ms`);
          }
        },
      },
    );
  } catch (error) {
    if (results.length === 0) {
      throw error;
    }
    log.debug({ err: error }, 'invocation did not succeed');
  } finally {
    unsubscribe();
  }

  const last = results.at(-1);
  if (!last) {
    throw new Error('Invocation produced no result');
  }

  output.log(pretty ? renderSummary(last) : JSON.stringify(serializeResult(last), null, 2));
  return { exitCode: exitCodeFor(last), result: last };
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run an agent or workflow by name, or the best match for an intent')
    .argument('<selection>', 'Agent or workflow name, or a free-text intent')
    .option('--timeout <ms>', 'Per-step timeout in milliseconds', parsePositiveInt)
    .option('--output-root <dir>', 'Directory receiving per-invocation output directories')
    .option('--target-language <code>', 'Language agents should produce')
    .option('--source-language <code>', 'Language of the source material')
    .option('--parallel <n>', 'Steps of one stage allowed to run at once', parsePositiveInt)
    .option('--retries <n>', 'Re-run the whole invocation after a step failure', parseNonNegativeInt, 0)
    .option('--retry-delay <ms>', 'Wait before the first retry in milliseconds', parseNonNegativeInt, 1000)
    .option(
      '--input <name=value>',
      'Value for a placeholder (repeatable)',
      (value: string, previous: string[]) => [...previous, value],
      [],
    )
    .option('--format <format>', 'Output format: pretty or json', 'pretty')
    .action(async (selectionText: string, options: RunCommandOptions) => {
      const shutdownManager = new ShutdownManager({ verbose: options.format !== 'json' });
      const controller = new AbortController();
      let orchestrator: Orchestrator | undefined;
      let removeHandlers = (): void => undefined;

      try {
        orchestrator = await openOrchestrator({
          outputRoot: options.outputRoot,
          targetLanguage: options.targetLanguage,
          sourceLanguage: options.sourceLanguage,
          stepTimeoutMs: options.timeout,
          maxParallelSteps: options.parallel,
        });
        shutdownManager.register(controller, orchestrator);
        removeHandlers = setupSignalHandlers(shutdownManager);

        const { exitCode } = await runCommand(orchestrator, selectionText, options, controller.signal);
        await orchestrator.close();
        process.exit(exitCode);
      } catch (error) {
        reportError(error);
        await orchestrator?.close();
        process.exit(controller.signal.aborted ? EXIT_INTERRUPTED : 1);
      } finally {
        removeHandlers();
      }
    });
}
