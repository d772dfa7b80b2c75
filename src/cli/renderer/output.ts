/**
 * Output Renderer
 *
 * Formats catalog entries, search results and execution results for
 * terminal display.
 */

import boxen from 'boxen';
import stripAnsi from 'strip-ansi';
import type { CatalogEntry } from '../../catalog/types.js';
import type { ExecutionResult, StepOutcome } from '../../engine/types.js';
import type { SearchResult } from '../../orchestrator/orchestrator.js';
import { formatDuration } from '../../process/utils.js';
import { colors, icons, stepColors, stepIcons } from './colors.js';
import type { RenderOptions, RunHeader, SerializedResult } from './types.js';

type Paint = (text: string) => string;

function painter(useColors: boolean): (paint: Paint, text: string) => string {
  return (paint, text) => (useColors ? paint(text) : text);
}

/**
 * Shorten text to `width` visible characters, ending with '...'
 */
export function truncate(text: string, width: number): string {
  if (width <= 0 || text.length <= width) {
    return text;
  }
  if (width <= 3) {
    return text.slice(0, width);
  }
  return `${text.slice(0, width - 3)}...`;
}

/**
 * Render rows as a box-drawn table. Column widths follow the visible
 * (ANSI-free) length of the cells.
 */
export function renderTable(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  const widths = headers.map((header, column) =>
    Math.max(stripAnsi(header).length, ...rows.map((row) => stripAnsi(row[column] ?? '').length)),
  );
  const pad = (text: string, width: number): string =>
    text + ' '.repeat(Math.max(0, width - stripAnsi(text).length));
  const border = (left: string, middle: string, right: string): string =>
    left + widths.map((width) => '─'.repeat(width + 2)).join(middle) + right;
  const line = (cells: readonly string[]): string =>
    '│ ' + widths.map((width, column) => pad(cells[column] ?? '', width)).join(' │ ') + ' │';

  return [
    border('┌', '┬', '┐'),
    line(headers),
    border('├', '┼', '┤'),
    ...rows.map(line),
    border('└', '┴', '┘'),
  ].join('\n');
}

/**
 * Catalog listing as a table
 */
export function renderCatalogTable(entries: readonly CatalogEntry[], options: RenderOptions = {}): string {
  const { useColors = true, maxDescriptionWidth = 60 } = options;
  const paint = painter(useColors);

  if (entries.length === 0) {
    return paint(colors.warning, `${icons.warning} The catalog is empty`);
  }

  const rows = entries.map((entry) => [
    entry.descriptor.name,
    paint(entry.kind === 'workflow' ? colors.workflow : colors.agent, entry.kind),
    entry.descriptor.category,
    truncate(entry.descriptor.description, maxDescriptionWidth),
  ]);
  return ['Catalog:', '', renderTable(['Name', 'Kind', 'Category', 'Description'], rows)].join('\n');
}

/**
 * Catalog listing as JSON
 */
export function renderCatalogJson(entries: readonly CatalogEntry[]): string {
  return JSON.stringify(
    entries.map((entry) => ({
      name: entry.descriptor.name,
      kind: entry.kind,
      category: entry.descriptor.category,
      description: entry.descriptor.description,
      keywords: entry.descriptor.keywords,
      ...(entry.kind === 'workflow' && { steps: entry.descriptor.steps.map((step) => step.name) }),
    })),
    null,
    2,
  );
}

/**
 * Ranked search matches, one per line
 *
 * @example
 * ```text
 * Matches (semantic):
 *   1. Speech Translator  agent  0.842
 * ```
 */
export function renderMatches(result: SearchResult, options: RenderOptions = {}): string {
  const paint = painter(options.useColors ?? true);
  if (result.matches.length === 0) {
    return paint(colors.warning, `${icons.warning} No matches (${result.strategy})`);
  }

  const nameWidth = Math.max(...result.matches.map((match) => match.entry.descriptor.name.length));
  const lines = [`Matches (${result.strategy}):`];
  result.matches.forEach((match, index) => {
    const kind = paint(match.entry.kind === 'workflow' ? colors.workflow : colors.agent, match.entry.kind.padEnd(8));
    lines.push(
      `  ${index + 1}. ${match.entry.descriptor.name.padEnd(nameWidth)}  ${kind}  ${paint(colors.dim, match.score.toFixed(3))}`,
    );
  });
  return lines.join('\n');
}

/**
 * Run header in a bordered box
 */
export function renderHeader(header: RunHeader): string {
  const lines = [
    colors.info(`Run: ${header.target} (${header.kind})`),
    colors.dim(`Invocation: ${header.invocationId}`),
    colors.dim(`Steps: ${header.stepCount}`),
    colors.dim(`Output: ${header.outputDir}`),
  ];
  return boxen(lines.join('\n'), {
    padding: 1,
    margin: 0,
    borderStyle: 'round',
    borderColor: 'cyan',
  });
}

/**
 * One progress line for a finished step
 *
 * @example
 * ```text
 * [OK] 1. Speech Translator (2s)
 * [ERR] 2. Summarization: Exited with code 3
 * ```
 */
export function renderStep(step: StepOutcome, options: RenderOptions = {}): string {
  const paint = painter(options.useColors ?? true);
  const icon = paint(stepColors[step.status], stepIcons[step.status]);
  const timing = step.durationMs !== undefined && step.status === 'succeeded' ? ` (${formatDuration(step.durationMs)})` : '';
  const reason = step.diagnostic ? `: ${step.diagnostic.split('\n')[0]}` : '';
  return `${icon} ${step.position}. ${step.name}${timing}${paint(colors.dim, reason)}`;
}

/**
 * Execution summary in a bordered box
 */
export function renderSummary(result: ExecutionResult): string {
  const lines: string[] = [];

  if (result.status === 'succeeded') {
    lines.push(colors.success(`${icons.success} ${result.target} completed successfully`));
  } else if (result.status === 'cancelled') {
    lines.push(colors.warning(`${icons.warning} ${result.target} was cancelled`));
  } else {
    lines.push(colors.error(`${icons.error} ${result.target} failed`));
    if (result.failedStep) {
      lines.push(colors.error(`  Step ${result.failedStep.position} (${result.failedStep.name}): ${result.failedStep.status}`));
      for (const line of result.failedStep.diagnostic.split('\n')) {
        lines.push(colors.dim(`    ${line}`));
      }
    }
  }

  lines.push('');
  lines.push(colors.dim(`Duration: ${formatDuration(result.durationMs)}`));
  lines.push(colors.dim(`Output: ${result.outputDir}`));
  if (result.artifacts.length > 0) {
    lines.push(colors.dim('Artifacts:'));
    for (const artifact of result.artifacts) {
      lines.push(colors.dim(`  ${artifact}`));
    }
  }

  return boxen(lines.join('\n'), {
    padding: 1,
    margin: { top: 1, bottom: 0, left: 0, right: 0 },
    borderStyle: 'round',
    borderColor: result.status === 'succeeded' ? 'green' : result.status === 'cancelled' ? 'yellow' : 'red',
  });
}

/**
 * Plain-data form of an execution result for `--format json`
 */
export function serializeResult(result: ExecutionResult): SerializedResult {
  return {
    target: result.target,
    kind: result.kind,
    invocationId: result.invocationId,
    status: result.status,
    outputDir: result.outputDir,
    durationMs: result.durationMs,
    artifacts: result.artifacts,
    steps: result.steps.map((step) => ({
      position: step.position,
      name: step.name,
      status: step.status,
      exitCode: step.exitCode,
      signal: step.signal,
      durationMs: step.durationMs,
      diagnostic: step.diagnostic,
      artifacts: step.artifacts,
    })),
    ...(result.failedStep && {
      failedStep: {
        position: result.failedStep.position,
        name: result.failedStep.name,
        status: result.failedStep.status,
        diagnostic: result.failedStep.diagnostic,
      },
    }),
    ...(result.error && {
      error: { name: result.error.name, code: result.error.code, message: result.error.message },
    }),
  };
}
