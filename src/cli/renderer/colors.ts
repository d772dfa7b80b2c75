/**
 * Color Scheme and Icons
 *
 * Visual style for catalog listings, search results and run progress.
 */

import chalk from 'chalk';
import type { StepStatus } from '../../engine/types.js';

export const colors = {
  workflow: chalk.magenta,
  agent: chalk.blue,
  error: chalk.red,
  warning: chalk.yellow,
  success: chalk.green,
  info: chalk.cyan,
  dim: chalk.dim,
  bold: chalk.bold,
};

/**
 * Icons (no emojis, ASCII/Unicode symbols only)
 */
export const icons = {
  success: '[OK]',
  error: '[ERR]',
  warning: '[!]',
  info: '[i]',
};

export const stepIcons: Record<StepStatus, string> = {
  pending: '[  ]',
  running: '[..]',
  succeeded: '[OK]',
  failed: '[ERR]',
  timed_out: '[TIME]',
  cancelled: '[X]',
  skipped: '[--]',
};

export const stepColors: Record<StepStatus, (text: string) => string> = {
  pending: chalk.dim,
  running: chalk.cyan,
  succeeded: chalk.green,
  failed: chalk.red,
  timed_out: chalk.red,
  cancelled: chalk.yellow,
  skipped: chalk.dim,
};
