/**
 * Logger
 *
 * Root pino logger for the orchestrator. Components take a child logger
 * tagged with their name via {@link createLogger}.
 *
 * @module agent-orchestrator/utils/logger
 */

import { pino, type Logger } from 'pino';

const isTest = process.env.VITEST !== undefined || process.env.NODE_ENV === 'test';
const level = process.env.LOG_LEVEL || (isTest ? 'silent' : 'info');

export const logger: Logger = pino({
  level,
  name: 'agent-orchestrator',
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(process.env.NODE_ENV !== 'production' &&
    !isTest && {
      transport: {
        target: 'pino-pretty',
        // stderr, so CLI output on stdout stays machine-readable
        options: { colorize: true, destination: 2 },
      },
    }),
});

/**
 * Create a child logger for a component
 *
 * @param component - Component name added to every log line
 */
export function createLogger(component: string): Logger {
  return logger.child({ component });
}

export type { Logger };

export default logger;
