/**
 * Search Command
 *
 * Ranks catalog entries against a free-text intent.
 */

import type { Command } from 'commander';
import type { Orchestrator } from '../../orchestrator/orchestrator.js';
import { openOrchestrator, parsePositiveInt, reportError } from '../bootstrap.js';
import { renderMatches } from '../renderer/output.js';

export interface SearchCommandOptions {
  top?: number;
  format?: 'text' | 'json';
  sourceLanguage?: string;
}

export async function searchCommand(
  orchestrator: Orchestrator,
  intent: string,
  options: SearchCommandOptions = {},
): Promise<string> {
  const result = await orchestrator.findRelevant(intent, { topK: options.top });
  if (options.format === 'json') {
    return JSON.stringify(
      {
        strategy: result.strategy,
        matches: result.matches.map((match) => ({
          name: match.entry.descriptor.name,
          kind: match.entry.kind,
          score: match.score,
        })),
      },
      null,
      2,
    );
  }
  return renderMatches(result);
}

export function registerSearchCommand(program: Command): void {
  program
    .command('search')
    .description('Find the agents and workflows that best match an intent')
    .argument('<intent>', 'What you want to do, in your own words')
    .option('--top <n>', 'Number of matches to show', parsePositiveInt, 3)
    .option('--format <format>', 'Output format: text or json', 'text')
    .option('--source-language <code>', 'Language the intent is written in')
    .action(async (intent: string, options: SearchCommandOptions) => {
      let orchestrator: Orchestrator | undefined;
      try {
        orchestrator = await openOrchestrator({ sourceLanguage: options.sourceLanguage });
        console.log(await searchCommand(orchestrator, intent, options));
        await orchestrator.close();
        process.exit(0);
      } catch (error) {
        reportError(error);
        await orchestrator?.close();
        process.exit(1);
      }
    });
}
