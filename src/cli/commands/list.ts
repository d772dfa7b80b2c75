/**
 * List Command
 *
 * Displays the agents and workflows found in the catalog.
 */

import type { Command } from 'commander';
import type { Orchestrator } from '../../orchestrator/orchestrator.js';
import { openOrchestrator, reportError } from '../bootstrap.js';
import { renderCatalogJson, renderCatalogTable } from '../renderer/output.js';

/**
 * List command options
 */
export interface ListOptions {
  /**
   * Output format: 'table' (default) or 'json'
   */
  format?: 'table' | 'json';
}

/**
 * Render the catalog, followed by any manifests that were skipped
 */
export function listCommand(orchestrator: Orchestrator, options: ListOptions = {}): string {
  const entries = orchestrator.listCatalog();
  if (options.format === 'json') {
    return renderCatalogJson(entries);
  }

  const lines = [renderCatalogTable(entries)];
  const errors = orchestrator.getDiscoveryErrors();
  if (errors.length > 0) {
    lines.push('', `Skipped manifests (${errors.length}):`);
    for (const error of errors) {
      lines.push(`  ${error.path}: ${error.message}`);
    }
  }
  return lines.join('\n');
}

/**
 * Register list command with Commander program
 */
export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('List available agents and workflows')
    .option('--format <format>', 'Output format: table or json', 'table')
    .action(async (options: ListOptions) => {
      let orchestrator: Orchestrator | undefined;
      try {
        orchestrator = await openOrchestrator();
        console.log(listCommand(orchestrator, options));
        await orchestrator.close();
        process.exit(0);
      } catch (error) {
        reportError(error);
        await orchestrator?.close();
        process.exit(1);
      }
    });
}
