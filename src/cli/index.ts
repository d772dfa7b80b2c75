#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { readFileSync, realpathSync } from 'fs';
import { fileURLToPath, pathToFileURL } from 'url';
import { dirname, join } from 'path';
import { registerListCommand } from './commands/list.js';
import { registerSearchCommand } from './commands/search.js';
import { registerRunCommand } from './commands/run.js';

// Get package.json for version
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', '..', 'package.json');

function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
    return String(packageJson.version);
  }
  return '0.0.0';
}

// Create CLI program
export const program = new Command();

program
  .name('agent-hub')
  .description('Discover, search and run catalogs of task agents and workflows')
  .version(readVersion());

// Register commands
registerListCommand(program);
registerSearchCommand(program);
registerRunCommand(program);

program.configureOutput({
  outputError: (str: string, write: (str: string) => void) => {
    // Color error messages red
    write(`\x1b[31m${str}\x1b[0m`);
  },
});

// Main function to run CLI (only if executed directly)
export async function runCli(argv: string[] = process.argv): Promise<void> {
  // Show help if no command specified
  if (!argv.slice(2).length) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

// Only run if this module is executed directly (not imported), also through the npm bin symlink
const entryPoint = process.argv[1];
if (entryPoint && import.meta.url === pathToFileURL(realpathSync(entryPoint)).href) {
  runCli().catch((error: unknown) => {
    console.error('[ERR] ' + (error instanceof Error ? error.message : String(error)));
    process.exit(1);
  });
}
