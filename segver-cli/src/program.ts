import { Command } from 'commander';
import { config } from './config.js';
import { registerCompareCommands } from './commands/compare.js';
import { registerSortCommands } from './commands/sort.js';
import { registerTokenCommands } from './commands/tokens.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('segver')
    .description('Compare, check and sort free-form version strings')
    .version(config.cliVersion)
    .option('--json', 'Output results as JSON')
    .option('--verbose', 'Log debug output to stderr');

  registerCompareCommands(program);
  registerSortCommands(program);
  registerTokenCommands(program);

  return program;
}
