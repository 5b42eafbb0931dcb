import { Command } from 'commander';
import { highestVersion, sortVersions, type SortDirection } from 'segver-core';
import { runCommand } from '../utils/command.js';
import { outputJSON } from '../utils/formatter.js';

export function registerSortCommands(program: Command): void {
  program
    .command('sort <versions...>')
    .description('Print versions one per line, lowest first')
    .option('--desc', 'Print highest first')
    .action((versions: string[], cmdOpts: { desc?: boolean }) => {
      runCommand(program, 'sort', ({ logger, json }) => {
        const direction: SortDirection = cmdOpts.desc ? 'desc' : 'asc';
        const sorted = sortVersions(versions, direction);
        logger.debug('Sorted versions', { direction, count: sorted.length });

        if (json) {
          outputJSON({ direction, versions: sorted });
          return;
        }
        sorted.forEach((version) => console.log(version));
      });
    });

  program
    .command('max <versions...>')
    .description('Print the highest version')
    .action((versions: string[]) => {
      runCommand(program, 'max', ({ logger, json }) => {
        const highest = highestVersion(versions);
        logger.debug('Found highest version', { count: versions.length, highest });

        if (json) {
          outputJSON({ highest });
          return;
        }
        console.log(highest);
      });
    });
}
