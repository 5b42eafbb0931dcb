import { Command } from 'commander';
import {
  compareVersions,
  higherVersion,
  isHigherOrSameVersion,
  isLowerOrSameVersion,
  isSameVersion,
  isStrictlyHigherVersion,
  isStrictlyLowerVersion
} from 'segver-core';
import { runCommand } from '../utils/command.js';
import { ExitCode } from '../utils/errors.js';
import { outputJSON } from '../utils/formatter.js';
import { validateRelation, type Relation } from '../utils/validation.js';

const RELATION_PREDICATES: Record<Relation, (left: string, right: string) => boolean> = {
  gt: isStrictlyHigherVersion,
  ge: isHigherOrSameVersion,
  lt: isStrictlyLowerVersion,
  le: isLowerOrSameVersion,
  eq: isSameVersion
};

/**
 * Register version comparison commands
 *
 * Provides:
 * - `segver compare <left> <right>` - Print -1, 0 or 1
 * - `segver higher <left> <right>` - Print the higher version
 * - `segver check <left> <relation> <right>` - Test a relation, exit 1 when it does not hold
 */
export function registerCompareCommands(program: Command): void {
  program
    .command('compare <left> <right>')
    .description('Print -1, 0 or 1 as <left> is lower than, the same as, or higher than <right>')
    .action((left: string, right: string) => {
      runCommand(program, 'compare', ({ logger, json }) => {
        const result = compareVersions(left, right);
        logger.debug('Compared versions', { left, right, result });

        if (json) {
          outputJSON({ left, right, result });
          return;
        }
        console.log(String(result));
      });
    });

  program
    .command('higher <left> <right>')
    .description('Print the higher of two versions (the first one when they are the same)')
    .action((left: string, right: string) => {
      runCommand(program, 'higher', ({ logger, json }) => {
        const higher = higherVersion(left, right);
        logger.debug('Picked higher version', { left, right, higher });

        if (json) {
          outputJSON({ left, right, higher });
          return;
        }
        console.log(higher);
      });
    });

  program
    .command('check <left> <relation> <right>')
    .description('Check a relation between two versions: gt, ge, lt, le or eq')
    .action((left: string, relationArg: string, right: string) => {
      runCommand(program, 'check', ({ logger, json }) => {
        const relation = validateRelation(relationArg);
        const satisfied = RELATION_PREDICATES[relation](left, right);
        logger.debug('Checked relation', { left, relation, right, satisfied });

        if (!satisfied) {
          process.exitCode = ExitCode.unsatisfied;
        }

        if (json) {
          outputJSON({ left, relation, right, satisfied });
          return;
        }
        console.log(String(satisfied));
      });
    });
}
