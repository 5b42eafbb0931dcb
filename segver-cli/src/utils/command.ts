import type { Command } from 'commander';
import { ConsoleLogger, type ILogger } from 'segver-core';
import { config } from '../config.js';
import { handleError } from './errors.js';

export type GlobalOptions = {
  json?: boolean;
  verbose?: boolean;
};

export interface CommandContext {
  logger: ILogger;
  json: boolean;
}

/**
 * Runs a command action with a logger bound to the command name and routes every
 * error through handleError.
 */
export function runCommand(program: Command, name: string, action: (context: CommandContext) => void): void {
  const opts = program.opts<GlobalOptions>();
  let json = opts.json === true;

  try {
    json = json || config.outputFormat === 'json';

    const logger = new ConsoleLogger(config.logLevel, { component: 'segver' }, config.logFormat);
    if (opts.verbose) {
      logger.setLevel('debug');
    }

    action({ logger: logger.child({ command: name }), json });
  } catch (err) {
    handleError(err, json);
  }
}
