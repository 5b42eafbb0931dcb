import { AppError, ConfigError, InvalidArgumentError } from 'segver-core';

export interface CLIError {
  success: false;
  error: string;
  message: string;
  details?: Record<string, unknown>;
  suggestion?: string;
}

/**
 * Exit code mapping:
 *   0 = Success, or the checked relation holds
 *   1 = The checked relation does not hold
 *   2 = Invalid argument
 *   3 = Configuration error
 *   4 = Unexpected error
 */
export const ExitCode = {
  success: 0,
  unsatisfied: 1,
  invalidArgument: 2,
  config: 3,
  unexpected: 4
} as const;

export function createError(
  code: string,
  message: string,
  details?: Record<string, unknown>,
  suggestion?: string
): CLIError {
  return {
    success: false,
    error: code,
    message,
    details,
    suggestion
  };
}

function splitSuggestion(details: Record<string, unknown> = {}): {
  details?: Record<string, unknown>;
  suggestion?: string;
} {
  const { suggestion, ...rest } = details;
  return {
    details: Object.keys(rest).length > 0 ? rest : undefined,
    suggestion: typeof suggestion === 'string' ? suggestion : undefined
  };
}

export function toCLIError(err: unknown): { cliError: CLIError; exitCode: number } {
  if (err instanceof InvalidArgumentError) {
    const { details, suggestion } = splitSuggestion(err.details);
    return {
      cliError: createError('invalid_argument', err.message, details, suggestion),
      exitCode: ExitCode.invalidArgument
    };
  }

  if (err instanceof ConfigError) {
    return {
      cliError: createError('config_error', err.message, undefined, 'Check the SEGVER_* environment variables'),
      exitCode: ExitCode.config
    };
  }

  if (err instanceof AppError) {
    return {
      cliError: createError(err.code.toLowerCase(), err.message, err.details),
      exitCode: ExitCode.unexpected
    };
  }

  return {
    cliError: createError(
      'unknown_error',
      err instanceof Error ? err.message : 'An unexpected error occurred',
      { originalError: String(err) }
    ),
    exitCode: ExitCode.unexpected
  };
}

export function handleError(err: unknown, json: boolean): never {
  const { cliError, exitCode } = toCLIError(err);

  if (json) {
    console.log(JSON.stringify(cliError, null, 2));
  } else {
    console.error(`\nError: ${cliError.message}`);
    if (cliError.details) {
      console.error(`   Details: ${JSON.stringify(cliError.details)}`);
    }
    if (cliError.suggestion) {
      console.error(`   ${cliError.suggestion}`);
    }
    console.error('');
  }

  process.exit(exitCode);
}

export function throwValidationError(message: string, suggestion?: string): never {
  throw new InvalidArgumentError(message, suggestion ? { suggestion } : undefined);
}
