import dotenv from 'dotenv';
import path from 'path';
import os from 'os';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { ConfigError, type LogFormat, type LogLevel } from 'segver-core';

// Load env vars from CWD .env, then from the home dir config
dotenv.config();
dotenv.config({ path: path.join(os.homedir(), '.segver', 'config') });

export type OutputFormat = 'text' | 'json';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];
const LOG_FORMATS: readonly LogFormat[] = ['pretty', 'json'];
const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json'];

function readChoice<T extends string>(name: string, choices: readonly T[], fallback: T): T {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const choice = choices.find((candidate) => candidate === raw.trim().toLowerCase());
  if (!choice) {
    throw new ConfigError(`${name} must be one of: ${choices.join(', ')} (got "${raw}")`);
  }
  return choice;
}

/**
 * Version from the package.json one level above this file, which is segver-cli/package.json
 * from both src/ and dist/. Binary builds inject SEGVER_CLI_VERSION instead.
 */
function readPackageVersion(): string {
  const __dirname = path.dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = path.join(__dirname, '../package.json');

  const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  throw new ConfigError(`${packageJsonPath} has no version`);
}

export const config = {
  get logLevel(): LogLevel {
    return readChoice('SEGVER_LOG_LEVEL', LOG_LEVELS, 'warn');
  },
  get logFormat(): LogFormat {
    return readChoice('SEGVER_LOG_FORMAT', LOG_FORMATS, 'pretty');
  },
  get outputFormat(): OutputFormat {
    return readChoice('SEGVER_OUTPUT', OUTPUT_FORMATS, 'text');
  },
  get cliVersion(): string {
    return process.env.SEGVER_CLI_VERSION || readPackageVersion();
  }
};
