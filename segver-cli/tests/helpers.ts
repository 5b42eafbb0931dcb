import { vi } from 'vitest';
import { createProgram } from '../src/program.js';

/**
 * Thrown by the process.exit stub so a test can see the exit code without the worker exiting.
 */
export class ExitCalled extends Error {
  constructor(readonly code: string | number | null | undefined) {
    super(`process.exit(${String(code)})`);
  }
}

export function mockExit() {
  return vi.spyOn(process, 'exit').mockImplementation((code) => {
    throw new ExitCalled(code);
  });
}

export function mockConsole() {
  return {
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
  };
}

/**
 * Clears the SEGVER_* variables a developer may have set, so defaults apply.
 */
export function stubDefaultEnv(): void {
  vi.stubEnv('SEGVER_OUTPUT', '');
  vi.stubEnv('SEGVER_LOG_LEVEL', '');
  vi.stubEnv('SEGVER_LOG_FORMAT', '');
}

export async function runCli(...args: string[]): Promise<void> {
  await createProgram().parseAsync(args, { from: 'user' });
}

export function jsonOutput(data: unknown): string {
  return JSON.stringify({ success: true, data }, null, 2);
}
