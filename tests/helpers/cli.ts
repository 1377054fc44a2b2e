/**
 * Console and process.exit capture for command tests
 */

import { vi } from 'vitest';

/** Thrown by the mocked process.exit so the command stops where it would have exited */
export class ExitCalled extends Error {
  constructor(readonly code: string | number | null | undefined) {
    super(`process.exit(${String(code)})`);
    this.name = 'ExitCalled';
  }
}

export function mockProcessExit() {
  return vi.spyOn(process, 'exit').mockImplementation(code => {
    throw new ExitCalled(code);
  });
}

export function captureConsole() {
  const log = vi.spyOn(console, 'log').mockImplementation(() => {});
  const error = vi.spyOn(console, 'error').mockImplementation(() => {});

  const join = (calls: unknown[][]): string[] => calls.map(args => args.map(String).join(' '));

  return {
    log,
    error,
    /** console.log output, one entry per call */
    lines: (): string[] => join(log.mock.calls),
    errors: (): string[] => join(error.mock.calls),
  };
}
