/**
 * Console and process.exit spies for command tests
 */

import { vi } from 'vitest';

export function spyOnCli() {
  const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  const exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
    throw new Error(`process.exit(${code})`);
  });

  const logged = (): string[] => logSpy.mock.calls.map(call => String(call[0]));

  return { logSpy, errorSpy, exitSpy, logged };
}
