import { afterEach, beforeEach, vi } from 'vitest';
import { setLogLevel } from './src/log';

const CONSOLE_METHODS = ['log', 'info', 'debug', 'warn', 'error'] as const;

// Keep test output quiet; tests that assert on log lines read the spies through vi.mocked(console.*)
beforeEach(() => {
  setLogLevel('info');
  for (const method of CONSOLE_METHODS) {
    vi.spyOn(console, method).mockImplementation(() => {});
  }
});

afterEach(() => {
  for (const method of CONSOLE_METHODS) {
    vi.mocked(console[method]).mockRestore();
  }
});
