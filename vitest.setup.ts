// Global test setup
import { afterEach, beforeEach, vi } from 'vitest';

const originalFetch = globalThis.fetch;

// Keep service logging out of the test output
beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  globalThis.fetch = originalFetch;
});
