/**
 * Vitest test setup file.
 * Silences the console logger and resets device storage between tests.
 */

import { afterEach, vi } from 'vitest';
import { setLogLevel } from './utils/logger.js';
import { initStorage, MemoryStorage } from './utils/storage.js';

setLogLevel('silent');

afterEach(() => {
  initStorage(new MemoryStorage());
  vi.restoreAllMocks();
});
