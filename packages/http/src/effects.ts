import { performance } from 'node:perf_hooks';

import type { Logger } from '@reqbench/logger';
import { fetch as undiciFetch } from 'undici';

import { clampTimerDelay } from './core/http-utils.js';
import type { HttpEffects } from './core/types.js';

/**
 * Production effects: undici fetch, real timers, the performance clock and the
 * shared logger. Tests override any subset.
 */
export function createHttpEffects(logger: Logger, overrides: Partial<HttpEffects> = {}): HttpEffects {
  return {
    date: () => new Date(),
    delay: (ms: number) => new Promise((resolve) => setTimeout(resolve, clampTimerDelay(ms))),
    fetch: (url, init) => undiciFetch(url, init),
    log: (level, message, metadata) => {
      if (metadata) {
        logger[level](metadata, message);
      } else {
        logger[level](message);
      }
    },
    now: () => performance.now(),
    ...overrides,
  };
}
