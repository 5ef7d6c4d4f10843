// Pure rate limiting functions
// All functions are pure - no side effects

/**
 * Minimum spacing between invocations for a requests-per-second limit.
 */
export const minIntervalMs = (requestsPerSecond: number): number => {
  return 1000 / requestsPerSecond;
};

/**
 * How long to wait before the next invocation may start.
 * The first invocation (no previous timestamp) never waits.
 */
export const calculateThrottleDelay = (
  lastInvokedAt: number | undefined,
  now: number,
  intervalMs: number
): number => {
  if (lastInvokedAt === undefined) {
    return 0;
  }

  const elapsed = now - lastInvokedAt;
  return elapsed < intervalMs ? intervalMs - elapsed : 0;
};
