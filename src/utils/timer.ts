import { setTimeout as delay } from 'node:timers/promises';

/**
 * Format a duration in milliseconds to a human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/**
 * Create a simple stopwatch
 */
export function stopwatch(): { elapsed: () => number; formatted: () => string } {
  const start = performance.now();
  return {
    elapsed: () => performance.now() - start,
    formatted: () => formatDuration(performance.now() - start),
  };
}

/**
 * Sleep that resolves early, without throwing, when the signal aborts.
 * Resolves true when the full duration elapsed.
 */
export async function interruptibleSleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return false;
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (err) {
    if (err instanceof Error && err.name === 'AbortError') {
      return false;
    }
    throw err;
  }
}
