import { setTimeout as delay } from 'timers/promises';
import type { RateLimitConfig } from './config.js';

export type RequestScheduler = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Sliding-window limiter for Companies House calls. Tasks run one at a time in
 * submission order; a failed task does not stall the ones queued behind it.
 */
export function createChRateLimiter(cfg: RateLimitConfig): RequestScheduler {
  const { windowMs, maxPerWindow, minIntervalMs } = cfg;
  const timestamps: number[] = [];
  let chain: Promise<unknown> = Promise.resolve();

  async function acquireSlot() {
    while (true) {
      const now = Date.now();
      while (timestamps.length && now - timestamps[0] >= windowMs) {
        timestamps.shift();
      }

      const sinceLast = timestamps.length ? now - timestamps[timestamps.length - 1] : Infinity;
      if (timestamps.length < maxPerWindow && sinceLast >= minIntervalMs) {
        timestamps.push(Date.now());
        return;
      }

      const waitForInterval = Math.max(0, minIntervalMs - sinceLast);
      const waitForWindow = timestamps.length >= maxPerWindow ? windowMs - (now - timestamps[0]) : 0;
      const waitMs = Math.max(waitForInterval, waitForWindow, 10);
      await delay(waitMs);
    }
  }

  return <T>(task: () => Promise<T>): Promise<T> => {
    const run = async () => {
      await acquireSlot();
      return task();
    };
    const next = chain.then(run, run);
    // Keep the queue alive past failures; the caller still sees the rejection via `next`
    chain = next.catch(() => undefined);
    return next;
  };
}

/** Scheduler that runs tasks immediately; for tests and one-off scripts. */
export const unlimited: RequestScheduler = (task) => task();
