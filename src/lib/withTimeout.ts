import { TraversalTimeoutError } from './errors.js';

/**
 * Races `task` against a wall-clock limit. The task keeps running after a
 * timeout; its eventual result or rejection is dropped.
 */
export async function withTimeout<T>(task: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TraversalTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([task, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
