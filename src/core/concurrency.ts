/**
 * Bounded fan-out for independent async work.
 */

import { availableParallelism } from "node:os";

/**
 * Default pool size: one slot per available CPU, at least 2.
 */
export function defaultConcurrency(): number {
  return Math.max(2, availableParallelism());
}

/**
 * Run task factories with at most `limit` in flight.
 * Results keep the order of `tasks`. The first rejection rejects the whole
 * batch; tasks not yet started are not started.
 */
export async function limitConcurrency<T>(
  tasks: Array<() => Promise<T>>,
  limit: number,
  signal?: AbortSignal
): Promise<T[]> {
  const results = new Array<T>(tasks.length);
  let next = 0;
  let failed = false;

  async function worker(): Promise<void> {
    while (!failed && next < tasks.length) {
      signal?.throwIfAborted();
      const index = next++;
      const task = tasks[index];
      if (!task) continue;
      try {
        results[index] = await task();
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  }

  const workerCount = Math.max(1, Math.min(limit, tasks.length));
  const workers: Promise<void>[] = [];
  for (let i = 0; i < workerCount; i++) {
    workers.push(worker());
  }
  await Promise.all(workers);

  return results;
}
