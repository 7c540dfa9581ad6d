import { availableParallelism } from 'node:os';

export type TaskOutcome<T> = { status: 'done'; value: T } | { status: 'not-started' };

export type TaskPoolOptions = {
  /** Worker count; defaults to the host's available parallelism. */
  concurrency?: number;
  /** Once aborted, no further task is started. Running tasks are not touched here. */
  signal?: AbortSignal;
};

export function defaultConcurrency(): number {
  return Math.max(1, availableParallelism());
}

/**
 * Run tasks on a fixed number of workers, preserving input order in the
 * returned outcomes. Tasks are expected to settle their own errors; a
 * rejection propagates and fails the whole pool.
 */
export async function runTaskPool<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  options: TaskPoolOptions = {},
): Promise<TaskOutcome<T>[]> {
  const outcomes: TaskOutcome<T>[] = tasks.map(() => ({ status: 'not-started' }));
  const size = Math.max(1, Math.min(options.concurrency ?? defaultConcurrency(), tasks.length));
  let next = 0;

  async function worker() {
    while (next < tasks.length) {
      if (options.signal?.aborted) return;
      const i = next++;
      outcomes[i] = { status: 'done', value: await tasks[i]() };
    }
  }

  await Promise.all(Array.from({ length: size }, () => worker()));
  return outcomes;
}
