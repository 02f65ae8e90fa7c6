/** Bounded fan-out/fan-in for independent, I/O-bound provider calls. */

type Task<T> = () => Promise<T>;

export function createLimiter(maxConcurrent: number) {
  if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
    throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const dequeue = () => {
    if (active >= maxConcurrent) return;
    const next = queue.shift();
    if (!next) return;
    active += 1;
    next();
  };

  return function limit<T>(task: Task<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const run = async () => {
        try {
          resolve(await task());
        } catch (err) {
          reject(err);
        } finally {
          active -= 1;
          dequeue();
        }
      };

      queue.push(() => {
        void run();
      });
      dequeue();
    });
  };
}

export interface PoolTask<K, T> {
  key: K;
  run: () => Promise<T>;
}

export type TaskOutcome<K, T> =
  | { key: K; ok: true; value: T }
  | { key: K; ok: false; error: Error };

/**
 * Run every task with at most `concurrency` in flight.
 * Outcomes arrive in completion order, each tagged with its task key; a
 * rejected task becomes a failure outcome and never affects its siblings.
 */
export async function runPool<K, T>(
  tasks: readonly PoolTask<K, T>[],
  concurrency: number,
  onSettled?: (outcome: TaskOutcome<K, T>) => void,
): Promise<TaskOutcome<K, T>[]> {
  const limit = createLimiter(concurrency);
  const outcomes: TaskOutcome<K, T>[] = [];

  const settle = (outcome: TaskOutcome<K, T>) => {
    outcomes.push(outcome);
    onSettled?.(outcome);
  };

  await Promise.all(
    tasks.map((task) =>
      limit(task.run).then(
        (value) => settle({ key: task.key, ok: true, value }),
        (err: unknown) =>
          settle({ key: task.key, ok: false, error: err instanceof Error ? err : new Error(String(err)) }),
      ),
    ),
  );

  return outcomes;
}
