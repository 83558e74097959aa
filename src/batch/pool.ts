/**
 * Bounded task pool.
 *
 * Runs one task per item with at most `concurrency` in flight. Aborting
 * stops new tasks from starting; tasks already running finish.
 */

export type TaskOutcome<T, R> =
  | { item: T; status: "fulfilled"; value: R }
  | { item: T; status: "rejected"; reason: unknown }
  | { item: T; status: "skipped" };

export type PoolOptions = {
  concurrency: number;
  signal?: AbortSignal;
  /** Stop starting tasks after the first rejection */
  failFast?: boolean;
};

export async function runPool<T, R>(
  items: readonly T[],
  task: (item: T) => Promise<R>,
  options: PoolOptions
): Promise<TaskOutcome<T, R>[]> {
  const outcomes: (TaskOutcome<T, R> | undefined)[] = new Array(items.length).fill(undefined);
  const workers = Math.max(1, Math.min(Math.floor(options.concurrency), items.length));
  let next = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    for (;;) {
      if (options.signal?.aborted || (options.failFast && failed)) return;
      const index = next++;
      if (index >= items.length) return;
      const item = items[index];
      try {
        outcomes[index] = { item, status: "fulfilled", value: await task(item) };
      } catch (reason) {
        failed = true;
        outcomes[index] = { item, status: "rejected", reason };
      }
    }
  };

  await Promise.all(Array.from({ length: workers }, worker));

  return items.map((item, index) => outcomes[index] ?? { item, status: "skipped" });
}
