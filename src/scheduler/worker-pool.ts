// ── Bounded Worker Pool ─────────────────────────────────────────────────────

export interface PoolOptions<T> {
  /** Task functions, each handed the pool's signal. */
  readonly tasks: ReadonlyArray<(signal: AbortSignal) => Promise<T>>;
  /** Maximum tasks in flight. Values below 1 are treated as 1. */
  readonly maxConcurrency: number;
  /** Aborting stops launching new tasks and is forwarded to in-flight ones. */
  readonly signal?: AbortSignal;
}

export type PoolSlot<T> =
  | { readonly status: "fulfilled"; readonly value: T }
  | { readonly status: "rejected"; readonly reason: unknown }
  | { readonly status: "skipped" };

export interface PoolResult<T> {
  /** One slot per task, in input order. */
  readonly slots: readonly PoolSlot<T>[];
  readonly aborted: boolean;
}

/**
 * Runs tasks with at most `maxConcurrency` in flight. A failing task never
 * stops the others; tasks not started before an abort are reported `skipped`.
 * Never rejects.
 */
export async function runPool<T>(options: PoolOptions<T>): Promise<PoolResult<T>> {
  const { tasks, maxConcurrency, signal } = options;
  const slots = tasks.map((): PoolSlot<T> => ({ status: "skipped" }));

  if (tasks.length === 0) {
    return { slots, aborted: signal?.aborted ?? false };
  }
  if (signal?.aborted) {
    return { slots, aborted: true };
  }

  const controller = new AbortController();
  const onParentAbort = () => controller.abort();
  signal?.addEventListener("abort", onParentAbort, { once: true });

  let nextIndex = 0;
  const worker = async (): Promise<void> => {
    while (nextIndex < tasks.length && !controller.signal.aborted) {
      const index = nextIndex++;
      const task = tasks[index];
      if (!task) continue;
      try {
        slots[index] = { status: "fulfilled", value: await task(controller.signal) };
      } catch (reason: unknown) {
        slots[index] = { status: "rejected", reason };
      }
    }
  };

  const workerCount = Math.max(1, Math.min(maxConcurrency, tasks.length));
  try {
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
  } finally {
    signal?.removeEventListener("abort", onParentAbort);
  }

  return { slots, aborted: signal?.aborted ?? false };
}
