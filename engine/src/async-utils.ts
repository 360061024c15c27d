export class TimeoutError extends Error {
  readonly code = "OPERATION_TIMED_OUT";
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class OperationAbortedError extends Error {
  readonly code = "OPERATION_ABORTED";

  constructor(operation: string) {
    super(`${operation} was aborted`);
    this.name = "OperationAbortedError";
  }
}

/**
 * Runs `task` with a child abort signal that fires when the deadline passes or
 * the parent signal aborts. A task that ignores its signal is still raced, so
 * the caller never waits past the deadline.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number | undefined,
  task: (signal: AbortSignal) => Promise<T>,
  parentSignal?: AbortSignal
): Promise<T> {
  if (parentSignal?.aborted) {
    throw new OperationAbortedError(operation);
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const guards = new Promise<never>((_, reject) => {
    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        const error = new TimeoutError(operation, timeoutMs);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    }

    if (parentSignal !== undefined) {
      onParentAbort = () => {
        const error = new OperationAbortedError(operation);
        controller.abort(error);
        reject(error);
      };
      parentSignal.addEventListener("abort", onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([task(controller.signal), guards]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
    if (parentSignal !== undefined && onParentAbort !== undefined) {
      parentSignal.removeEventListener("abort", onParentAbort);
    }
  }
}

export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new OperationAbortedError(operation);
  }
}

/**
 * Maps `items` through `worker` with at most `concurrency` calls in flight.
 * Results keep input order. Each worker call starts on a fresh macrotask so
 * synchronous work inside one slot does not starve timers. A non-finite
 * `concurrency` runs one call at a time.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => R | Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  const limit = Number.isFinite(concurrency) ? Math.max(1, Math.floor(concurrency)) : 1;
  const results = new Array<R>(items.length);
  let next = 0;

  const runSlot = async (): Promise<void> => {
    while (next < items.length) {
      const index = next;
      next += 1;
      await new Promise<void>((resolveTurn) => setImmediate(resolveTurn));
      throwIfAborted(signal, "Concurrent map");
      results[index] = await worker(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, () => runSlot()));
  return results;
}
