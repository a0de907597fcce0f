export class TimeoutError extends Error {
  code: string;
  timeoutMs: number;

  constructor(timeoutMs: number, label = "Operation") {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.code = "ETIMEDOUT";
    this.timeoutMs = timeoutMs;
  }
}

export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label?: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<T>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeoutMs, label)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/**
 * Like withTimeout, but hands the task an AbortSignal that fires on timeout
 * or when the caller's own signal aborts, so the underlying request is cancelled too.
 */
export async function withAbortableTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  opts: { label?: string; signal?: AbortSignal } = {}
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(opts.signal?.reason);

  if (opts.signal?.aborted) {
    controller.abort(opts.signal.reason);
  } else {
    opts.signal?.addEventListener("abort", onParentAbort, { once: true });
  }

  try {
    return await withTimeout(task(controller.signal), timeoutMs, opts.label);
  } catch (error) {
    if (error instanceof TimeoutError) controller.abort(error);
    throw error;
  } finally {
    opts.signal?.removeEventListener("abort", onParentAbort);
  }
}
