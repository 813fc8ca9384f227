export class TimeBudgetExceededError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} exceeded time budget of ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class OperationAbortedError extends Error {
  constructor(label: string, opts: { cause?: unknown } = {}) {
    super(`${label} was aborted`, { cause: opts.cause });
    this.name = "AbortError";
  }
}

/**
 * Run an operation under a time budget and an optional caller signal.
 *
 * The operation receives an AbortSignal that fires when either the budget
 * expires or the caller aborts, so network clients can cancel in-flight work.
 * Rejects with TimeBudgetExceededError or OperationAbortedError; never waits
 * past the budget for the operation to notice.
 */
export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  opts: { timeoutMs: number; signal?: AbortSignal; label?: string },
): Promise<T> {
  const { timeoutMs, signal, label = "operation" } = opts;

  if (signal?.aborted) {
    throw new OperationAbortedError(label, { cause: signal.reason });
  }

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;

  const budget = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new TimeBudgetExceededError(label, timeoutMs);
      // Settle first so the race reports the budget, not the operation's abort error
      reject(err);
      controller.abort(err);
    }, timeoutMs);

    if (signal) {
      onAbort = () => {
        reject(new OperationAbortedError(label, { cause: signal.reason }));
        controller.abort(signal.reason);
      };
      signal.addEventListener("abort", onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([run(controller.signal), budget]);
  } finally {
    if (timer) clearTimeout(timer);
    if (signal && onAbort) signal.removeEventListener("abort", onAbort);
  }
}
