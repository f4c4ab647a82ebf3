import { CancelledError, PollTimeoutError } from "./errors.js";

export const DEFAULT_POLL_INTERVAL_MS = 30 * 1000;

/** Returns true once the awaited condition holds. Throwing stops the wait. */
export type ConditionCheck = (signal?: AbortSignal) => Promise<boolean>;

export type WaitOptions = {
  timeoutMs: number;
  intervalMs?: number;
  signal?: AbortSignal;
  /** Used in timeout and cancellation messages, e.g. `cluster "demo" to be ready`. */
  description?: string;
};

/**
 * Poll `check` until it returns true, it throws, the timeout elapses or the
 * signal aborts. The first check runs immediately; later ones follow a fixed
 * interval. Nothing keeps running after the promise settles.
 */
export async function waitFor(check: ConditionCheck, options: WaitOptions): Promise<void> {
  const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const description = options.description ?? "condition";
  const deadline = Date.now() + options.timeoutMs;

  for (;;) {
    throwIfAborted(options.signal, description);

    if (await check(options.signal)) return;

    throwIfAborted(options.signal, description);

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw new PollTimeoutError(description, options.timeoutMs);
    }

    await sleep(Math.min(intervalMs, remaining), options.signal, `waiting for ${description}`);
  }
}

/** Resolve after `ms`, or reject with CancelledError as soon as the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal, description = "sleeping"): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError(description, { cause: signal.reason }));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError(description, { cause: signal?.reason }));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function throwIfAborted(signal: AbortSignal | undefined, description: string): void {
  if (signal?.aborted) {
    throw new CancelledError(`waiting for ${description}`, { cause: signal.reason });
  }
}
