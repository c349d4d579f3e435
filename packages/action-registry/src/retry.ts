import { HandlerError } from "./errors";
import type { ActionHandler } from "./types";

export type RetryOptions = {
  /** Total tries, including the first. */
  attempts?: number;
  delayMs?: number;
  shouldRetry?: (err: unknown, attempt: number) => boolean;
};

const isRetryable = (err: unknown) => err instanceof HandlerError && err.retryable;

const wait = (ms: number, signal: AbortSignal) =>
  new Promise<void>((resolve) => {
    if (ms <= 0 || signal.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    }
    signal.addEventListener("abort", done, { once: true });
  });

/**
 * Wraps a handler so transient failures are attempted again. The executor
 * itself never retries.
 */
export function withRetry<P>(handler: ActionHandler<P>, { attempts = 3, delayMs = 250, shouldRetry = isRetryable }: RetryOptions = {}): ActionHandler<P> {
  const maxAttempts = Math.max(1, Math.floor(attempts));
  return async (parameters, context) => {
    let attempt = 0;
    for (;;) {
      attempt += 1;
      try {
        return await handler(parameters, context);
      } catch (err) {
        if (attempt >= maxAttempts || context.signal.aborted || !shouldRetry(err, attempt)) {
          throw err;
        }
        await wait(delayMs, context.signal);
        if (context.signal.aborted) throw err;
      }
    }
  };
}
