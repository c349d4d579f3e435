import { HandlerError } from "@opsflow/action-registry";

export class StepTimeoutError extends HandlerError {
  constructor(action: string, timeoutMs: number) {
    super("step_timeout", `${action} did not finish within ${timeoutMs}ms`, {
      retryable: true,
      details: { action, timeoutMs }
    });
    this.name = "StepTimeoutError";
  }
}

/**
 * Settles with `work`, or rejects with `onTimeout()` once `timeoutMs` passes.
 * Without a positive bound the work is awaited as is.
 */
export async function raceTimeout<T>(work: Promise<T>, timeoutMs: number | undefined, onTimeout: () => Error): Promise<T> {
  if (timeoutMs === undefined || timeoutMs <= 0) return work;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  try {
    return await Promise.race([work, expired]);
  } finally {
    clearTimeout(timer);
  }
}
