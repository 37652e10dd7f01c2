export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TimeoutError";
  }
}

/** Reject with TimeoutError if `promise` has not settled after `ms`. A non-positive `ms` disables the bound. */
export function withTimeout<T>(promise: Promise<T>, ms: number, label = "Operation"): Promise<T> {
  if (ms <= 0) return promise;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(`${label} timed out after ${ms}ms`)), ms);
    timer.unref();
  });
  return Promise.race([promise, deadline]).finally(() => clearTimeout(timer));
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface PollOptions {
  timeoutMs: number;
  intervalMs?: number;
  label?: string;
}

/**
 * Calls `check` until it yields a non-null value or the deadline passes.
 * `check` always runs at least once, so a zero timeout means "look once".
 */
export async function pollUntil<T>(
  check: () => Promise<T | null>,
  options: PollOptions,
): Promise<T> {
  const interval = options.intervalMs ?? 250;
  const deadline = Date.now() + options.timeoutMs;
  for (;;) {
    const value = await check();
    if (value !== null) return value;
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw new TimeoutError(`${options.label ?? "Condition"} not met within ${options.timeoutMs}ms`);
    }
    await sleep(Math.min(interval, remaining));
  }
}
