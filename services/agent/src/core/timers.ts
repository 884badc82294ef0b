/** Longest delay setTimeout honours; longer waits are split into chunks. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export type WaitOutcome = "elapsed" | "aborted";

/**
 * The scheduler's only suspension points. Swapped for a fake clock in tests.
 */
export interface SchedulerTimers {
  now(): number;
  /** Fixed back-off between retries; not interruptible. */
  sleep(ms: number): Promise<void>;
  /** Waits until the instant `at` (epoch ms, may be Infinity) or until `signal` aborts. */
  waitUntil(at: number, signal: AbortSignal): Promise<WaitOutcome>;
}

export const systemTimers: SchedulerTimers = {
  now: () => Date.now(),

  sleep: (ms) =>
    new Promise<void>((resolve) => {
      setTimeout(resolve, ms);
    }),

  async waitUntil(at, signal) {
    while (!signal.aborted) {
      const remaining = at - Date.now();
      if (remaining <= 0) {
        return "elapsed";
      }
      const outcome = await delayOrAbort(Math.min(remaining, MAX_TIMER_DELAY_MS), signal);
      if (outcome === "aborted") {
        return "aborted";
      }
    }
    return "aborted";
  }
};

function delayOrAbort(ms: number, signal: AbortSignal): Promise<WaitOutcome> {
  return new Promise<WaitOutcome>((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve("aborted");
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve("elapsed");
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
