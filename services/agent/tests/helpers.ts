import type { IReadinessObserver, IReloader } from "../src/core/notifications";
import type { SchedulerTimers, WaitOutcome } from "../src/core/timers";

interface PendingWait {
  at: number;
  resolve: (outcome: WaitOutcome) => void;
}

/**
 * Manual clock: sleeps complete at once (advancing the clock), waits stay
 * pending until `elapse()` or the signal aborts.
 */
export class FakeTimers implements SchedulerTimers {
  readonly sleeps: number[] = [];
  readonly waits: number[] = [];
  private pending: PendingWait | null = null;
  private waitListeners: Array<() => void> = [];

  constructor(private current = 1_700_000_000_000) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }

  waitUntil(at: number, signal: AbortSignal): Promise<WaitOutcome> {
    this.waits.push(at);
    if (signal.aborted) {
      return Promise.resolve("aborted");
    }
    return new Promise<WaitOutcome>((resolve) => {
      this.pending = { at, resolve };
      signal.addEventListener(
        "abort",
        () => {
          this.pending = null;
          resolve("aborted");
        },
        { once: true }
      );
      const listeners = this.waitListeners;
      this.waitListeners = [];
      listeners.forEach((listener) => listener());
    });
  }

  /** Resolves once the scheduler is blocked in `waitUntil`. */
  waiting(): Promise<void> {
    if (this.pending) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waitListeners.push(resolve);
    });
  }

  /** Moves the clock to the pending wait's instant and releases it. */
  elapse(): void {
    const pending = this.pending;
    if (!pending) {
      throw new Error("no pending wait");
    }
    this.pending = null;
    if (Number.isFinite(pending.at)) {
      this.current = Math.max(this.current, pending.at);
    }
    pending.resolve("elapsed");
  }
}

export class RecordingReloader implements IReloader, IReadinessObserver {
  readonly events: string[] = [];
  private readonly failing = new Set<string>();

  fail(name: string): void {
    this.failing.add(name);
  }

  async reload(name: string): Promise<void> {
    this.events.push(`reload:${name}`);
    if (this.failing.has(name)) {
      throw new Error(`reload of ${name} failed`);
    }
  }

  async notifyReady(): Promise<void> {
    this.events.push("ready");
  }
}
