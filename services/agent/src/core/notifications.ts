import type { FastifyBaseLogger } from "fastify";

/** Makes a dependent service pick up its new configuration. */
export interface IReloader {
  reload(name: string): Promise<void>;
}

/** Told once that every configured file has been written. */
export interface IReadinessObserver {
  notifyReady(): Promise<void>;
}

interface NotificationDispatcherDeps {
  reloader?: IReloader;
  logger?: FastifyBaseLogger;
}

/**
 * Collects the notifier names of changed files and reloads each one once per
 * flush. Delivery failures are logged and never retried within a cycle.
 */
export class NotificationDispatcher {
  private readonly pending = new Set<string>();
  private readonly observers: IReadinessObserver[] = [];
  private reloader?: IReloader;
  private ready = false;

  constructor(private readonly deps: NotificationDispatcherDeps = {}) {
    this.reloader = deps.reloader;
  }

  setReloader(reloader: IReloader): void {
    this.reloader = reloader;
  }

  addReadinessObserver(observer: IReadinessObserver): void {
    this.observers.push(observer);
  }

  markPending(...names: string[]): void {
    for (const name of names) {
      this.pending.add(name);
    }
  }

  pendingNames(): string[] {
    return Array.from(this.pending);
  }

  /**
   * Delivers every pending name once and empties the pending set.
   * Returns the names that were reloaded successfully.
   */
  async flushPending(): Promise<string[]> {
    const names = Array.from(this.pending);
    this.pending.clear();
    const delivered: string[] = [];

    for (const name of names) {
      if (!this.reloader) {
        this.deps.logger?.warn({ notifier: name }, "agent: no reloader configured, dropping notification");
        continue;
      }
      try {
        await this.reloader.reload(name);
        delivered.push(name);
        this.deps.logger?.info({ notifier: name }, "agent: notifier reloaded");
      } catch (err) {
        this.deps.logger?.error({ err, notifier: name }, "agent: reload failed");
      }
    }

    return delivered;
  }

  /**
   * Signals readiness to every observer. Only the first call has an effect.
   */
  async notifyReady(): Promise<void> {
    if (this.ready) {
      return;
    }
    this.ready = true;
    for (const observer of this.observers) {
      try {
        await observer.notifyReady();
      } catch (err) {
        this.deps.logger?.error({ err }, "agent: readiness notification failed");
      }
    }
  }

  isReady(): boolean {
    return this.ready;
  }
}
