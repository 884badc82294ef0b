import type { FastifyBaseLogger } from "fastify";
import type { FileSpec, SecretSpec } from "@satchel/schemas";
import type { ISecretStore } from "@satchel/secrets";
import type { LifecycleState } from "./lifecycle-state";
import { FileMaterializer } from "./materializer";
import type { NotificationDispatcher } from "./notifications";
import { SecretResolver } from "./resolver";
import type { TemplateFunctions } from "./template";
import { systemTimers, type SchedulerTimers, type WaitOutcome } from "./timers";

export type SchedulerPhase =
  | "idle"
  | "logging-in"
  | "initial-resolving"
  | "waiting"
  | "renewing"
  | "stopped"
  | "failed";

export interface SecretStatus {
  name: string;
  expiresAt: string | null;
  renewAt: string | null;
  files: string[];
}

export interface SchedulerStatus {
  phase: SchedulerPhase;
  ready: boolean;
  renewals: number;
  pendingNotifications: string[];
  nextUpdate: { secret: string; at: string } | null;
  secrets: SecretStatus[];
  lastError: string | null;
}

interface SecretSchedulerDeps {
  store: ISecretStore;
  state: LifecycleState;
  secrets: Record<string, SecretSpec>;
  files: FileSpec[];
  dispatcher: NotificationDispatcher;
  logger?: FastifyBaseLogger;
  timers?: SchedulerTimers;
  retryPeriodMs?: number;
  dataFunctions?: TemplateFunctions;
}

/**
 * Drives the agent: log in, resolve and write everything once, then keep
 * renewing whichever secret is due next until the signal aborts.
 */
export class SecretScheduler {
  private phase: SchedulerPhase = "idle";
  private ready = false;
  private renewals = 0;
  private lastError: string | null = null;
  private readonly timers: SchedulerTimers;
  private readonly resolver: SecretResolver;
  private readonly materializer: FileMaterializer;
  private readonly filesByPath: Map<string, FileSpec>;

  constructor(private readonly deps: SecretSchedulerDeps) {
    this.timers = deps.timers ?? systemTimers;
    this.resolver = new SecretResolver({
      store: deps.store,
      state: deps.state,
      sleep: (ms) => this.timers.sleep(ms),
      logger: deps.logger,
      retryPeriodMs: deps.retryPeriodMs,
      dataFunctions: deps.dataFunctions
    });
    this.materializer = new FileMaterializer({
      state: deps.state,
      dispatcher: deps.dispatcher,
      logger: deps.logger
    });
    this.filesByPath = new Map(deps.files.map((file) => [file.path, file]));
  }

  /**
   * Resolves when the signal aborts while waiting; rejects on the first
   * fatal error.
   */
  async run(signal: AbortSignal): Promise<void> {
    if (this.phase !== "idle") {
      throw new Error(`scheduler already started (phase ${this.phase})`);
    }

    try {
      await this.login();
      await this.initialPass();

      for (;;) {
        this.phase = "waiting";
        const next = this.deps.state.nextUpdate();
        let outcome: WaitOutcome;
        if (!next) {
          this.deps.logger?.info("agent: no secret to update");
          outcome = await this.timers.waitUntil(Number.POSITIVE_INFINITY, signal);
        } else {
          this.deps.logger?.debug({ secret: next.secret.name, at: next.at.toISOString() }, "agent: waiting for next update");
          outcome = await this.timers.waitUntil(next.at.getTime(), signal);
        }

        if (outcome === "aborted") {
          this.phase = "stopped";
          this.deps.logger?.info("agent: stopped");
          return;
        }
        if (next) {
          await this.renew(next.secret.name);
        }
      }
    } catch (err) {
      this.phase = "failed";
      this.lastError = err instanceof Error ? err.message : String(err);
      throw err;
    }
  }

  getStatus(): SchedulerStatus {
    const state = this.deps.state;
    const next = state.nextUpdate();
    return {
      phase: this.phase,
      ready: this.ready,
      renewals: this.renewals,
      pendingNotifications: this.deps.dispatcher.pendingNames(),
      nextUpdate: next ? { secret: next.secret.name, at: next.at.toISOString() } : null,
      secrets: state.secretNames().flatMap((name) => {
        const secret = state.getSecret(name);
        if (!secret) return [];
        const renewAt = state.renewAt(secret);
        return [
          {
            name,
            expiresAt: secret.expiresAt ? secret.expiresAt.toISOString() : null,
            renewAt: renewAt ? renewAt.toISOString() : null,
            files: secret.filesUsing.map((usage) => usage.path)
          }
        ];
      }),
      lastError: this.lastError
    };
  }

  private async login(): Promise<void> {
    this.phase = "logging-in";
    const persisted = this.deps.state.getToken();
    if (persisted) {
      this.deps.store.setToken(persisted);
    }
    await this.deps.store.login();
    this.deps.state.setToken(this.deps.store.getToken());
    this.deps.state.save();
    this.deps.logger?.info("agent: logged in to secret store");
  }

  private async initialPass(): Promise<void> {
    this.phase = "initial-resolving";
    const { state, secrets } = this.deps;

    for (const [name, spec] of Object.entries(secrets)) {
      if (state.hasSecret(name)) {
        // usages are rebuilt by the renders below
        state.clearUsages(name);
      } else {
        await this.resolver.resolveWithRetry(name, spec);
      }
    }

    for (const name of state.secretNames()) {
      if (!Object.hasOwn(secrets, name)) {
        state.deleteSecret(name);
        state.save();
        this.deps.logger?.info({ secret: name }, "agent: removed secret no longer configured");
      }
    }

    for (const file of this.deps.files) {
      await this.materializer.materialize(file);
    }

    await this.deps.dispatcher.notifyReady();
    this.ready = true;
    await this.deps.dispatcher.flushPending();
    state.save();
    this.deps.logger?.info(
      { secrets: state.secretNames().length, files: this.deps.files.length },
      "agent: initial pass complete"
    );
  }

  private async renew(name: string): Promise<void> {
    this.phase = "renewing";
    const { state } = this.deps;
    const spec = Object.hasOwn(this.deps.secrets, name) ? this.deps.secrets[name] : undefined;
    if (!spec) {
      state.deleteSecret(name);
      state.save();
      return;
    }

    await this.resolver.resolveWithRetry(name, spec);
    this.renewals += 1;

    for (const usage of state.filesUsing(name)) {
      const file = this.filesByPath.get(usage.path);
      if (!file) {
        this.deps.logger?.warn({ secret: name, path: usage.path }, "agent: skipping unknown file");
        continue;
      }
      await this.materializer.materialize(file);
    }

    await this.deps.dispatcher.flushPending();
    state.save();
  }
}
