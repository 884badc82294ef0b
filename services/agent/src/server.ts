import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import type { AgentConfig } from "@satchel/schemas";
import { SecretStoreFactory, type ISecretStore } from "@satchel/secrets";
import { createDataFunctions } from "./core/data-template";
import { LifecycleState } from "./core/lifecycle-state";
import { NotificationDispatcher, type IReadinessObserver, type IReloader } from "./core/notifications";
import { SecretScheduler } from "./core/scheduler";
import type { IStateStore } from "./core/state-store";
import type { SchedulerTimers } from "./core/timers";
import { openStateDatabase } from "./db/connection";
import { SqliteStateStore } from "./db/state-repo";
import { SystemdReadiness } from "./notifiers/readiness";
import { NotifierReloader } from "./notifiers/reloader";
import { registerStatusRoutes } from "./routes/status";

interface BuildAgentOptions {
  config: AgentConfig;
  logger?: FastifyServerOptions["logger"];
  store?: ISecretStore;
  /** Defaults to SQLite at `config.statePath`. */
  stateStore?: IStateStore;
  reloader?: IReloader;
  readiness?: IReadinessObserver;
  timers?: SchedulerTimers;
  env?: NodeJS.ProcessEnv;
}

export interface Agent {
  app: FastifyInstance;
  scheduler: SecretScheduler;
}

export async function buildAgent(options: BuildAgentOptions): Promise<Agent> {
  const { config, timers } = options;
  const env = options.env ?? process.env;
  const app = Fastify({ logger: options.logger ?? true });

  let stateStore = options.stateStore;
  if (!stateStore) {
    const sqlite = new SqliteStateStore(openStateDatabase(config.statePath, app.log));
    app.addHook("onClose", async () => {
      sqlite.close();
    });
    stateStore = sqlite;
  }

  const state = LifecycleState.restore({
    store: stateStore,
    logger: app.log,
    renewFraction: config.renewFraction,
    now: timers ? () => timers.now() : undefined
  });

  const dispatcher = new NotificationDispatcher({
    reloader: options.reloader ?? new NotifierReloader(config.notifiers, { logger: app.log }),
    logger: app.log
  });
  dispatcher.addReadinessObserver(options.readiness ?? new SystemdReadiness({ env }));

  const scheduler = new SecretScheduler({
    store: options.store ?? SecretStoreFactory.createFromEnv(config.vault, env),
    state,
    secrets: config.secrets,
    files: config.files,
    dispatcher,
    logger: app.log,
    timers,
    retryPeriodMs: config.retryPeriodMs,
    dataFunctions: createDataFunctions(env)
  });

  registerStatusRoutes(app, { scheduler });

  return { app, scheduler };
}
