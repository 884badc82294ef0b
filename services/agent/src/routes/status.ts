import type { FastifyInstance } from "fastify";
import type { SecretScheduler } from "../core/scheduler";

interface StatusDeps {
  scheduler: SecretScheduler;
}

/** Liveness, readiness and lease status of the agent. Never exposes secret data. */
export function registerStatusRoutes(app: FastifyInstance, deps: StatusDeps): void {
  app.get("/health", () => ({ status: "ok" }));

  app.get("/status", () => deps.scheduler.getStatus());

  app.get("/ready", async (_req, reply) => {
    const { ready, phase } = deps.scheduler.getStatus();
    return reply.status(ready && phase !== "failed" ? 200 : 503).send({ ready, phase });
  });
}
