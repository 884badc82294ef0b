import { fileURLToPath } from "node:url";
import { loadAgentConfig, resolveConfigPath } from "./core/config";
import { buildAgent } from "./server";

async function main(): Promise<void> {
  let exitCode = 0;
  try {
    const configPath = resolveConfigPath();
    const config = await loadAgentConfig(configPath);
    const { app, scheduler } = await buildAgent({ config });

    const controller = new AbortController();
    const stop = (signal: NodeJS.Signals) => {
      app.log.info({ signal }, "agent: shutting down");
      controller.abort();
    };
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);

    if (config.status.enabled) {
      await app.listen({ port: config.status.port, host: config.status.host });
      app.log.info(`agent status listening on ${config.status.host}:${String(config.status.port)}`);
    } else {
      await app.ready();
    }

    try {
      await scheduler.run(controller.signal);
    } catch (err) {
      app.log.error({ err }, "agent: fatal error");
      exitCode = 1;
    } finally {
      await app.close();
    }
  } catch (error) {
    const message = error instanceof Error ? `${error.message}\n${error.stack ?? ""}` : String(error);
    process.stderr.write(`agent failed to start: ${message}\n`);
    exitCode = 1;
  }
  process.exit(exitCode);
}

const entryFile = process.argv[1];
const isCliEntry = entryFile && fileURLToPath(import.meta.url) === entryFile;

if (isCliEntry) {
  void main();
}
