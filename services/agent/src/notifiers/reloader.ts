import type { FastifyBaseLogger } from "fastify";
import type { NotifierSpec } from "@satchel/schemas";
import type { IReloader } from "../core/notifications";
import { runCommand as defaultRunCommand, type CommandRunner } from "./command-runner";

interface NotifierReloaderOptions {
  logger?: FastifyBaseLogger;
  runCommand?: CommandRunner;
  fetch?: typeof fetch;
}

/**
 * Reloads the services behind configured notifier names: a systemd unit, a
 * command, or an HTTP endpoint.
 */
export class NotifierReloader implements IReloader {
  private readonly runCommand: CommandRunner;
  private readonly fetchFn: typeof fetch;

  constructor(
    private readonly notifiers: Record<string, NotifierSpec>,
    private readonly options: NotifierReloaderOptions = {}
  ) {
    this.runCommand = options.runCommand ?? defaultRunCommand;
    this.fetchFn = options.fetch ?? fetch;
  }

  async reload(name: string): Promise<void> {
    const spec = Object.hasOwn(this.notifiers, name) ? this.notifiers[name] : undefined;
    if (!spec) {
      throw new Error(`unknown notifier: ${name}`);
    }

    this.options.logger?.debug({ notifier: name, type: spec.type }, "agent: reloading");
    switch (spec.type) {
      case "systemd":
        await this.runCommand("systemctl", [spec.action, spec.unit]);
        return;
      case "command": {
        const [program, ...args] = spec.command;
        await this.runCommand(program, args, { timeoutMs: spec.timeoutMs });
        return;
      }
      case "http": {
        const res = await this.fetchFn(spec.url, { method: spec.method, headers: spec.headers });
        if (!res.ok) {
          throw new Error(`notifier ${name}: ${spec.method} ${spec.url} returned ${res.status}`);
        }
        return;
      }
    }
  }
}
