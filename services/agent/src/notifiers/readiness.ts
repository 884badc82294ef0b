import type { IReadinessObserver } from "../core/notifications";
import { runCommand as defaultRunCommand, type CommandRunner } from "./command-runner";

/**
 * Tells systemd (Type=notify units) that the agent finished its first pass.
 * Outside systemd there is no NOTIFY_SOCKET and nothing is sent.
 */
export class SystemdReadiness implements IReadinessObserver {
  private readonly env: NodeJS.ProcessEnv;
  private readonly runCommand: CommandRunner;

  constructor(options: { env?: NodeJS.ProcessEnv; runCommand?: CommandRunner } = {}) {
    this.env = options.env ?? process.env;
    this.runCommand = options.runCommand ?? defaultRunCommand;
  }

  async notifyReady(): Promise<void> {
    if (!this.env.NOTIFY_SOCKET) {
      return;
    }
    await this.runCommand("systemd-notify", ["--ready"], { env: this.env });
  }
}
