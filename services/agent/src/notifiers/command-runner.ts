import { spawn } from "node:child_process";

export interface RunCommandOptions {
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

/** Runs a program without a shell; rejects on spawn failure or a non-zero exit. */
export type CommandRunner = (command: string, args: string[], options?: RunCommandOptions) => Promise<void>;

export const runCommand: CommandRunner = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      env: options.env ?? process.env,
      stdio: ["ignore", "ignore", "pipe"],
      timeout: options.timeoutMs
    });
    let stderr = "";
    child.stderr.on("data", (d: Buffer) => (stderr += d.toString()));
    child.on("error", reject);
    child.on("exit", (code, signal) => {
      if (code === 0) resolve();
      else {
        const status = signal ? `signal ${signal}` : `exit code ${String(code)}`;
        reject(new Error(`${[command, ...args].join(" ")} failed with ${status}: ${stderr.trim()}`));
      }
    });
  });
