import fs from "node:fs/promises";
import path from "node:path";
import { AgentConfigSchema, type AgentConfig } from "@satchel/schemas";
import type { ZodError } from "zod";
import { ConfigurationError } from "./errors";

export const DEFAULT_CONFIG_PATH = "/etc/satchel/satchel.json";

/**
 * First CLI argument, then SATCHEL_CONFIG, then the default location.
 */
export function resolveConfigPath(argv: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): string {
  return argv[0] || env.SATCHEL_CONFIG || DEFAULT_CONFIG_PATH;
}

export async function loadAgentConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): Promise<AgentConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`couldn't read configuration ${configPath}: ${reason}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`couldn't parse configuration ${configPath}: ${reason}`, { cause: err });
  }

  return parseAgentConfig(json, { baseDir: path.dirname(path.resolve(configPath)), env });
}

/**
 * Validates an already-decoded configuration and applies env overrides.
 * Relative template files are taken from `baseDir`.
 */
export function parseAgentConfig(
  input: unknown,
  options: { baseDir?: string; env?: NodeJS.ProcessEnv } = {}
): AgentConfig {
  const parsed = AgentConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`invalid configuration: ${formatIssues(parsed.error)}`, { cause: parsed.error });
  }

  const env = options.env ?? process.env;
  const baseDir = options.baseDir ?? process.cwd();
  const config = parsed.data;

  const files = config.files.map((file) =>
    file.templateFile ? { ...file, templateFile: path.resolve(baseDir, file.templateFile) } : file
  );

  return {
    ...config,
    statePath: env.SATCHEL_STATE_PATH || config.statePath,
    status: {
      ...config.status,
      host: env.SATCHEL_STATUS_HOST || config.status.host,
      port: parsePort(env.SATCHEL_STATUS_PORT, config.status.port)
    },
    files
  };
}

function parsePort(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new ConfigurationError(`invalid SATCHEL_STATUS_PORT: ${value}`);
  }
  return port;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
