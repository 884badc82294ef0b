import os from "node:os";
import type { FastifyBaseLogger } from "fastify";
import { renderTemplate, type TemplateFunctions } from "./template";

export function createDataFunctions(env: NodeJS.ProcessEnv = process.env): TemplateFunctions {
  return {
    env: (name: string) => env[name] ?? "",
    hostname: () => os.hostname()
  };
}

/**
 * Expands the string values of a secret's request data through `env` and
 * `hostname`. A value that fails to expand is sent as written.
 */
export function expandRequestData(
  data: Record<string, unknown> | undefined,
  options: { logger?: FastifyBaseLogger; functions?: TemplateFunctions } = {}
): Record<string, unknown> {
  const functions = options.functions ?? createDataFunctions();
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data ?? {})) {
    if (typeof value !== "string") {
      result[key] = value;
      continue;
    }
    try {
      result[key] = renderTemplate(value, "secret-data", functions);
    } catch (err) {
      options.logger?.warn({ err, key, value }, "agent: couldn't resolve data template, sending it unexpanded");
      result[key] = value;
    }
  }

  return result;
}
