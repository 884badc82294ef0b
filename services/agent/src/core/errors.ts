/**
 * A file or secret definition that can never be served correctly, whatever
 * the store returns. Always fatal to the run.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export class TemplateError extends ConfigurationError {
  constructor(
    message: string,
    public readonly template: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TemplateError";
  }
}

/** The store rejected a secret request in a way retrying cannot fix. */
export class SecretResolutionError extends Error {
  constructor(
    public readonly secret: string,
    public readonly status: number | undefined,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`couldn't resolve secret '${secret}': ${reason}`, { cause });
    this.name = "SecretResolutionError";
  }
}

export class MaterializationError extends Error {
  constructor(
    public readonly path: string,
    message: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${message}: ${reason}`, { cause });
    this.name = "MaterializationError";
  }
}
