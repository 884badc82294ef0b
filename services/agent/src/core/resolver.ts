import type { FastifyBaseLogger } from "fastify";
import { DEFAULT_RETRY_PERIOD_MS, type SecretSpec } from "@satchel/schemas";
import { SecretStoreError, type ISecretStore, type SecretLease } from "@satchel/secrets";
import { expandRequestData } from "./data-template";
import { SecretResolutionError } from "./errors";
import type { LifecycleState, SecretState } from "./lifecycle-state";
import type { TemplateFunctions } from "./template";

export interface ResolveOutcome {
  /** Whether another attempt may succeed. Meaningful only with `error`. */
  retry: boolean;
  error?: Error;
}

interface SecretResolverDeps {
  store: ISecretStore;
  state: LifecycleState;
  sleep: (ms: number) => Promise<void>;
  logger?: FastifyBaseLogger;
  retryPeriodMs?: number;
  dataFunctions?: TemplateFunctions;
}

/**
 * No response at all, or a 5xx (store sealed, proxy unavailable): try again.
 * Anything else means the request or its permissions are wrong.
 */
export function isRetryable(err: unknown): boolean {
  if (!(err instanceof SecretStoreError)) {
    return false;
  }
  if (err.status === undefined) {
    return true;
  }
  return Math.floor(err.status / 100) === 5;
}

export class SecretResolver {
  private readonly retryPeriodMs: number;

  constructor(private readonly deps: SecretResolverDeps) {
    this.retryPeriodMs = deps.retryPeriodMs ?? DEFAULT_RETRY_PERIOD_MS;
  }

  /**
   * One attempt: request the secret and, on success, record and persist it.
   */
  async resolve(name: string, spec: SecretSpec): Promise<ResolveOutcome> {
    const data = expandRequestData(spec.data, {
      logger: this.deps.logger,
      functions: this.deps.dataFunctions
    });

    let lease: SecretLease;
    try {
      lease = await this.deps.store.request(spec.httpMethod, spec.vaultUrl, { data });
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      return { retry: isRetryable(err), error };
    }

    this.deps.state.setSecret(name, lease);
    this.deps.state.save();
    this.deps.logger?.info(
      { secret: name, leaseDurationSeconds: lease.leaseDurationSeconds, renewable: lease.renewable },
      "agent: secret resolved"
    );
    return { retry: false };
  }

  /**
   * Attempts until success, sleeping the fixed retry period after every
   * retryable failure. A fatal failure is thrown as a SecretResolutionError.
   */
  async resolveWithRetry(name: string, spec: SecretSpec): Promise<SecretState> {
    for (let attempt = 1; ; attempt += 1) {
      const outcome = await this.resolve(name, spec);
      if (!outcome.error) {
        const secret = this.deps.state.getSecret(name);
        if (!secret) {
          throw new Error(`secret '${name}' missing from state after resolution`);
        }
        return secret;
      }
      if (!outcome.retry) {
        const status = outcome.error instanceof SecretStoreError ? outcome.error.status : undefined;
        throw new SecretResolutionError(name, status, outcome.error);
      }
      this.deps.logger?.warn(
        { err: outcome.error, secret: name, attempt, retryInMs: this.retryPeriodMs },
        "agent: secret resolution failed, retrying"
      );
      await this.deps.sleep(this.retryPeriodMs);
    }
  }
}
