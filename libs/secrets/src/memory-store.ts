import type { ISecretStore, RequestOptions, SecretLease } from "./interfaces";
import { SecretStoreError } from "./errors";

export interface RecordedRequest {
  method: string;
  path: string;
  data?: Record<string, unknown>;
}

type Outcome = SecretLease | SecretStoreError;

/**
 * In-process secret store for development and testing.
 * Secrets are keyed by request path; failures can be queued per path and are
 * consumed one per request before the stored secret is served again.
 */
export class MemorySecretStore implements ISecretStore {
  private token: string | null;
  private readonly secrets = new Map<string, SecretLease>();
  private readonly queued = new Map<string, Outcome[]>();
  private loginError: Error | null = null;
  private readonly requestLog: RecordedRequest[] = [];
  private logins = 0;

  constructor(options: { token?: string; secrets?: Record<string, Partial<SecretLease> & { data: Record<string, unknown> }> } = {}) {
    this.token = options.token ?? null;
    for (const [path, lease] of Object.entries(options.secrets ?? {})) {
      this.put(path, lease);
    }
  }

  async login(): Promise<void> {
    this.logins += 1;
    if (this.loginError) {
      throw this.loginError;
    }
    this.token = this.token ?? `memory-token-${this.logins}`;
  }

  getToken(): string | null {
    return this.token;
  }

  setToken(token: string | null): void {
    this.token = token;
  }

  async request(method: string, path: string, options: RequestOptions = {}): Promise<SecretLease> {
    const key = normalizePath(path);
    this.requestLog.push({ method: method.toUpperCase(), path: key, data: options.data });

    const next = this.queued.get(key)?.shift();
    if (next instanceof SecretStoreError) {
      throw next;
    }
    const lease = next ?? this.secrets.get(key);
    if (!lease) {
      throw new SecretStoreError(`no secret at ${key}`, { status: 404, errors: [] });
    }
    return structuredClone(lease);
  }

  /** Store (or replace) the secret served for `path`. */
  put(path: string, lease: Partial<SecretLease> & { data: Record<string, unknown> }): void {
    this.secrets.set(normalizePath(path), {
      renewable: false,
      leaseDurationSeconds: 0,
      ...lease
    });
  }

  /** Queue one-shot outcomes served before the stored secret. */
  enqueue(path: string, ...outcomes: Outcome[]): void {
    const key = normalizePath(path);
    const queue = this.queued.get(key) ?? [];
    queue.push(...outcomes);
    this.queued.set(key, queue);
  }

  failLogin(error: Error | null): void {
    this.loginError = error;
  }

  getRequests(): RecordedRequest[] {
    return [...this.requestLog];
  }

  getLoginCount(): number {
    return this.logins;
  }
}

function normalizePath(path: string): string {
  return path.replace(/^\/+/, "").replace(/^v1\//, "");
}
