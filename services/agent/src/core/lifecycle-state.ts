import type { FastifyBaseLogger } from "fastify";
import { DEFAULT_RENEW_FRACTION, type FileUsage, type LifecycleSnapshot } from "@satchel/schemas";
import type { SecretLease } from "@satchel/secrets";
import type { IStateStore } from "./state-store";

export interface SecretState {
  name: string;
  data: Record<string, unknown>;
  leaseId?: string;
  renewable: boolean;
  leaseDurationSeconds: number;
  resolvedAt: Date;
  /** null when the secret has no lease and is never renewed */
  expiresAt: Date | null;
  /** Ordered by priority (highest first), then path. */
  filesUsing: FileUsage[];
}

export interface NextUpdate {
  secret: SecretState;
  at: Date;
}

export interface LifecycleStateOptions {
  store?: IStateStore;
  logger?: FastifyBaseLogger;
  /** Fraction of the lease after which the secret is renewed, in (0, 1]. */
  renewFraction?: number;
  now?: () => number;
}

/**
 * Authoritative record of resolved secrets, their leases, the files that use
 * each of them, and the store token.
 */
export class LifecycleState {
  private token: string | null = null;
  private readonly secrets = new Map<string, SecretState>();
  private readonly store?: IStateStore;
  private readonly logger?: FastifyBaseLogger;
  private readonly renewFraction: number;
  private readonly now: () => number;

  constructor(options: LifecycleStateOptions = {}) {
    this.store = options.store;
    this.logger = options.logger;
    this.renewFraction = options.renewFraction ?? DEFAULT_RENEW_FRACTION;
    this.now = options.now ?? Date.now;
    if (!(this.renewFraction > 0 && this.renewFraction <= 1)) {
      throw new Error(`renewFraction must be in (0, 1], got ${this.renewFraction}`);
    }
  }

  /**
   * Builds the aggregate from whatever the store holds.
   */
  static restore(options: LifecycleStateOptions & { store: IStateStore }): LifecycleState {
    const state = new LifecycleState(options);
    const snapshot = options.store.load();
    if (snapshot) {
      state.token = snapshot.token;
      for (const record of snapshot.secrets) {
        state.secrets.set(record.name, {
          name: record.name,
          data: record.data,
          leaseId: record.leaseId,
          renewable: record.renewable,
          leaseDurationSeconds: record.leaseDurationSeconds,
          resolvedAt: new Date(record.resolvedAt),
          expiresAt: record.expiresAt ? new Date(record.expiresAt) : null,
          filesUsing: sortUsages(record.filesUsing)
        });
      }
      options.logger?.info({ secrets: state.secrets.size }, "agent: restored lifecycle state");
    }
    return state;
  }

  getToken(): string | null {
    return this.token;
  }

  setToken(token: string | null): void {
    this.token = token;
  }

  /**
   * Records a fresh resolution. Files already registered against the secret
   * stay registered so a renewal knows what to re-render.
   */
  setSecret(name: string, lease: SecretLease): SecretState {
    const resolvedAt = new Date(this.now());
    const expiresAt =
      lease.leaseDurationSeconds > 0 ? new Date(resolvedAt.getTime() + lease.leaseDurationSeconds * 1000) : null;
    const secret: SecretState = {
      name,
      data: lease.data,
      leaseId: lease.leaseId,
      renewable: lease.renewable,
      leaseDurationSeconds: lease.leaseDurationSeconds,
      resolvedAt,
      expiresAt,
      filesUsing: this.secrets.get(name)?.filesUsing ?? []
    };
    this.secrets.set(name, secret);
    return secret;
  }

  getSecret(name: string): SecretState | undefined {
    return this.secrets.get(name);
  }

  hasSecret(name: string): boolean {
    return this.secrets.has(name);
  }

  secretNames(): string[] {
    return Array.from(this.secrets.keys());
  }

  deleteSecret(name: string): boolean {
    return this.secrets.delete(name);
  }

  clearUsages(name: string): void {
    const secret = this.secrets.get(name);
    if (secret) {
      secret.filesUsing = [];
    }
  }

  /**
   * Replaces every usage entry of `path` with one entry per secret in
   * `secretNames`, the set used by the file's latest successful render.
   */
  commitUsages(path: string, priority: number, secretNames: Iterable<string>): void {
    const used = new Set(secretNames);
    for (const secret of this.secrets.values()) {
      const others = secret.filesUsing.filter((usage) => usage.path !== path);
      if (used.has(secret.name)) {
        others.push({ path, priority });
      }
      secret.filesUsing = sortUsages(others);
    }
  }

  filesUsing(name: string): FileUsage[] {
    return (this.secrets.get(name)?.filesUsing ?? []).map((usage) => ({ ...usage }));
  }

  renewAt(secret: SecretState): Date | null {
    if (!secret.expiresAt) {
      return null;
    }
    const start = secret.resolvedAt.getTime();
    const span = secret.expiresAt.getTime() - start;
    return new Date(start + Math.floor(span * this.renewFraction));
  }

  /**
   * The secret whose renewal instant comes first. Secrets without a lease
   * are never selected.
   */
  nextUpdate(): NextUpdate | null {
    let next: NextUpdate | null = null;
    for (const secret of this.secrets.values()) {
      const at = this.renewAt(secret);
      if (at && (!next || at.getTime() < next.at.getTime())) {
        next = { secret, at };
      }
    }
    return next;
  }

  snapshot(): LifecycleSnapshot {
    return {
      token: this.token,
      secrets: Array.from(this.secrets.values()).map((secret) => ({
        name: secret.name,
        data: structuredClone(secret.data),
        leaseId: secret.leaseId,
        renewable: secret.renewable,
        leaseDurationSeconds: secret.leaseDurationSeconds,
        resolvedAt: secret.resolvedAt.toISOString(),
        expiresAt: secret.expiresAt ? secret.expiresAt.toISOString() : null,
        filesUsing: secret.filesUsing.map((usage) => ({ ...usage }))
      }))
    };
  }

  /**
   * Persists the aggregate. Failures are logged and reported through the
   * return value; the in-memory state stays authoritative.
   */
  save(): boolean {
    if (!this.store) {
      return true;
    }
    try {
      this.store.save(this.snapshot());
      return true;
    } catch (err) {
      this.logger?.error({ err }, "agent: couldn't save state");
      return false;
    }
  }
}

function sortUsages(usages: FileUsage[]): FileUsage[] {
  return [...usages].sort((a, b) => b.priority - a.priority || (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
