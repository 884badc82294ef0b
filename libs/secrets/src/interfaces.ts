import type { VaultConfig } from "@satchel/schemas";

/**
 * A secret as returned by the store, together with its lease metadata.
 */
export interface SecretLease {
  requestId?: string;
  leaseId?: string;
  renewable: boolean;
  /** Zero when the secret carries no lease. */
  leaseDurationSeconds: number;
  data: Record<string, unknown>;
}

export interface RequestOptions {
  /** Sent as query parameters for GET/LIST/DELETE, as a JSON body otherwise */
  data?: Record<string, unknown>;
}

/**
 * Capability the agent needs from a secret store: authenticate, expose the
 * session token, and perform one request.
 *
 * `request` rejects with a {@link SecretStoreError}; its `status` is the HTTP
 * status when the store answered and is undefined when no response arrived.
 */
export interface ISecretStore {
  login(): Promise<void>;
  getToken(): string | null;
  /** Seed a previously issued token (e.g. restored from persisted state). */
  setToken(token: string | null): void;
  request(method: string, path: string, options?: RequestOptions): Promise<SecretLease>;
}

export interface SecretStoreConfig {
  /** 'vault' for a Vault-compatible HTTP API, 'memory' for development */
  provider: "vault" | "memory";
  vault?: VaultConfig;
}
