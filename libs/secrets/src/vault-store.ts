import fs from "node:fs/promises";
import { z } from "zod";
import type { VaultConfig } from "@satchel/schemas";
import type { ISecretStore, RequestOptions, SecretLease } from "./interfaces";
import { SecretStoreError } from "./errors";

const VaultAuthSchema = z.object({
  client_token: z.string().min(1),
  lease_duration: z.number().optional(),
  renewable: z.boolean().optional()
});

const VaultResponseSchema = z.object({
  request_id: z.string().optional(),
  lease_id: z.string().optional(),
  renewable: z.boolean().optional(),
  lease_duration: z.number().optional(),
  data: z.record(z.string(), z.unknown()).nullable().optional(),
  auth: VaultAuthSchema.nullable().optional(),
  warnings: z.array(z.string()).nullable().optional()
});

const VaultErrorBodySchema = z.object({
  errors: z.array(z.string()).default([])
});

type VaultResponse = z.infer<typeof VaultResponseSchema>;

const QUERY_METHODS = new Set(["GET", "LIST", "DELETE", "HEAD"]);

interface SendOptions {
  data?: Record<string, unknown>;
  /** Overrides the session token; null sends the request unauthenticated. */
  token?: string | null;
}

/**
 * Secret store backed by the Vault HTTP API.
 *
 * Login reuses a configured or restored token while `auth/token/lookup-self`
 * accepts it, and falls back to AppRole otherwise. The AppRole secret id may
 * come inline, from a file, or from a response-wrapped token in a file.
 */
export class VaultSecretStore implements ISecretStore {
  private readonly address: string;
  private token: string | null;

  constructor(private readonly config: VaultConfig) {
    this.address = config.address.replace(/\/+$/, "");
    this.token = config.token ?? null;
  }

  async login(): Promise<void> {
    if (this.token && (await this.tokenIsValid())) {
      return;
    }
    if (!this.config.roleId) {
      throw new SecretStoreError(
        this.token ? "vault token was rejected and no AppRole role id is configured" : "no vault token or AppRole role id configured"
      );
    }

    const secretId = await this.resolveSecretId();
    const response = await this.send("POST", "auth/approle/login", {
      data: { role_id: this.config.roleId, secret_id: secretId },
      token: null
    });
    if (!response?.auth) {
      throw new SecretStoreError("vault AppRole login returned no auth block");
    }
    this.token = response.auth.client_token;
  }

  getToken(): string | null {
    return this.token;
  }

  setToken(token: string | null): void {
    this.token = token;
  }

  async request(method: string, path: string, options: RequestOptions = {}): Promise<SecretLease> {
    const response = await this.send(method.toUpperCase(), path, { data: options.data });
    return {
      requestId: response?.request_id,
      leaseId: response?.lease_id || undefined,
      renewable: response?.renewable ?? false,
      leaseDurationSeconds: response?.lease_duration ?? 0,
      data: response?.data ?? {}
    };
  }

  private async tokenIsValid(): Promise<boolean> {
    try {
      await this.send("GET", "auth/token/lookup-self", {});
      return true;
    } catch (err) {
      if (err instanceof SecretStoreError && (err.status === 401 || err.status === 403)) {
        return false;
      }
      throw err;
    }
  }

  private async resolveSecretId(): Promise<string> {
    if (this.config.secretId) {
      return this.config.secretId;
    }
    if (this.config.secretIdFile) {
      return (await fs.readFile(this.config.secretIdFile, "utf-8")).trim();
    }
    if (this.config.wrappedSecretIdFile) {
      const wrappingToken = (await fs.readFile(this.config.wrappedSecretIdFile, "utf-8")).trim();
      const unwrapped = await this.send("POST", "sys/wrapping/unwrap", { token: wrappingToken });
      const secretId = unwrapped?.data?.secret_id;
      if (typeof secretId !== "string" || secretId.length === 0) {
        throw new SecretStoreError("wrapped response does not contain a secret_id");
      }
      return secretId;
    }
    throw new SecretStoreError("AppRole login requires secretId, secretIdFile or wrappedSecretIdFile");
  }

  private async send(method: string, path: string, options: SendOptions): Promise<VaultResponse | null> {
    const url = new URL(this.resolveUrl(path));
    const headers: Record<string, string> = {};
    let body: string | undefined;

    if (options.data && Object.keys(options.data).length > 0) {
      if (QUERY_METHODS.has(method)) {
        for (const [key, value] of Object.entries(options.data)) {
          url.searchParams.set(key, typeof value === "string" ? value : JSON.stringify(value));
        }
      } else {
        headers["content-type"] = "application/json";
        body = JSON.stringify(options.data);
      }
    }

    const token = options.token === undefined ? this.token : options.token;
    if (token) {
      headers["x-vault-token"] = token;
    }
    if (this.config.namespace) {
      headers["x-vault-namespace"] = this.config.namespace;
    }

    let res: Response;
    try {
      res = await fetch(url, {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(this.config.timeoutMs)
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new SecretStoreError(`vault ${method} ${url.pathname} failed: ${message}`, { cause: err });
    }

    if (res.status === 204) {
      return null;
    }

    const text = await res.text();
    if (!res.ok) {
      const errors = parseErrors(text);
      throw new SecretStoreError(
        `vault ${method} ${url.pathname} failed ${res.status}: ${errors.join("; ") || res.statusText || "unknown error"}`,
        { status: res.status, errors }
      );
    }

    let json: unknown;
    try {
      json = text.length > 0 ? JSON.parse(text) : {};
    } catch (err) {
      throw new SecretStoreError(`vault ${method} ${url.pathname} returned invalid JSON`, { status: res.status, cause: err });
    }
    const parsed = VaultResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new SecretStoreError(`vault ${method} ${url.pathname} returned an unexpected payload`, {
        status: res.status,
        cause: parsed.error
      });
    }
    return parsed.data;
  }

  private resolveUrl(path: string): string {
    if (/^https?:\/\//.test(path)) {
      return path;
    }
    const trimmed = path.replace(/^\/+/, "").replace(/^v1\//, "");
    return `${this.address}/v1/${trimmed}`;
  }
}

function parseErrors(text: string): string[] {
  try {
    const parsed = VaultErrorBodySchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data.errors : [];
  } catch {
    return text.trim().length > 0 ? [text.trim()] : [];
  }
}
