import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { VaultConfigSchema } from "@satchel/schemas";
import { SecretStoreError, VaultSecretStore } from "../src/index";

const fetchMock = vi.fn<(input: URL, init?: RequestInit) => Promise<Response>>();

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

function call(index: number) {
  const [input, init] = fetchMock.mock.calls[index];
  return {
    url: String(input),
    method: init?.method,
    headers: new Headers(init?.headers),
    body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined
  };
}

function vault(overrides: Record<string, unknown> = {}): VaultSecretStore {
  return new VaultSecretStore(VaultConfigSchema.parse({ address: "http://vault.test:8200/", timeoutMs: 1000, ...overrides }));
}

describe("VaultSecretStore", () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("login", () => {
    it("keeps a token that lookup-self accepts", async () => {
      fetchMock.mockResolvedValueOnce(json(200, { data: { id: "test-token" } }));
      const store = vault({ token: "test-token" });

      await store.login();

      expect(store.getToken()).toBe("test-token");
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(call(0).url).toBe("http://vault.test:8200/v1/auth/token/lookup-self");
      expect(call(0).method).toBe("GET");
      expect(call(0).headers.get("x-vault-token")).toBe("test-token");
    });

    it("falls back to AppRole when the token is rejected", async () => {
      fetchMock
        .mockResolvedValueOnce(json(403, { errors: ["permission denied"] }))
        .mockResolvedValueOnce(json(200, { auth: { client_token: "approle-token", lease_duration: 3600 } }));
      const store = vault({ token: "stale-token", roleId: "test-role", secretId: "test-secret-id" });

      await store.login();

      expect(store.getToken()).toBe("approle-token");
      const login = call(1);
      expect(login.url).toBe("http://vault.test:8200/v1/auth/approle/login");
      expect(login.method).toBe("POST");
      expect(login.headers.get("x-vault-token")).toBeNull();
      expect(login.body).toEqual({ role_id: "test-role", secret_id: "test-secret-id" });
    });

    it("fails without a token or a role id", async () => {
      const store = vault();
      await expect(store.login()).rejects.toThrow("no vault token or AppRole role id configured");
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it("propagates lookup-self transport failures", async () => {
      fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
      const store = vault({ token: "test-token", roleId: "test-role", secretId: "test-secret-id" });

      await expect(store.login()).rejects.toBeInstanceOf(SecretStoreError);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    describe("secret id files", () => {
      let dir: string;

      beforeEach(async () => {
        dir = await mkdtemp(path.join(tmpdir(), "vault-store-"));
      });

      afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
      });

      it("reads the secret id from a file", async () => {
        const secretIdFile = path.join(dir, "secret-id");
        await writeFile(secretIdFile, "file-secret-id\n");
        fetchMock.mockResolvedValueOnce(json(200, { auth: { client_token: "approle-token" } }));
        const store = vault({ roleId: "test-role", secretIdFile });

        await store.login();

        expect(call(0).body).toEqual({ role_id: "test-role", secret_id: "file-secret-id" });
      });

      it("unwraps a response-wrapped secret id", async () => {
        const wrappedSecretIdFile = path.join(dir, "wrapped");
        await writeFile(wrappedSecretIdFile, "test-wrapping-token\n");
        fetchMock
          .mockResolvedValueOnce(json(200, { data: { secret_id: "unwrapped-id" } }))
          .mockResolvedValueOnce(json(200, { auth: { client_token: "approle-token" } }));
        const store = vault({ roleId: "test-role", wrappedSecretIdFile });

        await store.login();

        expect(call(0).url).toBe("http://vault.test:8200/v1/sys/wrapping/unwrap");
        expect(call(0).headers.get("x-vault-token")).toBe("test-wrapping-token");
        expect(call(1).body).toEqual({ role_id: "test-role", secret_id: "unwrapped-id" });
        expect(store.getToken()).toBe("approle-token");
      });
    });
  });

  describe("request", () => {
    it("sends GET data as query parameters and maps the lease", async () => {
      fetchMock.mockResolvedValueOnce(
        json(200, {
          request_id: "req-1",
          lease_id: "",
          renewable: false,
          lease_duration: 0,
          data: { password: "test-secret" }
        })
      );
      const store = vault({ token: "test-token" });

      const lease = await store.request("get", "/v1/secret/data/app", { data: { version: 2 } });

      expect(call(0).url).toBe("http://vault.test:8200/v1/secret/data/app?version=2");
      expect(call(0).method).toBe("GET");
      expect(call(0).body).toBeUndefined();
      expect(lease).toEqual({
        requestId: "req-1",
        leaseId: undefined,
        renewable: false,
        leaseDurationSeconds: 0,
        data: { password: "test-secret" }
      });
    });

    it("sends POST data as a JSON body", async () => {
      fetchMock.mockResolvedValueOnce(
        json(200, {
          lease_id: "pki/issue/web/123",
          renewable: true,
          lease_duration: 600,
          data: { certificate: "test-cert" }
        })
      );
      const store = vault({ token: "test-token", namespace: "team-a" });

      const lease = await store.request("POST", "pki/issue/web", { data: { common_name: "web.internal" } });

      expect(call(0).url).toBe("http://vault.test:8200/v1/pki/issue/web");
      expect(call(0).headers.get("content-type")).toBe("application/json");
      expect(call(0).headers.get("x-vault-namespace")).toBe("team-a");
      expect(call(0).body).toEqual({ common_name: "web.internal" });
      expect(lease.leaseId).toBe("pki/issue/web/123");
      expect(lease.renewable).toBe(true);
      expect(lease.leaseDurationSeconds).toBe(600);
    });

    it("uses absolute URLs as given", async () => {
      fetchMock.mockResolvedValueOnce(json(200, { data: {} }));
      const store = vault({ token: "test-token" });

      await store.request("GET", "http://other.test:8200/v1/secret/app");

      expect(call(0).url).toBe("http://other.test:8200/v1/secret/app");
    });

    it("treats 204 as an empty lease", async () => {
      fetchMock.mockResolvedValueOnce(new Response(null, { status: 204 }));
      const store = vault({ token: "test-token" });

      const lease = await store.request("DELETE", "secret/app");

      expect(lease).toEqual({ renewable: false, leaseDurationSeconds: 0, data: {} });
    });

    it("reports the status and errors of a failed response", async () => {
      fetchMock.mockResolvedValueOnce(json(503, { errors: ["Vault is sealed"] }));
      const store = vault({ token: "test-token" });

      const error = await store.request("GET", "secret/app").catch((err: unknown) => err);

      expect(error).toBeInstanceOf(SecretStoreError);
      if (error instanceof SecretStoreError) {
        expect(error.status).toBe(503);
        expect(error.errors).toEqual(["Vault is sealed"]);
        expect(error.isTransport).toBe(false);
        expect(error.message).toBe("vault GET /v1/secret/app failed 503: Vault is sealed");
      }
    });

    it("reports transport failures without a status", async () => {
      fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
      const store = vault({ token: "test-token" });

      const error = await store.request("GET", "secret/app").catch((err: unknown) => err);

      expect(error).toBeInstanceOf(SecretStoreError);
      if (error instanceof SecretStoreError) {
        expect(error.status).toBeUndefined();
        expect(error.isTransport).toBe(true);
      }
    });
  });
});
