import { describe, expect, it } from "vitest";
import { MemorySecretStore, SecretStoreError, SecretStoreFactory, VaultSecretStore } from "../src/index";

describe("MemorySecretStore", () => {
  it("issues a token on first login and keeps an existing one", async () => {
    const fresh = new MemorySecretStore();
    await fresh.login();
    expect(fresh.getToken()).toBe("memory-token-1");

    const seeded = new MemorySecretStore({ token: "test-token" });
    await seeded.login();
    expect(seeded.getToken()).toBe("test-token");
    expect(seeded.getLoginCount()).toBe(1);
  });

  it("serves stored secrets by normalised path and records requests", async () => {
    const store = new MemorySecretStore({
      secrets: { "secret/app": { data: { password: "test-secret" }, leaseDurationSeconds: 60 } }
    });

    const lease = await store.request("get", "/v1/secret/app", { data: { version: 1 } });

    expect(lease).toEqual({ renewable: false, leaseDurationSeconds: 60, data: { password: "test-secret" } });
    expect(store.getRequests()).toEqual([{ method: "GET", path: "secret/app", data: { version: 1 } }]);
  });

  it("returns copies so callers cannot alter stored data", async () => {
    const store = new MemorySecretStore();
    store.put("secret/app", { data: { password: "test-secret" } });

    const first = await store.request("GET", "secret/app");
    first.data.password = "changed";
    const second = await store.request("GET", "secret/app");

    expect(second.data.password).toBe("test-secret");
  });

  it("answers 404 for unknown paths", async () => {
    const store = new MemorySecretStore();
    const error = await store.request("GET", "secret/missing").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(SecretStoreError);
    if (error instanceof SecretStoreError) {
      expect(error.status).toBe(404);
    }
  });

  it("serves queued outcomes before the stored secret", async () => {
    const store = new MemorySecretStore();
    store.put("secret/app", { data: { v: "stored" } });
    store.enqueue(
      "secret/app",
      new SecretStoreError("sealed", { status: 503 }),
      { renewable: true, leaseDurationSeconds: 10, data: { v: "queued" } }
    );

    await expect(store.request("GET", "secret/app")).rejects.toThrow("sealed");
    expect((await store.request("GET", "secret/app")).data).toEqual({ v: "queued" });
    expect((await store.request("GET", "secret/app")).data).toEqual({ v: "stored" });
  });

  it("fails login when told to", async () => {
    const store = new MemorySecretStore();
    store.failLogin(new SecretStoreError("connection refused"));

    await expect(store.login()).rejects.toThrow("connection refused");
    expect(store.getToken()).toBeNull();

    store.failLogin(null);
    await store.login();
    expect(store.getToken()).toBe("memory-token-2");
  });
});

describe("SecretStoreFactory", () => {
  it("creates a memory store", () => {
    expect(SecretStoreFactory.createProvider({ provider: "memory" })).toBeInstanceOf(MemorySecretStore);
  });

  it("requires vault settings for the vault provider", () => {
    expect(() => SecretStoreFactory.createProvider({ provider: "vault" })).toThrow(
      "Vault secret store requires vault configuration"
    );
  });

  it("layers VAULT_* variables over the base settings", () => {
    const store = SecretStoreFactory.createFromEnv(
      { address: "http://config.test:8200", token: "config-token" },
      { VAULT_TOKEN: "env-token" }
    );

    expect(store).toBeInstanceOf(VaultSecretStore);
    expect(store.getToken()).toBe("env-token");
  });

  it("selects the memory store from SATCHEL_SECRET_STORE", () => {
    const store = SecretStoreFactory.createFromEnv({}, { SATCHEL_SECRET_STORE: "memory", VAULT_TOKEN: "test-token" });

    expect(store).toBeInstanceOf(MemorySecretStore);
    expect(store.getToken()).toBe("test-token");
  });
});
