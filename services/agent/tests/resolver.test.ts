import { describe, expect, it } from "vitest";
import { SecretSpecSchema } from "@satchel/schemas";
import { MemorySecretStore, SecretStoreError } from "@satchel/secrets";
import { SecretResolutionError } from "../src/core/errors";
import { LifecycleState } from "../src/core/lifecycle-state";
import { isRetryable, SecretResolver } from "../src/core/resolver";
import { InMemoryStateStore } from "../src/core/state-store";

function setup() {
  const store = new MemorySecretStore({ token: "test-token" });
  const stateStore = new InMemoryStateStore();
  const state = new LifecycleState({ store: stateStore, now: () => 0 });
  const sleeps: number[] = [];
  const resolver = new SecretResolver({
    store,
    state,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    retryPeriodMs: 250,
    dataFunctions: { env: (name: string) => `env-${name}`, hostname: () => "node-1" }
  });
  return { store, stateStore, state, sleeps, resolver };
}

describe("isRetryable", () => {
  it.each([
    [new SecretStoreError("refused"), true],
    [new SecretStoreError("sealed", { status: 503 }), true],
    [new SecretStoreError("bad gateway", { status: 502 }), true],
    [new SecretStoreError("denied", { status: 403 }), false],
    [new SecretStoreError("missing", { status: 404 }), false],
    [new Error("bug"), false]
  ])("%s -> %s", (error, expected) => {
    expect(isRetryable(error)).toBe(expected);
  });
});

describe("SecretResolver", () => {
  const spec = SecretSpecSchema.parse({ vaultUrl: "secret/app" });

  it("records and persists a resolved secret", async () => {
    const { store, stateStore, state, resolver } = setup();
    store.put("secret/app", { data: { password: "test-secret" }, leaseDurationSeconds: 30, renewable: true });

    const outcome = await resolver.resolve("app", spec);

    expect(outcome).toEqual({ retry: false });
    expect(state.getSecret("app")?.data).toEqual({ password: "test-secret" });
    expect(stateStore.getSaveCount()).toBe(1);
  });

  it("expands request data before sending it", async () => {
    const { store, resolver } = setup();
    store.put("pki/issue/web", { data: { certificate: "test-cert" } });

    await resolver.resolve(
      "cert",
      SecretSpecSchema.parse({
        vaultUrl: "pki/issue/web",
        httpMethod: "post",
        data: { common_name: "{{ hostname }}", alt: '{{ env "ZONE" }}', ttl: 60 }
      })
    );

    expect(store.getRequests()).toEqual([
      { method: "POST", path: "pki/issue/web", data: { common_name: "node-1", alt: "env-ZONE", ttl: 60 } }
    ]);
  });

  it("retries transport and server errors after the retry period", async () => {
    const { store, sleeps, resolver } = setup();
    store.put("secret/app", { data: { password: "test-secret" } });
    store.enqueue("secret/app", new SecretStoreError("refused"), new SecretStoreError("sealed", { status: 503 }));

    const secret = await resolver.resolveWithRetry("app", spec);

    expect(secret.data).toEqual({ password: "test-secret" });
    expect(sleeps).toEqual([250, 250]);
    expect(store.getRequests()).toHaveLength(3);
  });

  it("fails without retrying on client errors", async () => {
    const { store, state, sleeps, resolver } = setup();
    store.enqueue("secret/app", new SecretStoreError("permission denied", { status: 403 }));

    const error = await resolver.resolveWithRetry("app", spec).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(SecretResolutionError);
    if (error instanceof SecretResolutionError) {
      expect(error.secret).toBe("app");
      expect(error.status).toBe(403);
      expect(error.message).toBe("couldn't resolve secret 'app': permission denied");
    }
    expect(sleeps).toEqual([]);
    expect(state.hasSecret("app")).toBe(false);
  });

  it("reports a single failed attempt as retryable or not", async () => {
    const { store, resolver } = setup();
    store.enqueue("secret/app", new SecretStoreError("sealed", { status: 500 }));

    const outcome = await resolver.resolve("app", spec);
    expect(outcome.retry).toBe(true);
    expect(outcome.error?.message).toBe("sealed");

    const missing = await resolver.resolve("app", spec);
    expect(missing.retry).toBe(false);
    expect(missing.error?.message).toBe("no secret at secret/app");
  });
});
