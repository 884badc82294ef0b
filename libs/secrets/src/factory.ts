import { VaultConfigSchema, type VaultConfig } from "@satchel/schemas";
import type { ISecretStore, SecretStoreConfig } from "./interfaces";
import { MemorySecretStore } from "./memory-store";
import { VaultSecretStore } from "./vault-store";

/**
 * Factory for creating secret store instances based on configuration.
 */
export class SecretStoreFactory {
  static createProvider(config: SecretStoreConfig): ISecretStore {
    if (config.provider === "memory") {
      return new MemorySecretStore({ token: config.vault?.token });
    }

    if (config.provider === "vault") {
      if (!config.vault) {
        throw new Error("Vault secret store requires vault configuration");
      }
      return new VaultSecretStore(config.vault);
    }

    throw new Error(`Unknown secret store provider: ${String(config.provider)}`);
  }

  /**
   * Creates a secret store with VAULT_* environment variables layered over
   * `base` (typically the vault section of the agent configuration).
   */
  static createFromEnv(base: Partial<VaultConfig> = {}, env: NodeJS.ProcessEnv = process.env): ISecretStore {
    const provider = env.SATCHEL_SECRET_STORE === "memory" ? "memory" : "vault";
    const vault = VaultConfigSchema.parse({
      ...base,
      address: env.VAULT_ADDR || base.address,
      token: env.VAULT_TOKEN || base.token,
      namespace: env.VAULT_NAMESPACE || base.namespace,
      roleId: env.VAULT_ROLE_ID || base.roleId,
      secretId: env.VAULT_SECRET_ID || base.secretId,
      secretIdFile: env.VAULT_SECRET_ID_FILE || base.secretIdFile,
      wrappedSecretIdFile: env.VAULT_WRAPPED_SECRET_ID_FILE || base.wrappedSecretIdFile
    });

    return SecretStoreFactory.createProvider({ provider, vault });
  }
}
