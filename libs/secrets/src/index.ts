// Core interfaces
export type { ISecretStore, RequestOptions, SecretLease, SecretStoreConfig } from "./interfaces";
export { SecretStoreError } from "./errors";

// Providers
export { VaultSecretStore } from "./vault-store";
export { MemorySecretStore, type RecordedRequest } from "./memory-store";

// Factory
export { SecretStoreFactory } from "./factory";
