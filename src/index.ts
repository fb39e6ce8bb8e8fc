import { SecretVault, type SecretVaultOptions } from "./api/SecretVault";

export type { ResetReason, SecretVaultOptions } from "./api/SecretVault";
export { SecretVault } from "./api/SecretVault";
export { KeyLifecycleManager } from "./api/keys/KeyLifecycleManager";
export type { KeyPhase } from "./api/keys/states/BaseKeyState";
export { RecordCodec } from "./api/vault/RecordCodec";

export { EncryptionManager } from "./crypto/EncryptionManager";
export { deriveKey, derivePasswordBits } from "./crypto/KeyDerivation";
export { hashPassword, verifyPassword } from "./crypto/PasswordHashing";
export { generateStrongPassword } from "./crypto/PasswordGenerator";
export { SessionKey } from "./crypto/SessionKey";

export type { User } from "./identity/User";
export {
  describeItem,
  summarize,
  type CredentialItem,
  type NewCredential,
  type NewNote,
  type NoteItem,
  type VaultItem
} from "./items/VaultItem";
export { Vault } from "./vault/Vault";

export type { BlobStore } from "./storage/BlobStore";
export { MemoryBlobStore } from "./storage/MemoryBlobStore";
export { WebStorageBlobStore, type StorageLike } from "./storage/WebStorageBlobStore";
export { IndexedDbBlobStore, type IdbConfig } from "./storage/IndexedDbBlobStore";

export { createLogger, type Logger, type LogLevelName, type LogSink } from "./utils/logger";
export * from "./errors";
export { VAULT_CONSTANTS } from "./constants";

/**
 * Creates a `SecretVault`. Shorthand for `new SecretVault(opts)`.
 *
 * @example
 * ```typescript
 * import secretVault from "local-secret-vault";
 *
 * const vault = secretVault();
 *
 * async function main() {
 *   await vault.register("alice", "correct horse battery");
 *   const item = await vault.addCredential({
 *     title: "Email",
 *     site: "mail.example.com",
 *     username: "alice",
 *     secret: vault.generatePassword()
 *   });
 *   console.log(vault.describeItem(item.id));
 *   vault.logout();
 * }
 *
 * main();
 * ```
 */
export default function secretVault(opts?: SecretVaultOptions): SecretVault {
  return new SecretVault(opts);
}
