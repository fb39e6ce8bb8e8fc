import { MIN_BLOB_LEN, VAULT_CONSTANTS } from "../../constants";
import { isPasswordHash } from "../../crypto/PasswordHashing";
import type { User } from "../../identity/User";
import type { VaultItem } from "../../items/VaultItem";
import type {
  PersistedItem,
  PersistedUser,
  PersistedUsersRecord,
  PersistedVaultRecord
} from "../../types";
import { base64ToBytes, bytesToBase64 } from "../../utils/base64";
import { decodeJson, encodeJson, isPlainObject } from "../../utils/json";
import { Vault } from "../../vault/Vault";

export interface DecodedVault {
  vault: Vault;
  /** The record still carried raw key bytes from an older writer; re-save to drop them. */
  hadLegacyKey: boolean;
}

function isNonEmptyString(v: unknown): v is string {
  return typeof v === "string" && v.trim().length > 0;
}

function isBlob(v: unknown): v is string {
  if (typeof v !== "string") return false;
  try {
    return base64ToBytes(v).byteLength >= MIN_BLOB_LEN;
  } catch {
    return false;
  }
}

function isIsoDate(v: unknown): v is string {
  return typeof v === "string" && !Number.isNaN(Date.parse(v));
}

/**
 * Serializes users and vaults to UTF-8 JSON records and validates them on the way back.
 * Anything malformed decodes to `null`; callers treat that as absent.
 *
 * Vault records hold the salt and the encrypted items, never key material.
 */
export class RecordCodec {
  constructor(public readonly namespace: string = VAULT_CONSTANTS.NAMESPACE) {}

  usersKey(): string {
    return `${this.namespace}:users`;
  }

  vaultKey(ownerId: string): string {
    return `${this.namespace}:vault:${ownerId}`;
  }

  // --------------------------- users ---------------------------

  encodeUsers(users: readonly User[]): Uint8Array {
    const record: PersistedUsersRecord = {
      v: VAULT_CONSTANTS.RECORD_VERSION,
      users: users.map((u) => ({ id: u.id, username: u.username, passwordHash: u.passwordHash }))
    };
    return encodeJson(record);
  }

  decodeUsers(bytes: Uint8Array): User[] | null {
    let parsed: unknown;
    try {
      parsed = decodeJson(bytes);
    } catch {
      return null;
    }
    if (!this.isValidUsersRecord(parsed)) return null;
    return parsed.users.map((u) => ({ id: u.id, username: u.username, passwordHash: u.passwordHash }));
  }

  isValidUsersRecord(value: unknown): value is PersistedUsersRecord {
    if (!isPlainObject(value)) return false;
    if (value.v !== VAULT_CONSTANTS.RECORD_VERSION) return false;
    if (!Array.isArray(value.users)) return false;

    const names = new Set<string>();
    const ids = new Set<string>();
    for (const u of value.users) {
      if (!this.isValidUser(u)) return false;
      if (names.has(u.username) || ids.has(u.id)) return false;
      names.add(u.username);
      ids.add(u.id);
    }
    return true;
  }

  private isValidUser(u: unknown): u is PersistedUser {
    return (
      isPlainObject(u) &&
      isNonEmptyString(u.id) &&
      isNonEmptyString(u.username) &&
      isPasswordHash(u.passwordHash)
    );
  }

  // --------------------------- vaults ---------------------------

  encodeVault(vault: Vault): Uint8Array {
    const record: PersistedVaultRecord = {
      v: VAULT_CONSTANTS.RECORD_VERSION,
      ownerId: vault.ownerId,
      salt: bytesToBase64(vault.salt),
      items: vault.items.map(toPersistedItem)
    };
    return encodeJson(record);
  }

  decodeVault(bytes: Uint8Array, expectedOwnerId: string): DecodedVault | null {
    let parsed: unknown;
    try {
      parsed = decodeJson(bytes);
    } catch {
      return null;
    }
    if (!this.isValidVaultRecord(parsed) || parsed.ownerId !== expectedOwnerId) return null;

    const vault = new Vault(parsed.ownerId, base64ToBytes(parsed.salt), parsed.items.map(fromPersistedItem));
    return { vault, hadLegacyKey: "key" in parsed };
  }

  isValidVaultRecord(value: unknown): value is PersistedVaultRecord {
    if (!isPlainObject(value)) return false;
    if (value.v !== VAULT_CONSTANTS.RECORD_VERSION) return false;
    if (!isNonEmptyString(value.ownerId)) return false;
    if (typeof value.salt !== "string") return false;
    try {
      if (base64ToBytes(value.salt).byteLength !== VAULT_CONSTANTS.SALT_LEN) return false;
    } catch {
      return false;
    }
    if (!Array.isArray(value.items)) return false;

    const ownerId = value.ownerId;
    const ids = new Set<string>();
    for (const item of value.items) {
      if (!this.isValidItem(item, ownerId)) return false;
      if (ids.has(item.id)) return false;
      ids.add(item.id);
    }
    return true;
  }

  private isValidItem(i: unknown, ownerId: string): i is PersistedItem {
    if (!isPlainObject(i)) return false;
    if (!isNonEmptyString(i.id) || !isNonEmptyString(i.title)) return false;
    if (i.ownerId !== ownerId || !isIsoDate(i.createdAt)) return false;

    switch (i.kind) {
      case "credential":
        return typeof i.site === "string" && typeof i.username === "string" && isBlob(i.secret);
      case "note":
        return isBlob(i.text);
      default:
        return false;
    }
  }
}

function toPersistedItem(item: VaultItem): PersistedItem {
  const base = {
    id: item.id,
    title: item.title,
    ownerId: item.ownerId,
    createdAt: item.createdAt.toISOString()
  };
  switch (item.kind) {
    case "credential":
      return { ...base, kind: "credential", site: item.site, username: item.username, secret: item.secret };
    case "note":
      return { ...base, kind: "note", text: item.text };
  }
}

function fromPersistedItem(p: PersistedItem): VaultItem {
  const base = { id: p.id, title: p.title, ownerId: p.ownerId, createdAt: new Date(p.createdAt) };
  switch (p.kind) {
    case "credential":
      return { ...base, kind: "credential", site: p.site, username: p.username, secret: p.secret };
    case "note":
      return { ...base, kind: "note", text: p.text };
  }
}
