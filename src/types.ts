/**
 * Base64 text of an AES-GCM field blob (`nonce || ciphertext || tag`) or of a
 * password hash (`salt || derived`). Opaque outside `src/crypto`.
 */
export type CryptoBlob = string;

export interface PersistedUser {
  id: string;
  username: string;
  passwordHash: CryptoBlob;
}

export interface PersistedUsersRecord {
  v: 1;
  users: PersistedUser[];
}

interface PersistedItemBase {
  id: string;
  title: string;
  ownerId: string;
  createdAt: string;   // ISO-8601
}

export interface PersistedCredentialItem extends PersistedItemBase {
  kind: "credential";
  site: string;
  username: string;
  secret: CryptoBlob;
}

export interface PersistedNoteItem extends PersistedItemBase {
  kind: "note";
  text: CryptoBlob;
}

export type PersistedItem = PersistedCredentialItem | PersistedNoteItem;

export interface PersistedVaultRecord {
  v: 1;
  ownerId: string;
  salt: string;        // base64, 16 bytes
  items: PersistedItem[];
}
