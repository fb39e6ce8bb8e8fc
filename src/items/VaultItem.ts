import type { EncryptionManager } from "../crypto/EncryptionManager";
import type { SessionKey } from "../crypto/SessionKey";
import { ValidationError } from "../errors";
import type { CryptoBlob } from "../types";

interface ItemBase {
  readonly id: string;
  readonly title: string;
  readonly ownerId: string;
  readonly createdAt: Date;
}

export interface CredentialItem extends ItemBase {
  readonly kind: "credential";
  readonly site: string;
  readonly username: string;
  readonly secret: CryptoBlob;
}

export interface NoteItem extends ItemBase {
  readonly kind: "note";
  readonly text: CryptoBlob;
}

export type VaultItem = CredentialItem | NoteItem;
export type ItemKind = VaultItem["kind"];

export interface NewCredential {
  title: string;
  site: string;
  username: string;
  secret: string;
}

export interface NewNote {
  title: string;
  text: string;
}

/** Everything item construction needs besides the key. */
export interface ItemContext {
  ownerId: string;
  enc: EncryptionManager;
  now?: () => Date;
  newId?: () => string;
}

function assertNonEmpty(value: unknown, field: string): asserts value is string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new ValidationError(`${field} must be a non-empty string`);
  }
}

function assertString(value: unknown, field: string): asserts value is string {
  if (typeof value !== "string") {
    throw new ValidationError(`${field} must be a string`);
  }
}

function baseFields(title: string, ctx: ItemContext): ItemBase {
  assertNonEmpty(title, "title");
  assertNonEmpty(ctx.ownerId, "ownerId");
  return {
    id: ctx.newId?.() ?? crypto.randomUUID(),
    title,
    ownerId: ctx.ownerId,
    createdAt: ctx.now?.() ?? new Date()
  };
}

export async function createCredential(
  input: NewCredential,
  key: SessionKey,
  ctx: ItemContext
): Promise<CredentialItem> {
  const base = baseFields(input.title, ctx);
  assertString(input.site, "site");
  assertString(input.username, "username");
  assertString(input.secret, "secret");
  return {
    ...base,
    kind: "credential",
    site: input.site,
    username: input.username,
    secret: await ctx.enc.encryptText(input.secret, key.use())
  };
}

export async function createNote(input: NewNote, key: SessionKey, ctx: ItemContext): Promise<NoteItem> {
  const base = baseFields(input.title, ctx);
  assertString(input.text, "text");
  return {
    ...base,
    kind: "note",
    text: await ctx.enc.encryptText(input.text, key.use())
  };
}

/** The encrypted field of an item: a credential's secret or a note's text. */
export function sealedField(item: VaultItem): CryptoBlob {
  switch (item.kind) {
    case "credential":
      return item.secret;
    case "note":
      return item.text;
    default:
      return assertNever(item);
  }
}

function withSealedField(item: VaultItem, blob: CryptoBlob): VaultItem {
  switch (item.kind) {
    case "credential":
      return { ...item, secret: blob };
    case "note":
      return { ...item, text: blob };
    default:
      return assertNever(item);
  }
}

export async function revealSecret(item: VaultItem, key: SessionKey, enc: EncryptionManager): Promise<string> {
  return enc.decryptText(sealedField(item), key.use());
}

/** New item value with the sensitive field re-encrypted; title and owner are kept. */
export async function replaceSecret<T extends VaultItem>(
  item: T,
  plaintext: string,
  key: SessionKey,
  enc: EncryptionManager
): Promise<T>;
export async function replaceSecret(
  item: VaultItem,
  plaintext: string,
  key: SessionKey,
  enc: EncryptionManager
): Promise<VaultItem> {
  assertString(plaintext, "plaintext");
  return withSealedField(item, await enc.encryptText(plaintext, key.use()));
}

/** Moves an item from one session key to another. */
export async function reencryptItem<T extends VaultItem>(
  item: T,
  from: SessionKey,
  to: SessionKey,
  enc: EncryptionManager
): Promise<T>;
export async function reencryptItem(
  item: VaultItem,
  from: SessionKey,
  to: SessionKey,
  enc: EncryptionManager
): Promise<VaultItem> {
  const plain = await enc.decrypt(sealedField(item), from.use());
  try {
    return withSealedField(item, await enc.encrypt(plain, to.use()));
  } finally {
    plain.fill(0);
  }
}

/** List-view line. Never includes decrypted content; search runs over it. */
export function summarize(item: VaultItem): string {
  switch (item.kind) {
    case "credential":
      return `Password: ${item.title} (${item.site})`;
    case "note":
      return `Note: ${item.title}`;
    default:
      return assertNever(item);
  }
}

export function describeItem(item: VaultItem): string {
  const created = `Created: ${item.createdAt.toISOString()}`;
  switch (item.kind) {
    case "credential":
      return [`Title: ${item.title}`, `Site: ${item.site}`, `Username: ${item.username}`, created].join("\n");
    case "note":
      return [`Title: ${item.title}`, created].join("\n");
    default:
      return assertNever(item);
  }
}

function assertNever(value: never): never {
  throw new ValidationError(`Unknown item kind: ${JSON.stringify(value)}`);
}
