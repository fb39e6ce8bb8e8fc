import { EncryptionManager } from "../crypto/EncryptionManager";
import { generateStrongPassword } from "../crypto/PasswordGenerator";
import { CryptoError, KeyNotAvailableError, NotFoundError } from "../errors";
import { IdentityService } from "../identity/IdentityService";
import type { User } from "../identity/User";
import { UserRepository } from "../identity/UserRepository";
import {
  createCredential,
  createNote,
  describeItem,
  reencryptItem,
  replaceSecret,
  revealSecret,
  summarize,
  type CredentialItem,
  type ItemContext,
  type NewCredential,
  type NewNote,
  type NoteItem,
  type VaultItem
} from "../items/VaultItem";
import type { BlobStore } from "../storage/BlobStore";
import { MemoryBlobStore } from "../storage/MemoryBlobStore";
import { createLogger, type Logger, type LogLevelName } from "../utils/logger";
import { Vault } from "../vault/Vault";
import { VaultRepository } from "../vault/VaultRepository";
import { KeyLifecycleManager } from "./keys/KeyLifecycleManager";
import { RecordCodec } from "./vault/RecordCodec";

/**
 * Configuration options for a SecretVault.
 */
export interface SecretVaultOptions {
  /** Where records are persisted. Defaults to a process-local {@link MemoryBlobStore}. */
  store?: BlobStore;
  /** Prefix of every persisted record key. */
  namespace?: string;
  logger?: Logger;
  /** Level for the default logger; ignored when `logger` is given. */
  logLevel?: LogLevelName;
  /** Clock for item creation timestamps. */
  now?: () => Date;
}

/** Why persisted data was last discarded and replaced with an empty structure. */
export type ResetReason =
  | "invalid-users-record"
  | "unreadable-users-record"
  | "invalid-vault-record"
  | "missing-vault-record";

function byTitleIgnoringCase(a: VaultItem, b: VaultItem): number {
  const x = a.title.toLowerCase();
  const y = b.title.toLowerCase();
  return x < y ? -1 : x > y ? 1 : 0;
}

interface Session {
  user: User;
  vault: Vault;
}

/**
 * Multi-user secret vault: accounts, one encrypted vault per account, and a session key
 * that exists only between login and logout.
 *
 * Persisted state is a users record (usernames and password hashes) and one vault
 * record per user (salt and encrypted items). Keys are re-derived from the password on
 * every login and never written anywhere.
 */
export class SecretVault {
  private readonly store: BlobStore;
  private readonly codec: RecordCodec;
  private readonly enc = new EncryptionManager();
  private readonly users = new UserRepository();
  private readonly vaults = new VaultRepository();
  private readonly identity: IdentityService;
  private readonly keys: KeyLifecycleManager;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly ready: Promise<void>;

  private session: Session | null = null;
  private resetReason: ResetReason | null = null;

  constructor(opts: SecretVaultOptions = {}) {
    this.store = opts.store ?? new MemoryBlobStore();
    this.codec = new RecordCodec(opts.namespace);
    this.log = (opts.logger ?? createLogger({ level: opts.logLevel })).child("vault");
    this.now = opts.now ?? (() => new Date());
    this.identity = new IdentityService(this.users, { logger: this.log.child("identity") });
    this.keys = new KeyLifecycleManager({ enc: this.enc, logger: this.log.child("keys") });
    this.ready = this.initialize();
  }

  // --------------------------- public API ---------------------------

  /** Resolves once the users record has been loaded. Never rejects. */
  whenReady(): Promise<void> {
    return this.ready;
  }

  get lastResetReason(): ResetReason | null {
    return this.resetReason;
  }

  currentUser(): User | null {
    return this.session?.user ?? null;
  }

  isLocked(): boolean {
    return this.session === null || this.keys.phase !== "materialized";
  }

  /**
   * Creates the account and its empty vault, then opens a session for it.
   * Any session already open is ended first.
   *
   * @throws {DuplicateUsernameError} when the username is taken.
   * @throws {ValidationError} for an empty username or password.
   */
  async register(username: string, password: string): Promise<User> {
    await this.ready;
    this.endSession();

    const user = await this.identity.register(username, password);
    try {
      const salt = await this.keys.createVaultKey(password);
      const vault = new Vault(user.id, salt);
      this.vaults.put(vault);
      await this.saveVault(vault);
      await this.saveUsers();
      this.session = { user, vault };
    } catch (e) {
      this.users.remove(user.username);
      this.vaults.delete(user.id);
      this.keys.clear();
      await this.store.remove(this.codec.vaultKey(user.id)).catch((cleanup: unknown) => {
        this.log.error("failed to remove vault record during rollback", { userId: user.id, error: String(cleanup) });
      });
      throw e;
    }
    this.log.info("session opened", { username });
    return user;
  }

  /**
   * Verifies the password and opens a session. Returns false for an unknown user or a
   * wrong password. Any session already open is ended first, whatever the outcome.
   */
  async login(username: string, password: string): Promise<boolean> {
    await this.ready;
    this.endSession();

    if (!(await this.identity.login(username, password))) return false;
    const user = this.users.findByUsername(username);
    if (!user) return false;

    let vault: Vault;
    try {
      vault = await this.openVault(user, password);
    } catch (e) {
      this.keys.clear();
      throw e;
    }
    this.session = { user, vault };
    this.log.info("session opened", { username });
    return true;
  }

  logout(): void {
    const username = this.session?.user.username;
    this.endSession();
    if (username !== undefined) this.log.info("session closed", { username });
  }

  /**
   * Changes the logged-in user's password. Every item is re-encrypted under the key
   * derived from `next`; a wrong `current` returns false and changes nothing.
   *
   * @throws {KeyNotAvailableError} without a session.
   */
  async resetPassword(current: string, next: string): Promise<boolean> {
    await this.ready;
    const { user, vault } = this.requireSession();

    if (!(await this.identity.login(user.username, current))) return false;

    const previousItems = vault.items;
    const previousHash = user.passwordHash;
    let updated: User = user;

    await this.keys.rekey(next, async (from, to) => {
      const moved: VaultItem[] = [];
      for (const item of previousItems) {
        try {
          moved.push(await reencryptItem(item, from, to, this.enc));
        } catch (e) {
          if (!(e instanceof CryptoError)) throw e;
          // Already unreadable under the old key; carried over as is.
          this.log.warn("item could not be decrypted; keeping its blob unchanged", { itemId: item.id });
          moved.push(item);
        }
      }
      updated = await this.identity.replacePassword(user.username, next);
      vault.replaceAll(moved);
      try {
        await this.saveVault(vault);
        await this.saveUsers();
      } catch (e) {
        vault.replaceAll(previousItems);
        this.users.replacePasswordHash(user.username, previousHash);
        await this.saveVault(vault).catch((restore: unknown) => {
          this.log.error("failed to restore vault record", { userId: user.id, error: String(restore) });
        });
        throw e;
      }
    });

    this.session = { user: updated, vault };
    this.log.info("password reset", { username: user.username, items: previousItems.length });
    return true;
  }

  async addCredential(input: NewCredential): Promise<CredentialItem> {
    await this.ready;
    const { vault } = this.requireSession();
    const item = await createCredential(input, this.keys.current(), this.itemContext(vault));
    await this.mutate(vault, () => vault.addItem(item));
    return item;
  }

  async addNote(input: NewNote): Promise<NoteItem> {
    await this.ready;
    const { vault } = this.requireSession();
    const item = await createNote(input, this.keys.current(), this.itemContext(vault));
    await this.mutate(vault, () => vault.addItem(item));
    return item;
  }

  /** Decrypts a credential's secret or a note's text. */
  async revealSecret(itemId: string): Promise<string> {
    await this.ready;
    const item = this.getItem(itemId);
    return revealSecret(item, this.keys.current(), this.enc);
  }

  async updateSecret(itemId: string, plaintext: string): Promise<VaultItem> {
    await this.ready;
    const { vault } = this.requireSession();
    const previous = this.getItem(itemId);
    const next = await replaceSecret(previous, plaintext, this.keys.current(), this.enc);
    await this.mutate(vault, () => vault.replaceItem(previous, next));
    return next;
  }

  async removeItem(itemId: string): Promise<void> {
    await this.ready;
    const { vault } = this.requireSession();
    const item = this.getItem(itemId);
    await this.mutate(vault, () => vault.removeItem(item));
  }

  /** @throws {NotFoundError} for an id not in the current vault. */
  getItem(itemId: string): VaultItem {
    const { vault } = this.requireSession();
    const item = vault.getItem(itemId);
    if (!item) throw new NotFoundError(`No item with id ${itemId}`);
    return item;
  }

  listItems(): readonly VaultItem[] {
    return this.requireSession().vault.items;
  }

  /** One summary line per item, sorted by title ignoring case; equal titles keep vault order. */
  listSummaries(): string[] {
    return [...this.listItems()].sort(byTitleIgnoringCase).map(summarize);
  }

  search(keyword: string): Iterable<VaultItem> {
    return this.requireSession().vault.search(keyword);
  }

  describeItem(itemId: string): string {
    return describeItem(this.getItem(itemId));
  }

  generatePassword(length?: number): string {
    return generateStrongPassword(length);
  }

  // --------------------------- private helpers ---------------------------

  private async initialize(): Promise<void> {
    let bytes: Uint8Array | null;
    try {
      bytes = await this.store.load(this.codec.usersKey());
    } catch (e) {
      this.resetReason = "unreadable-users-record";
      this.log.error("users record could not be read; starting empty", { error: String(e) });
      return;
    }
    if (!bytes) return;

    const users = this.codec.decodeUsers(bytes);
    if (!users) {
      this.resetReason = "invalid-users-record";
      this.log.warn("users record is malformed; starting empty");
      return;
    }
    for (const u of users) this.users.add(u);
    this.log.debug("users loaded", { count: users.length });
  }

  /** Loads the user's vault and materializes its key; a missing or bad record gives a fresh vault. */
  private async openVault(user: User, password: string): Promise<Vault> {
    const cached = this.vaults.get(user.id);
    if (cached) {
      await this.keys.materialize(password, cached.salt);
      return cached;
    }

    const bytes = await this.store.load(this.codec.vaultKey(user.id));
    const decoded = bytes ? this.codec.decodeVault(bytes, user.id) : null;
    if (decoded) {
      await this.keys.materialize(password, decoded.vault.salt);
      this.vaults.put(decoded.vault);
      if (decoded.hadLegacyKey) {
        this.log.warn("vault record carried key material; rewriting without it", { userId: user.id });
        await this.saveVault(decoded.vault);
      }
      return decoded.vault;
    }

    this.resetReason = bytes ? "invalid-vault-record" : "missing-vault-record";
    this.log.warn("vault record unusable; starting with an empty vault", {
      userId: user.id,
      reason: this.resetReason
    });
    const salt = await this.keys.createVaultKey(password);
    const vault = new Vault(user.id, salt);
    this.vaults.put(vault);
    await this.saveVault(vault);
    return vault;
  }

  private requireSession(): Session {
    if (!this.session || this.keys.phase !== "materialized") {
      throw new KeyNotAvailableError();
    }
    return this.session;
  }

  private endSession(): void {
    this.keys.clear();
    this.session = null;
  }

  private itemContext(vault: Vault): ItemContext {
    return { ownerId: vault.ownerId, enc: this.enc, now: this.now };
  }

  /** Applies `change` and persists; the in-memory vault is restored if the write fails. */
  private async mutate(vault: Vault, change: () => void): Promise<void> {
    const snapshot = vault.items;
    change();
    try {
      await this.saveVault(vault);
    } catch (e) {
      vault.replaceAll(snapshot);
      throw e;
    }
  }

  private async saveVault(vault: Vault): Promise<void> {
    await this.store.store(this.codec.vaultKey(vault.ownerId), this.codec.encodeVault(vault));
  }

  private async saveUsers(): Promise<void> {
    await this.store.store(this.codec.usersKey(), this.codec.encodeUsers(this.users.list()));
  }
}
