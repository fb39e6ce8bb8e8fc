import { EncryptionManager } from "../../crypto/EncryptionManager";
import { deriveKey } from "../../crypto/KeyDerivation";
import { SessionKey } from "../../crypto/SessionKey";
import { KeyNotAvailableError } from "../../errors";
import { createLogger, type Logger } from "../../utils/logger";
import type { KeyPhase, KeyState } from "./states/BaseKeyState";
import { MaterializedState } from "./states/MaterializedState";
import { UninitializedState } from "./states/UninitializedState";

/** Moves every item from `previous` to `next`; throwing aborts the rekey. */
export type Reencrypt = (previous: SessionKey, next: SessionKey) => Promise<void>;

export interface KeyLifecycleOptions {
  enc?: EncryptionManager;
  logger?: Logger;
}

/**
 * Owns the vault salt and the session key for one authenticated session.
 *
 * Phases: `uninitialized` → `materialized` (vault creation or login) → `cleared` (logout),
 * and `cleared` → `materialized` again on the next login. Only the salt is ever persisted
 * by callers; the key lives in a {@link SessionKey} and is re-derived every session.
 */
export class KeyLifecycleManager {
  private state: KeyState;

  /** @internal */
  public readonly enc: EncryptionManager;

  private readonly log: Logger;

  constructor(opts: KeyLifecycleOptions = {}) {
    this.enc = opts.enc ?? new EncryptionManager();
    this.log = opts.logger ?? createLogger({ scope: ["keys"] });
    this.state = new UninitializedState(this);
  }

  get phase(): KeyPhase {
    return this.state.phase;
  }

  /** New vault: fresh salt, derive, materialize. Returns the salt to persist. */
  async createVaultKey(password: string): Promise<Uint8Array> {
    return this.state.createVaultKey(password);
  }

  /** Login or re-authentication: re-derive from the persisted salt. */
  async materialize(password: string, salt: Uint8Array): Promise<void> {
    await this.state.materialize(password, salt);
  }

  /** @throws {KeyNotAvailableError} unless a session key is materialized. */
  current(): SessionKey {
    return this.state.current();
  }

  /** Copy of the salt the current key was derived from. */
  salt(): Uint8Array {
    if (this.state instanceof MaterializedState) return this.state.saltCopy();
    throw new KeyNotAvailableError();
  }

  /**
   * Password change: derive from the same salt and `newPassword`, let `reencrypt`
   * move the data, then swap keys. Revokes the previous key on success only.
   */
  async rekey(newPassword: string, reencrypt: Reencrypt): Promise<void> {
    await this.state.rekey(newPassword, reencrypt);
  }

  /** Logout: revoke the key. Later access fails with KeyNotAvailableError. */
  clear(): void {
    const before = this.state.phase;
    this.state.clear();
    if (before === "materialized") this.log.debug("session key cleared");
  }

  /** @internal */
  transitionTo(state: KeyState): void {
    this.state = state;
  }

  /** @internal Replace whatever key is live with `key`. */
  install(key: SessionKey, salt: Uint8Array): void {
    const saltCopy = salt.slice();
    if (this.state instanceof MaterializedState) this.state.retire();
    this.transitionTo(new MaterializedState(this, key, saltCopy));
    this.log.debug("session key materialized");
  }

  /** @internal */
  async deriveSessionKey(password: string, salt: Uint8Array): Promise<SessionKey> {
    const key = await deriveKey(password, salt);
    return new SessionKey(key);
  }
}
