import type { KeyLifecycleManager, Reencrypt } from "../KeyLifecycleManager";
import type { SessionKey } from "../../../crypto/SessionKey";

export type KeyPhase = "uninitialized" | "materialized" | "cleared";

export abstract class KeyState {
  constructor(protected context: KeyLifecycleManager) {}

  abstract readonly phase: KeyPhase;
  abstract current(): SessionKey;
  abstract rekey(newPassword: string, reencrypt: Reencrypt): Promise<void>;
  abstract clear(): void;

  /** Vault creation and login are valid from every phase; any live key is revoked first. */
  async createVaultKey(password: string): Promise<Uint8Array> {
    const salt = this.context.enc.generateSalt();
    await this.materialize(password, salt);
    return salt.slice();
  }

  async materialize(password: string, salt: Uint8Array): Promise<void> {
    const key = await this.context.deriveSessionKey(password, salt);
    this.context.install(key, salt);
  }

  protected transitionTo(state: KeyState): void {
    this.context.transitionTo(state);
  }
}
