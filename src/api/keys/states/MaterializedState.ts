import { KeyState } from "./BaseKeyState";
import { ClearedState } from "./ClearedState";
import type { KeyLifecycleManager, Reencrypt } from "../KeyLifecycleManager";
import type { SessionKey } from "../../../crypto/SessionKey";

export class MaterializedState extends KeyState {
  readonly phase = "materialized" as const;

  constructor(
    context: KeyLifecycleManager,
    private readonly key: SessionKey,
    private readonly salt: Uint8Array
  ) {
    super(context);
  }

  current(): SessionKey {
    this.key.use();
    return this.key;
  }

  saltCopy(): Uint8Array {
    return this.salt.slice();
  }

  /**
   * Same salt, new password. The previous key stays live until `reencrypt` resolves,
   * so a failure leaves the session exactly as it was.
   */
  async rekey(newPassword: string, reencrypt: Reencrypt): Promise<void> {
    const next = await this.context.deriveSessionKey(newPassword, this.salt);
    try {
      await reencrypt(this.key, next);
    } catch (e) {
      next.revoke();
      throw e;
    }
    this.context.install(next, this.salt);
  }

  clear(): void {
    this.key.revoke();
    this.salt.fill(0);
    this.transitionTo(new ClearedState(this.context));
  }

  /** Called when another key replaces this one. */
  retire(): void {
    this.key.revoke();
    this.salt.fill(0);
  }
}
