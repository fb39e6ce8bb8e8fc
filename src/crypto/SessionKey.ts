import { KeyNotAvailableError } from "../errors";

/**
 * Capability for one authenticated session: the derived, non-extractable AES key.
 * Revoking drops the key; every later `use()` throws.
 */
export class SessionKey {
  private key: CryptoKey | null;

  constructor(key: CryptoKey) {
    this.key = key;
  }

  use(): CryptoKey {
    if (!this.key) throw new KeyNotAvailableError("Session key was revoked");
    return this.key;
  }

  get isRevoked(): boolean {
    return this.key === null;
  }

  revoke(): void {
    this.key = null;
  }
}
