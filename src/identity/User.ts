import type { CryptoBlob } from "../types";

export interface User {
  readonly id: string;
  /** Unique, compared case-sensitively. */
  readonly username: string;
  readonly passwordHash: CryptoBlob;
}
