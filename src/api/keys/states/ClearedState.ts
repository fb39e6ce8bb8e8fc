import { KeyState } from "./BaseKeyState";
import { KeyNotAvailableError } from "../../../errors";
import type { SessionKey } from "../../../crypto/SessionKey";

export class ClearedState extends KeyState {
  readonly phase = "cleared" as const;

  current(): SessionKey {
    throw new KeyNotAvailableError("Session ended; log in again");
  }

  async rekey(): Promise<void> {
    throw new KeyNotAvailableError("Session ended; log in again");
  }

  clear(): void {
    // No-op
  }
}
