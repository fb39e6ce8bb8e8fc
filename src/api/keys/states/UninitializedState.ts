import { KeyState } from "./BaseKeyState";
import { KeyNotAvailableError } from "../../../errors";
import type { SessionKey } from "../../../crypto/SessionKey";

export class UninitializedState extends KeyState {
  readonly phase = "uninitialized" as const;

  current(): SessionKey {
    throw new KeyNotAvailableError("No session key has been derived");
  }

  async rekey(): Promise<void> {
    throw new KeyNotAvailableError("No session key has been derived");
  }

  clear(): void {
    // Nothing to drop
  }
}
