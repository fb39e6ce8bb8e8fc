import { hashPassword, verifyPassword } from "../crypto/PasswordHashing";
import { DuplicateUsernameError, ValidationError } from "../errors";
import { createLogger, type Logger } from "../utils/logger";
import type { User } from "./User";
import type { UserRepository } from "./UserRepository";

export interface IdentityServiceOptions {
  logger?: Logger;
  /** Source of user ids. Defaults to `crypto.randomUUID()`. */
  newId?: () => string;
}

/**
 * Registration, login and password reset over a {@link UserRepository}.
 *
 * Bad credentials are a `false` result, never an exception. The only error a
 * login can raise is FormatError, for a stored hash that is not a hash blob.
 */
export class IdentityService {
  private readonly log: Logger;
  private readonly newId: () => string;

  constructor(
    private readonly users: UserRepository,
    opts: IdentityServiceOptions = {}
  ) {
    this.log = opts.logger ?? createLogger({ scope: ["identity"] });
    this.newId = opts.newId ?? (() => crypto.randomUUID());
  }

  async register(username: string, password: string): Promise<User> {
    assertNonBlank(username, "username");
    assertNonEmpty(password, "password");
    if (this.users.has(username)) {
      throw new DuplicateUsernameError(username);
    }

    const passwordHash = await hashPassword(password);
    const user: User = { id: this.newId(), username, passwordHash };
    // Re-checked by add(): another registration may have landed while hashing.
    this.users.add(user);
    this.log.info("user registered", { username });
    return user;
  }

  async login(username: string, password: string): Promise<boolean> {
    const user = this.users.findByUsername(username);
    if (!user) {
      this.log.info("login rejected: unknown user", { username });
      return false;
    }
    const ok = await verifyPassword(password, user.passwordHash);
    if (!ok) this.log.info("login rejected: bad password", { username });
    return ok;
  }

  /** Verifies `current` first; a wrong password returns false and changes nothing. */
  async resetPassword(username: string, current: string, next: string): Promise<boolean> {
    assertNonEmpty(next, "new password");
    if (!(await this.login(username, current))) return false;
    await this.replacePassword(username, next);
    return true;
  }

  /** Unchecked replacement, for callers that have already verified the current password. */
  async replacePassword(username: string, next: string): Promise<User> {
    assertNonEmpty(next, "new password");
    const passwordHash = await hashPassword(next);
    const user = this.users.replacePasswordHash(username, passwordHash);
    this.log.info("password replaced", { username });
    return user;
  }
}

function assertNonBlank(value: string, field: string): void {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new ValidationError(`${field} must be a non-empty string`);
  }
}

// Passwords are taken verbatim; only the empty string is refused.
function assertNonEmpty(value: string, field: string): void {
  if (typeof value !== "string" || value.length === 0) {
    throw new ValidationError(`${field} must be a non-empty string`);
  }
}
