import { DuplicateUsernameError, NotFoundError } from "../errors";
import type { CryptoBlob } from "../types";
import type { User } from "./User";

/** In-memory user directory keyed by exact username. */
export class UserRepository {
  private readonly byUsername = new Map<string, User>();

  constructor(users: Iterable<User> = []) {
    for (const u of users) this.add(u);
  }

  /** @throws {DuplicateUsernameError} when the username is taken; the existing user is untouched. */
  add(user: User): void {
    if (this.byUsername.has(user.username)) {
      throw new DuplicateUsernameError(user.username);
    }
    this.byUsername.set(user.username, user);
  }

  has(username: string): boolean {
    return this.byUsername.has(username);
  }

  findByUsername(username: string): User | null {
    return this.byUsername.get(username) ?? null;
  }

  replacePasswordHash(username: string, passwordHash: CryptoBlob): User {
    const existing = this.byUsername.get(username);
    if (!existing) throw new NotFoundError(`Unknown user: ${username}`);
    const updated: User = { ...existing, passwordHash };
    this.byUsername.set(username, updated);
    return updated;
  }

  remove(username: string): boolean {
    return this.byUsername.delete(username);
  }

  list(): User[] {
    return [...this.byUsername.values()];
  }

  get size(): number {
    return this.byUsername.size;
  }

  clear(): void {
    this.byUsername.clear();
  }
}
