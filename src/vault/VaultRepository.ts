import type { Vault } from "./Vault";

/** Vaults by owner id; one vault per user. */
export class VaultRepository {
  private readonly byOwner = new Map<string, Vault>();

  get(ownerId: string): Vault | null {
    return this.byOwner.get(ownerId) ?? null;
  }

  put(vault: Vault): void {
    this.byOwner.set(vault.ownerId, vault);
  }

  delete(ownerId: string): boolean {
    return this.byOwner.delete(ownerId);
  }

  clear(): void {
    this.byOwner.clear();
  }
}
