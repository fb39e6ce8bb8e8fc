import { OwnershipMismatchError, ValidationError } from "../errors";
import { summarize, type VaultItem } from "../items/VaultItem";
import { isUint8Array } from "../utils/typedArray";
import { VAULT_CONSTANTS } from "../constants";

/**
 * One user's ordered collection of items plus the salt their key is derived from.
 * The salt is fixed for the vault's lifetime; only the items change.
 */
export class Vault {
  private readonly keySalt: Uint8Array;
  private entries: VaultItem[];

  constructor(
    public readonly ownerId: string,
    salt: Uint8Array,
    items: Iterable<VaultItem> = []
  ) {
    if (typeof ownerId !== "string" || ownerId.length === 0) {
      throw new ValidationError("ownerId must be a non-empty string");
    }
    if (!isUint8Array(salt) || salt.byteLength !== VAULT_CONSTANTS.SALT_LEN) {
      throw new ValidationError(`Salt must be Uint8Array of length ${VAULT_CONSTANTS.SALT_LEN}`);
    }
    this.keySalt = salt.slice();
    this.entries = [];
    for (const item of items) this.addItem(item);
  }

  get salt(): Uint8Array {
    return this.keySalt.slice();
  }

  get items(): readonly VaultItem[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }

  /** @throws {OwnershipMismatchError} when the item belongs to another user. */
  addItem(item: VaultItem): void {
    this.assertOwned(item);
    this.entries.push(item);
  }

  /** Removes this exact item object. Returns whether it was present. */
  removeItem(item: VaultItem): boolean {
    const idx = this.entries.indexOf(item);
    if (idx === -1) return false;
    this.entries.splice(idx, 1);
    return true;
  }

  /** Swaps `previous` for `next` in place, keeping its position. */
  replaceItem(previous: VaultItem, next: VaultItem): boolean {
    this.assertOwned(next);
    const idx = this.entries.indexOf(previous);
    if (idx === -1) return false;
    this.entries[idx] = next;
    return true;
  }

  /** All-or-nothing: ownership of every item is checked before anything changes. */
  replaceAll(items: readonly VaultItem[]): void {
    for (const item of items) this.assertOwned(item);
    this.entries = [...items];
  }

  getItem(id: string): VaultItem | null {
    return this.entries.find((i) => i.id === id) ?? null;
  }

  /**
   * Case-insensitive substring match over title and summary, in vault order.
   * Lazy: each iteration scans the items as they are at that moment.
   */
  search(keyword: string): Iterable<VaultItem> {
    if (typeof keyword !== "string") throw new ValidationError("keyword must be a string");
    const needle = keyword.toLowerCase();
    return { [Symbol.iterator]: () => this.scan(needle) };
  }

  private *scan(needle: string): Generator<VaultItem> {
    for (const item of [...this.entries]) {
      if (item.title.toLowerCase().includes(needle) || summarize(item).toLowerCase().includes(needle)) {
        yield item;
      }
    }
  }

  private assertOwned(item: VaultItem): void {
    if (item.ownerId !== this.ownerId) {
      throw new OwnershipMismatchError();
    }
  }
}
