import "../setup";
import { OwnershipMismatchError, ValidationError } from "../../src/errors";
import type { CredentialItem, NoteItem, VaultItem } from "../../src/items/VaultItem";
import { Vault } from "../../src/vault/Vault";
import { VaultRepository } from "../../src/vault/VaultRepository";

const salt = new Uint8Array(16).fill(3);
const createdAt = new Date("2024-01-01T00:00:00.000Z");

function credential(id: string, title: string, site: string, ownerId = "owner-1"): CredentialItem {
  return { id, kind: "credential", title, site, username: "alice", secret: "blob", ownerId, createdAt };
}

function note(id: string, title: string, ownerId = "owner-1"): NoteItem {
  return { id, kind: "note", title, text: "blob", ownerId, createdAt };
}

const ids = (items: Iterable<VaultItem>) => Array.from(items, (i) => i.id);

describe("Vault", () => {
  it("validates owner and salt", () => {
    expect(() => new Vault("", salt)).toThrow(ValidationError);
    expect(() => new Vault("owner-1", new Uint8Array(8))).toThrow(ValidationError);
  });

  it("keeps its own copy of the salt", () => {
    const mine = salt.slice();
    const vault = new Vault("owner-1", mine);
    mine.fill(0);
    vault.salt.fill(0);
    expect(Array.from(vault.salt)).toEqual(Array.from(salt));
  });

  it("only accepts items of its owner", () => {
    const vault = new Vault("owner-1", salt);
    expect(() => vault.addItem(note("n1", "stranger", "owner-2"))).toThrow(OwnershipMismatchError);
    expect(vault.size).toBe(0);
    expect(() => new Vault("owner-1", salt, [note("n2", "x", "owner-2")])).toThrow(OwnershipMismatchError);
  });

  it("removes items by identity", () => {
    const a = note("n1", "A");
    const vault = new Vault("owner-1", salt, [a]);
    expect(vault.removeItem({ ...a })).toBe(false);
    expect(vault.removeItem(a)).toBe(true);
    expect(vault.size).toBe(0);
  });

  it("replaces items in place", () => {
    const a = note("n1", "A");
    const b = note("n2", "B");
    const vault = new Vault("owner-1", salt, [a, b]);
    const a2 = { ...a, text: "blob2" };
    expect(vault.replaceItem(a, a2)).toBe(true);
    expect(vault.items[0]).toBe(a2);
    expect(vault.replaceItem(a, a2)).toBe(false);
  });

  it("replaces everything or nothing", () => {
    const vault = new Vault("owner-1", salt, [note("n1", "A")]);
    expect(() => vault.replaceAll([note("n2", "B"), note("n3", "C", "owner-2")])).toThrow(OwnershipMismatchError);
    expect(ids(vault.items)).toEqual(["n1"]);
    vault.replaceAll([note("n2", "B")]);
    expect(ids(vault.items)).toEqual(["n2"]);
  });

  it("looks items up by id", () => {
    const vault = new Vault("owner-1", salt, [note("n1", "A")]);
    expect(vault.getItem("n1")?.title).toBe("A");
    expect(vault.getItem("missing")).toBeNull();
  });

  describe("search", () => {
    const items = [
      credential("c1", "Mail", "mail.example.com"),
      note("n1", "Shopping list"),
      credential("c2", "Bank", "EXAMPLE-bank.test"),
      note("n2", "mailing addresses")
    ];

    it("matches title and summary case-insensitively, in vault order", () => {
      const vault = new Vault("owner-1", salt, items);
      expect(ids(vault.search("MAIL"))).toEqual(["c1", "n2"]);
      expect(ids(vault.search("example"))).toEqual(["c1", "c2"]);
      expect(ids(vault.search("note:"))).toEqual(["n1", "n2"]);
      expect(ids(vault.search("password"))).toEqual(["c1", "c2"]);
      expect(ids(vault.search("nothing"))).toEqual([]);
    });

    it("returns everything for an empty keyword", () => {
      const vault = new Vault("owner-1", salt, items);
      expect(ids(vault.search(""))).toEqual(["c1", "n1", "c2", "n2"]);
    });

    it("rescans the vault on every iteration", () => {
      const vault = new Vault("owner-1", salt, [items[0]]);
      const results = vault.search("mail");
      expect(ids(results)).toEqual(["c1"]);
      vault.addItem(items[3]);
      expect(ids(results)).toEqual(["c1", "n2"]);
    });

    it("rejects a non-string keyword", () => {
      const vault = new Vault("owner-1", salt);
      expect(() => Reflect.apply(vault.search, vault, [42])).toThrow(ValidationError);
    });
  });
});

describe("VaultRepository", () => {
  it("stores one vault per owner", () => {
    const repo = new VaultRepository();
    const v1 = new Vault("owner-1", salt);
    repo.put(v1);
    expect(repo.get("owner-1")).toBe(v1);
    expect(repo.get("owner-2")).toBeNull();
    const v2 = new Vault("owner-1", salt);
    repo.put(v2);
    expect(repo.get("owner-1")).toBe(v2);
    expect(repo.delete("owner-1")).toBe(true);
    repo.clear();
    expect(repo.get("owner-1")).toBeNull();
  });
});
