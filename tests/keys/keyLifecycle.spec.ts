import "../setup";
import { KeyLifecycleManager } from "../../src/api/keys/KeyLifecycleManager";
import type { SessionKey } from "../../src/crypto/SessionKey";
import { KeyNotAvailableError } from "../../src/errors";
import { createLogger } from "../../src/utils/logger";

const quiet = createLogger({ level: "silent" });

describe("KeyLifecycleManager", () => {
  it("starts uninitialized with no key or salt", () => {
    const keys = new KeyLifecycleManager({ logger: quiet });
    expect(keys.phase).toBe("uninitialized");
    expect(() => keys.current()).toThrow(new KeyNotAvailableError("No session key has been derived"));
    expect(() => keys.salt()).toThrow(KeyNotAvailableError);
  });

  it("materializes on vault creation and returns a 16-byte salt", async () => {
    const keys = new KeyLifecycleManager({ logger: quiet });
    const salt = await keys.createVaultKey("test-password");
    expect(salt.byteLength).toBe(16);
    expect(keys.phase).toBe("materialized");
    expect(Array.from(keys.salt())).toEqual(Array.from(salt));
  });

  it("re-derives the same key from the persisted salt", async () => {
    const first = new KeyLifecycleManager({ logger: quiet });
    const salt = await first.createVaultKey("test-password");
    const blob = await first.enc.encryptText("kept", first.current().use());

    const second = new KeyLifecycleManager({ logger: quiet });
    await second.materialize("test-password", salt);
    await expect(second.enc.decryptText(blob, second.current().use())).resolves.toBe("kept");
  });

  it("revokes the key on clear and rejects access afterwards", async () => {
    const keys = new KeyLifecycleManager({ logger: quiet });
    await keys.createVaultKey("test-password");
    const held = keys.current();

    keys.clear();
    expect(keys.phase).toBe("cleared");
    expect(held.isRevoked).toBe(true);
    expect(() => keys.current()).toThrow(new KeyNotAvailableError("Session ended; log in again"));
    await expect(keys.rekey("other", async () => undefined)).rejects.toBeInstanceOf(KeyNotAvailableError);

    keys.clear();
    expect(keys.phase).toBe("cleared");
  });

  it("can be materialized again after clear", async () => {
    const keys = new KeyLifecycleManager({ logger: quiet });
    const salt = await keys.createVaultKey("test-password");
    keys.clear();
    await keys.materialize("test-password", salt);
    expect(keys.phase).toBe("materialized");
  });

  it("revokes a live key when another one is materialized", async () => {
    const keys = new KeyLifecycleManager({ logger: quiet });
    const salt = await keys.createVaultKey("test-password");
    const before = keys.current();
    await keys.materialize("test-password", salt);
    expect(before.isRevoked).toBe(true);
    expect(keys.current()).not.toBe(before);
  });

  it("swaps to the new key after a successful rekey", async () => {
    const keys = new KeyLifecycleManager({ logger: quiet });
    const salt = await keys.createVaultKey("old-password");
    const oldKey = keys.current();
    const blob = await keys.enc.encryptText("moved", oldKey.use());

    let moved = "";
    await keys.rekey("new-password", async (previous, next) => {
      expect(previous).toBe(oldKey);
      const plain = await keys.enc.decryptText(blob, previous.use());
      moved = await keys.enc.encryptText(plain, next.use());
    });

    expect(oldKey.isRevoked).toBe(true);
    expect(Array.from(keys.salt())).toEqual(Array.from(salt));
    await expect(keys.enc.decryptText(moved, keys.current().use())).resolves.toBe("moved");

    const fresh = new KeyLifecycleManager({ logger: quiet });
    await fresh.materialize("new-password", salt);
    await expect(fresh.enc.decryptText(moved, fresh.current().use())).resolves.toBe("moved");
  });

  it("keeps the previous key when re-encryption fails", async () => {
    const keys = new KeyLifecycleManager({ logger: quiet });
    await keys.createVaultKey("old-password");
    const oldKey = keys.current();

    let attempted: SessionKey | null = null;
    await expect(
      keys.rekey("new-password", async (_previous, next) => {
        attempted = next;
        throw new Error("disk full");
      })
    ).rejects.toThrow("disk full");

    expect(keys.current()).toBe(oldKey);
    expect(oldKey.isRevoked).toBe(false);
    expect(attempted).not.toBeNull();
    expect(attempted).toHaveProperty("isRevoked", true);
  });
});
