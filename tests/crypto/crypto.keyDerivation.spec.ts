import "../setup";
import { deriveKey, derivePasswordBits } from "../../src/crypto/KeyDerivation";
import { EncryptionManager } from "../../src/crypto/EncryptionManager";
import { KdfError, ValidationError } from "../../src/errors";
import { FIXED_SALT } from "../helpers/keys";

describe("KeyDerivation", () => {
  afterEach(() => jest.restoreAllMocks());

  it("derives 32 deterministic bytes from password and salt", async () => {
    const a = await derivePasswordBits("test-password", FIXED_SALT);
    const b = await derivePasswordBits("test-password", FIXED_SALT);
    expect(a.byteLength).toBe(32);
    expect(Array.from(a)).toEqual(Array.from(b));
  });

  it("gives different bytes for a different password or salt", async () => {
    const base = Array.from(await derivePasswordBits("test-password", FIXED_SALT));
    const otherPw = Array.from(await derivePasswordBits("test-password2", FIXED_SALT));
    const otherSalt = Array.from(await derivePasswordBits("test-password", new Uint8Array(16).fill(8)));
    expect(otherPw).not.toEqual(base);
    expect(otherSalt).not.toEqual(base);
  });

  it("validates inputs before deriving", async () => {
    await expect(derivePasswordBits("", FIXED_SALT)).rejects.toBeInstanceOf(ValidationError);
    await expect(derivePasswordBits("pw", new Uint8Array(15))).rejects.toThrow(
      "Salt must be Uint8Array of length 16"
    );
    await expect(derivePasswordBits("pw", FIXED_SALT, 1000)).rejects.toBeInstanceOf(ValidationError);
    await expect(derivePasswordBits("pw", FIXED_SALT, 70000.5)).rejects.toBeInstanceOf(ValidationError);
  });

  it("wraps WebCrypto failures in KdfError", async () => {
    jest.spyOn(crypto.subtle, "deriveBits").mockRejectedValueOnce(new Error("boom"));
    await expect(derivePasswordBits("pw", FIXED_SALT)).rejects.toThrow(
      new KdfError("PBKDF2 derivation failed: boom")
    );
  });

  it("produces a non-extractable AES-GCM key that re-derives identically", async () => {
    const enc = new EncryptionManager();
    const k1 = await deriveKey("test-password", FIXED_SALT);
    const k2 = await deriveKey("test-password", FIXED_SALT);
    expect(k1.extractable).toBe(false);
    expect(k1.algorithm.name).toBe("AES-GCM");
    expect([...k1.usages].sort()).toEqual(["decrypt", "encrypt"]);

    const blob = await enc.encryptText("across sessions", k1);
    await expect(enc.decryptText(blob, k2)).resolves.toBe("across sessions");
  });
});
