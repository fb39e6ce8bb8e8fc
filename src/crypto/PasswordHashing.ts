import { VAULT_CONSTANTS } from "../constants";
import { FormatError } from "../errors";
import type { CryptoBlob } from "../types";
import { base64ToBytes, bytesToBase64 } from "../utils/base64";
import { concatBytes, constantTimeEqual, zeroize } from "../utils/typedArray";
import { randomBytes } from "./EncryptionManager";
import { derivePasswordBits } from "./KeyDerivation";

/**
 * Salted PBKDF2 password hash: Base64(`salt[16] || derived[32]`).
 * Every call draws a new salt, so hashing the same password twice gives different blobs.
 */
export async function hashPassword(password: string): Promise<CryptoBlob> {
  const salt = randomBytes(VAULT_CONSTANTS.SALT_LEN);
  const derived = await derivePasswordBits(password, salt);
  try {
    return bytesToBase64(concatBytes(salt, derived));
  } finally {
    zeroize(derived);
  }
}

/**
 * Returns false on mismatch. Throws FormatError only when `stored` is not a
 * password-hash blob at all.
 */
export async function verifyPassword(password: string, stored: CryptoBlob): Promise<boolean> {
  const { salt, expected } = decodePasswordHash(stored);
  if (typeof password !== "string" || password.length === 0) return false;

  const actual = await derivePasswordBits(password, salt);
  try {
    return constantTimeEqual(actual, expected);
  } finally {
    zeroize(actual);
  }
}

export function decodePasswordHash(stored: CryptoBlob): { salt: Uint8Array; expected: Uint8Array } {
  let bytes: Uint8Array;
  try {
    bytes = base64ToBytes(stored);
  } catch {
    throw new FormatError("Invalid password hash");
  }
  if (bytes.byteLength !== VAULT_CONSTANTS.PASSWORD_HASH_LEN) {
    throw new FormatError("Invalid password hash");
  }
  return {
    salt: bytes.slice(0, VAULT_CONSTANTS.SALT_LEN),
    expected: bytes.slice(VAULT_CONSTANTS.SALT_LEN)
  };
}

export function isPasswordHash(stored: unknown): stored is CryptoBlob {
  if (typeof stored !== "string") return false;
  try {
    decodePasswordHash(stored);
    return true;
  } catch {
    return false;
  }
}
