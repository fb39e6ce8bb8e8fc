import { VAULT_CONSTANTS } from "../constants";
import { errorMessage, KdfError, ValidationError } from "../errors";
import { asArrayBuffer, isUint8Array, utf8Encode, withSecretBuffer, zeroize } from "../utils/typedArray";

function assertKdfInputs(password: string, salt: Uint8Array, iterations: number): void {
  if (typeof password !== "string" || password.length === 0) {
    throw new ValidationError("Password must be a non-empty string");
  }

  if (!isUint8Array(salt) || salt.byteLength !== VAULT_CONSTANTS.SALT_LEN) {
    throw new ValidationError(`Salt must be Uint8Array of length ${VAULT_CONSTANTS.SALT_LEN}`);
  }

  const { MIN_ITERATIONS, MAX_ITERATIONS } = VAULT_CONSTANTS.PBKDF2;
  if (!Number.isInteger(iterations) || iterations < MIN_ITERATIONS || iterations > MAX_ITERATIONS) {
    throw new ValidationError(`iterations must be an integer in [${MIN_ITERATIONS}, ${MAX_ITERATIONS}]`);
  }
}

/**
 * PBKDF2-HMAC-SHA-256 over the UTF-8 password. Returns the raw 32 bytes;
 * the caller owns them and should zeroize when done.
 */
export async function derivePasswordBits(
  password: string,
  salt: Uint8Array,
  iterations: number = VAULT_CONSTANTS.PBKDF2.ITERATIONS
): Promise<Uint8Array> {
  assertKdfInputs(password, salt, iterations);

  const passwordBytes = utf8Encode(password);
  let bits: ArrayBuffer;
  try {
    const baseKey = await withSecretBuffer(passwordBytes, (buffer) =>
      crypto.subtle.importKey("raw", buffer, VAULT_CONSTANTS.PBKDF2.NAME, false, ["deriveBits"])
    );
    bits = await crypto.subtle.deriveBits(
      {
        name: VAULT_CONSTANTS.PBKDF2.NAME,
        hash: VAULT_CONSTANTS.PBKDF2.HASH,
        salt: asArrayBuffer(salt),
        iterations
      },
      baseKey,
      VAULT_CONSTANTS.PBKDF2.KEY_LEN * 8
    );
  } catch (e) {
    throw new KdfError(`PBKDF2 derivation failed: ${errorMessage(e)}`);
  } finally {
    zeroize(passwordBytes);
  }

  const out = new Uint8Array(bits.byteLength);
  const view = new Uint8Array(bits);
  out.set(view);
  view.fill(0);
  if (out.byteLength !== VAULT_CONSTANTS.PBKDF2.KEY_LEN) {
    zeroize(out);
    throw new KdfError(`PBKDF2 returned invalid size (expected ${VAULT_CONSTANTS.PBKDF2.KEY_LEN} bytes)`);
  }
  return out;
}

/**
 * Derives the vault's AES-256-GCM key. The key is non-extractable and the
 * intermediate bits are overwritten before returning.
 */
export async function deriveKey(
  password: string,
  salt: Uint8Array,
  iterations: number = VAULT_CONSTANTS.PBKDF2.ITERATIONS
): Promise<CryptoKey> {
  const raw = await derivePasswordBits(password, salt, iterations);
  try {
    return await withSecretBuffer(raw, (buffer) =>
      crypto.subtle.importKey(
        "raw",
        buffer,
        { name: VAULT_CONSTANTS.AES.NAME, length: VAULT_CONSTANTS.AES.LENGTH },
        false,
        ["encrypt", "decrypt"]
      )
    );
  } catch (e) {
    throw new KdfError(`Failed to import derived key: ${errorMessage(e)}`);
  } finally {
    zeroize(raw);
  }
}
