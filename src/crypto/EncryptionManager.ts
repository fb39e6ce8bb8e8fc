import { MIN_BLOB_LEN, VAULT_CONSTANTS } from "../constants";
import { AuthenticationError, EncryptionError, errorMessage, FormatError, ValidationError } from "../errors";
import type { CryptoBlob } from "../types";
import { base64ToBytes, bytesToBase64 } from "../utils/base64";
import {
  asArrayBuffer,
  concatBytes,
  isUint8Array,
  utf8Decode,
  utf8Encode,
  withSecretBuffer,
  zeroize
} from "../utils/typedArray";

/**
 * AES-256-GCM field encryption.
 *
 * Blob layout: Base64(`nonce[12] || ciphertext[n] || tag[16]`). WebCrypto already
 * returns `ciphertext || tag`, so a blob is the nonce followed by that output.
 */
export class EncryptionManager {
  generateSalt(): Uint8Array {
    return randomBytes(VAULT_CONSTANTS.SALT_LEN);
  }

  async encrypt(plaintext: Uint8Array, key: CryptoKey): Promise<CryptoBlob> {
    if (!isUint8Array(plaintext)) throw new ValidationError("plaintext must be a Uint8Array");
    this.assertKey(key, "encrypt", "encrypt()");

    // A fresh random nonce per call; GCM breaks down if one repeats under a key.
    const iv = randomBytes(VAULT_CONSTANTS.AES.IV_LENGTH);
    let sealed: ArrayBuffer;
    try {
      sealed = await withSecretBuffer(plaintext, (data) =>
        crypto.subtle.encrypt(this.params(iv), key, data)
      );
    } catch (e) {
      throw new EncryptionError(`Encryption failed: ${errorMessage(e)}`);
    }
    return bytesToBase64(concatBytes(iv, new Uint8Array(sealed)));
  }

  async decrypt(blob: CryptoBlob, key: CryptoKey): Promise<Uint8Array> {
    const bytes = this.decodeBlob(blob);
    this.assertKey(key, "decrypt", "decrypt()");

    const iv = bytes.subarray(0, VAULT_CONSTANTS.AES.IV_LENGTH);
    const sealed = bytes.subarray(VAULT_CONSTANTS.AES.IV_LENGTH);

    let pt: ArrayBuffer;
    try {
      pt = await crypto.subtle.decrypt(this.params(iv), key, asArrayBuffer(sealed));
    } catch {
      throw new AuthenticationError();
    }
    const view = new Uint8Array(pt);
    const out = new Uint8Array(view);
    view.fill(0);
    return out;
  }

  async encryptText(text: string, key: CryptoKey): Promise<CryptoBlob> {
    if (typeof text !== "string") throw new ValidationError("text must be a string");
    const bytes = utf8Encode(text);
    try {
      return await this.encrypt(bytes, key);
    } finally {
      zeroize(bytes);
    }
  }

  async decryptText(blob: CryptoBlob, key: CryptoKey): Promise<string> {
    const bytes = await this.decrypt(blob, key);
    try {
      return utf8Decode(bytes);
    } catch {
      // Authenticated but not UTF-8: not something this library wrote.
      throw new FormatError();
    } finally {
      zeroize(bytes);
    }
  }

  /** Decodes and length-checks a blob without touching the key. */
  decodeBlob(blob: CryptoBlob): Uint8Array {
    let bytes: Uint8Array;
    try {
      bytes = base64ToBytes(blob);
    } catch {
      throw new FormatError();
    }
    if (bytes.byteLength < MIN_BLOB_LEN) {
      throw new FormatError();
    }
    return bytes;
  }

  private params(iv: Uint8Array): AesGcmParams {
    return {
      name: VAULT_CONSTANTS.AES.NAME,
      iv: asArrayBuffer(iv),
      tagLength: VAULT_CONSTANTS.AES.TAG_LENGTH * 8
    };
  }

  private assertKey(key: CryptoKey, usage: KeyUsage, where: string): void {
    const alg: KeyAlgorithm | undefined = key?.algorithm;

    if (!key || alg?.name !== VAULT_CONSTANTS.AES.NAME) {
      throw new ValidationError(`Invalid key algorithm for ${where}; expected ${VAULT_CONSTANTS.AES.NAME}`);
    }

    if ("length" in alg && typeof alg.length === "number" && alg.length !== VAULT_CONSTANTS.AES.LENGTH) {
      throw new ValidationError(`Invalid key length for ${where}; expected ${VAULT_CONSTANTS.AES.LENGTH} bits`);
    }

    if (!key.usages.includes(usage)) {
      throw new ValidationError(`Key missing "${usage}" usage for ${where}`);
    }
  }
}

/** CSPRNG bytes; `crypto.getRandomValues` is safe to call from any caller. */
export function randomBytes(length: number): Uint8Array {
  const out = new Uint8Array(length);
  crypto.getRandomValues(out);
  return out;
}
