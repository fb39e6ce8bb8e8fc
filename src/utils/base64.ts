import { FormatError } from "../errors";

const MAX_BASE64_LEN = 16 * 1024 * 1024;
const CANONICAL_BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export function bytesToBase64(u8: Uint8Array): string {
  if (u8.byteLength === 0) return "";
  let binary = "";
  for (let i = 0; i < u8.length; i++) binary += String.fromCharCode(u8[i]);
  return btoa(binary);
}

/**
 * Decodes standard, padded Base64 exactly as {@link bytesToBase64} writes it.
 * Whitespace, the URL-safe alphabet, missing padding and non-zero trailing bits
 * are all rejected, so a damaged blob never decodes.
 */
export function base64ToBytes(b64: string): Uint8Array {
  if (typeof b64 !== "string" || b64.length === 0) {
    throw new FormatError("Base64 input must be a non-empty string");
  }
  if (b64.length > MAX_BASE64_LEN) {
    throw new FormatError("Base64 input too large");
  }
  if (b64.length % 4 !== 0 || !CANONICAL_BASE64.test(b64)) {
    throw new FormatError("Invalid base64 input");
  }

  let binary: string;
  try {
    binary = atob(b64);
  } catch {
    throw new FormatError("Invalid base64 input");
  }
  const out = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) out[i] = binary.charCodeAt(i);
  if (bytesToBase64(out) !== b64) {
    throw new FormatError("Invalid base64 input");
  }
  return out;
}
