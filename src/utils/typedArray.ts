// src/utils/typedArray.ts
export function asArrayBuffer(u8: Uint8Array): ArrayBuffer {
  const { buffer } = u8;
  if (buffer instanceof ArrayBuffer && u8.byteOffset === 0 && u8.byteLength === buffer.byteLength) {
    return buffer;
  }
  const out = new ArrayBuffer(u8.byteLength);
  new Uint8Array(out).set(u8);
  return out;
}

/**
 * Runs `fn` on a private ArrayBuffer copy of `u8` and overwrites the copy afterwards.
 * Used for secret inputs (passwords, raw key bits, plaintext) handed to WebCrypto.
 */
export async function withSecretBuffer<T>(u8: Uint8Array, fn: (buffer: ArrayBuffer) => Promise<T>): Promise<T> {
  const copy = new ArrayBuffer(u8.byteLength);
  const view = new Uint8Array(copy);
  view.set(u8);
  try {
    return await fn(copy);
  } finally {
    view.fill(0);
  }
}

/** Works across realms (TextEncoder output under Jest is not `instanceof Uint8Array`). */
export function isUint8Array(value: unknown): value is Uint8Array {
  return ArrayBuffer.isView(value) && Object.prototype.toString.call(value) === "[object Uint8Array]";
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.byteLength, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.byteLength;
  }
  return out;
}

/**
 * Compares every byte regardless of where the first difference is.
 * Length is not secret here: both inputs have fixed, public sizes.
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.byteLength !== b.byteLength) return false;
  let diff = 0;
  for (let i = 0; i < a.byteLength; i++) {
    diff |= a[i] ^ b[i];
  }
  return diff === 0;
}

export function zeroize(...buffers: Array<Uint8Array | null | undefined>): void {
  for (const b of buffers) b?.fill(0);
}

export function utf8Encode(text: string): Uint8Array {
  const encoded = new TextEncoder().encode(text);
  const out = new Uint8Array(encoded);
  encoded.fill(0);
  return out;
}

export function utf8Decode(bytes: Uint8Array): string {
  return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
}
