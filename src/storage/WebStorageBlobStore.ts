import { errorMessage, NotSupportedError, PersistenceError, StorageFullError } from "../errors";
import { base64ToBytes, bytesToBase64 } from "../utils/base64";
import type { BlobStore } from "./BlobStore";

/** The part of the Web Storage API this adapter uses (`localStorage`, `sessionStorage`, or a stand-in). */
export type StorageLike = Pick<Storage, "getItem" | "setItem" | "removeItem">;

function estimateBytes(s: string): number {
  try { return new Blob([s]).size; } catch { return s.length; }
}

/**
 * Stores each blob as Base64 text under its key. Writes are read back and compared.
 */
export class WebStorageBlobStore implements BlobStore {
  private readonly storage: StorageLike;

  constructor(storage?: StorageLike) {
    const resolved = storage ?? (typeof localStorage !== "undefined" ? localStorage : undefined);
    if (!resolved) {
      throw new NotSupportedError("No Web Storage available; pass a storage instance");
    }
    this.storage = resolved;
  }

  async load(key: string): Promise<Uint8Array | null> {
    const raw = this.storage.getItem(key);
    if (!raw) return null;
    try { return base64ToBytes(raw); } catch { return null; }
  }

  _isQuotaExceeded(err: unknown): boolean {
    if (!err || typeof err !== "object") return false;
    const name = "name" in err && typeof err.name === "string" ? err.name : "";
    const msg = "message" in err && typeof err.message === "string" ? err.message : "";
    const code = "code" in err ? err.code : undefined;

    return (
      name === "QuotaExceededError" ||
      name === "NS_ERROR_DOM_QUOTA_REACHED" ||
      code === 22 ||            // legacy Safari / WebKit
      code === 1014 ||          // Firefox DOMException
      /quota/i.test(msg)
    );
  }

  async store(key: string, bytes: Uint8Array): Promise<void> {
    const serialized = bytesToBase64(bytes);
    try {
      this.storage.setItem(key, serialized);
    } catch (e) {
      if (this._isQuotaExceeded(e)) {
        throw new StorageFullError(`Storage quota exceeded (${estimateBytes(serialized)} bytes)`);
      }
      throw new PersistenceError(`Failed to persist data: ${errorMessage(e)}`);
    }
    if (this.storage.getItem(key) !== serialized) {
      throw new PersistenceError("Failed to persist data (integrity check)");
    }
  }

  async remove(key: string): Promise<void> {
    this.storage.removeItem(key);
  }
}
