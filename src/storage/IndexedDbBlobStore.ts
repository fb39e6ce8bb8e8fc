import { VAULT_CONSTANTS } from "../constants";
import { NotSupportedError, PersistenceError } from "../errors";
import { base64ToBytes, bytesToBase64 } from "../utils/base64";
import type { BlobStore } from "./BlobStore";

/** Where blobs live in IndexedDB. */
export interface IdbConfig {
  dbName: string;
  storeName: string;
}

/** Resolve partial config to concrete values using current defaults. */
function resolveIdbConfig(cfg?: Partial<IdbConfig>): IdbConfig {
  return {
    dbName: cfg?.dbName ?? VAULT_CONSTANTS.IDB.DB_NAME,
    storeName: cfg?.storeName ?? VAULT_CONSTANTS.IDB.STORE
  };
}

interface BlobRecord {
  id: string;
  data: string; // base64
}

function isBlobRecord(value: unknown): value is BlobRecord {
  return (
    !!value &&
    typeof value === "object" &&
    "id" in value &&
    typeof value.id === "string" &&
    "data" in value &&
    typeof value.data === "string"
  );
}

/**
 * Blob store on one IndexedDB object store. Records are `{ id, data }` with the
 * blob as Base64, so values survive structured cloning unchanged.
 * The database is opened per call and closed afterwards.
 */
export class IndexedDbBlobStore implements BlobStore {
  private readonly cfg: IdbConfig;

  constructor(cfg?: Partial<IdbConfig>) {
    this.cfg = resolveIdbConfig(cfg);
  }

  async load(key: string): Promise<Uint8Array | null> {
    const found = await this.withStore("readonly", (store) => store.get(key));
    if (!isBlobRecord(found) || found.data.length === 0) return null;
    try {
      return base64ToBytes(found.data);
    } catch {
      return null;
    }
  }

  async store(key: string, bytes: Uint8Array): Promise<void> {
    const record: BlobRecord = { id: key, data: bytesToBase64(bytes) };
    await this.withStore("readwrite", (store) => store.put(record));
  }

  async remove(key: string): Promise<void> {
    await this.withStore("readwrite", (store) => store.delete(key));
  }

  /** Drops the whole database. */
  async destroy(): Promise<void> {
    const idb = this.factory();
    await new Promise<void>((resolve, reject) => {
      const req = idb.deleteDatabase(this.cfg.dbName);
      req.onsuccess = () => resolve();
      req.onerror = () => reject(new PersistenceError(req.error?.message ?? "IndexedDB delete failed"));
    });
  }

  // --------------------------- private helpers ---------------------------

  private factory(): IDBFactory {
    if (!globalThis.indexedDB) {
      throw new NotSupportedError("IndexedDB unavailable");
    }
    return globalThis.indexedDB;
  }

  /** Resolves with the request's result once the transaction has committed. */
  private async withStore(
    mode: IDBTransactionMode,
    op: (store: IDBObjectStore) => IDBRequest
  ): Promise<unknown> {
    const db = await this.openDB();
    try {
      return await new Promise<unknown>((resolve, reject) => {
        const tx = db.transaction(this.cfg.storeName, mode);
        const req = op(tx.objectStore(this.cfg.storeName));
        let result: unknown = undefined;
        req.onsuccess = () => {
          result = req.result;
        };
        tx.oncomplete = () => resolve(result);
        tx.onerror = () => reject(new PersistenceError(tx.error?.message ?? "IndexedDB transaction failed"));
        tx.onabort = () => reject(new PersistenceError(tx.error?.message ?? "IndexedDB transaction aborted"));
      });
    } finally {
      db.close();
    }
  }

  private openDB(): Promise<IDBDatabase> {
    const idb = this.factory();
    return new Promise((resolve, reject) => {
      try {
        const req = idb.open(this.cfg.dbName, 1);
        req.onupgradeneeded = () => {
          if (!req.result.objectStoreNames.contains(this.cfg.storeName)) {
            req.result.createObjectStore(this.cfg.storeName, { keyPath: "id" });
          }
        };
        req.onsuccess = () => resolve(req.result);
        req.onerror = () =>
          reject(new NotSupportedError(req.error?.message ?? "IndexedDB error"));
      } catch (e) {
        reject(new NotSupportedError(e instanceof Error ? e.message : "IndexedDB unavailable"));
      }
    });
  }
}
