/**
 * Where serialized users and vaults live. The vault only knows keys and bytes;
 * file names, framing and transport belong to the implementation.
 */
export interface BlobStore {
  /** `null` when nothing is stored under `key`. */
  load(key: string): Promise<Uint8Array | null>;
  store(key: string, bytes: Uint8Array): Promise<void>;
  remove(key: string): Promise<void>;
}
