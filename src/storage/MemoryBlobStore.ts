import type { BlobStore } from "./BlobStore";

/** Process-local store; the default when no store is configured. Copies on the way in and out. */
export class MemoryBlobStore implements BlobStore {
  private readonly blobs = new Map<string, Uint8Array>();

  async load(key: string): Promise<Uint8Array | null> {
    const found = this.blobs.get(key);
    return found ? found.slice() : null;
  }

  async store(key: string, bytes: Uint8Array): Promise<void> {
    this.blobs.set(key, bytes.slice());
  }

  async remove(key: string): Promise<void> {
    this.blobs.delete(key);
  }

  keys(): string[] {
    return [...this.blobs.keys()];
  }
}
