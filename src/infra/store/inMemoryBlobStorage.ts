import { BlobStorage, PutPrecondition, StoredBlob } from "../../domain/blobStorage.js";
import { PreconditionFailedError } from "../../domain/errors.js";

export class InMemoryBlobStorage implements BlobStorage {
  private readonly blobs = new Map<string, { data: Buffer; generation: number }>();

  private nextGeneration = 1;

  async get(key: string): Promise<StoredBlob | null> {
    const blob = this.blobs.get(key);
    if (!blob) {
      return null;
    }
    return { data: Buffer.from(blob.data), generation: String(blob.generation) };
  }

  async put(key: string, data: Buffer, precondition: PutPrecondition): Promise<string> {
    const current = this.blobs.get(key);
    const currentGeneration = current ? String(current.generation) : null;
    if (currentGeneration !== precondition.ifGeneration) {
      throw new PreconditionFailedError(key);
    }

    const generation = this.nextGeneration;
    this.nextGeneration += 1;
    this.blobs.set(key, { data: Buffer.from(data), generation });
    return String(generation);
  }

  async delete(key: string): Promise<boolean> {
    return this.blobs.delete(key);
  }

  async list(prefix: string): Promise<string[]> {
    return this.keys().filter((key) => key.startsWith(prefix));
  }

  keys(): string[] {
    return [...this.blobs.keys()].sort();
  }

  async close(): Promise<void> {}
}
