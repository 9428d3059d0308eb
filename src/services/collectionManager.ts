import { StaleVersionError } from "../domain/errors.js";
import { CollectionStatus } from "../domain/types.js";
import { EmbeddingClient } from "../infra/ai/types.js";
import { SyncManager } from "../infra/store/syncManager.js";
import { VectorIndex } from "../infra/store/vectorIndex.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("collections");

export interface CollectionHandle {
  collectionId: string;
  index: VectorIndex;
  version: number;
  exists: boolean;
  /** Blob generation backing `version`; `null` when nothing is stored. */
  generation: string | null;
}

export interface CollectionSource {
  /** Cached or restored index, migrated to the current embedding model if needed. */
  open(collectionId: string, signal?: AbortSignal): Promise<CollectionHandle>;
}

export type CollectionMutation = (
  working: VectorIndex,
  signal?: AbortSignal,
) => void | Promise<void>;

export interface CollectionManagerOptions {
  cacheTtlMs: number;
  persistMaxAttempts: number;
  now?: () => number;
}

interface CachedCollection {
  handle: CollectionHandle;
  loadedAt: number;
}

/**
 * Owns the per-instance collection cache. Cached indexes are never mutated in place:
 * writers clone, persist the clone under the next version, and only then swap it in.
 */
export class CollectionManager implements CollectionSource {
  private readonly cache = new Map<string, CachedCollection>();

  private readonly pendingLoads = new Map<string, Promise<CollectionHandle>>();

  private readonly lastSynced = new Map<string, number>();

  /** Order of the last cache write per collection; a restore never overrides a later one. */
  private readonly touched = new Map<string, number>();

  private writeSeq = 0;

  private readonly now: () => number;

  constructor(
    private readonly sync: SyncManager,
    private readonly embeddingClient: EmbeddingClient,
    private readonly options: CollectionManagerOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  /** Cached or restored index as stored, without model migration. */
  read(collectionId: string, signal?: AbortSignal): Promise<CollectionHandle> {
    return this.load(collectionId, false, signal);
  }

  async open(collectionId: string, signal?: AbortSignal): Promise<CollectionHandle> {
    const handle = await this.load(collectionId, false, signal);
    if (!handle.exists || !this.needsReembedding(handle.index)) {
      return handle;
    }

    logger.warn("embedding model changed, re-embedding collection", {
      collectionId,
      from: handle.index.modelVersion,
      to: this.embeddingClient.modelVersion,
    });
    return this.update(collectionId, () => undefined, signal);
  }

  /**
   * Read-modify-write against the durable snapshot. A concurrent writer surfaces as
   * `StaleVersionError`, after which the snapshot is re-read and the mutation replayed.
   */
  async update(
    collectionId: string,
    mutate: CollectionMutation,
    signal?: AbortSignal,
  ): Promise<CollectionHandle> {
    for (let attempt = 1; ; attempt += 1) {
      const base = await this.load(collectionId, attempt > 1, signal);
      let working = base.index.clone();
      if (this.needsReembedding(working)) {
        working = await this.reembed(working, signal);
      }
      await mutate(working, signal);

      signal?.throwIfAborted();
      const version = base.version + 1;
      let generation: string;
      try {
        ({ generation } = await this.sync.persist(collectionId, working, version, {
          baseGeneration: base.generation,
          signal,
        }));
      } catch (error) {
        if (error instanceof StaleVersionError && attempt < this.options.persistMaxAttempts) {
          logger.info("collection changed concurrently, retrying write", {
            collectionId,
            attempt,
            attemptedVersion: version,
          });
          continue;
        }
        throw error;
      }

      return this.commit({ collectionId, index: working, version, exists: true, generation });
    }
  }

  async delete(collectionId: string, signal?: AbortSignal): Promise<boolean> {
    this.forget(collectionId);
    return this.sync.delete(collectionId, signal);
  }

  list(signal?: AbortSignal): Promise<string[]> {
    return this.sync.listCollections(signal);
  }

  async status(collectionId: string, signal?: AbortSignal): Promise<CollectionStatus> {
    const restored = await this.sync.restore(collectionId, signal);
    return {
      collectionId,
      exists: restored.exists,
      version: restored.version,
      lastSyncedVersion: this.lastSynced.get(collectionId) ?? 0,
      modelVersion: restored.index.modelVersion,
      documentCount: restored.index.documentCount,
      chunkCount: restored.index.size,
      snapshotBytes: restored.snapshotBytes,
    };
  }

  private needsReembedding(index: VectorIndex): boolean {
    return index.size > 0 && index.modelVersion !== this.embeddingClient.modelVersion;
  }

  private async reembed(index: VectorIndex, signal?: AbortSignal): Promise<VectorIndex> {
    const chunks = index.listChunks();
    const vectors = await this.embeddingClient.embed(
      chunks.map((chunk) => chunk.text),
      signal,
    );

    const rebuilt = new VectorIndex(index.collectionId);
    for (const document of index.listDocuments()) {
      rebuilt.upsertDocument(document);
    }
    chunks.forEach((chunk, position) => {
      rebuilt.add(chunk, {
        chunkId: chunk.chunkId,
        vector: vectors[position],
        modelVersion: this.embeddingClient.modelVersion,
      });
    });
    return rebuilt;
  }

  /** `fresh` skips the cache and any restore already in flight. */
  private async load(
    collectionId: string,
    fresh: boolean,
    signal?: AbortSignal,
  ): Promise<CollectionHandle> {
    const cached = this.cache.get(collectionId);
    if (!fresh && cached && this.now() - cached.loadedAt < this.options.cacheTtlMs) {
      return cached.handle;
    }

    let pending = fresh ? this.restore(collectionId) : this.pendingLoads.get(collectionId);
    if (!pending) {
      // Shared between concurrent callers, so it is bounded by the storage timeout
      // rather than any one caller's signal.
      const shared = this.restore(collectionId).finally(() => {
        if (this.pendingLoads.get(collectionId) === shared) {
          this.pendingLoads.delete(collectionId);
        }
      });
      this.pendingLoads.set(collectionId, shared);
      pending = shared;
    }

    const handle = await pending;
    signal?.throwIfAborted();
    return handle;
  }

  private async restore(collectionId: string): Promise<CollectionHandle> {
    const startedAt = this.writeSeq;
    const restored = await this.sync.restore(collectionId);
    const handle: CollectionHandle = {
      collectionId,
      index: restored.index,
      version: restored.version,
      exists: restored.exists,
      generation: restored.generation,
    };

    if ((this.touched.get(collectionId) ?? 0) > startedAt) {
      return handle;
    }
    if (restored.exists) {
      this.store(handle);
      this.lastSynced.set(collectionId, restored.version);
    } else {
      this.forget(collectionId);
    }
    return handle;
  }

  private commit(handle: CollectionHandle): CollectionHandle {
    this.store(handle);
    this.lastSynced.set(handle.collectionId, handle.version);
    return handle;
  }

  private store(handle: CollectionHandle): void {
    this.writeSeq += 1;
    this.touched.set(handle.collectionId, this.writeSeq);
    this.cache.set(handle.collectionId, { handle, loadedAt: this.now() });
  }

  private forget(collectionId: string): void {
    this.writeSeq += 1;
    this.touched.set(collectionId, this.writeSeq);
    this.cache.delete(collectionId);
    this.lastSynced.delete(collectionId);
  }
}
