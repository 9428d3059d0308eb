import { RetryPolicy } from "../../config/env.js";
import { BlobStorage, StoredBlob } from "../../domain/blobStorage.js";
import {
  DocQaError,
  InvalidSnapshotError,
  PreconditionFailedError,
  StaleVersionError,
} from "../../domain/errors.js";
import { createLogger } from "../../utils/logger.js";
import { TimeoutError, withRetry, withTimeout } from "../../utils/retry.js";
import { VectorIndex } from "./vectorIndex.js";

const logger = createLogger("sync");

export interface SyncManagerOptions {
  timeoutMs: number;
  retry: RetryPolicy;
  maxSnapshotBytes: number;
}

export interface RestoredCollection {
  index: VectorIndex;
  version: number;
  exists: boolean;
  /** Blob generation the index was read from; `null` when nothing is stored. */
  generation: string | null;
  snapshotBytes: number;
}

export interface PersistOptions {
  /**
   * Generation of the snapshot the index was built on, `null` for a collection that was
   * not stored. Without it the write is checked against the head read at persist time.
   */
  baseGeneration?: string | null;
  signal?: AbortSignal;
}

export interface PersistResult {
  version: number;
  generation: string;
  snapshotBytes: number;
}

interface SnapshotHead {
  version: number;
  generation: string;
}

const COLLECTIONS_PREFIX = "collections/";
const SNAPSHOT_FILE = "/snapshot.json";

export function snapshotKey(collectionId: string): string {
  return `${COLLECTIONS_PREFIX}${encodeURIComponent(collectionId)}${SNAPSHOT_FILE}`;
}

/**
 * Mirrors collection indexes to blob storage. The stored snapshot is the source of truth
 * across instances; a write lands only over the exact blob generation it was checked
 * against, and only with a strictly greater version.
 */
export class SyncManager {
  constructor(
    private readonly storage: BlobStorage,
    private readonly options: SyncManagerOptions,
  ) {}

  async restore(collectionId: string, signal?: AbortSignal): Promise<RestoredCollection> {
    const blob = await this.callStorage(
      "get",
      collectionId,
      () => this.storage.get(snapshotKey(collectionId)),
      signal,
    );
    if (!blob) {
      return {
        index: new VectorIndex(collectionId),
        version: 0,
        exists: false,
        generation: null,
        snapshotBytes: 0,
      };
    }

    const { index, version } = VectorIndex.fromSnapshot(parseJson(blob, collectionId));
    if (index.collectionId !== collectionId) {
      throw new InvalidSnapshotError(
        `Snapshot stored for ${collectionId} belongs to ${index.collectionId}.`,
      );
    }

    logger.debug("restored collection snapshot", { collectionId, version, chunks: index.size });
    return {
      index,
      version,
      exists: true,
      generation: blob.generation,
      snapshotBytes: blob.data.byteLength,
    };
  }

  async persist(
    collectionId: string,
    index: VectorIndex,
    version: number,
    options: PersistOptions = {},
  ): Promise<PersistResult> {
    const { signal } = options;
    if (index.collectionId !== collectionId) {
      throw new Error(`Index of ${index.collectionId} cannot be persisted as ${collectionId}.`);
    }
    if (!Number.isInteger(version) || version <= 0) {
      throw new RangeError(`Snapshot version must be a positive integer, got ${version}.`);
    }

    const payload = Buffer.from(JSON.stringify(index.toSnapshot(version)), "utf-8");
    if (payload.byteLength > this.options.maxSnapshotBytes) {
      throw new Error(
        `Collection snapshot exceeds size limit (${payload.byteLength} > ${this.options.maxSnapshotBytes} bytes).`,
      );
    }

    const head = await this.readHead(collectionId, signal);
    const storedVersion = head?.version ?? 0;
    // A first snapshot is always version 1, so a writer whose base was deleted
    // underneath it cannot recreate the collection from that base.
    if (head ? version <= head.version : version !== 1) {
      throw new StaleVersionError(collectionId, version, storedVersion);
    }
    const ifGeneration =
      options.baseGeneration === undefined ? head?.generation ?? null : options.baseGeneration;
    if (ifGeneration !== (head?.generation ?? null)) {
      throw new StaleVersionError(collectionId, version, storedVersion);
    }

    signal?.throwIfAborted();
    let generation: string;
    try {
      // Not retried: a timed-out conditional put may have landed, and replaying it
      // would fail its own precondition.
      generation = await withTimeout(
        this.options.timeoutMs,
        () => this.storage.put(snapshotKey(collectionId), payload, { ifGeneration }),
        signal,
      );
    } catch (error) {
      if (error instanceof PreconditionFailedError) {
        throw new StaleVersionError(collectionId, version, null, { cause: error });
      }
      if (error instanceof TimeoutError && !signal?.aborted) {
        const landed = await this.findLandedWrite(collectionId, payload);
        if (landed === null) {
          throw error;
        }
        logger.warn("snapshot write timed out but landed", { collectionId, version });
        generation = landed;
      } else {
        throw error;
      }
    }

    logger.info("persisted collection snapshot", {
      collectionId,
      version,
      chunks: index.size,
      bytes: payload.byteLength,
    });
    return { version, generation, snapshotBytes: payload.byteLength };
  }

  async delete(collectionId: string, signal?: AbortSignal): Promise<boolean> {
    const deleted = await this.callStorage(
      "delete",
      collectionId,
      () => this.storage.delete(snapshotKey(collectionId)),
      signal,
    );
    if (deleted) {
      logger.info("deleted collection snapshot", { collectionId });
    }
    return deleted;
  }

  /** Generation of the stored snapshot when it holds exactly `payload`. */
  /** Ids of every collection with a stored snapshot, sorted. */
  async listCollections(signal?: AbortSignal): Promise<string[]> {
    const keys = await this.callStorage(
      "list",
      "*",
      () => this.storage.list(COLLECTIONS_PREFIX),
      signal,
    );
    return keys
      .filter((key) => key.endsWith(SNAPSHOT_FILE))
      .map((key) => key.slice(COLLECTIONS_PREFIX.length, -SNAPSHOT_FILE.length))
      .filter((encoded) => encoded.length > 0 && !encoded.includes("/"))
      .map((encoded) => decodeURIComponent(encoded))
      .sort();
  }

  private async findLandedWrite(collectionId: string, payload: Buffer): Promise<string | null> {
    const blob = await this.callStorage("get", collectionId, () =>
      this.storage.get(snapshotKey(collectionId)),
    );
    return blob && blob.data.equals(payload) ? blob.generation : null;
  }

  private async readHead(collectionId: string, signal?: AbortSignal): Promise<SnapshotHead | null> {
    const blob = await this.callStorage(
      "get",
      collectionId,
      () => this.storage.get(snapshotKey(collectionId)),
      signal,
    );
    if (!blob) {
      return null;
    }
    const raw = parseJson(blob, collectionId);
    const version =
      raw && typeof raw === "object" && "version" in raw && typeof raw.version === "number"
        ? raw.version
        : null;
    if (version === null) {
      throw new InvalidSnapshotError(`Snapshot of ${collectionId} has no version.`);
    }
    return { version, generation: blob.generation };
  }

  private callStorage<T>(
    operation: string,
    collectionId: string,
    task: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    return withRetry(() => withTimeout(this.options.timeoutMs, task, signal), {
      policy: this.options.retry,
      signal,
      isRetryable: (error) => !(error instanceof DocQaError),
      onRetry: (error, attempt, delayMs) =>
        logger.warn(`blob storage ${operation} failed, retrying`, {
          collectionId,
          attempt,
          delayMs,
          error,
        }),
    });
  }
}

function parseJson(blob: StoredBlob, collectionId: string): unknown {
  try {
    return JSON.parse(blob.data.toString("utf-8"));
  } catch (error) {
    throw new InvalidSnapshotError(`Snapshot of ${collectionId} is not valid JSON.`, {
      cause: error,
    });
  }
}

