import { z } from "zod";
import { InvalidSnapshotError } from "../../domain/errors.js";
import { Chunk, DocumentRecord, Embedding, SearchHit } from "../../domain/types.js";
import { cosineSimilarity, isFiniteVector } from "../../utils/vector.js";

export const SNAPSHOT_FORMAT_VERSION = 1;

const chunkSchema = z.object({
  chunkId: z.string().min(1),
  documentId: z.string().min(1),
  sequenceIndex: z.number().int().min(0),
  text: z.string().min(1),
  charStart: z.number().int().min(0),
  charEnd: z.number().int().min(1),
});

const documentSchema = z.object({
  documentId: z.string().min(1),
  name: z.string(),
  sizeBytes: z.number().int().min(0),
  charLength: z.number().int().min(0),
  chunkCount: z.number().int().min(0),
  ingestedAt: z.string(),
  userId: z.string().nullable(),
});

const snapshotSchema = z.object({
  format_version: z.literal(SNAPSHOT_FORMAT_VERSION),
  collection_id: z.string().min(1),
  version: z.number().int().min(0),
  model_version: z.string().nullable(),
  dimension: z.number().int().positive().nullable(),
  saved_at: z.string(),
  documents: z.array(documentSchema),
  entries: z.array(z.object({ chunk: chunkSchema, vector: z.array(z.number()) })),
});

export type VectorIndexSnapshot = z.infer<typeof snapshotSchema>;

interface IndexEntry {
  chunk: Chunk;
  vector: number[];
}

/**
 * In-process nearest-neighbour index for one collection. Every stored vector was produced
 * by the same embedding model (`modelVersion`).
 */
export class VectorIndex {
  private readonly entries = new Map<string, IndexEntry>();

  private readonly chunkIdsByDocument = new Map<string, Set<string>>();

  private readonly documents = new Map<string, DocumentRecord>();

  private declaredModelVersion: string | null;

  private declaredDimension: number | null;

  constructor(
    readonly collectionId: string,
    modelVersion: string | null = null,
    dimension: number | null = null,
  ) {
    this.declaredModelVersion = modelVersion;
    this.declaredDimension = dimension;
  }

  get modelVersion(): string | null {
    return this.declaredModelVersion;
  }

  get dimension(): number | null {
    return this.declaredDimension;
  }

  get size(): number {
    return this.entries.size;
  }

  get documentCount(): number {
    return this.documents.size;
  }

  add(chunk: Chunk, embedding: Embedding): void {
    if (embedding.chunkId !== chunk.chunkId) {
      throw new Error(`Embedding for ${embedding.chunkId} cannot be stored as ${chunk.chunkId}.`);
    }
    if (!isFiniteVector(embedding.vector)) {
      throw new Error(`Embedding for ${chunk.chunkId} is empty or not finite.`);
    }
    if (this.declaredModelVersion === null) {
      this.declaredModelVersion = embedding.modelVersion;
    } else if (this.declaredModelVersion !== embedding.modelVersion) {
      throw new Error(
        `Embedding model ${embedding.modelVersion} does not match collection model ${this.declaredModelVersion}.`,
      );
    }
    if (this.declaredDimension === null) {
      this.declaredDimension = embedding.vector.length;
    } else if (this.declaredDimension !== embedding.vector.length) {
      throw new Error(
        `Embedding dimension ${embedding.vector.length} does not match collection dimension ${this.declaredDimension}.`,
      );
    }

    this.entries.set(chunk.chunkId, { chunk: { ...chunk }, vector: [...embedding.vector] });
    let ids = this.chunkIdsByDocument.get(chunk.documentId);
    if (!ids) {
      ids = new Set<string>();
      this.chunkIdsByDocument.set(chunk.documentId, ids);
    }
    ids.add(chunk.chunkId);
  }

  upsertDocument(record: DocumentRecord): void {
    this.documents.set(record.documentId, { ...record });
  }

  /** Drops the document's chunks and metadata; returns the number of chunks removed. */
  removeDocument(documentId: string): number {
    const ids = this.chunkIdsByDocument.get(documentId);
    let removed = 0;
    if (ids) {
      for (const id of ids) {
        if (this.entries.delete(id)) {
          removed += 1;
        }
      }
    }
    this.chunkIdsByDocument.delete(documentId);
    this.documents.delete(documentId);
    return removed;
  }

  search(queryVector: readonly number[], k: number): SearchHit[] {
    if (k <= 0 || this.entries.size === 0) {
      return [];
    }
    if (this.declaredDimension !== null && queryVector.length !== this.declaredDimension) {
      throw new RangeError(
        `Query dimension ${queryVector.length} does not match collection dimension ${this.declaredDimension}.`,
      );
    }

    const scored: Array<{ chunk: Chunk; score: number }> = [];
    for (const entry of this.entries.values()) {
      scored.push({ chunk: entry.chunk, score: cosineSimilarity(queryVector, entry.vector) });
    }

    return scored
      .sort(
        (a, b) =>
          b.score - a.score ||
          a.chunk.sequenceIndex - b.chunk.sequenceIndex ||
          a.chunk.chunkId.localeCompare(b.chunk.chunkId),
      )
      .slice(0, k)
      .map((item) => ({ chunkId: item.chunk.chunkId, score: item.score }));
  }

  getChunk(chunkId: string): Chunk | undefined {
    return this.entries.get(chunkId)?.chunk;
  }

  getVector(chunkId: string): readonly number[] | undefined {
    return this.entries.get(chunkId)?.vector;
  }

  getDocument(documentId: string): DocumentRecord | undefined {
    return this.documents.get(documentId);
  }

  listDocuments(): DocumentRecord[] {
    return [...this.documents.values()].sort((a, b) => a.documentId.localeCompare(b.documentId));
  }

  /** Chunks grouped by document, in source order. */
  listChunks(): Chunk[] {
    return [...this.entries.values()]
      .map((entry) => entry.chunk)
      .sort(
        (a, b) => a.documentId.localeCompare(b.documentId) || a.sequenceIndex - b.sequenceIndex,
      );
  }

  clone(): VectorIndex {
    const copy = new VectorIndex(this.collectionId, this.declaredModelVersion, this.declaredDimension);
    copy.load(this.toSnapshot(0));
    return copy;
  }

  toSnapshot(version: number): VectorIndexSnapshot {
    return {
      format_version: SNAPSHOT_FORMAT_VERSION,
      collection_id: this.collectionId,
      version,
      model_version: this.declaredModelVersion,
      dimension: this.declaredDimension,
      saved_at: new Date().toISOString(),
      documents: this.listDocuments(),
      entries: this.listChunks().map((chunk) => ({
        chunk,
        vector: [...(this.entries.get(chunk.chunkId)?.vector ?? [])],
      })),
    };
  }

  static fromSnapshot(raw: unknown): { index: VectorIndex; version: number } {
    const parsed = snapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidSnapshotError(
        `Invalid collection snapshot: ${parsed.error.issues[0]?.message ?? "unknown issue"}.`,
        { cause: parsed.error },
      );
    }

    const snapshot = parsed.data;
    if (snapshot.entries.length > 0 && snapshot.model_version === null) {
      throw new InvalidSnapshotError("Collection snapshot has vectors but no embedding model version.");
    }
    const index = new VectorIndex(snapshot.collection_id, snapshot.model_version, snapshot.dimension);
    index.load(snapshot);
    return { index, version: snapshot.version };
  }

  private load(snapshot: VectorIndexSnapshot): void {
    for (const document of snapshot.documents) {
      this.upsertDocument(document);
    }
    const modelVersion = snapshot.model_version;
    if (modelVersion === null) {
      return;
    }
    for (const entry of snapshot.entries) {
      this.add(entry.chunk, { chunkId: entry.chunk.chunkId, vector: entry.vector, modelVersion });
    }
  }
}
