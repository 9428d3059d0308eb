export interface DocumentInput {
  documentId: string;
  content: Uint8Array | string;
  name?: string;
  userId?: string;
  /** Defaults to an id derived from `documentId`. */
  collectionId?: string;
}

export interface DocumentRecord {
  documentId: string;
  name: string;
  sizeBytes: number;
  charLength: number;
  chunkCount: number;
  ingestedAt: string;
  userId: string | null;
}

export interface Chunk {
  chunkId: string;
  documentId: string;
  sequenceIndex: number;
  text: string;
  /** Offsets into the extracted document text, end exclusive. */
  charStart: number;
  charEnd: number;
}

export interface Embedding {
  chunkId: string;
  vector: number[];
  modelVersion: string;
}

export interface SearchHit {
  chunkId: string;
  score: number;
}

export interface RetrievedChunk {
  chunk: Chunk;
  score: number;
}

export interface Citation {
  chunkId: string;
  documentId: string;
  sequenceIndex: number;
  charStart: number;
  charEnd: number;
  score: number;
  snippet: string;
}

export type TurnOutcome = "answered" | "not_found" | "no_document";

export interface ChatSession {
  sessionId: string;
  userId: string;
  collectionId: string;
  createdAt: string;
}

export interface SessionSummary extends ChatSession {
  turnCount: number;
}

/** A document together with the collection it was ingested into. */
export interface UserDocument extends DocumentRecord {
  collectionId: string;
}

export interface Turn {
  sessionId: string;
  sequenceIndex: number;
  question: string;
  answer: string;
  citations: string[];
  outcome: TurnOutcome;
  timestamp: string;
}

export interface ServiceHealth {
  answerMode: "generative" | "extractive";
  embeddingModel: string;
  collectionCount: number;
}

export interface CollectionStatus {
  collectionId: string;
  exists: boolean;
  version: number;
  lastSyncedVersion: number;
  modelVersion: string | null;
  documentCount: number;
  chunkCount: number;
  snapshotBytes: number;
}
