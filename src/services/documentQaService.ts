import { createHash } from "node:crypto";
import { AppConfig } from "../config/env.js";
import { BlobStorage } from "../domain/blobStorage.js";
import {
  IngestionFailedError,
  SessionConflictError,
  SessionNotFoundError,
  describeError,
} from "../domain/errors.js";
import { SessionStore } from "../domain/sessionStore.js";
import {
  ChatSession,
  Citation,
  CollectionStatus,
  DocumentInput,
  DocumentRecord,
  ServiceHealth,
  SessionSummary,
  Turn,
  UserDocument,
} from "../domain/types.js";
import { EmbeddingClient, GenerationClient } from "../infra/ai/types.js";
import { SyncManager } from "../infra/store/syncManager.js";
import { AnswerSynthesizer } from "../pipelines/answering.js";
import { chunkText } from "../pipelines/chunking.js";
import { Retriever } from "../pipelines/retrieval.js";
import { createLogger } from "../utils/logger.js";
import { detectLanguage, noDocumentMessage, normalizeText } from "../utils/text.js";
import { CollectionManager } from "./collectionManager.js";

const logger = createLogger("qa");

export type QaSettings = Pick<
  AppConfig,
  | "chunkSize"
  | "chunkOverlap"
  | "maxDocumentBytes"
  | "topK"
  | "fetchK"
  | "retrievalStrategy"
  | "mmrLambda"
  | "scoreThreshold"
  | "contextCharBudget"
  | "storageTimeoutMs"
  | "retry"
  | "maxSnapshotBytes"
  | "indexCacheTtlMs"
  | "persistMaxAttempts"
  | "sessionListLimit"
>;

export interface DocumentQaServiceDeps {
  embeddingClient: EmbeddingClient;
  /** `null` answers extractively. */
  generationClient: GenerationClient | null;
  blobStorage: BlobStorage;
  sessionStore: SessionStore;
  settings: QaSettings;
  now?: () => number;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface IngestResult {
  collectionId: string;
  documentId: string;
  version: number;
  chunkCount: number;
}

export interface AskInput {
  collectionId: string;
  userId: string;
  question: string;
  sessionId?: string;
  topK?: number;
}

export type AskResult =
  | {
      kind: "no_document";
      collectionId: string;
      message: string;
      /** Present only when the question was asked in an existing session. */
      session: ChatSession | null;
      turn: Turn | null;
    }
  | {
      kind: "answered" | "not_found";
      collectionId: string;
      collectionVersion: number;
      session: ChatSession;
      turn: Turn;
      citations: Citation[];
    };

export function defaultCollectionId(documentId: string): string {
  return `doc-${createHash("sha256").update(documentId).digest("hex").slice(0, 16)}`;
}

export class DocumentQaService {
  private readonly collections: CollectionManager;

  private readonly retriever: Retriever;

  private readonly synthesizer: AnswerSynthesizer;

  private readonly embeddingClient: EmbeddingClient;

  private readonly sessions: SessionStore;

  private readonly settings: QaSettings;

  private readonly now: () => number;

  constructor(deps: DocumentQaServiceDeps) {
    const { settings } = deps;
    this.settings = settings;
    this.embeddingClient = deps.embeddingClient;
    this.sessions = deps.sessionStore;
    this.now = deps.now ?? Date.now;

    const sync = new SyncManager(deps.blobStorage, {
      timeoutMs: settings.storageTimeoutMs,
      retry: settings.retry,
      maxSnapshotBytes: settings.maxSnapshotBytes,
    });
    this.collections = new CollectionManager(sync, deps.embeddingClient, {
      cacheTtlMs: settings.indexCacheTtlMs,
      persistMaxAttempts: settings.persistMaxAttempts,
      now: this.now,
    });
    this.retriever = new Retriever(this.collections, deps.embeddingClient, {
      fetchK: settings.fetchK,
      strategy: settings.retrievalStrategy,
      mmrLambda: settings.mmrLambda,
    });
    this.synthesizer = new AnswerSynthesizer(deps.generationClient, {
      contextCharBudget: settings.contextCharBudget,
    });
  }

  get answerMode(): "generative" | "extractive" {
    return this.synthesizer.mode;
  }

  /** Fails when blob storage cannot be listed. */
  async health(options: RequestOptions = {}): Promise<ServiceHealth> {
    const collectionIds = await this.collections.list(options.signal);
    return {
      answerMode: this.answerMode,
      embeddingModel: this.embeddingClient.modelVersion,
      collectionCount: collectionIds.length,
    };
  }

  /**
   * Chunks, embeds and persists one document. Re-ingesting a `documentId` replaces its
   * chunks. Any failure leaves the collection at its last persisted version.
   */
  async ingest(input: DocumentInput, options: RequestOptions = {}): Promise<IngestResult> {
    const { signal } = options;
    const documentId = input.documentId.trim();
    const collectionId = input.collectionId?.trim() || defaultCollectionId(documentId);
    const startedAt = this.now();

    try {
      if (!documentId) {
        throw new IngestionFailedError(input.documentId, "documentId is required.");
      }
      signal?.throwIfAborted();

      const bytes =
        typeof input.content === "string" ? Buffer.from(input.content, "utf-8") : input.content;
      if (bytes.byteLength > this.settings.maxDocumentBytes) {
        throw new IngestionFailedError(
          documentId,
          `document is ${bytes.byteLength} bytes, the limit is ${this.settings.maxDocumentBytes}.`,
        );
      }

      const text = normalizeText(decodeUtf8(documentId, bytes));
      const chunks = chunkText(documentId, text, this.settings.chunkSize, this.settings.chunkOverlap);
      if (chunks.length === 0) {
        throw new IngestionFailedError(documentId, "document contains no text.");
      }

      const vectors = await this.embeddingClient.embed(
        chunks.map((chunk) => chunk.text),
        signal,
      );
      const modelVersion = this.embeddingClient.modelVersion;
      const record: DocumentRecord = {
        documentId,
        name: input.name?.trim() || documentId,
        sizeBytes: bytes.byteLength,
        charLength: text.length,
        chunkCount: chunks.length,
        ingestedAt: new Date(this.now()).toISOString(),
        userId: input.userId ?? null,
      };

      const handle = await this.collections.update(
        collectionId,
        (working) => {
          working.removeDocument(documentId);
          working.upsertDocument(record);
          chunks.forEach((chunk, position) => {
            working.add(chunk, { chunkId: chunk.chunkId, vector: vectors[position], modelVersion });
          });
        },
        signal,
      );

      logger.info("document ingested", {
        collectionId,
        documentId,
        version: handle.version,
        chunkCount: chunks.length,
        latencyMs: this.now() - startedAt,
      });
      return { collectionId, documentId, version: handle.version, chunkCount: chunks.length };
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      logger.warn("ingestion failed", { collectionId, documentId: input.documentId, error });
      if (error instanceof IngestionFailedError) {
        throw error;
      }
      throw new IngestionFailedError(input.documentId, describeError(error), { cause: error });
    }
  }

  async ask(input: AskInput, options: RequestOptions = {}): Promise<AskResult> {
    const { signal } = options;
    const question = input.question.trim();
    if (!question) {
      throw new Error("Question cannot be empty.");
    }
    const startedAt = this.now();
    const language = detectLanguage(question);

    const existing = input.sessionId ? await this.requireSession(input.sessionId, input) : null;

    const retrieval = await this.retriever.retrieve(
      input.collectionId,
      question,
      input.topK ?? this.settings.topK,
      this.settings.scoreThreshold,
      signal,
    );

    if (!retrieval.collectionFound) {
      const message = noDocumentMessage(language);
      const turn = existing
        ? await this.sessions.appendTurn(existing.sessionId, {
            question,
            answer: message,
            citations: [],
            outcome: "no_document",
          })
        : null;
      return { kind: "no_document", collectionId: input.collectionId, message, session: existing, turn };
    }

    const result = await this.synthesizer.synthesize(question, retrieval.hits, language, signal);
    signal?.throwIfAborted();

    const session =
      existing ??
      (await this.sessions.createSession({
        userId: input.userId,
        collectionId: input.collectionId,
      }));
    const turn = await this.sessions.appendTurn(session.sessionId, {
      question,
      answer: result.answerText,
      citations: result.citations.map((citation) => citation.chunkId),
      outcome: result.kind,
    });

    logger.info("question answered", {
      collectionId: input.collectionId,
      sessionId: session.sessionId,
      outcome: result.kind,
      hits: retrieval.hits.length,
      citations: result.citations.length,
      latencyMs: this.now() - startedAt,
    });
    return {
      kind: result.kind,
      collectionId: input.collectionId,
      collectionVersion: retrieval.version,
      session,
      turn,
      citations: result.citations,
    };
  }

  listSessions(userId: string, limit?: number): Promise<SessionSummary[]> {
    return this.sessions.listSessions(userId, limit ?? this.settings.sessionListLimit);
  }

  listTurns(sessionId: string): Promise<Turn[]> {
    return this.sessions.listTurns(sessionId);
  }

  deleteSession(sessionId: string): Promise<boolean> {
    return this.sessions.deleteSession(sessionId);
  }

  /** Sessions that referenced the collection are kept; asking in them again yields `no_document`. */
  async deleteCollection(collectionId: string, options: RequestOptions = {}): Promise<boolean> {
    const deleted = await this.collections.delete(collectionId, options.signal);
    logger.info("collection deleted", { collectionId, existed: deleted });
    return deleted;
  }

  async listDocuments(collectionId: string, options: RequestOptions = {}): Promise<DocumentRecord[]> {
    const handle = await this.collections.read(collectionId, options.signal);
    return handle.index.listDocuments();
  }

  /** Documents the user ingested across every collection, newest first. */
  async listUserDocuments(userId: string, options: RequestOptions = {}): Promise<UserDocument[]> {
    const collectionIds = await this.collections.list(options.signal);
    const documents: UserDocument[] = [];
    for (const collectionId of collectionIds) {
      const handle = await this.collections.read(collectionId, options.signal);
      for (const document of handle.index.listDocuments()) {
        if (document.userId === userId) {
          documents.push({ ...document, collectionId });
        }
      }
    }
    return documents.sort(
      (a, b) =>
        b.ingestedAt.localeCompare(a.ingestedAt) ||
        a.collectionId.localeCompare(b.collectionId) ||
        a.documentId.localeCompare(b.documentId),
    );
  }

  getCollectionStatus(collectionId: string, options: RequestOptions = {}): Promise<CollectionStatus> {
    return this.collections.status(collectionId, options.signal);
  }

  private async requireSession(sessionId: string, input: AskInput): Promise<ChatSession> {
    const session = await this.sessions.getSession(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    if (session.collectionId !== input.collectionId) {
      throw new SessionConflictError(
        `Session ${sessionId} belongs to collection ${session.collectionId}, not ${input.collectionId}.`,
      );
    }
    if (session.userId !== input.userId) {
      throw new SessionConflictError(`Session ${sessionId} belongs to another user.`);
    }
    return session;
  }
}

function decodeUtf8(documentId: string, bytes: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (error) {
    throw new IngestionFailedError(documentId, "document is not valid UTF-8 text.", {
      cause: error,
    });
  }
}
