import { describe, expect, it } from "vitest";
import {
  IngestionFailedError,
  SessionConflictError,
  SessionNotFoundError,
} from "../src/domain/errors.js";
import { GenerationResponse, GenerationRequest } from "../src/infra/ai/types.js";
import { InMemoryBlobStorage } from "../src/infra/store/inMemoryBlobStorage.js";
import { InMemorySessionStore } from "../src/infra/store/inMemorySessionStore.js";
import {
  DocumentQaService,
  QaSettings,
  defaultCollectionId,
} from "../src/services/documentQaService.js";
import { truncate } from "../src/utils/text.js";
import { FakeEmbeddingClient, FakeGenerationClient, testSettings } from "./helpers/fakes.js";

const GUIDE = [
  "Scholarship Programme Guide",
  "The application deadline is 30 September 2025 at noon.",
  "The programme supports students in engineering and science who live in the region.",
  "Applications are submitted through the online portal with two references attached.",
  "Late submissions are not accepted under any circumstances, including technical problems.",
  "Awards are announced in December and paid in two instalments during the academic year.",
].join("\n\n");

// With 100-character windows and no overlap each paragraph is one chunk; the deadline is
// in the fourth, at [278, 370).
const RENEWAL = [
  "Riverside Housing Cooperative: annual membership renewal notice for all current residents.",
  "Members renew online or at the office, and the renewal fee stays at forty euros this year.",
  "Parking permits are issued with the renewal and must be shown on the dashboard at all times.",
  "The renewal deadline: 30 September 2025. Forms received after that date are not processed.",
  "Questions about renewal can be sent to the office by email, and replies arrive within a week.",
].join("\n\n");

function answerFromDeadline(request: GenerationRequest): GenerationResponse {
  const passage = request.passages.find((item) => item.text.includes("30 September 2025"));
  if (!passage) {
    return { text: "NOT_FOUND", usedPassages: [] };
  }
  return {
    text: `The deadline is 30 September 2025 [${passage.label}].`,
    usedPassages: [passage.label],
  };
}

interface Harness {
  service: DocumentQaService;
  storage: InMemoryBlobStorage;
  embedder: FakeEmbeddingClient;
  generation: FakeGenerationClient;
  sessions: InMemorySessionStore;
}

function createHarness(
  options: {
    storage?: InMemoryBlobStorage;
    embedder?: FakeEmbeddingClient;
    settings?: Partial<QaSettings>;
  } = {},
): Harness {
  const storage = options.storage ?? new InMemoryBlobStorage();
  const embedder = options.embedder ?? new FakeEmbeddingClient();
  const generation = new FakeGenerationClient(answerFromDeadline);
  const sessions = new InMemorySessionStore();
  const service = new DocumentQaService({
    embeddingClient: embedder,
    generationClient: generation,
    blobStorage: storage,
    sessionStore: sessions,
    settings: testSettings(options.settings),
  });
  return { service, storage, embedder, generation, sessions };
}

describe("DocumentQaService", () => {
  it("answers from an ingested document with a citation to the supporting chunk", async () => {
    const { service } = createHarness();

    const ingest = await service.ingest({
      documentId: "scholarship-guide",
      collectionId: "guides",
      content: GUIDE,
      userId: "u1",
    });
    const result = await service.ask({
      collectionId: "guides",
      userId: "u1",
      question: "What is the deadline?",
      topK: 10,
    });

    expect(ingest.version).toBe(1);
    expect(ingest.chunkCount).toBeGreaterThan(1);
    expect(result.kind).toBe("answered");
    if (result.kind === "no_document") {
      return;
    }
    expect(result.turn.answer).toContain("30 September 2025");
    expect(result.citations[0]).toMatchObject({
      chunkId: "scholarship-guide:0",
      documentId: "scholarship-guide",
      sequenceIndex: 0,
      charStart: 0,
    });
    expect(result.turn.citations[0]).toBe("scholarship-guide:0");
    expect(result.turn.outcome).toBe("answered");
    expect(result.session.userId).toBe("u1");
    expect(result.collectionVersion).toBe(1);

    const turns = await service.listTurns(result.session.sessionId);
    expect(turns).toHaveLength(1);
    expect(turns[0].question).toBe("What is the deadline?");
  });

  it("cites the later chunk holding the deadline with offsets into the ingested text", async () => {
    const { service } = createHarness({ settings: { chunkSize: 100, chunkOverlap: 0 } });

    const ingest = await service.ingest({ documentId: "renewal", collectionId: "coop", content: RENEWAL });
    const result = await service.ask({ collectionId: "coop", userId: "u1", question: "What is the deadline?" });

    expect(ingest.chunkCount).toBe(5);
    if (result.kind === "no_document") {
      throw new Error("expected an answer");
    }
    expect(result.kind).toBe("answered");
    expect(result.turn.answer).toContain("30 September 2025");
    expect(result.citations.map((citation) => citation.chunkId)).toEqual(["renewal:3"]);
    expect(result.citations[0]).toMatchObject({ sequenceIndex: 3, charStart: 278, charEnd: 370 });
    for (const citation of result.citations) {
      expect(citation.snippet).toBe(truncate(RENEWAL.slice(citation.charStart, citation.charEnd), 280));
    }
  });

  it("reports no_document for a collection that was never ingested", async () => {
    const { service, embedder, generation } = createHarness();

    const result = await service.ask({ collectionId: "empty", userId: "u1", question: "What is the deadline?" });

    expect(result).toEqual({
      kind: "no_document",
      collectionId: "empty",
      message: "No document has been ingested for this collection yet.",
      session: null,
      turn: null,
    });
    expect(embedder.calls).toHaveLength(0);
    expect(generation.requests).toHaveLength(0);
  });

  it("records a no_document turn in an existing session after the collection is deleted", async () => {
    const { service } = createHarness();
    await service.ingest({ documentId: "guide", collectionId: "guides", content: GUIDE });
    const first = await service.ask({ collectionId: "guides", userId: "u1", question: "What is the deadline?" });
    if (first.kind === "no_document") {
      throw new Error("expected an answer");
    }

    expect(await service.deleteCollection("guides")).toBe(true);
    const second = await service.ask({
      collectionId: "guides",
      userId: "u1",
      question: "What is the deadline?",
      sessionId: first.session.sessionId,
    });

    expect(second.kind).toBe("no_document");
    expect((await service.listTurns(first.session.sessionId)).map((turn) => turn.outcome)).toEqual([
      "answered",
      "no_document",
    ]);
  });

  it("keeps not_found answers distinguishable in the session history", async () => {
    const { service } = createHarness();
    await service.ingest({
      documentId: "menu",
      collectionId: "menus",
      content: "The cafeteria serves lunch from noon until two in the afternoon.",
    });

    const result = await service.ask({
      collectionId: "menus",
      userId: "u1",
      question: "When does the cafeteria serve lunch?",
    });

    expect(result.kind).toBe("not_found");
    if (result.kind === "no_document") {
      return;
    }
    expect(result.turn.answer).toBe("The answer was not found in the document.");
    expect(result.turn.citations).toEqual([]);
    expect(result.turn.outcome).toBe("not_found");
  });

  it("replaces a document's chunks when it is ingested again", async () => {
    const { service } = createHarness();
    await service.ingest({ documentId: "notes", collectionId: "c1", content: GUIDE });
    const second = await service.ingest({
      documentId: "notes",
      collectionId: "c1",
      content: "Only one short paragraph remains.",
      name: "notes.txt",
    });

    const status = await service.getCollectionStatus("c1");
    const documents = await service.listDocuments("c1");

    expect(second).toEqual({ collectionId: "c1", documentId: "notes", version: 2, chunkCount: 1 });
    expect(status).toMatchObject({ exists: true, version: 2, documentCount: 1, chunkCount: 1 });
    expect(documents.map((document) => [document.documentId, document.name])).toEqual([["notes", "notes.txt"]]);
  });

  it("derives a stable collection id from the document id", async () => {
    const { service } = createHarness();

    const result = await service.ingest({ documentId: "handbook", content: "Hello there, reader." });

    expect(result.collectionId).toBe(defaultCollectionId("handbook"));
    expect(defaultCollectionId("handbook")).toMatch(/^doc-[0-9a-f]{16}$/);
  });

  it("leaves nothing behind when embedding fails", async () => {
    const { service, embedder } = createHarness();
    embedder.failure = new Error("embedding service down");

    const error = await service
      .ingest({ documentId: "guide", collectionId: "guides", content: GUIDE })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IngestionFailedError);
    expect(error).toMatchObject({ code: "INGESTION_FAILED", documentId: "guide" });
    expect((await service.getCollectionStatus("guides")).exists).toBe(false);

    embedder.failure = null;
    const result = await service.ask({ collectionId: "guides", userId: "u1", question: "What is the deadline?" });
    expect(result.kind).toBe("no_document");
  });

  it("keeps the last persisted version when a later ingest fails", async () => {
    const { service, embedder } = createHarness();
    await service.ingest({ documentId: "guide", collectionId: "guides", content: GUIDE });
    embedder.failure = new Error("embedding service down");

    await expect(
      service.ingest({ documentId: "extra", collectionId: "guides", content: "More text." }),
    ).rejects.toBeInstanceOf(IngestionFailedError);

    expect(await service.getCollectionStatus("guides")).toMatchObject({ version: 1, documentCount: 1 });
  });

  it("rejects oversized, empty and non-UTF-8 documents before embedding", async () => {
    const { service, embedder } = createHarness({ settings: { maxDocumentBytes: 64 } });

    await expect(service.ingest({ documentId: "big", content: "x".repeat(65) })).rejects.toThrow(
      "the limit is 64",
    );
    await expect(service.ingest({ documentId: "blank", content: " \n\t " })).rejects.toThrow(
      "document contains no text",
    );
    await expect(
      service.ingest({ documentId: "binary", content: new Uint8Array([0xff, 0xfe, 0xfd]) }),
    ).rejects.toThrow("not valid UTF-8");
    expect(embedder.calls).toHaveLength(0);
  });

  it("does not persist a cancelled ingest", async () => {
    const { service } = createHarness();
    const controller = new AbortController();
    controller.abort(new Error("client went away"));

    const error = await service
      .ingest({ documentId: "guide", collectionId: "guides", content: GUIDE }, { signal: controller.signal })
      .catch((e: unknown) => e);

    expect(error).not.toBeInstanceOf(IngestionFailedError);
    expect(error).toMatchObject({ message: "client went away" });
    expect((await service.getCollectionStatus("guides")).exists).toBe(false);
  });

  it("merges concurrent ingests from two instances into one collection", async () => {
    const storage = new InMemoryBlobStorage();
    const first = createHarness({ storage });
    const second = createHarness({ storage });

    const results = await Promise.all([
      first.service.ingest({ documentId: "guide", collectionId: "shared", content: GUIDE }),
      second.service.ingest({
        documentId: "menu",
        collectionId: "shared",
        content: "The cafeteria serves lunch from noon until two in the afternoon.",
      }),
    ]);

    expect(results.map((result) => result.version).sort()).toEqual([1, 2]);
    const observer = createHarness({ storage });
    expect((await observer.service.listDocuments("shared")).map((document) => document.documentId)).toEqual([
      "guide",
      "menu",
    ]);
    expect((await observer.service.getCollectionStatus("shared")).version).toBe(2);
  });

  it("does not bring back documents of a collection another instance deleted", async () => {
    const storage = new InMemoryBlobStorage();
    const first = createHarness({ storage });
    const second = createHarness({ storage });

    await first.service.ingest({ documentId: "secret", collectionId: "c", content: "Private notes." });
    expect(await second.service.listDocuments("c")).toHaveLength(1);
    await first.service.deleteCollection("c");
    const result = await second.service.ingest({ documentId: "menu", collectionId: "c", content: "Lunch is at noon." });

    const observer = createHarness({ storage });
    expect(result.version).toBe(1);
    expect((await observer.service.listDocuments("c")).map((document) => document.documentId)).toEqual(["menu"]);
  });

  it("lists a user's documents across collections, newest first", async () => {
    let clock = Date.parse("2025-03-01T10:00:00.000Z");
    const service = new DocumentQaService({
      embeddingClient: new FakeEmbeddingClient(),
      generationClient: null,
      blobStorage: new InMemoryBlobStorage(),
      sessionStore: new InMemorySessionStore(),
      settings: testSettings(),
      now: () => (clock += 1000),
    });

    await service.ingest({ documentId: "guide", collectionId: "b", content: GUIDE, userId: "u1" });
    await service.ingest({ documentId: "notes", collectionId: "b", content: "Private notes.", userId: "u2" });
    await service.ingest({ documentId: "menu", collectionId: "a", content: "Lunch is at noon.", userId: "u1" });
    await service.ingest({ documentId: "shared", collectionId: "a", content: "No owner." });

    const documents = await service.listUserDocuments("u1");

    expect(documents.map((document) => [document.collectionId, document.documentId])).toEqual([
      ["a", "menu"],
      ["b", "guide"],
    ]);
    expect(await service.listUserDocuments("u3")).toEqual([]);
  });

  it("sees another instance's writes once its cache expires", async () => {
    const storage = new InMemoryBlobStorage();
    const writer = createHarness({ storage });
    const reader = createHarness({ storage, settings: { indexCacheTtlMs: 0 } });

    await writer.service.ingest({ documentId: "menu", collectionId: "shared", content: "Lunch is at noon." });
    expect(await reader.service.listDocuments("shared")).toHaveLength(1);

    await writer.service.ingest({ documentId: "guide", collectionId: "shared", content: GUIDE });
    expect(await reader.service.listDocuments("shared")).toHaveLength(2);
  });

  it("re-embeds the whole collection when the embedding model changes", async () => {
    const storage = new InMemoryBlobStorage();
    const before = createHarness({ storage, embedder: new FakeEmbeddingClient("fake:v1") });
    const ingest = await before.service.ingest({ documentId: "guide", collectionId: "guides", content: GUIDE });

    const upgraded = new FakeEmbeddingClient("fake:v2");
    const after = createHarness({ storage, embedder: upgraded });
    const result = await after.service.ask({
      collectionId: "guides",
      userId: "u1",
      question: "What is the deadline?",
      topK: 10,
    });

    expect(result.kind).toBe("answered");
    expect(upgraded.embeddedTexts).toBe(ingest.chunkCount + 1);
    expect(await after.service.getCollectionStatus("guides")).toMatchObject({
      version: 2,
      modelVersion: "fake:v2",
      chunkCount: ingest.chunkCount,
    });
  });

  it("rejects sessions bound to another collection or user", async () => {
    const { service, sessions } = createHarness();
    await service.ingest({ documentId: "guide", collectionId: "guides", content: GUIDE });
    await sessions.createSession({ userId: "u1", collectionId: "other", sessionId: "s-other" });
    await sessions.createSession({ userId: "u2", collectionId: "guides", sessionId: "s-u2" });

    const ask = (sessionId: string) =>
      service.ask({ collectionId: "guides", userId: "u1", question: "What is the deadline?", sessionId });

    await expect(ask("s-other")).rejects.toBeInstanceOf(SessionConflictError);
    await expect(ask("s-u2")).rejects.toBeInstanceOf(SessionConflictError);
    await expect(ask("missing")).rejects.toBeInstanceOf(SessionNotFoundError);
  });

  it("continues an existing session and lists sessions newest first", async () => {
    const { service } = createHarness();
    await service.ingest({ documentId: "guide", collectionId: "guides", content: GUIDE });

    const first = await service.ask({ collectionId: "guides", userId: "u1", question: "What is the deadline?" });
    if (first.kind === "no_document") {
      throw new Error("expected an answer");
    }
    const followUp = await service.ask({
      collectionId: "guides",
      userId: "u1",
      question: "Is the deadline at noon?",
      sessionId: first.session.sessionId,
    });
    if (followUp.kind === "no_document") {
      throw new Error("expected an answer");
    }

    expect(followUp.session.sessionId).toBe(first.session.sessionId);
    expect(followUp.turn.sequenceIndex).toBe(1);
    expect((await service.listSessions("u1")).map((session) => session.sessionId)).toEqual([
      first.session.sessionId,
    ]);
    expect(await service.deleteSession(first.session.sessionId)).toBe(true);
    expect(await service.listSessions("u1")).toEqual([]);
  });

  it("rejects an empty question", async () => {
    const { service } = createHarness();

    await expect(service.ask({ collectionId: "c1", userId: "u1", question: "   " })).rejects.toThrow(
      "Question cannot be empty.",
    );
  });
});
