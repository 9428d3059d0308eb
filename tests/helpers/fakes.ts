import { EmbeddingClient, GenerationClient, GenerationRequest, GenerationResponse } from "../../src/infra/ai/types.js";
import { QaSettings } from "../../src/services/documentQaService.js";
import { tokenize } from "../../src/utils/text.js";

export const FAKE_DIMENSION = 256;

function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i += 1) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/** Bag-of-words vector: texts sharing words point in similar directions. */
export function hashEmbed(text: string, dimension = FAKE_DIMENSION): number[] {
  const vector = new Array<number>(dimension).fill(0);
  for (const token of tokenize(text)) {
    vector[fnv1a(token) % dimension] += 1;
  }
  return vector;
}

export class FakeEmbeddingClient implements EmbeddingClient {
  readonly calls: string[][] = [];

  failure: Error | null = null;

  constructor(readonly modelVersion = "fake:hash-256") {}

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    signal?.throwIfAborted();
    this.calls.push([...texts]);
    if (this.failure) {
      throw this.failure;
    }
    return texts.map((text) => hashEmbed(text));
  }

  get embeddedTexts(): number {
    return this.calls.reduce((sum, call) => sum + call.length, 0);
  }
}

export class FakeGenerationClient implements GenerationClient {
  readonly requests: GenerationRequest[] = [];

  constructor(
    private readonly respond: (request: GenerationRequest) => GenerationResponse | Promise<GenerationResponse>,
  ) {}

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationResponse> {
    signal?.throwIfAborted();
    this.requests.push(request);
    return this.respond(request);
  }
}

export function testSettings(overrides: Partial<QaSettings> = {}): QaSettings {
  return {
    chunkSize: 200,
    chunkOverlap: 40,
    maxDocumentBytes: 1024 * 1024,
    topK: 3,
    fetchK: 10,
    retrievalStrategy: "similarity",
    mmrLambda: 0.5,
    scoreThreshold: 0.1,
    contextCharBudget: 2000,
    storageTimeoutMs: 1000,
    retry: { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0 },
    maxSnapshotBytes: 10 * 1024 * 1024,
    indexCacheTtlMs: 60_000,
    persistMaxAttempts: 3,
    sessionListLimit: 10,
    ...overrides,
  };
}
