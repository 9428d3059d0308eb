import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/env.js";

describe("loadConfig", () => {
  it("applies defaults for a minimal OpenAI setup", () => {
    const config = loadConfig({ OPENAI_API_KEY: "test-secret" });

    expect(config).toMatchObject({
      transport: "stdio",
      embeddingProvider: "openai",
      generationProvider: "openai",
      answerMode: "generative",
      openaiApiKey: "test-secret",
      chunkSize: 1000,
      chunkOverlap: 200,
      topK: 5,
      fetchK: 10,
      maxDocumentBytes: 50 * 1024 * 1024,
      blobStorage: "file",
      sessionStore: "memory",
      databaseUrl: null,
      retry: { maxAttempts: 4, baseDelayMs: 500, maxDelayMs: 8000 },
    });
  });

  it("coerces numeric values and trims trailing slashes from base urls", () => {
    const config = loadConfig({
      EMBEDDING_PROVIDER: "ollama",
      OLLAMA_BASE_URL: "http://127.0.0.1:11434/",
      TOP_K: "12",
      FETCH_K: "4",
      SCORE_THRESHOLD: "0.35",
    });

    expect(config.ollamaBaseUrl).toBe("http://127.0.0.1:11434");
    expect(config.generationProvider).toBe("ollama");
    expect(config.topK).toBe(12);
    expect(config.fetchK).toBe(12);
    expect(config.scoreThreshold).toBe(0.35);
  });

  it("requires an API key only when OpenAI is used", () => {
    expect(() => loadConfig({})).toThrow("OPENAI_API_KEY is required");
    expect(() => loadConfig({ EMBEDDING_PROVIDER: "ollama", ANSWER_MODE: "extractive" })).not.toThrow();
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() =>
      loadConfig({ OPENAI_API_KEY: "test-secret", CHUNK_SIZE: "300", CHUNK_OVERLAP: "300" }),
    ).toThrow("CHUNK_OVERLAP (300) must be smaller than CHUNK_SIZE (300).");
  });

  it("requires DATABASE_URL for Postgres storage", () => {
    expect(() => loadConfig({ OPENAI_API_KEY: "test-secret", SESSION_STORE: "postgres" })).toThrow(
      "requires DATABASE_URL",
    );
  });

  it("rejects unknown enum values", () => {
    expect(() => loadConfig({ OPENAI_API_KEY: "test-secret", RETRIEVAL_STRATEGY: "random" })).toThrow();
  });
});
