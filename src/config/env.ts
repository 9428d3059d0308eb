import { z } from "zod";

const envSchema = z.object({
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  MCP_HOST: z.string().default("0.0.0.0"),
  MCP_PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  EMBEDDING_PROVIDER: z.enum(["openai", "ollama"]).default("openai"),
  GENERATION_PROVIDER: z.enum(["openai", "ollama"]).optional(),
  ANSWER_MODE: z.enum(["generative", "extractive"]).default("generative"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  OLLAMA_BASE_URL: z.string().url().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("nomic-embed-text"),
  EMBEDDING_BATCH_SIZE: z.coerce.number().int().min(1).max(2048).default(64),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  GENERATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(4),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(500),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(8_000),

  BLOB_STORAGE: z.enum(["file", "postgres", "memory"]).default("file"),
  BLOB_STORAGE_DIR: z.string().default(".data/blobs"),
  SESSION_STORE: z.enum(["memory", "postgres"]).default("memory"),
  DATABASE_URL: z.string().optional(),
  STORAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  INDEX_CACHE_TTL_MS: z.coerce.number().int().min(0).default(60_000),
  PERSIST_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  MAX_SNAPSHOT_BYTES: z.coerce.number().int().positive().default(200 * 1024 * 1024),

  MAX_DOCUMENT_BYTES: z.coerce.number().int().positive().default(50 * 1024 * 1024),
  CHUNK_SIZE: z.coerce.number().int().min(50).default(1000),
  CHUNK_OVERLAP: z.coerce.number().int().min(0).default(200),
  TOP_K: z.coerce.number().int().min(1).max(50).default(5),
  FETCH_K: z.coerce.number().int().min(1).max(200).default(10),
  RETRIEVAL_STRATEGY: z.enum(["similarity", "mmr"]).default("similarity"),
  MMR_LAMBDA: z.coerce.number().min(0).max(1).default(0.5),
  SCORE_THRESHOLD: z.coerce.number().min(-1).max(1).default(0.2),
  CONTEXT_CHAR_BUDGET: z.coerce.number().int().min(200).default(6_000),
  SESSION_LIST_LIMIT: z.coerce.number().int().min(1).max(100).default(10),
});

export type EnvInput = Record<string, string | undefined>;

export type AiProvider = "openai" | "ollama";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface AppConfig {
  transport: "stdio" | "http";
  host: string;
  port: number;
  logLevel: "debug" | "info" | "warn" | "error";

  embeddingProvider: AiProvider;
  generationProvider: AiProvider;
  answerMode: "generative" | "extractive";
  openaiApiKey: string | null;
  openaiBaseUrl: string;
  openaiEmbeddingModel: string;
  openaiChatModel: string;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  ollamaEmbeddingModel: string;
  embeddingBatchSize: number;
  embeddingTimeoutMs: number;
  generationTimeoutMs: number;
  generationTemperature: number;
  retry: RetryPolicy;

  blobStorage: "file" | "postgres" | "memory";
  blobStorageDir: string;
  sessionStore: "memory" | "postgres";
  databaseUrl: string | null;
  storageTimeoutMs: number;
  indexCacheTtlMs: number;
  persistMaxAttempts: number;
  maxSnapshotBytes: number;

  maxDocumentBytes: number;
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  fetchK: number;
  retrievalStrategy: "similarity" | "mmr";
  mmrLambda: number;
  scoreThreshold: number;
  contextCharBudget: number;
  sessionListLimit: number;
}

export function loadConfig(env: EnvInput = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  if (parsed.CHUNK_OVERLAP >= parsed.CHUNK_SIZE) {
    throw new Error(
      `CHUNK_OVERLAP (${parsed.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${parsed.CHUNK_SIZE}).`,
    );
  }

  const usesPostgres = parsed.BLOB_STORAGE === "postgres" || parsed.SESSION_STORE === "postgres";
  if (usesPostgres && !parsed.DATABASE_URL) {
    throw new Error("BLOB_STORAGE=postgres or SESSION_STORE=postgres requires DATABASE_URL.");
  }

  const generationProvider = parsed.GENERATION_PROVIDER ?? parsed.EMBEDDING_PROVIDER;
  const openAiNeeded =
    parsed.EMBEDDING_PROVIDER === "openai" ||
    (parsed.ANSWER_MODE === "generative" && generationProvider === "openai");
  if (openAiNeeded && !parsed.OPENAI_API_KEY) {
    throw new Error("OPENAI_API_KEY is required when the OpenAI provider is selected.");
  }

  return {
    transport: parsed.MCP_TRANSPORT,
    host: parsed.MCP_HOST,
    port: parsed.MCP_PORT,
    logLevel: parsed.LOG_LEVEL,

    embeddingProvider: parsed.EMBEDDING_PROVIDER,
    generationProvider,
    answerMode: parsed.ANSWER_MODE,
    openaiApiKey: parsed.OPENAI_API_KEY || null,
    openaiBaseUrl: parsed.OPENAI_BASE_URL.replace(/\/+$/, ""),
    openaiEmbeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    openaiChatModel: parsed.OPENAI_CHAT_MODEL,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL.replace(/\/+$/, ""),
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    embeddingBatchSize: parsed.EMBEDDING_BATCH_SIZE,
    embeddingTimeoutMs: parsed.EMBEDDING_TIMEOUT_MS,
    generationTimeoutMs: parsed.GENERATION_TIMEOUT_MS,
    generationTemperature: parsed.GENERATION_TEMPERATURE,
    retry: {
      maxAttempts: parsed.RETRY_MAX_ATTEMPTS,
      baseDelayMs: parsed.RETRY_BASE_DELAY_MS,
      maxDelayMs: Math.max(parsed.RETRY_MAX_DELAY_MS, parsed.RETRY_BASE_DELAY_MS),
    },

    blobStorage: parsed.BLOB_STORAGE,
    blobStorageDir: parsed.BLOB_STORAGE_DIR,
    sessionStore: parsed.SESSION_STORE,
    databaseUrl: parsed.DATABASE_URL ?? null,
    storageTimeoutMs: parsed.STORAGE_TIMEOUT_MS,
    indexCacheTtlMs: parsed.INDEX_CACHE_TTL_MS,
    persistMaxAttempts: parsed.PERSIST_MAX_ATTEMPTS,
    maxSnapshotBytes: parsed.MAX_SNAPSHOT_BYTES,

    maxDocumentBytes: parsed.MAX_DOCUMENT_BYTES,
    chunkSize: parsed.CHUNK_SIZE,
    chunkOverlap: parsed.CHUNK_OVERLAP,
    topK: parsed.TOP_K,
    fetchK: Math.max(parsed.FETCH_K, parsed.TOP_K),
    retrievalStrategy: parsed.RETRIEVAL_STRATEGY,
    mmrLambda: parsed.MMR_LAMBDA,
    scoreThreshold: parsed.SCORE_THRESHOLD,
    contextCharBudget: parsed.CONTEXT_CHAR_BUDGET,
    sessionListLimit: parsed.SESSION_LIST_LIMIT,
  };
}
