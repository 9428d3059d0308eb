import { AiProvider, AppConfig } from "../../config/env.js";
import { BatchingEmbeddingClient } from "./embeddingClient.js";
import { RetryingGenerationClient } from "./generationClient.js";
import { OllamaClient } from "./ollamaClient.js";
import { OpenAiClient } from "./openAiClient.js";
import { EmbeddingClient, GenerationClient } from "./types.js";

export interface AiClients {
  embeddingClient: EmbeddingClient;
  /** `null` in extractive answer mode. */
  generationClient: GenerationClient | null;
}

export function createAiClients(config: AppConfig): AiClients {
  const embeddingClient = new BatchingEmbeddingClient(
    createProvider(config.embeddingProvider, config),
    {
      batchSize: config.embeddingBatchSize,
      timeoutMs: config.embeddingTimeoutMs,
      retry: config.retry,
    },
  );

  if (config.answerMode === "extractive") {
    return { embeddingClient, generationClient: null };
  }

  const generationClient = new RetryingGenerationClient(
    createProvider(config.generationProvider, config),
    {
      timeoutMs: config.generationTimeoutMs,
      retry: config.retry,
    },
  );
  return { embeddingClient, generationClient };
}

function createProvider(provider: AiProvider, config: AppConfig): OpenAiClient | OllamaClient {
  if (provider === "ollama") {
    return new OllamaClient({
      baseUrl: config.ollamaBaseUrl,
      chatModel: config.ollamaChatModel,
      embeddingModel: config.ollamaEmbeddingModel,
      temperature: config.generationTemperature,
    });
  }

  if (!config.openaiApiKey) {
    throw new Error("OPENAI_API_KEY is required for OpenAI operations.");
  }
  return new OpenAiClient({
    apiKey: config.openaiApiKey,
    baseUrl: config.openaiBaseUrl,
    embeddingModel: config.openaiEmbeddingModel,
    chatModel: config.openaiChatModel,
    temperature: config.generationTemperature,
  });
}
