import { z } from "zod";
import { MalformedResponseError, postJson } from "./http.js";
import { buildGroundedMessages, parseGeneratedAnswer } from "./prompt.js";
import {
  EmbeddingProvider,
  GenerationProvider,
  GenerationRequest,
  GenerationResponse,
} from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
  temperature: number;
}

const embeddingsResponseSchema = z.object({
  embedding: z.array(z.number()).optional(),
});

const chatResponseSchema = z.object({
  message: z
    .object({
      content: z.string().optional(),
    })
    .optional(),
});

const EMBEDDING_CONCURRENCY = 4;

export class OllamaClient implements EmbeddingProvider, GenerationProvider {
  readonly name = "ollama";

  constructor(private readonly options: OllamaClientOptions) {}

  get modelVersion(): string {
    return `ollama:${this.options.embeddingModel}`;
  }

  async embedBatch(texts: string[], signal: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const workers = Math.min(EMBEDDING_CONCURRENCY, texts.length);
    const embeddings: number[][] = new Array(texts.length);
    let cursor = 0;

    const runWorker = async () => {
      while (true) {
        const index = cursor;
        cursor += 1;
        if (index >= texts.length) {
          return;
        }
        embeddings[index] = await this.embedOne(texts[index], signal);
      }
    };

    await Promise.all(Array.from({ length: workers }, () => runWorker()));
    return embeddings;
  }

  async generate(request: GenerationRequest, signal: AbortSignal): Promise<GenerationResponse> {
    const data = await postJson({
      service: "Ollama chat",
      url: `${this.options.baseUrl}/api/chat`,
      body: {
        model: this.options.chatModel,
        stream: false,
        format: "json",
        keep_alive: "30m",
        options: {
          temperature: this.options.temperature,
          num_predict: 512,
          top_p: 0.9,
        },
        messages: buildGroundedMessages(request),
      },
      schema: chatResponseSchema,
      signal,
    });

    return parseGeneratedAnswer(data.message?.content ?? "");
  }

  private async embedOne(text: string, signal: AbortSignal): Promise<number[]> {
    const data = await postJson({
      service: "Ollama embeddings",
      url: `${this.options.baseUrl}/api/embeddings`,
      body: {
        model: this.options.embeddingModel,
        prompt: text,
      },
      schema: embeddingsResponseSchema,
      signal,
    });

    if (!data.embedding || data.embedding.length === 0) {
      throw new MalformedResponseError("Ollama embeddings", "empty vector");
    }
    return data.embedding;
  }
}
