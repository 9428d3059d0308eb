import { z } from "zod";
import { postJson } from "./http.js";
import { buildGroundedMessages, parseGeneratedAnswer } from "./prompt.js";
import {
  EmbeddingProvider,
  GenerationProvider,
  GenerationRequest,
  GenerationResponse,
} from "./types.js";

interface OpenAiClientOptions {
  apiKey: string;
  baseUrl: string;
  embeddingModel: string;
  chatModel: string;
  temperature: number;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int(),
    }),
  ),
});

const chatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable(),
      }),
    }),
  ),
});

export class OpenAiClient implements EmbeddingProvider, GenerationProvider {
  readonly name = "openai";

  constructor(private readonly options: OpenAiClientOptions) {}

  get modelVersion(): string {
    return `openai:${this.options.embeddingModel}`;
  }

  async embedBatch(texts: string[], signal: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const data = await postJson({
      service: "OpenAI embeddings",
      url: `${this.options.baseUrl}/embeddings`,
      headers: this.authHeaders(),
      body: {
        model: this.options.embeddingModel,
        input: texts,
      },
      schema: embeddingResponseSchema,
      signal,
    });

    return [...data.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  async generate(request: GenerationRequest, signal: AbortSignal): Promise<GenerationResponse> {
    const data = await postJson({
      service: "OpenAI chat",
      url: `${this.options.baseUrl}/chat/completions`,
      headers: this.authHeaders(),
      body: {
        model: this.options.chatModel,
        temperature: this.options.temperature,
        response_format: { type: "json_object" },
        messages: buildGroundedMessages(request),
      },
      schema: chatResponseSchema,
      signal,
    });

    return parseGeneratedAnswer(data.choices[0]?.message.content ?? "");
  }

  private authHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.options.apiKey}` };
  }
}
