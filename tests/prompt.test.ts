import { afterEach, describe, expect, it, vi } from "vitest";
import { HttpStatusError } from "../src/infra/ai/http.js";
import { OpenAiClient } from "../src/infra/ai/openAiClient.js";
import { buildGroundedMessages, parseGeneratedAnswer } from "../src/infra/ai/prompt.js";
import { GenerationRequest } from "../src/infra/ai/types.js";
import { detectLanguage } from "../src/utils/text.js";

const request: GenerationRequest = {
  instruction: "Answer only from context.",
  question: "What is the deadline?",
  passages: [
    { label: 1, documentId: "policy", sequenceIndex: 0, text: "Applications open in May." },
    { label: 2, documentId: "policy", sequenceIndex: 4, text: "Deadline: 30 September 2025." },
  ],
  language: detectLanguage("What is the deadline?"),
};

describe("prompt", () => {
  it("numbers passages with their source position", () => {
    const [system, user] = buildGroundedMessages(request);

    expect(system).toEqual({ role: "system", content: "Answer only from context." });
    expect(user.content).toContain("[2] source=policy#4\nDeadline: 30 September 2025.");
    expect(user.content).toContain("Write the answer only in English.");
    expect(user.content).toContain('set "answer" to "NOT_FOUND"');
  });

  it("parses the structured JSON reply, fenced or not", () => {
    expect(parseGeneratedAnswer('{"answer": " Friday [1] ", "used_passages": [1]}')).toEqual({
      text: "Friday [1]",
      usedPassages: [1],
    });
    expect(parseGeneratedAnswer('```json\n{"answer": "NOT_FOUND", "used_passages": []}\n```')).toEqual({
      text: "NOT_FOUND",
      usedPassages: [],
    });
  });

  it("falls back to prose replies", () => {
    expect(parseGeneratedAnswer("  The deadline is Friday [2].  ")).toEqual({
      text: "The deadline is Friday [2].",
    });
  });
});

describe("OpenAiClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const client = new OpenAiClient({
    apiKey: "test-secret",
    baseUrl: "https://llm.example.test/v1",
    embeddingModel: "embed-small",
    chatModel: "chat-mini",
    temperature: 0.1,
  });

  it("returns embeddings in input order", async () => {
    const fetchMock = vi.fn(async () =>
      new Response(
        JSON.stringify({
          data: [
            { index: 1, embedding: [0, 1] },
            { index: 0, embedding: [1, 0] },
          ],
        }),
        { status: 200 },
      ),
    );
    vi.stubGlobal("fetch", fetchMock);

    const vectors = await client.embedBatch(["first", "second"], new AbortController().signal);

    expect(vectors).toEqual([
      [1, 0],
      [0, 1],
    ]);
    expect(client.modelVersion).toBe("openai:embed-small");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("reports HTTP failures with their status", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("rate limited", { status: 429 })),
    );

    const error = await client
      .generate(request, new AbortController().signal)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error instanceof HttpStatusError && error.status).toBe(429);
    expect(error instanceof HttpStatusError && error.retryable).toBe(true);
  });

  it("parses the chat completion content", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () =>
        new Response(
          JSON.stringify({
            choices: [
              { message: { content: '{"answer": "30 September 2025 [2]", "used_passages": [2]}' } },
            ],
          }),
          { status: 200 },
        ),
      ),
    );

    await expect(client.generate(request, new AbortController().signal)).resolves.toEqual({
      text: "30 September 2025 [2]",
      usedPassages: [2],
    });
  });
});
