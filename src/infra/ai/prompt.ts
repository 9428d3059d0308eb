import { z } from "zod";
import { GenerationRequest, GenerationResponse } from "./types.js";

export const NOT_FOUND_SENTINEL = "NOT_FOUND";

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

const structuredAnswerSchema = z.object({
  answer: z.string(),
  used_passages: z.array(z.number().int()).optional(),
});

export function buildGroundedMessages(request: GenerationRequest): ChatMessage[] {
  const contextBlock = request.passages
    .map(
      (passage) =>
        `[${passage.label}] source=${passage.documentId}#${passage.sequenceIndex}\n${passage.text}`,
    )
    .join("\n\n");

  return [
    { role: "system", content: request.instruction },
    {
      role: "user",
      content: [
        `Question:\n${request.question}`,
        `Context:\n${contextBlock}`,
        [
          "Output rules:",
          `1) Write the answer only in ${request.language.label}.`,
          "2) Cite evidence inline as [1], [2] using the passage labels.",
          '3) Reply with JSON: {"answer": string, "used_passages": number[]}.',
          `4) If the context does not contain the answer, set "answer" to "${NOT_FOUND_SENTINEL}" and "used_passages" to [].`,
        ].join("\n"),
      ].join("\n\n"),
    },
  ];
}

/** Accepts the JSON shape requested above and falls back to plain text. */
export function parseGeneratedAnswer(raw: string): GenerationResponse {
  const trimmed = raw
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "")
    .trim();

  try {
    const parsed = structuredAnswerSchema.safeParse(JSON.parse(trimmed));
    if (parsed.success) {
      return {
        text: parsed.data.answer.trim(),
        usedPassages: parsed.data.used_passages,
      };
    }
  } catch {
    // Not JSON; the model answered in prose.
  }

  return { text: raw.trim() };
}
