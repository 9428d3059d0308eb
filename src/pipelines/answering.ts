import { Citation, RetrievedChunk } from "../domain/types.js";
import { NOT_FOUND_SENTINEL } from "../infra/ai/prompt.js";
import { ContextPassage, GenerationClient } from "../infra/ai/types.js";
import {
  LanguageHint,
  notFoundMessage,
  scoreByTokenOverlap,
  splitSentences,
  truncate,
} from "../utils/text.js";

export type AnswerMode = "generative" | "extractive";

export type SynthesisResult =
  | { kind: "answered"; answerText: string; citations: Citation[] }
  | { kind: "not_found"; answerText: string; citations: Citation[] };

export interface AnswerSynthesizerOptions {
  contextCharBudget: number;
}

export interface ContextEntry {
  passage: ContextPassage;
  retrieved: RetrievedChunk;
}

const SNIPPET_CHARS = 280;
const EXTRACTIVE_PASSAGE_LIMIT = 3;
const EXTRACTIVE_SENTENCE_CHARS = 180;

export function buildInstruction(language: LanguageHint): string {
  return [
    "You are a strict document QA assistant.",
    "Answer only from the provided context passages and never from prior knowledge.",
    "Cite every passage you rely on with its label, for example [1].",
    `If the context does not contain the answer, reply exactly ${NOT_FOUND_SENTINEL}.`,
    `Respond only in ${language.label}.`,
  ].join("\n");
}

/**
 * Orders passages by score and fills the character budget. The first passage is
 * truncated when it alone exceeds the budget so that a context is never empty.
 */
export function buildContextWindow(
  retrieved: RetrievedChunk[],
  charBudget: number,
): ContextEntry[] {
  const ordered = [...retrieved].sort(
    (a, b) => b.score - a.score || a.chunk.sequenceIndex - b.chunk.sequenceIndex,
  );

  const entries: ContextEntry[] = [];
  let used = 0;
  for (const item of ordered) {
    const remaining = charBudget - used;
    let text = item.chunk.text;
    if (text.length > remaining) {
      if (entries.length > 0) {
        break;
      }
      text = text.slice(0, Math.max(0, remaining));
    }

    entries.push({
      passage: {
        label: entries.length + 1,
        documentId: item.chunk.documentId,
        sequenceIndex: item.chunk.sequenceIndex,
        text,
      },
      retrieved: item,
    });
    used += text.length;
  }
  return entries;
}

/** Labels cited as `[2]` or `[1, 3]`, in first-mention order. */
export function extractCitationLabels(text: string): number[] {
  const labels: number[] = [];
  for (const match of text.matchAll(/\[(\d+(?:\s*,\s*\d+)*)\]/g)) {
    for (const part of match[1].split(",")) {
      labels.push(Number.parseInt(part.trim(), 10));
    }
  }
  return dedupe(labels);
}

export function isNotFoundReply(text: string): boolean {
  const stripped = text
    .trim()
    .replace(/^["'`]+/, "")
    .replace(/["'`.\s]+$/, "");
  return stripped.length === 0 || stripped.toUpperCase() === NOT_FOUND_SENTINEL;
}

export class AnswerSynthesizer {
  /** A `null` generation client selects extractive answers. */
  constructor(
    private readonly generationClient: GenerationClient | null,
    private readonly options: AnswerSynthesizerOptions,
  ) {}

  get mode(): AnswerMode {
    return this.generationClient ? "generative" : "extractive";
  }

  async synthesize(
    question: string,
    retrieved: RetrievedChunk[],
    language: LanguageHint,
    signal?: AbortSignal,
  ): Promise<SynthesisResult> {
    const context = buildContextWindow(retrieved, this.options.contextCharBudget);
    if (context.length === 0) {
      return notFound(language);
    }

    if (!this.generationClient) {
      return answerExtractively(question, context, language);
    }

    const response = await this.generationClient.generate(
      {
        instruction: buildInstruction(language),
        question,
        passages: context.map((entry) => entry.passage),
        language,
      },
      signal,
    );

    if (isNotFoundReply(response.text)) {
      return notFound(language);
    }

    const answerText = response.text.trim();
    const cited = dedupe([...extractCitationLabels(answerText), ...(response.usedPassages ?? [])])
      .map((label) => context[label - 1])
      .filter((entry): entry is ContextEntry => entry !== undefined);

    return {
      kind: "answered",
      answerText,
      citations: (cited.length > 0 ? cited : context).map(toCitation),
    };
  }
}

function answerExtractively(
  question: string,
  context: ContextEntry[],
  language: LanguageHint,
): SynthesisResult {
  const lines: string[] = [];
  const cited: ContextEntry[] = [];

  for (const entry of context.slice(0, EXTRACTIVE_PASSAGE_LIMIT)) {
    let best = "";
    let bestScore = 0;
    for (const sentence of splitSentences(entry.passage.text)) {
      const score = scoreByTokenOverlap(question, sentence);
      if (score > bestScore) {
        best = sentence;
        bestScore = score;
      }
    }

    if (bestScore > 0) {
      lines.push(`${truncate(best, EXTRACTIVE_SENTENCE_CHARS)} [${entry.passage.label}]`);
      cited.push(entry);
    }
  }

  if (lines.length === 0) {
    return notFound(language);
  }
  return { kind: "answered", answerText: lines.join("\n"), citations: cited.map(toCitation) };
}

function notFound(language: LanguageHint): SynthesisResult {
  return { kind: "not_found", answerText: notFoundMessage(language), citations: [] };
}

function toCitation(entry: ContextEntry): Citation {
  const { chunk, score } = entry.retrieved;
  return {
    chunkId: chunk.chunkId,
    documentId: chunk.documentId,
    sequenceIndex: chunk.sequenceIndex,
    charStart: chunk.charStart,
    charEnd: chunk.charEnd,
    score: Number(score.toFixed(4)),
    snippet: truncate(chunk.text, SNIPPET_CHARS),
  };
}

function dedupe(values: number[]): number[] {
  return values.filter((value, index) => values.indexOf(value) === index);
}
