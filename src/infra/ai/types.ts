import { LanguageHint } from "../../utils/text.js";

/** One provider round trip; batching, timeouts and retries live in the wrappers. */
export interface EmbeddingProvider {
  readonly modelVersion: string;
  embedBatch(texts: string[], signal: AbortSignal): Promise<number[][]>;
}

export interface EmbeddingClient {
  /** `<provider>:<model>`; all vectors of a collection must share it. */
  readonly modelVersion: string;
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface ContextPassage {
  /** 1-based label the model cites as `[label]`. */
  label: number;
  documentId: string;
  sequenceIndex: number;
  text: string;
}

export interface GenerationRequest {
  instruction: string;
  question: string;
  passages: ContextPassage[];
  language: LanguageHint;
}

export interface GenerationResponse {
  text: string;
  /** Passage labels the service reports as used, when it reports them. */
  usedPassages?: number[];
}

export interface GenerationProvider {
  readonly name: string;
  generate(request: GenerationRequest, signal: AbortSignal): Promise<GenerationResponse>;
}

export interface GenerationClient {
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationResponse>;
}
