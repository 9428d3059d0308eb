import { RetryPolicy } from "../../config/env.js";
import { EmbeddingUnavailableError, describeError } from "../../domain/errors.js";
import { createLogger } from "../../utils/logger.js";
import { withRetry, withTimeout } from "../../utils/retry.js";
import { isFiniteVector } from "../../utils/vector.js";
import { isTransientFailure } from "./http.js";
import { EmbeddingClient, EmbeddingProvider } from "./types.js";

const logger = createLogger("embedding");

export interface BatchingEmbeddingClientOptions {
  batchSize: number;
  timeoutMs: number;
  retry: RetryPolicy;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Splits input into bounded batches, gives each provider call a timeout and retries
 * transient failures with exponential backoff.
 */
export class BatchingEmbeddingClient implements EmbeddingClient {
  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly options: BatchingEmbeddingClientOptions,
  ) {}

  get modelVersion(): string {
    return this.provider.modelVersion;
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let start = 0; start < texts.length; start += this.options.batchSize) {
      const batch = texts.slice(start, start + this.options.batchSize);
      vectors.push(...(await this.embedBatch(batch, signal)));
    }

    const dimension = vectors[0]?.length ?? 0;
    if (vectors.some((vector) => vector.length !== dimension || !isFiniteVector(vector))) {
      throw new EmbeddingUnavailableError(
        `${this.modelVersion} returned vectors of inconsistent dimension.`,
        false,
      );
    }
    return vectors;
  }

  private async embedBatch(batch: string[], signal?: AbortSignal): Promise<number[][]> {
    try {
      const vectors = await withRetry(
        () =>
          withTimeout(
            this.options.timeoutMs,
            (callSignal) => this.provider.embedBatch(batch, callSignal),
            signal,
          ),
        {
          policy: this.options.retry,
          signal,
          isRetryable: isTransientFailure,
          sleep: this.options.sleep,
          onRetry: (error, attempt, delayMs) =>
            logger.warn("embedding batch failed, retrying", {
              model: this.modelVersion,
              size: batch.length,
              attempt,
              delayMs,
              error,
            }),
        },
      );

      if (vectors.length !== batch.length) {
        throw new EmbeddingUnavailableError(
          `${this.modelVersion} returned ${vectors.length} vectors for ${batch.length} texts.`,
          false,
        );
      }
      return vectors;
    } catch (error) {
      if (signal?.aborted || error instanceof EmbeddingUnavailableError) {
        throw error;
      }
      throw new EmbeddingUnavailableError(
        `Embedding service unavailable: ${describeError(error)}`,
        isTransientFailure(error),
        { cause: error },
      );
    }
  }
}
