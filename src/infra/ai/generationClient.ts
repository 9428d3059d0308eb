import { RetryPolicy } from "../../config/env.js";
import { GenerationUnavailableError, describeError } from "../../domain/errors.js";
import { createLogger } from "../../utils/logger.js";
import { withRetry, withTimeout } from "../../utils/retry.js";
import { isTransientFailure } from "./http.js";
import {
  GenerationClient,
  GenerationProvider,
  GenerationRequest,
  GenerationResponse,
} from "./types.js";

const logger = createLogger("generation");

export interface RetryingGenerationClientOptions {
  timeoutMs: number;
  retry: RetryPolicy;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class RetryingGenerationClient implements GenerationClient {
  constructor(
    private readonly provider: GenerationProvider,
    private readonly options: RetryingGenerationClientOptions,
  ) {}

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationResponse> {
    try {
      return await withRetry(
        () =>
          withTimeout(
            this.options.timeoutMs,
            (callSignal) => this.provider.generate(request, callSignal),
            signal,
          ),
        {
          policy: this.options.retry,
          signal,
          isRetryable: isTransientFailure,
          sleep: this.options.sleep,
          onRetry: (error, attempt, delayMs) =>
            logger.warn("generation failed, retrying", {
              provider: this.provider.name,
              attempt,
              delayMs,
              error,
            }),
        },
      );
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      throw new GenerationUnavailableError(
        `Generation service unavailable: ${describeError(error)}`,
        isTransientFailure(error),
        { cause: error },
      );
    }
  }
}
