import { z } from "zod";
import { TimeoutError } from "../../utils/retry.js";

export class HttpStatusError extends Error {
  constructor(
    readonly service: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(`${service} failed (${status}): ${body.slice(0, 500)}`);
    this.name = "HttpStatusError";
  }

  /** Quota, rate limit and server-side failures are worth another attempt. */
  get retryable(): boolean {
    return this.status === 408 || this.status === 429 || this.status >= 500;
  }
}

export class MalformedResponseError extends Error {
  constructor(service: string, detail: string) {
    super(`${service} returned an unexpected payload: ${detail}`);
    this.name = "MalformedResponseError";
  }
}

export async function postJson<T>(input: {
  service: string;
  url: string;
  body: unknown;
  schema: z.ZodType<T>;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}): Promise<T> {
  const response = await fetch(input.url, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      ...input.headers,
    },
    body: JSON.stringify(input.body),
    signal: input.signal,
  });

  if (!response.ok) {
    throw new HttpStatusError(input.service, response.status, await response.text());
  }

  const parsed = input.schema.safeParse(await response.json());
  if (!parsed.success) {
    throw new MalformedResponseError(
      input.service,
      parsed.error.issues[0]?.message ?? "schema mismatch",
    );
  }
  return parsed.data;
}

/** Network failures (fetch rejects with TypeError), timeouts and retryable statuses. */
export function isTransientFailure(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return error.retryable;
  }
  if (error instanceof MalformedResponseError) {
    return false;
  }
  if (error instanceof TimeoutError) {
    return true;
  }
  return error instanceof TypeError;
}
