export type DocQaErrorCode =
  | "INGESTION_FAILED"
  | "EMBEDDING_UNAVAILABLE"
  | "GENERATION_UNAVAILABLE"
  | "STALE_VERSION"
  | "PRECONDITION_FAILED"
  | "SESSION_NOT_FOUND"
  | "SESSION_CONFLICT"
  | "INVALID_SNAPSHOT";

export class DocQaError extends Error {
  constructor(
    readonly code: DocQaErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Chunking or embedding failed after retries; the document has to be uploaded again. */
export class IngestionFailedError extends DocQaError {
  constructor(
    readonly documentId: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super("INGESTION_FAILED", `Ingestion of "${documentId}" failed: ${reason}`, options);
  }
}

export class EmbeddingUnavailableError extends DocQaError {
  constructor(
    message: string,
    readonly retryable: boolean,
    options?: { cause?: unknown },
  ) {
    super("EMBEDDING_UNAVAILABLE", message, options);
  }
}

export class GenerationUnavailableError extends DocQaError {
  constructor(
    message: string,
    readonly retryable: boolean,
    options?: { cause?: unknown },
  ) {
    super("GENERATION_UNAVAILABLE", message, options);
  }
}

export class StaleVersionError extends DocQaError {
  constructor(
    readonly collectionId: string,
    readonly attemptedVersion: number,
    readonly storedVersion: number | null,
    options?: { cause?: unknown },
  ) {
    super(
      "STALE_VERSION",
      storedVersion === null
        ? `Snapshot of ${collectionId} changed while writing version ${attemptedVersion}.`
        : `Cannot write version ${attemptedVersion} of ${collectionId}: stored version is ${storedVersion}.`,
      options,
    );
  }
}

export class PreconditionFailedError extends DocQaError {
  constructor(readonly key: string) {
    super("PRECONDITION_FAILED", `Blob ${key} did not match the expected generation.`);
  }
}

export class SessionNotFoundError extends DocQaError {
  constructor(readonly sessionId: string) {
    super("SESSION_NOT_FOUND", `Session ${sessionId} not found.`);
  }
}

export class SessionConflictError extends DocQaError {
  constructor(message: string) {
    super("SESSION_CONFLICT", message);
  }
}

export class InvalidSnapshotError extends DocQaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INVALID_SNAPSHOT", message, options);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
