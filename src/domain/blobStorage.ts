export interface StoredBlob {
  data: Buffer;
  /** Opaque token that changes on every successful write. */
  generation: string;
}

export interface PutPrecondition {
  /** `null` means the key must not exist yet. */
  ifGeneration: string | null;
}

export interface BlobStorage {
  get(key: string): Promise<StoredBlob | null>;
  /** Throws `PreconditionFailedError` when the stored generation does not match. */
  put(key: string, data: Buffer, precondition: PutPrecondition): Promise<string>;
  delete(key: string): Promise<boolean>;
  /** Keys starting with `prefix`, sorted. */
  list(prefix: string): Promise<string[]>;
  close(): Promise<void>;
}
