import { Pool } from "pg";
import { AppConfig } from "../../config/env.js";
import { BlobStorage } from "../../domain/blobStorage.js";
import { SessionStore } from "../../domain/sessionStore.js";
import { createPostgresPool } from "../db/postgres.js";
import { FileBlobStorage } from "./fileBlobStorage.js";
import { InMemoryBlobStorage } from "./inMemoryBlobStorage.js";
import { InMemorySessionStore } from "./inMemorySessionStore.js";
import { PgBlobStorage } from "./pgBlobStorage.js";
import { PgSessionStore } from "./pgSessionStore.js";

export interface StorageBootstrapResult {
  blobStorage: BlobStorage;
  sessionStore: SessionStore;
  close: () => Promise<void>;
}

type StorageConfig = Pick<
  AppConfig,
  "blobStorage" | "blobStorageDir" | "sessionStore" | "databaseUrl" | "storageTimeoutMs"
>;

export async function createStorage(config: StorageConfig): Promise<StorageBootstrapResult> {
  let pool: Pool | null = null;
  const getPool = (): Pool => {
    if (!config.databaseUrl) {
      throw new Error("DATABASE_URL is required for Postgres storage.");
    }
    pool ??= createPostgresPool(config.databaseUrl, config.storageTimeoutMs);
    return pool;
  };

  let blobStorage: BlobStorage;
  if (config.blobStorage === "postgres") {
    const storage = new PgBlobStorage(getPool());
    await storage.initialize();
    blobStorage = storage;
  } else if (config.blobStorage === "memory") {
    blobStorage = new InMemoryBlobStorage();
  } else {
    blobStorage = new FileBlobStorage(config.blobStorageDir, {
      lockTimeoutMs: config.storageTimeoutMs,
    });
  }

  let sessionStore: SessionStore;
  if (config.sessionStore === "postgres") {
    const store = new PgSessionStore(getPool());
    await store.initialize();
    sessionStore = store;
  } else {
    sessionStore = new InMemorySessionStore();
  }

  return {
    blobStorage,
    sessionStore,
    close: async () => {
      await blobStorage.close();
      await sessionStore.close();
      await pool?.end();
    },
  };
}
