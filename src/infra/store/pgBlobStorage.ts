import { Pool } from "pg";
import { BlobStorage, PutPrecondition, StoredBlob } from "../../domain/blobStorage.js";
import { PreconditionFailedError } from "../../domain/errors.js";

type BlobRow = {
  data: Buffer;
  generation: string;
};

/**
 * Blob storage in a Postgres table. Each conditional write is a single statement, so a
 * write either lands with a new generation or does not land at all. Generations come from
 * one sequence and are never reused, even after a key is deleted and written again.
 */
export class PgBlobStorage implements BlobStorage {
  private initialized = false;

  constructor(private readonly pool: Pool) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.pool.query(`CREATE SEQUENCE IF NOT EXISTS blob_generation_seq`);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS blob_objects (
        key TEXT PRIMARY KEY,
        generation BIGINT NOT NULL,
        data BYTEA NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    this.initialized = true;
  }

  async get(key: string): Promise<StoredBlob | null> {
    await this.initialize();
    const result = await this.pool.query<BlobRow>(
      `SELECT data, generation::text AS generation FROM blob_objects WHERE key = $1`,
      [key],
    );
    const row = result.rows[0];
    if (!row) {
      return null;
    }
    return { data: row.data, generation: row.generation };
  }

  async put(key: string, data: Buffer, precondition: PutPrecondition): Promise<string> {
    await this.initialize();

    const result =
      precondition.ifGeneration === null
        ? await this.pool.query<{ generation: string }>(
            `
              INSERT INTO blob_objects (key, generation, data, updated_at)
              VALUES ($1, nextval('blob_generation_seq'), $2, NOW())
              ON CONFLICT (key) DO NOTHING
              RETURNING generation::text AS generation
            `,
            [key, data],
          )
        : await this.pool.query<{ generation: string }>(
            `
              UPDATE blob_objects
              SET data = $2, generation = nextval('blob_generation_seq'), updated_at = NOW()
              WHERE key = $1 AND generation = $3::bigint
              RETURNING generation::text AS generation
            `,
            [key, data, precondition.ifGeneration],
          );

    const row = result.rows[0];
    if (!row) {
      throw new PreconditionFailedError(key);
    }
    return row.generation;
  }

  async delete(key: string): Promise<boolean> {
    await this.initialize();
    const result = await this.pool.query(`DELETE FROM blob_objects WHERE key = $1`, [key]);
    return (result.rowCount ?? 0) > 0;
  }

  async list(prefix: string): Promise<string[]> {
    await this.initialize();
    const result = await this.pool.query<{ key: string }>(
      `SELECT key FROM blob_objects WHERE left(key, length($1)) = $1 ORDER BY key`,
      [prefix],
    );
    return result.rows.map((row) => row.key);
  }

  async close(): Promise<void> {}
}
