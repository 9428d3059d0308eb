import { Pool } from "pg";

export function createPostgresPool(connectionString: string, statementTimeoutMs: number): Pool {
  return new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: statementTimeoutMs,
    statement_timeout: statementTimeoutMs,
  });
}
