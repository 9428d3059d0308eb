import { randomUUID } from "node:crypto";
import { Pool } from "pg";
import { z } from "zod";
import { SessionConflictError, SessionNotFoundError } from "../../domain/errors.js";
import {
  AppendTurnInput,
  CreateSessionInput,
  SessionStore,
} from "../../domain/sessionStore.js";
import { ChatSession, SessionSummary, Turn, TurnOutcome } from "../../domain/types.js";

type PgSessionRow = {
  id: string;
  user_id: string;
  collection_id: string;
  created_at: Date;
};

type PgTurnRow = {
  session_id: string;
  sequence_index: number;
  question: string;
  answer: string;
  citations: unknown;
  outcome: string;
  created_at: Date;
};

const citationsSchema = z.array(z.string());
const outcomeSchema = z.enum(["answered", "not_found", "no_document"]);

export class PgSessionStore implements SessionStore {
  private initialized = false;

  constructor(private readonly pool: Pool) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS chat_sessions (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        collection_id TEXT NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        turn_count INTEGER NOT NULL DEFAULT 0
      )
    `);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS chat_turns (
        session_id TEXT NOT NULL REFERENCES chat_sessions(id) ON DELETE CASCADE,
        sequence_index INTEGER NOT NULL,
        question TEXT NOT NULL,
        answer TEXT NOT NULL,
        citations JSONB NOT NULL,
        outcome TEXT NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        PRIMARY KEY (session_id, sequence_index)
      )
    `);
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_chat_sessions_user ON chat_sessions(user_id, created_at DESC)`,
    );

    this.initialized = true;
  }

  async createSession(input: CreateSessionInput): Promise<ChatSession> {
    await this.initialize();
    const sessionId = input.sessionId ?? randomUUID();
    const result = await this.pool.query<PgSessionRow>(
      `
        INSERT INTO chat_sessions (id, user_id, collection_id, created_at)
        VALUES ($1, $2, $3, NOW())
        ON CONFLICT (id) DO NOTHING
        RETURNING id, user_id, collection_id, created_at
      `,
      [sessionId, input.userId, input.collectionId],
    );

    const row = result.rows[0];
    if (!row) {
      throw new SessionConflictError(`Session ${sessionId} already exists.`);
    }
    return toSession(row);
  }

  async getSession(sessionId: string): Promise<ChatSession | null> {
    await this.initialize();
    const result = await this.pool.query<PgSessionRow>(
      `SELECT id, user_id, collection_id, created_at FROM chat_sessions WHERE id = $1`,
      [sessionId],
    );
    const row = result.rows[0];
    return row ? toSession(row) : null;
  }

  /** The session row lock orders concurrent appends, across instances too. */
  async appendTurn(sessionId: string, input: AppendTurnInput): Promise<Turn> {
    await this.initialize();
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");

      const locked = await client.query<{ turn_count: number }>(
        `SELECT turn_count FROM chat_sessions WHERE id = $1 FOR UPDATE`,
        [sessionId],
      );
      const session = locked.rows[0];
      if (!session) {
        throw new SessionNotFoundError(sessionId);
      }

      const inserted = await client.query<PgTurnRow>(
        `
          INSERT INTO chat_turns
            (session_id, sequence_index, question, answer, citations, outcome, created_at)
          VALUES ($1, $2, $3, $4, $5::jsonb, $6, NOW())
          RETURNING session_id, sequence_index, question, answer, citations, outcome, created_at
        `,
        [
          sessionId,
          session.turn_count,
          input.question,
          input.answer,
          JSON.stringify(input.citations),
          input.outcome,
        ],
      );
      await client.query(`UPDATE chat_sessions SET turn_count = turn_count + 1 WHERE id = $1`, [
        sessionId,
      ]);

      await client.query("COMMIT");
      return toTurn(inserted.rows[0]);
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async listTurns(sessionId: string): Promise<Turn[]> {
    if (!(await this.getSession(sessionId))) {
      throw new SessionNotFoundError(sessionId);
    }

    const result = await this.pool.query<PgTurnRow>(
      `
        SELECT session_id, sequence_index, question, answer, citations, outcome, created_at
        FROM chat_turns
        WHERE session_id = $1
        ORDER BY sequence_index ASC
      `,
      [sessionId],
    );
    return result.rows.map(toTurn);
  }

  async listSessions(userId: string, limit?: number): Promise<SessionSummary[]> {
    await this.initialize();
    const result = await this.pool.query<PgSessionRow & { turn_count: number }>(
      `
        SELECT id, user_id, collection_id, created_at, turn_count
        FROM chat_sessions
        WHERE user_id = $1
        ORDER BY created_at DESC, id DESC
        LIMIT $2
      `,
      [userId, limit ?? null],
    );
    return result.rows.map((row) => ({ ...toSession(row), turnCount: row.turn_count }));
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    await this.initialize();
    const result = await this.pool.query(`DELETE FROM chat_sessions WHERE id = $1`, [sessionId]);
    return (result.rowCount ?? 0) > 0;
  }

  async close(): Promise<void> {}
}

function toSession(row: PgSessionRow): ChatSession {
  return {
    sessionId: row.id,
    userId: row.user_id,
    collectionId: row.collection_id,
    createdAt: row.created_at.toISOString(),
  };
}

function toTurn(row: PgTurnRow): Turn {
  const outcome: TurnOutcome = outcomeSchema.parse(row.outcome);
  return {
    sessionId: row.session_id,
    sequenceIndex: row.sequence_index,
    question: row.question,
    answer: row.answer,
    citations: citationsSchema.parse(row.citations),
    outcome,
    timestamp: row.created_at.toISOString(),
  };
}
