import { randomUUID } from "node:crypto";
import { SessionConflictError, SessionNotFoundError } from "../../domain/errors.js";
import {
  AppendTurnInput,
  CreateSessionInput,
  SessionStore,
} from "../../domain/sessionStore.js";
import { ChatSession, SessionSummary, Turn } from "../../domain/types.js";

interface SessionEntry {
  session: ChatSession;
  turns: Turn[];
  createdOrder: number;
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, SessionEntry>();

  private createdCount = 0;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async createSession(input: CreateSessionInput): Promise<ChatSession> {
    const sessionId = input.sessionId ?? randomUUID();
    if (this.sessions.has(sessionId)) {
      throw new SessionConflictError(`Session ${sessionId} already exists.`);
    }

    const session: ChatSession = {
      sessionId,
      userId: input.userId,
      collectionId: input.collectionId,
      createdAt: this.now().toISOString(),
    };
    this.createdCount += 1;
    this.sessions.set(sessionId, { session, turns: [], createdOrder: this.createdCount });
    return { ...session };
  }

  async getSession(sessionId: string): Promise<ChatSession | null> {
    const entry = this.sessions.get(sessionId);
    return entry ? { ...entry.session } : null;
  }

  // Read and write happen without an await in between, so appends to one session
  // cannot interleave.
  async appendTurn(sessionId: string, input: AppendTurnInput): Promise<Turn> {
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      throw new SessionNotFoundError(sessionId);
    }

    const turn: Turn = {
      sessionId,
      sequenceIndex: entry.turns.length,
      question: input.question,
      answer: input.answer,
      citations: [...input.citations],
      outcome: input.outcome,
      timestamp: this.now().toISOString(),
    };
    entry.turns.push(turn);
    return { ...turn, citations: [...turn.citations] };
  }

  async listTurns(sessionId: string): Promise<Turn[]> {
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      throw new SessionNotFoundError(sessionId);
    }
    return entry.turns.map((turn) => ({ ...turn, citations: [...turn.citations] }));
  }

  async listSessions(userId: string, limit?: number): Promise<SessionSummary[]> {
    const sessions = [...this.sessions.values()]
      .filter((entry) => entry.session.userId === userId)
      .sort(
        (a, b) =>
          b.session.createdAt.localeCompare(a.session.createdAt) ||
          b.createdOrder - a.createdOrder,
      )
      .map((entry) => ({ ...entry.session, turnCount: entry.turns.length }));
    return limit === undefined ? sessions : sessions.slice(0, limit);
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }

  async close(): Promise<void> {}
}
