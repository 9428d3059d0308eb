import { ChatSession, SessionSummary, Turn, TurnOutcome } from "./types.js";

export interface CreateSessionInput {
  userId: string;
  collectionId: string;
  sessionId?: string;
}

export interface AppendTurnInput {
  question: string;
  answer: string;
  citations: string[];
  outcome: TurnOutcome;
}

export interface SessionStore {
  createSession(input: CreateSessionInput): Promise<ChatSession>;
  getSession(sessionId: string): Promise<ChatSession | null>;
  /** Appends with the next sequence index; appends to one session never interleave. */
  appendTurn(sessionId: string, input: AppendTurnInput): Promise<Turn>;
  listTurns(sessionId: string): Promise<Turn[]>;
  /** Newest first. */
  listSessions(userId: string, limit?: number): Promise<SessionSummary[]>;
  deleteSession(sessionId: string): Promise<boolean>;
  close(): Promise<void>;
}
