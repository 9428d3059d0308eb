import { describe, expect, it } from "vitest";
import { SessionConflictError, SessionNotFoundError } from "../src/domain/errors.js";
import { InMemorySessionStore } from "../src/infra/store/inMemorySessionStore.js";

function steppingClock(start = Date.parse("2025-03-01T10:00:00.000Z")) {
  let current = start;
  return () => {
    const value = new Date(current);
    current += 1000;
    return value;
  };
}

describe("InMemorySessionStore", () => {
  it("creates sessions and appends numbered turns", async () => {
    const store = new InMemorySessionStore(steppingClock());
    const session = await store.createSession({ userId: "u1", collectionId: "c1", sessionId: "s1" });

    const first = await store.appendTurn("s1", {
      question: "What is the deadline?",
      answer: "30 September 2025 [1]",
      citations: ["policy:4"],
      outcome: "answered",
    });
    const second = await store.appendTurn("s1", {
      question: "Who approves refunds?",
      answer: "The answer was not found in the document.",
      citations: [],
      outcome: "not_found",
    });

    expect(session).toEqual({
      sessionId: "s1",
      userId: "u1",
      collectionId: "c1",
      createdAt: "2025-03-01T10:00:00.000Z",
    });
    expect([first.sequenceIndex, second.sequenceIndex]).toEqual([0, 1]);
    expect(first.timestamp).toBe("2025-03-01T10:00:01.000Z");
    expect((await store.listTurns("s1")).map((turn) => turn.outcome)).toEqual([
      "answered",
      "not_found",
    ]);
  });

  it("keeps concurrent appends gap-free and ordered", async () => {
    const store = new InMemorySessionStore();
    await store.createSession({ userId: "u1", collectionId: "c1", sessionId: "s1" });

    await Promise.all(
      Array.from({ length: 20 }, (_, i) =>
        store.appendTurn("s1", { question: `q${i}`, answer: "a", citations: [], outcome: "answered" }),
      ),
    );

    const turns = await store.listTurns("s1");
    expect(turns.map((turn) => turn.sequenceIndex)).toEqual(Array.from({ length: 20 }, (_, i) => i));
  });

  it("lists a user's sessions newest first with a limit", async () => {
    const store = new InMemorySessionStore(steppingClock());
    await store.createSession({ userId: "u1", collectionId: "c1", sessionId: "old" });
    await store.createSession({ userId: "u2", collectionId: "c1", sessionId: "other" });
    await store.createSession({ userId: "u1", collectionId: "c2", sessionId: "new" });

    expect((await store.listSessions("u1")).map((session) => session.sessionId)).toEqual(["new", "old"]);
    expect((await store.listSessions("u1", 1)).map((session) => session.sessionId)).toEqual(["new"]);
  });

  it("counts the turns of each listed session", async () => {
    const store = new InMemorySessionStore(steppingClock());
    await store.createSession({ userId: "u1", collectionId: "c1", sessionId: "s1" });
    await store.createSession({ userId: "u1", collectionId: "c1", sessionId: "s2" });
    for (const question of ["First?", "Second?"]) {
      await store.appendTurn("s1", { question, answer: "Yes.", citations: [], outcome: "not_found" });
    }

    expect(
      (await store.listSessions("u1")).map((session) => [session.sessionId, session.turnCount]),
    ).toEqual([
      ["s2", 0],
      ["s1", 2],
    ]);
  });

  it("rejects duplicate ids and unknown sessions", async () => {
    const store = new InMemorySessionStore();
    await store.createSession({ userId: "u1", collectionId: "c1", sessionId: "s1" });

    await expect(
      store.createSession({ userId: "u1", collectionId: "c1", sessionId: "s1" }),
    ).rejects.toBeInstanceOf(SessionConflictError);
    await expect(
      store.appendTurn("missing", { question: "q", answer: "a", citations: [], outcome: "answered" }),
    ).rejects.toBeInstanceOf(SessionNotFoundError);
    await expect(store.listTurns("missing")).rejects.toBeInstanceOf(SessionNotFoundError);
  });

  it("deletes a session with its turns", async () => {
    const store = new InMemorySessionStore();
    await store.createSession({ userId: "u1", collectionId: "c1", sessionId: "s1" });
    await store.appendTurn("s1", { question: "q", answer: "a", citations: [], outcome: "answered" });

    expect(await store.deleteSession("s1")).toBe(true);
    expect(await store.getSession("s1")).toBeNull();
    expect(await store.deleteSession("s1")).toBe(false);
  });
});
