import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DocumentQaService } from "../services/documentQaService.js";
import { errorResult, jsonResult } from "./respond.js";

export function registerSessionTools(server: McpServer, service: DocumentQaService) {
  server.registerTool(
    "list_sessions",
    {
      title: "List Sessions",
      description: "Lists a user's chat sessions, newest first.",
      inputSchema: {
        user_id: z.string().min(1).describe("Session owner"),
        limit: z.number().int().min(1).max(100).optional().describe("Maximum sessions"),
      },
    },
    async ({ user_id, limit }) => {
      try {
        const sessions = await service.listSessions(user_id, limit);
        return jsonResult({
          sessions: sessions.map((session) => ({
            session_id: session.sessionId,
            collection_id: session.collectionId,
            created_at: session.createdAt,
            turn_count: session.turnCount,
          })),
        });
      } catch (error) {
        return errorResult("list_sessions", error);
      }
    },
  );

  server.registerTool(
    "list_turns",
    {
      title: "List Turns",
      description: "Returns the question/answer turns of a session in order.",
      inputSchema: {
        session_id: z.string().min(1).describe("Session id"),
      },
    },
    async ({ session_id }) => {
      try {
        const turns = await service.listTurns(session_id);
        return jsonResult({
          session_id,
          turns: turns.map((turn) => ({
            sequence_index: turn.sequenceIndex,
            question: turn.question,
            answer: turn.answer,
            citations: turn.citations,
            outcome: turn.outcome,
            timestamp: turn.timestamp,
          })),
        });
      } catch (error) {
        return errorResult("list_turns", error);
      }
    },
  );

  server.registerTool(
    "delete_session",
    {
      title: "Delete Session",
      description: "Deletes a session and all of its turns.",
      inputSchema: {
        session_id: z.string().min(1).describe("Session id"),
      },
    },
    async ({ session_id }) => {
      try {
        return jsonResult({ session_id, deleted: await service.deleteSession(session_id) });
      } catch (error) {
        return errorResult("delete_session", error);
      }
    },
  );
}
