import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DocumentQaService } from "../services/documentQaService.js";
import { errorResult, jsonResult } from "./respond.js";

export function registerAskQuestionTool(server: McpServer, service: DocumentQaService) {
  server.registerTool(
    "ask_question",
    {
      title: "Ask Question",
      description:
        "Answers a question from one collection's documents with citations and records the turn in a chat session.",
      inputSchema: {
        collection_id: z.string().min(1).describe("Collection to answer from"),
        user_id: z.string().min(1).describe("Asking user"),
        question: z.string().min(2).describe("Question about the documents"),
        session_id: z.string().optional().describe("Existing session; a new one is created when omitted"),
        top_k: z.number().int().min(1).max(20).optional().describe("Retrieval size"),
      },
    },
    async (input, extra) => {
      const startedAt = Date.now();
      try {
        const result = await service.ask(
          {
            collectionId: input.collection_id,
            userId: input.user_id,
            question: input.question,
            sessionId: input.session_id,
            topK: input.top_k,
          },
          { signal: extra.signal },
        );

        if (result.kind === "no_document") {
          return jsonResult({
            kind: result.kind,
            answer: result.message,
            citations: [],
            session_id: result.session?.sessionId ?? null,
            latency_ms: Date.now() - startedAt,
          });
        }

        return jsonResult({
          kind: result.kind,
          answer: result.turn.answer,
          citations: result.citations.map((citation) => ({
            chunk_id: citation.chunkId,
            document_id: citation.documentId,
            sequence_index: citation.sequenceIndex,
            char_start: citation.charStart,
            char_end: citation.charEnd,
            score: citation.score,
            snippet: citation.snippet,
          })),
          session_id: result.session.sessionId,
          turn_index: result.turn.sequenceIndex,
          collection_version: result.collectionVersion,
          answer_generation_mode: service.answerMode,
          latency_ms: Date.now() - startedAt,
        });
      } catch (error) {
        return errorResult("ask_question", error);
      }
    },
  );
}
