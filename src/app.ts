import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { DocumentQaService } from "./services/documentQaService.js";
import { registerAskQuestionTool } from "./tools/askQuestion.js";
import { registerCollectionTools } from "./tools/collections.js";
import { registerIngestDocumentTool } from "./tools/ingestDocument.js";
import { errorResult, jsonResult } from "./tools/respond.js";
import { registerSessionTools } from "./tools/sessions.js";

export const SERVER_NAME = "cited-doc-qa";
export const SERVER_VERSION = "0.1.0";

export function createAppServer(service: DocumentQaService): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Checks that blob storage is reachable and reports the answer and embedding setup.",
    },
    async (extra) => {
      try {
        const health = await service.health({ signal: extra.signal });
        return jsonResult({
          status: "ok",
          server: `${SERVER_NAME}@${SERVER_VERSION}`,
          answer_generation_mode: health.answerMode,
          embedding_model: health.embeddingModel,
          collection_count: health.collectionCount,
        });
      } catch (error) {
        return errorResult("health_check", error);
      }
    },
  );

  registerIngestDocumentTool(server, service);
  registerAskQuestionTool(server, service);
  registerSessionTools(server, service);
  registerCollectionTools(server, service);

  return server;
}
