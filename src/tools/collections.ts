import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DocumentQaService } from "../services/documentQaService.js";
import { errorResult, jsonResult } from "./respond.js";

export function registerCollectionTools(server: McpServer, service: DocumentQaService) {
  server.registerTool(
    "list_documents",
    {
      title: "List Documents",
      description: "Lists the documents ingested into a collection.",
      inputSchema: {
        collection_id: z.string().min(1).describe("Collection id"),
      },
    },
    async ({ collection_id }, extra) => {
      try {
        const documents = await service.listDocuments(collection_id, { signal: extra.signal });
        return jsonResult({
          collection_id,
          documents: documents.map((document) => ({
            document_id: document.documentId,
            name: document.name,
            size_bytes: document.sizeBytes,
            chunk_count: document.chunkCount,
            ingested_at: document.ingestedAt,
            user_id: document.userId,
          })),
        });
      } catch (error) {
        return errorResult("list_documents", error);
      }
    },
  );

  server.registerTool(
    "list_user_documents",
    {
      title: "List User Documents",
      description: "Lists the documents a user ingested across all collections, newest first.",
      inputSchema: {
        user_id: z.string().min(1).describe("Document owner"),
      },
    },
    async ({ user_id }, extra) => {
      try {
        const documents = await service.listUserDocuments(user_id, { signal: extra.signal });
        return jsonResult({
          user_id,
          documents: documents.map((document) => ({
            collection_id: document.collectionId,
            document_id: document.documentId,
            name: document.name,
            chunk_count: document.chunkCount,
            ingested_at: document.ingestedAt,
          })),
        });
      } catch (error) {
        return errorResult("list_user_documents", error);
      }
    },
  );

  server.registerTool(
    "collection_status",
    {
      title: "Collection Status",
      description: "Reports the stored version, embedding model and size of a collection.",
      inputSchema: {
        collection_id: z.string().min(1).describe("Collection id"),
      },
    },
    async ({ collection_id }, extra) => {
      try {
        const status = await service.getCollectionStatus(collection_id, { signal: extra.signal });
        return jsonResult({
          collection_id: status.collectionId,
          exists: status.exists,
          version: status.version,
          last_synced_version: status.lastSyncedVersion,
          model_version: status.modelVersion,
          document_count: status.documentCount,
          chunk_count: status.chunkCount,
          snapshot_bytes: status.snapshotBytes,
        });
      } catch (error) {
        return errorResult("collection_status", error);
      }
    },
  );

  server.registerTool(
    "delete_collection",
    {
      title: "Delete Collection",
      description: "Deletes a collection's stored index. Chat sessions are kept.",
      inputSchema: {
        collection_id: z.string().min(1).describe("Collection id"),
      },
    },
    async ({ collection_id }, extra) => {
      try {
        const deleted = await service.deleteCollection(collection_id, { signal: extra.signal });
        return jsonResult({ collection_id, deleted });
      } catch (error) {
        return errorResult("delete_collection", error);
      }
    },
  );
}
