import { promises as fs } from "node:fs";
import path from "node:path";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { IngestionFailedError } from "../domain/errors.js";
import { DocumentQaService } from "../services/documentQaService.js";
import { errorResult, jsonResult } from "./respond.js";

const SUPPORTED_EXTENSIONS = new Set([".md", ".txt"]);

export function registerIngestDocumentTool(server: McpServer, service: DocumentQaService) {
  server.registerTool(
    "ingest_document",
    {
      title: "Ingest Document",
      description:
        "Chunks, embeds and stores a plain-text document. Re-ingesting a document_id replaces it.",
      inputSchema: {
        document_id: z.string().min(1).describe("Stable id of the document"),
        content: z.string().optional().describe("Document text"),
        content_base64: z.string().optional().describe("UTF-8 document bytes, base64 encoded"),
        path: z.string().optional().describe("Local .md or .txt file to read instead"),
        name: z.string().optional().describe("Display name, defaults to document_id"),
        user_id: z.string().optional().describe("Uploading user"),
        collection_id: z
          .string()
          .min(1)
          .optional()
          .describe("Target collection, defaults to one derived from document_id"),
      },
    },
    async (input, extra) => {
      try {
        const content = await resolveContent(input);
        const result = await service.ingest(
          {
            documentId: input.document_id,
            content,
            name: input.name ?? (input.path ? path.basename(input.path) : undefined),
            userId: input.user_id,
            collectionId: input.collection_id,
          },
          { signal: extra.signal },
        );
        return jsonResult({
          collection_id: result.collectionId,
          document_id: result.documentId,
          version: result.version,
          chunk_count: result.chunkCount,
        });
      } catch (error) {
        return errorResult("ingest_document", error);
      }
    },
  );
}

async function resolveContent(input: {
  document_id: string;
  content?: string;
  content_base64?: string;
  path?: string;
}): Promise<string | Uint8Array> {
  const provided = [input.content, input.content_base64, input.path].filter(
    (value) => value !== undefined,
  );
  if (provided.length !== 1) {
    throw new IngestionFailedError(
      input.document_id,
      "provide exactly one of content, content_base64 or path.",
    );
  }

  if (input.content !== undefined) {
    return input.content;
  }
  if (input.content_base64 !== undefined) {
    return Buffer.from(input.content_base64, "base64");
  }

  const filePath = path.resolve(input.path ?? "");
  const ext = path.extname(filePath).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.has(ext)) {
    throw new IngestionFailedError(
      input.document_id,
      `unsupported file extension "${ext || "(none)"}". Supported: ${[...SUPPORTED_EXTENSIONS].join(", ")}`,
    );
  }
  return fs.readFile(filePath);
}
