import { createServer, IncomingMessage, Server, ServerResponse } from "node:http";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import "dotenv/config";
import { createAppServer } from "./app.js";
import { AppConfig, loadConfig } from "./config/env.js";
import { describeError } from "./domain/errors.js";
import { createAiClients } from "./infra/ai/defaultAiClient.js";
import { createStorage } from "./infra/store/createStorage.js";
import { DocumentQaService } from "./services/documentQaService.js";
import { createLogger, setLogLevel } from "./utils/logger.js";

const MCP_PATH = "/mcp";

const logger = createLogger("server");

type ShutdownTask = () => Promise<void>;

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const { embeddingClient, generationClient } = createAiClients(config);
  const storage = await createStorage(config);
  const service = new DocumentQaService({
    embeddingClient,
    generationClient,
    blobStorage: storage.blobStorage,
    sessionStore: storage.sessionStore,
    settings: config,
  });

  logger.info("starting", {
    transport: config.transport,
    embeddingModel: embeddingClient.modelVersion,
    answerMode: service.answerMode,
    blobStorage: config.blobStorage,
    sessionStore: config.sessionStore,
  });

  // The transport stops before storage closes.
  const stopTransport =
    config.transport === "http" ? await runHttpServer(config, service) : await runStdioServer(service);
  installShutdown([stopTransport, storage.close]);
}

async function runStdioServer(service: DocumentQaService): Promise<ShutdownTask> {
  const server = createAppServer(service);
  await server.connect(new StdioServerTransport());
  return () => server.close();
}

/**
 * Stateless streamable HTTP: every POST gets its own MCP server, so any instance behind a
 * load balancer can answer any request. Chat state lives in the session store.
 */
async function runHttpServer(config: AppConfig, service: DocumentQaService): Promise<ShutdownTask> {
  const httpServer = createServer((req, res) => {
    routeRequest(req, res, service).catch((error: unknown) => {
      logger.error("http request failed", { method: req.method, url: req.url, error });
      if (!res.headersSent) {
        writeJson(res, 500, { error: describeError(error) });
      }
    });
  });

  await listen(httpServer, config.host, config.port);
  logger.info(`MCP HTTP server listening on http://${config.host}:${config.port}${MCP_PATH}`);
  return () => closeHttpServer(httpServer);
}

async function routeRequest(req: IncomingMessage, res: ServerResponse, service: DocumentQaService) {
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

  if (url.pathname === "/healthz") {
    try {
      const health = await service.health();
      writeJson(res, 200, { status: "ok", collection_count: health.collectionCount });
    } catch (error) {
      logger.warn("health check failed", { error });
      writeJson(res, 503, { status: "unavailable", error: describeError(error) });
    }
    return;
  }

  if (url.pathname !== MCP_PATH) {
    writeJson(res, 404, { error: "Not found" });
    return;
  }

  if (req.method !== "POST") {
    writeJson(res, 405, {
      jsonrpc: "2.0",
      error: { code: -32000, message: "Method not allowed" },
      id: null,
    });
    return;
  }

  const body = await readJsonBody(req);
  const server = createAppServer(service);
  const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
  res.on("close", () => {
    Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
      logger.warn("failed to close MCP request server", { error });
    });
  });

  await server.connect(transport);
  await transport.handleRequest(req, res, body);
}

function installShutdown(tasks: ShutdownTask[]) {
  let stopping = false;
  const onSignal = (signal: NodeJS.Signals) => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info("shutting down", { signal });
    runInOrder(tasks).then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("shutdown failed", { error });
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

async function runInOrder(tasks: ShutdownTask[]) {
  for (const task of tasks) {
    await task();
  }
}

function listen(httpServer: Server, host: string, port: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(port, host, () => {
      httpServer.off("error", reject);
      resolve();
    });
  });
}

function closeHttpServer(httpServer: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    httpServer.close((error) => (error ? reject(error) : resolve()));
  });
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new Error("Invalid JSON body", { cause: error });
  }
}

function writeJson(res: ServerResponse, status: number, payload: unknown) {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
}

main().catch((error: unknown) => {
  logger.error("failed to start MCP server", { error });
  process.exit(1);
});
