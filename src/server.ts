import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config/env.js";
import { createProviders } from "./infra/ai/createProviders.js";
import { logger } from "./infra/logging/logger.js";
import { createVectorStore } from "./infra/store/createVectorStore.js";
import { MCP_PATH, runHttpServer } from "./http/httpServer.js";
import { createRestHandler } from "./http/restRoutes.js";
import { createAppServer } from "./mcpServer.js";
import { RagService } from "./services/ragService.js";

async function main() {
  const config = loadConfig();
  const providers = createProviders(config);
  const { store, close } = await createVectorStore(config);
  const shutdownTasks: Array<() => Promise<void>> = [close];

  const service = new RagService(
    { store, embedding: providers.embedding, generation: providers.generation },
    config,
  );

  logger.info(
    {
      store: config.enablePgvector ? "pgvector" : "memory",
      embeddingProvider: config.embeddingProvider,
      generationProvider: config.generationProvider,
      dimension: config.embeddingDimension,
    },
    "service configured",
  );

  if (config.transport === "http") {
    const http = await runHttpServer({
      host: config.host,
      port: config.port,
      frontendUrl: config.frontendUrl,
      rest: createRestHandler(service, {
        frontendUrl: config.frontendUrl,
        maxUploadBytes: config.maxUploadBytes,
      }),
      mcpServerFactory: () => createAppServer(service),
    });
    shutdownTasks.unshift(http.stop);
    logger.info(
      { url: `http://${config.host}:${http.port}`, mcp: MCP_PATH },
      "HTTP server listening",
    );
  } else {
    const server = createAppServer(service);
    await server.connect(new StdioServerTransport());
    shutdownTasks.unshift(() => server.close());
  }

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, "shutting down");
    try {
      for (const task of shutdownTasks) {
        await task();
      }
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, "shutdown failed");
      process.exit(1);
    }
  };

  process.on("SIGINT", (signal) => void shutdown(signal));
  process.on("SIGTERM", (signal) => void shutdown(signal));
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "failed to start server");
  process.exit(1);
});
