import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createEmbedder } from "@tally/clients";
import { RestStore, createStoreClient } from "@tally/core";
import { ConfigError, createLogger, loadConfig, parseLogLevel } from "@tally/shared";
import { createHandlers } from "./handlers";
import { SERVER_INSTRUCTIONS, registerTools } from "./registerTools";

const SERVER_NAME = "tally-gateway";
const SERVER_VERSION = "0.1.0";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ component: "mcp-server" }, { level: config.logLevel });

  const storeClient = createStoreClient(config, { logger });
  const store = new RestStore(storeClient.client, logger);
  const embedder = createEmbedder(config.embedder);
  const handlers = createHandlers({
    store,
    embedder,
    logger,
    maxConcurrentTools: config.maxConcurrentTools,
  });

  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { instructions: SERVER_INSTRUCTIONS }
  );
  registerTools(server, handlers);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("server.started", {
    version: SERVER_VERSION,
    embedder: config.embedder.useFake ? "fake" : "openai_compat",
    embedding_model: config.embedder.model,
    tls_backend: config.tls.backend,
    max_concurrent_tools: config.maxConcurrentTools ?? null,
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("server.shutdown", { signal });
    try {
      await server.close();
    } catch (err) {
      logger.error("server.close_failed", { err });
    }
    try {
      await storeClient.close();
    } catch (err) {
      logger.error("store.close_failed", { err });
    }
    await logger.flush();
  };

  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch(async (err: unknown) => {
  // Config may be what failed, so the level is read straight from the environment.
  const logger = createLogger({ component: "mcp-server" }, { level: parseLogLevel(process.env.LOG_LEVEL) });
  logger.error("server.start_failed", {
    err,
    missing: err instanceof ConfigError ? err.missing : undefined,
  });
  await logger.flush();
  process.exit(1);
});
