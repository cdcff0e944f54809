import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { createAppServer } from "./appServer.js";
import { loadConfig } from "./config/env.js";
import { MCP_PATH, startHttpServer } from "./httpServer.js";
import { createLogger } from "./infra/logging/logger.js";
import { createEngineState } from "./services/engineState.js";

const log = createLogger("server");

async function main() {
  const config = loadConfig();
  const state = await createEngineState(config);
  const shutdownTasks: Array<() => Promise<void>> = [state.close];

  if (config.transport === "http") {
    const http = await startHttpServer({
      host: config.host,
      port: config.port,
      state,
      serverFactory: () => createAppServer(state),
    });
    shutdownTasks.unshift(http.close);
    log.info({ url: `${http.url}${MCP_PATH}` }, "MCP HTTP server listening");
  } else {
    await createAppServer(state).connect(new StdioServerTransport());
    log.info("MCP stdio server connected");
  }

  const shutdown = async () => {
    for (const task of shutdownTasks) {
      await task();
    }
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch((error: unknown) => {
  log.fatal({ err: error }, "failed to start MCP server");
  process.exit(1);
});
