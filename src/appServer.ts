import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { EngineState } from "./services/engineState.js";
import { registerAskPortfolioTool } from "./tools/askPortfolio.js";
import { registerClassifyQueryTool } from "./tools/classifyQuery.js";
import { registerEngineStatusTool } from "./tools/engineStatus.js";
import { registerRebuildIndexTool } from "./tools/rebuildIndex.js";
import { registerSearchDocumentsTool } from "./tools/searchDocuments.js";
import { registerSuggestFollowupsTool } from "./tools/suggestFollowups.js";
import { registerSuggestRelatedTopicsTool } from "./tools/suggestRelatedTopics.js";

export function createAppServer(state: EngineState): McpServer {
  const server = new McpServer({
    name: "portfolio-assistant-mcp",
    version: "0.1.0",
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns basic server status.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const who = name?.trim() || "anonymous";
      const stats = state.engine.getStats();
      return {
        content: [
          {
            type: "text",
            text: `portfolio-assistant-mcp is running (${stats.document_count} documents, ${stats.index_type}). hello ${who}`,
          },
        ],
      };
    },
  );

  registerAskPortfolioTool(server, state.service);
  registerSearchDocumentsTool(server, state.service);
  registerSuggestRelatedTopicsTool(server, state.service);
  registerSuggestFollowupsTool(server, state.service);
  registerClassifyQueryTool(server, state.service);
  registerRebuildIndexTool(server, state.service);
  registerEngineStatusTool(server, state.service);

  return server;
}
