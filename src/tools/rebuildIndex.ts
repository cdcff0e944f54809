import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { PortfolioAssistantService } from "../services/portfolioAssistantService.js";

export function registerRebuildIndexTool(server: McpServer, service: PortfolioAssistantService) {
  server.registerTool(
    "rebuild_index",
    {
      title: "Rebuild Index",
      description:
        "Reloads the portfolio corpus and swaps in a fresh index. Queries in flight keep the old one.",
      inputSchema: {},
    },
    async () => {
      const result = await service.rebuildIndex();

      return {
        isError: !result.ok,
        content: [
          {
            type: "text",
            text: JSON.stringify(result, null, 2),
          },
        ],
      };
    },
  );
}
