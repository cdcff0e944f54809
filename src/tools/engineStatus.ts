import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { PortfolioAssistantService } from "../services/portfolioAssistantService.js";

export function registerEngineStatusTool(server: McpServer, service: PortfolioAssistantService) {
  server.registerTool(
    "engine_status",
    {
      title: "Engine Status",
      description: "Index statistics, corpus origin, session counters and answer mode.",
      inputSchema: {},
    },
    async () => {
      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(service.getStatus(), null, 2),
          },
        ],
      };
    },
  );
}
