import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PortfolioAssistantService } from "../services/portfolioAssistantService.js";

export function registerClassifyQueryTool(server: McpServer, service: PortfolioAssistantService) {
  server.registerTool(
    "classify_query",
    {
      title: "Classify Query",
      description:
        "Returns the category label a question would be routed under, without recording a turn.",
      inputSchema: {
        query: z.string().describe("Question to classify"),
        session_id: z.string().min(1).optional().describe("Evaluate against this session's context"),
      },
    },
    async ({ query, session_id }) => {
      const result = service.classify(query, session_id);

      return {
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
