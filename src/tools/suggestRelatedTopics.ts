import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PortfolioAssistantService } from "../services/portfolioAssistantService.js";

export function registerSuggestRelatedTopicsTool(
  server: McpServer,
  service: PortfolioAssistantService,
) {
  server.registerTool(
    "suggest_related_topics",
    {
      title: "Suggest Related Topics",
      description: "Short topic labels a visitor could ask about next.",
      inputSchema: {
        query: z.string().min(1).describe("Question or topic"),
      },
    },
    async ({ query }) => {
      const topics = await service.relatedTopics(query);

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify({ query, topics }, null, 2),
          },
        ],
      };
    },
  );
}
