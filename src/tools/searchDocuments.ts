import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PortfolioAssistantService } from "../services/portfolioAssistantService.js";

export function registerSearchDocumentsTool(server: McpServer, service: PortfolioAssistantService) {
  server.registerTool(
    "search_documents",
    {
      title: "Search Documents",
      description: "Ranks portfolio documents against a query.",
      inputSchema: {
        query: z.string().min(1).describe("Search query"),
        top_k: z.number().int().min(1).max(20).optional().describe("Max hits"),
        category: z.string().min(1).optional().describe("Only documents of this category"),
      },
    },
    async ({ query, top_k, category }) => {
      const result = await service.searchDocuments({ query, topK: top_k, category });

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
