import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PortfolioAssistantService } from "../services/portfolioAssistantService.js";

export function registerAskPortfolioTool(server: McpServer, service: PortfolioAssistantService) {
  server.registerTool(
    "ask_portfolio",
    {
      title: "Ask Portfolio",
      description:
        "Answers a question about the portfolio owner. Pass session_id back on later turns to keep conversational context.",
      inputSchema: {
        question: z.string().trim().min(1).max(1000).describe("Question in Indonesian or English"),
        session_id: z.string().min(1).max(128).optional().describe("Session id from a previous answer"),
        top_k: z.number().int().min(1).max(10).optional().describe("Documents to retrieve"),
      },
    },
    async ({ question, session_id, top_k }) => {
      const result = await service.ask({ question, sessionId: session_id, topK: top_k });

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
