import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PortfolioAssistantService } from "../services/portfolioAssistantService.js";

export function registerSuggestFollowupsTool(server: McpServer, service: PortfolioAssistantService) {
  server.registerTool(
    "suggest_followups",
    {
      title: "Suggest Follow-up Questions",
      description:
        "Questions a visitor could ask next, based on the session's last topic and mentioned items.",
      inputSchema: {
        session_id: z.string().min(1).optional().describe("Conversation to continue"),
        limit: z.number().int().min(1).max(10).optional().describe("Maximum suggestions, default 3"),
      },
    },
    async ({ session_id, limit }) => {
      const result = service.followups(session_id, limit);

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
