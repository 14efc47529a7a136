import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { RagService } from "../services/ragService.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerChatTool(server: McpServer, service: RagService) {
  server.registerTool(
    "chat",
    {
      title: "Chat",
      description: "Answers a question using only the ingested documents, with citations.",
      inputSchema: {
        query: z.string().min(1).describe("Question for the ingested documents"),
        top_k: z.number().int().min(1).max(20).optional().describe("Retrieval size"),
      },
    },
    async ({ query, top_k }) => {
      try {
        return jsonResult(await service.chat({ query, topK: top_k }));
      } catch (error) {
        return errorResult("chat", error);
      }
    },
  );
}
