import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { RagService } from "../services/ragService.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerSearchChunksTool(server: McpServer, service: RagService) {
  server.registerTool(
    "search_chunks",
    {
      title: "Search Chunks",
      description: "Retrieves the top matching chunks without generating an answer.",
      inputSchema: {
        query: z.string().min(1).describe("Search query"),
        top_k: z.number().int().min(1).max(20).optional().describe("Max hits"),
      },
    },
    async ({ query, top_k }) => {
      try {
        return jsonResult(await service.search({ query, topK: top_k }));
      } catch (error) {
        return errorResult("search_chunks", error);
      }
    },
  );
}
