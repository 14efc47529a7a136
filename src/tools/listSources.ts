import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { RagService } from "../services/ragService.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerListSourcesTool(server: McpServer, service: RagService) {
  server.registerTool(
    "list_sources",
    {
      title: "List Sources",
      description: "Lists ingested documents with fingerprint and chunk count.",
      inputSchema: {},
    },
    async () => {
      try {
        return jsonResult({ sources: await service.listSources() });
      } catch (error) {
        return errorResult("list_sources", error);
      }
    },
  );
}
