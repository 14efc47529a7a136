import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { RagService } from "./services/ragService.js";
import { registerChatTool } from "./tools/chat.js";
import { registerIngestDocumentTool } from "./tools/ingestDocument.js";
import { registerListSourcesTool } from "./tools/listSources.js";
import { registerSearchChunksTool } from "./tools/searchChunks.js";

export const SERVER_NAME = "doc-rag-service";
export const SERVER_VERSION = "0.1.0";

export function createAppServer(service: RagService): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns basic server status.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const who = name?.trim() || "anonymous";
      const { record_count } = await service.status();
      return {
        content: [
          {
            type: "text",
            text: `${SERVER_NAME} is running with ${record_count} stored chunks. hello ${who}`,
          },
        ],
      };
    },
  );

  registerIngestDocumentTool(server, service);
  registerChatTool(server, service);
  registerSearchChunksTool(server, service);
  registerListSourcesTool(server, service);

  return server;
}
