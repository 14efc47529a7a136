import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { RagService } from "../services/ragService.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerIngestDocumentTool(server: McpServer, service: RagService) {
  server.registerTool(
    "ingest_document",
    {
      title: "Ingest Document",
      description:
        "Extracts, chunks and embeds an uploaded PDF, markdown or text file. Re-uploading the same content is a no-op.",
      inputSchema: {
        filename: z.string().min(1).describe("Original file name, e.g. handbook.pdf"),
        content_base64: z.string().min(1).describe("File bytes, base64 encoded"),
      },
    },
    async ({ filename, content_base64 }) => {
      try {
        const result = await service.ingest({
          filename,
          bytes: Buffer.from(content_base64, "base64"),
        });
        return jsonResult(result);
      } catch (error) {
        return errorResult("ingest_document", error);
      }
    },
  );
}
