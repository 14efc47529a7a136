import { createServer } from "node:http";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { readJsonBody } from "./body.js";
import { McpSessionRegistry } from "./mcpSessions.js";
import { RestHandler, applyCors, writeError, writeJson } from "./restRoutes.js";

export const MCP_PATH = "/mcp";

const MCP_BODY_LIMIT = 32 * 1024 * 1024;

export interface HttpServerOptions {
  host: string;
  port: number;
  frontendUrl: string;
  rest: RestHandler;
  mcpServerFactory: () => McpServer;
}

export interface RunningHttpServer {
  port: number;
  stop: () => Promise<void>;
}

export async function runHttpServer(options: HttpServerOptions): Promise<RunningHttpServer> {
  const sessions = new McpSessionRegistry(options.mcpServerFactory);

  const httpServer = createServer(async (req, res) => {
    try {
      const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
      applyCors(res, options.frontendUrl);

      if (req.method === "OPTIONS") {
        res.writeHead(204);
        res.end();
        return;
      }

      if (await options.rest(req, res, url)) {
        return;
      }

      if (url.pathname !== MCP_PATH) {
        res.writeHead(404, { "Content-Type": "text/plain" });
        res.end("Not found");
        return;
      }

      if (req.method === "POST") {
        const body = await readJsonBody(req, MCP_BODY_LIMIT);
        await sessions.handlePost(req, res, body);
        return;
      }

      if (req.method === "GET" || req.method === "DELETE") {
        await sessions.handleStream(req, res);
        return;
      }

      writeJson(res, 405, { error: "Method not allowed" });
    } catch (error) {
      writeError(res, error);
    }
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(options.port, options.host, () => {
      httpServer.off("error", reject);
      resolve();
    });
  });

  const address = httpServer.address();
  const port = address && typeof address === "object" ? address.port : options.port;

  return {
    port,
    stop: async () => {
      await sessions.closeAll();

      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      });
    },
  };
}
