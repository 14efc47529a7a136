import { randomUUID } from "node:crypto";
import { IncomingMessage, ServerResponse } from "node:http";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { componentLogger } from "../infra/logging/logger.js";
import { writeJson } from "./restRoutes.js";

const log = componentLogger("mcp-sessions");

interface McpSession {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

const SESSION_HEADER = "mcp-session-id";

/**
 * Streamable-HTTP sessions keyed by `mcp-session-id`. Each session gets its
 * own `McpServer` from the factory; every session shares the one RagService.
 */
export class McpSessionRegistry {
  private readonly sessions = new Map<string, McpSession>();

  constructor(private readonly serverFactory: () => McpServer) {}

  async handlePost(req: IncomingMessage, res: ServerResponse, body: unknown): Promise<void> {
    const sessionId = sessionIdOf(req);
    if (sessionId) {
      const session = this.sessions.get(sessionId);
      if (!session) {
        writeRpcError(res, 404, -32001, "Session not found");
        return;
      }
      await session.transport.handleRequest(req, res, body);
      return;
    }

    if (!isInitializeRequest(body)) {
      writeRpcError(res, 400, -32000, "Initialize request is required when session is not established");
      return;
    }

    const server = this.serverFactory();
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (id) => this.open(id, { server, transport }),
    });
    transport.onclose = () => {
      if (transport.sessionId) {
        this.discard(transport.sessionId);
      }
    };

    await server.connect(transport);
    await transport.handleRequest(req, res, body);
  }

  /** GET opens the server-to-client stream, DELETE ends the session. */
  async handleStream(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const sessionId = sessionIdOf(req);
    const session = sessionId ? this.sessions.get(sessionId) : undefined;
    if (!session) {
      writeRpcError(res, 400, -32000, `Missing or invalid ${SESSION_HEADER}`);
      return;
    }
    await session.transport.handleRequest(req, res);
  }

  async closeAll(): Promise<void> {
    const open = [...this.sessions.entries()];
    this.sessions.clear();
    await Promise.all(
      open.map(async ([id, session]) => {
        await session.transport.close();
        await session.server.close();
        log.debug({ sessionId: id }, "session closed on shutdown");
      }),
    );
  }

  private open(id: string, session: McpSession) {
    this.sessions.set(id, session);
    log.debug({ sessionId: id, open: this.sessions.size }, "session opened");
  }

  private discard(id: string) {
    const session = this.sessions.get(id);
    if (!session) {
      return;
    }
    this.sessions.delete(id);
    log.debug({ sessionId: id, open: this.sessions.size }, "session closed");
    session.server.close().catch((error: unknown) => {
      log.warn({ sessionId: id, err: error }, "failed to close session server");
    });
  }
}

function sessionIdOf(req: IncomingMessage): string | undefined {
  const header = req.headers[SESSION_HEADER];
  return Array.isArray(header) ? header[0] : header;
}

function writeRpcError(res: ServerResponse, status: number, code: number, message: string) {
  writeJson(res, status, { jsonrpc: "2.0", error: { code, message }, id: null });
}
