import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { RunningHttpServer, runHttpServer } from "../src/http/httpServer.js";
import { createRestHandler } from "../src/http/restRoutes.js";
import { createAppServer } from "../src/mcpServer.js";
import { fingerprintText } from "../src/pipelines/fingerprint.js";
import { HANDBOOK, createTestService } from "./helpers/testService.js";

let server: RunningHttpServer;
let baseUrl = "";

describe("HTTP API", () => {
  beforeAll(async () => {
    const { service } = createTestService();
    server = await runHttpServer({
      host: "127.0.0.1",
      port: 0,
      frontendUrl: "http://frontend.test",
      rest: createRestHandler(service, {
        frontendUrl: "http://frontend.test",
        maxUploadBytes: 1024,
      }),
      mcpServerFactory: () => createAppServer(service),
    });
    baseUrl = `http://127.0.0.1:${server.port}`;
  });

  afterAll(async () => {
    await server.stop();
  });

  it("reports health", async () => {
    const response = await fetch(`${baseUrl}/healthz`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ ok: true, record_count: 0 });
    expect(response.headers.get("access-control-allow-origin")).toBe("http://frontend.test");
  });

  it("answers CORS preflight requests", async () => {
    const response = await fetch(`${baseUrl}/upload`, { method: "OPTIONS" });

    expect(response.status).toBe(204);
    expect(response.headers.get("access-control-allow-headers")).toBe(
      "Content-Type, x-filename, mcp-session-id",
    );
  });

  it("ingests an upload once and recognises the repeat", async () => {
    const first = await fetch(`${baseUrl}/upload?filename=handbook.md`, {
      method: "POST",
      body: HANDBOOK,
    });
    expect(first.status).toBe(200);
    expect(await first.json()).toEqual({
      message: "Processed handbook.md into 1 chunks.",
      filename: "handbook.md",
      byteLength: Buffer.byteLength(HANDBOOK),
      fingerprint: fingerprintText(HANDBOOK),
      chunkCount: 1,
      outcome: "processed",
    });

    const repeat = await fetch(`${baseUrl}/upload`, {
      method: "POST",
      headers: { "x-filename": "handbook-copy.md" },
      body: HANDBOOK,
    });
    expect(await repeat.json()).toMatchObject({
      message: "Document already processed.",
      outcome: "already-processed",
      chunkCount: 0,
    });

    const sources = await fetch(`${baseUrl}/sources`);
    expect(await sources.json()).toMatchObject({ sources: [{ source: "handbook.md", chunkCount: 1 }] });
  });

  it("requires a filename for uploads", async () => {
    const response = await fetch(`${baseUrl}/upload`, { method: "POST", body: "text" });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: {
        code: "VALIDATION_ERROR",
        message: "Pass the file name as ?filename= or an x-filename header.",
        retryable: false,
      },
    });
  });

  it("rejects uploads over the size limit", async () => {
    const response = await fetch(`${baseUrl}/upload?filename=big.txt`, {
      method: "POST",
      body: "a".repeat(2000),
    });

    expect(response.status).toBe(413);
    expect(await response.json()).toEqual({
      error: {
        code: "PAYLOAD_TOO_LARGE",
        message: "The upload is larger than the 1024-byte limit.",
        retryable: false,
      },
    });
  });

  it("reports unsupported files as unprocessable", async () => {
    const response = await fetch(`${baseUrl}/upload?filename=sheet.xlsx`, {
      method: "POST",
      body: "PK",
    });

    expect(response.status).toBe(422);
    expect(await response.json()).toMatchObject({ error: { code: "EXTRACTION_ERROR" } });
  });

  it("answers chat questions", async () => {
    const response = await fetch(`${baseUrl}/chat`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ query: "When are expense reports due?" }),
    });

    expect(response.status).toBe(200);
    const body: unknown = await response.json();
    expect(body).toMatchObject({
      response: "Stub answer.",
      citations: [{ source: "handbook.md", chunk_index: 0 }],
    });
  });

  it("validates chat bodies", async () => {
    const empty = await fetch(`${baseUrl}/chat`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ query: "   " }),
    });
    expect(empty.status).toBe(400);
    expect(await empty.json()).toMatchObject({
      error: { code: "VALIDATION_ERROR", message: "query must not be empty" },
    });

    const malformed = await fetch(`${baseUrl}/chat`, { method: "POST", body: "{not json" });
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toMatchObject({ error: { message: "Invalid JSON body." } });
  });

  it("rejects wrong methods and unknown paths", async () => {
    expect((await fetch(`${baseUrl}/chat`)).status).toBe(405);
    expect((await fetch(`${baseUrl}/nowhere`)).status).toBe(404);
  });

  it("requires an initialize request before an MCP session exists", async () => {
    const response = await fetch(`${baseUrl}/mcp`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ jsonrpc: "2.0", id: 1, method: "tools/list" }),
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      jsonrpc: "2.0",
      error: { code: -32000, message: "Initialize request is required when session is not established" },
      id: null,
    });
  });

  it("rejects MCP requests for unknown sessions", async () => {
    const post = await fetch(`${baseUrl}/mcp`, {
      method: "POST",
      headers: { "Content-Type": "application/json", "mcp-session-id": "no-such-session" },
      body: JSON.stringify({ jsonrpc: "2.0", id: 2, method: "tools/list" }),
    });
    expect(post.status).toBe(404);
    expect(await post.json()).toEqual({
      jsonrpc: "2.0",
      error: { code: -32001, message: "Session not found" },
      id: null,
    });

    const stream = await fetch(`${baseUrl}/mcp`);
    expect(stream.status).toBe(400);
    expect(await stream.json()).toEqual({
      jsonrpc: "2.0",
      error: { code: -32000, message: "Missing or invalid mcp-session-id" },
      id: null,
    });
  });

  it("serves MCP tools over a streamable HTTP session", async () => {
    const client = new Client({ name: "http-session-test", version: "1.0.0" });
    const transport = new StreamableHTTPClientTransport(new URL(`${baseUrl}/mcp`));
    await client.connect(transport);

    try {
      expect(transport.sessionId).toBeTruthy();
      const { tools } = await client.listTools();
      expect(tools.map((tool) => tool.name)).toContain("ingest_document");
    } finally {
      await transport.terminateSession();
      await client.close();
    }
  });
});
