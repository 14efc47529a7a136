import { IncomingMessage, ServerResponse } from "node:http";
import { z } from "zod";
import { ValidationError, isRagError, toErrorResponse } from "../domain/errors.js";
import { IngestResult } from "../domain/types.js";
import { componentLogger } from "../infra/logging/logger.js";
import { RagService } from "../services/ragService.js";
import { readJsonBody, readRawBody } from "./body.js";

const log = componentLogger("http");

const JSON_BODY_LIMIT = 64 * 1024;

const chatBodySchema = z.object({
  query: z.string().trim().min(1, "query must not be empty"),
  top_k: z.number().int().min(1).max(20).optional(),
});

export interface RestRouteOptions {
  frontendUrl: string;
  maxUploadBytes: number;
}

type RestService = Pick<RagService, "ingest" | "chat" | "listSources" | "status">;

export type RestHandler = (req: IncomingMessage, res: ServerResponse, url: URL) => Promise<boolean>;

export function applyCors(res: ServerResponse, frontendUrl: string) {
  res.setHeader("Access-Control-Allow-Origin", frontendUrl);
  res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type, x-filename, mcp-session-id");
  res.setHeader("Access-Control-Expose-Headers", "mcp-session-id");
  if (frontendUrl !== "*") {
    res.setHeader("Vary", "Origin");
  }
}

export function writeJson(res: ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

export function writeError(res: ServerResponse, error: unknown) {
  const { status, body } = toErrorResponse(error);
  if (status >= 500 || !isRagError(error)) {
    log.error({ err: error, status }, "request failed");
  } else {
    log.info({ code: body.error.code, status }, "request rejected");
  }
  if (!res.headersSent) {
    writeJson(res, status, body);
  }
}

/**
 * Builds the REST handler. It resolves to `false` when the path is not one
 * of its routes so the caller can fall through to other handlers.
 */
export function createRestHandler(service: RestService, options: RestRouteOptions): RestHandler {
  return async (req, res, url) => {
    switch (url.pathname) {
      case "/healthz":
        if (req.method !== "GET") {
          return methodNotAllowed(res);
        }
        writeJson(res, 200, await service.status());
        return true;

      case "/upload": {
        if (req.method !== "POST") {
          return methodNotAllowed(res);
        }
        const filename = resolveFilename(req, url);
        const bytes = await readRawBody(req, options.maxUploadBytes);
        const result = await service.ingest({ filename, bytes });
        writeJson(res, 200, { message: describeOutcome(result), ...result });
        return true;
      }

      case "/chat": {
        if (req.method !== "POST") {
          return methodNotAllowed(res);
        }
        const parsed = chatBodySchema.safeParse(await readJsonBody(req, JSON_BODY_LIMIT));
        if (!parsed.success) {
          throw new ValidationError(parsed.error.issues.map((issue) => issue.message).join("; "));
        }
        const result = await service.chat({ query: parsed.data.query, topK: parsed.data.top_k });
        writeJson(res, 200, {
          response: result.answer,
          citations: result.citations,
          latency_ms: result.latency_ms,
        });
        return true;
      }

      case "/sources":
        if (req.method !== "GET") {
          return methodNotAllowed(res);
        }
        writeJson(res, 200, { sources: await service.listSources() });
        return true;

      default:
        return false;
    }
  };
}

function resolveFilename(req: IncomingMessage, url: URL): string {
  const header = req.headers["x-filename"];
  const fromHeader = Array.isArray(header) ? header[0] : header;
  const filename = url.searchParams.get("filename") ?? fromHeader;
  if (!filename?.trim()) {
    throw new ValidationError("Pass the file name as ?filename= or an x-filename header.");
  }
  return filename;
}

function describeOutcome(result: IngestResult): string {
  switch (result.outcome) {
    case "processed":
      return `Processed ${result.filename} into ${result.chunkCount} chunks.`;
    case "already-processed":
      return "Document already processed.";
    case "no-content":
      return "No extractable text found.";
  }
}

function methodNotAllowed(res: ServerResponse): true {
  writeJson(res, 405, { error: "Method not allowed" });
  return true;
}
