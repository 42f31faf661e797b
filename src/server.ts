import http from "node:http";
import type { AddressInfo } from "node:net";
import { MAX_URL_LENGTH } from "./patch/download.js";
import type { PatchRequest } from "./patch/types.js";

export const MAX_REQUEST_BYTES = 10 * 1024 * 1024;
export const DEFAULT_HOST = "127.0.0.1";

const CORS_HEADERS = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "POST, OPTIONS, GET",
  "Access-Control-Allow-Headers": "Content-Type"
};

export interface PatchServerOptions {
  /** Runs after the request has been acknowledged; the client does not wait for it. */
  onPatchRequest: (request: PatchRequest) => Promise<void>;
  onError?: (err: unknown, request: PatchRequest) => void;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json", ...CORS_HEADERS });
  res.end(JSON.stringify(body));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Resolves to undefined when the body grows past `limit`; the rest is still drained so a reply can follow. */
function readBody(req: http.IncomingMessage, limit: number): Promise<Buffer | undefined> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size <= limit) {
        chunks.push(chunk);
      }
    });
    req.on("end", () => resolve(size > limit ? undefined : Buffer.concat(chunks)));
    req.on("error", reject);
  });
}

type ParsedRequest = { request: PatchRequest } | { error: string };

export function parsePatchRequest(body: unknown): ParsedRequest {
  if (!isRecord(body) || body.patch_url === undefined) {
    return { error: "Missing patch_url" };
  }
  const url = body.patch_url;
  if (typeof url !== "string" || !(url.startsWith("http://") || url.startsWith("https://"))) {
    return { error: "Invalid URL format" };
  }
  if (url.length > MAX_URL_LENGTH) {
    return { error: "URL too long" };
  }
  const title = typeof body.level_title === "string" ? body.level_title : undefined;
  return { request: { url, title } };
}

async function handlePatch(req: http.IncomingMessage, res: http.ServerResponse, options: PatchServerOptions): Promise<void> {
  if (Number(req.headers["content-length"] ?? "0") > MAX_REQUEST_BYTES) {
    req.resume();
    sendJson(res, 413, { error: "Request too large" });
    return;
  }
  const raw = await readBody(req, MAX_REQUEST_BYTES);
  if (!raw) {
    sendJson(res, 413, { error: "Request too large" });
    return;
  }

  let body: unknown;
  try {
    body = JSON.parse(raw.toString("utf8"));
  } catch {
    sendJson(res, 400, { error: "Invalid JSON" });
    return;
  }
  const parsed = parsePatchRequest(body);
  if ("error" in parsed) {
    sendJson(res, 400, { error: parsed.error });
    return;
  }

  sendJson(res, 200, { success: true, message: "Patch request received" });
  const onError = options.onError ?? ((err: unknown) => console.error(err instanceof Error ? err.message : err));
  options.onPatchRequest(parsed.request).catch((err: unknown) => onError(err, parsed.request));
}

async function handle(req: http.IncomingMessage, res: http.ServerResponse, options: PatchServerOptions): Promise<void> {
  const pathname = new URL(req.url ?? "/", "http://localhost").pathname;
  if (req.method === "OPTIONS") {
    res.writeHead(200, { ...CORS_HEADERS, "Access-Control-Max-Age": "3600" });
    res.end();
    return;
  }
  if (req.method === "GET" && (pathname === "/" || pathname === "/health")) {
    sendJson(res, 200, { status: "ok", message: "BPS patcher server is running" });
    return;
  }
  if (req.method === "POST" && pathname === "/patch") {
    await handlePatch(req, res, options);
    return;
  }
  res.writeHead(404);
  res.end();
}

/** HTTP listener that lets a web page hand patch URLs to the local patcher. */
export function createPatchServer(options: PatchServerOptions): http.Server {
  return http.createServer((req, res) => {
    handle(req, res, options).catch((err: unknown) => {
      if (res.headersSent) {
        res.destroy(err instanceof Error ? err : undefined);
        return;
      }
      sendJson(res, 500, { error: "Internal server error" });
    });
  });
}

export async function listen(server: http.Server, port: number, host = DEFAULT_HOST): Promise<AddressInfo> {
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Server is not listening on a TCP port");
  }
  return address;
}
