/**
 * JSON-over-HTTP transport for the bridge.
 *
 *   GET  /health    connection check + model status
 *   GET  /status    detailed model and server status
 *   POST /infer     run one inference cycle
 *   POST /shutdown  ask the process to stop
 */

import { createServer } from "node:http";
import type { IncomingMessage, Server, ServerResponse } from "node:http";
import { createLogger, describeError } from "@/lib/logger";
import type { Logger } from "@/lib/logger";
import { BridgeError } from "@/services/bridge-facade";
import type { BridgeFacade } from "@/services/bridge-facade";

export interface BridgeServerOptions {
  facade: BridgeFacade;
  maxBodyBytes: number;
  /** Runs once the /shutdown response has been flushed. */
  onShutdown?: () => void | Promise<void>;
  logger?: Logger;
}

type Method = "GET" | "POST";
type RouteHandler = (req: IncomingMessage) => Promise<unknown> | unknown;

function sendJson(res: ServerResponse, status: number, payload: unknown): void {
  const body = JSON.stringify(payload);
  res.writeHead(status, {
    "Content-Type": "application/json",
    "Content-Length": Buffer.byteLength(body),
  });
  res.end(body);
}

function readBody(req: IncomingMessage, limit: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;
    let settled = false;

    req.on("data", (chunk: Buffer) => {
      if (settled) return;
      received += chunk.length;
      if (received > limit) {
        settled = true;
        reject(new BridgeError("PayloadTooLarge", 413, `Request body exceeds ${limit} bytes`));
        // Keep draining so the 413 can still be written.
        req.resume();
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      if (settled) return;
      settled = true;
      resolve(Buffer.concat(chunks));
    });
    req.on("error", (err) => {
      if (settled) return;
      settled = true;
      reject(err);
    });
  });
}

async function readJson(req: IncomingMessage, limit: number): Promise<unknown> {
  const raw = await readBody(req, limit);
  try {
    return JSON.parse(raw.toString("utf8"));
  } catch {
    throw new BridgeError("InvalidJson", 400, "Request body is not valid JSON");
  }
}

export function createBridgeServer(options: BridgeServerOptions): Server {
  const { facade, maxBodyBytes, onShutdown } = options;
  const logger = options.logger ?? createLogger("http");

  const routes: Record<string, Partial<Record<Method, RouteHandler>>> = {
    "/health": { GET: () => facade.health() },
    "/status": { GET: () => facade.status() },
    "/infer": { POST: async (req) => facade.infer(await readJson(req, maxBodyBytes)) },
    "/shutdown": { POST: () => ({ status: "shutting_down" }) },
  };

  const handle = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const path = new URL(req.url ?? "/", "http://localhost").pathname;
    const route = routes[path];
    if (!route) {
      throw new BridgeError("NotFound", 404, `No route for ${path}`);
    }
    const method = req.method === "GET" || req.method === "POST" ? req.method : null;
    const handler = method ? route[method] : undefined;
    if (!handler) {
      throw new BridgeError("MethodNotAllowed", 405, `${req.method ?? "?"} not allowed on ${path}`);
    }

    const payload = await handler(req);

    if (path === "/shutdown") {
      logger.info("Shutdown request received, terminating server");
      // Drop keep-alive so server.close() is not held open by this socket.
      res.setHeader("Connection", "close");
      res.on("finish", () => {
        Promise.resolve(onShutdown?.()).catch((err: unknown) => {
          logger.error("Shutdown hook failed:", err);
        });
      });
    }
    sendJson(res, 200, payload);
  };

  return createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      if (res.headersSent) {
        logger.error(`${req.method} ${req.url} failed after responding:`, err);
        res.end();
        return;
      }
      if (err instanceof BridgeError) {
        logger.warn(`${req.method} ${req.url} → ${err.status} ${err.code}: ${err.message}`);
        sendJson(res, err.status, { error: err.message });
        return;
      }
      logger.error(`${req.method} ${req.url} failed:`, err);
      sendJson(res, 500, { error: describeError(err) });
    });
  });
}
