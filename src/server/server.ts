import { createServer, type Server, type IncomingMessage, type ServerResponse } from "node:http";
import type { RelayContext } from "../service/bootstrap.js";
import { SlashCommandHandler } from "../commands/slash.js";
import {
  createCommandHandler,
  createFiltersHandler,
  createHealthHandler,
  createMetricsHandler,
  createPostCreatedHandler,
  createTestHandler,
  type GatewayHandler,
  type GatewayRequest,
  type GatewayResponse,
} from "./handlers.js";

const MAX_BODY_BYTES = 1024 * 1024;

export interface Route {
  methods: readonly string[];
  path: string;
  handler: GatewayHandler;
}

export class PayloadTooLargeError extends Error {
  constructor() {
    super(`Request body exceeds ${MAX_BODY_BYTES} bytes`);
    this.name = "PayloadTooLargeError";
  }
}

/** Route table for the relay's HTTP surface. */
export function createRoutes(ctx: RelayContext, opts: { startedAt?: number } = {}): Route[] {
  const commands = new SlashCommandHandler({
    engine: ctx.engine,
    categories: ctx.categories,
    taggingEnabled: ctx.config.taggingEnabled,
  });

  return [
    { methods: ["GET"], path: "/health", handler: createHealthHandler({ service: ctx.service, startedAt: opts.startedAt ?? Date.now() }) },
    { methods: ["GET"], path: "/metrics", handler: createMetricsHandler({ filterStore: ctx.filterStore, metrics: ctx.metrics }) },
    { methods: ["GET", "PUT", "DELETE"], path: "/filters", handler: createFiltersHandler(ctx.engine) },
    { methods: ["POST"], path: "/command", handler: createCommandHandler({ commands, incomingToken: ctx.config.slack.incomingToken }) },
    { methods: ["POST"], path: "/events/post-created", handler: createPostCreatedHandler({ service: ctx.service, guardian: ctx.guardian }) },
    { methods: ["POST"], path: "/test", handler: createTestHandler(ctx.service) },
  ];
}

/** Resolve a request against the route table. */
export async function routeRequest(routes: readonly Route[], req: GatewayRequest): Promise<GatewayResponse> {
  const route = routes.find((r) => r.path === req.path);
  if (!route) {
    return { status: 404, headers: { "Content-Type": "text/plain" }, body: "Not Found" };
  }
  if (!route.methods.includes(req.method)) {
    return { status: 405, headers: { "Content-Type": "text/plain", Allow: route.methods.join(", ") }, body: "Method Not Allowed" };
  }

  try {
    return await route.handler(req);
  } catch (err) {
    console.error(`[RelayServer] ${req.method} ${req.path} failed: ${(err as Error).message}`);
    return {
      status: 500,
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ error: (err as Error).message }),
    };
  }
}

async function readRequestBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) throw new PayloadTooLargeError();
    chunks.push(buf);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

function headerRecord(req: IncomingMessage): Record<string, string | undefined> {
  const headers: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(req.headers)) {
    headers[name] = Array.isArray(value) ? value.join(", ") : value;
  }
  return headers;
}

/**
 * Create and start the relay's HTTP server.
 */
export function createRelayServer(
  routes: readonly Route[],
  port = 18010,
  bind = "127.0.0.1",
): Server {
  const server = createServer(async (req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url ?? "/", `http://${bind}`);
    let response: GatewayResponse;

    try {
      const body = await readRequestBody(req);
      response = await routeRequest(routes, {
        method: req.method ?? "GET",
        path: url.pathname,
        query: url.searchParams,
        headers: headerRecord(req),
        body,
      });
    } catch (err) {
      const status = err instanceof PayloadTooLargeError ? 413 : 400;
      response = { status, headers: { "Content-Type": "text/plain" }, body: (err as Error).message };
    }

    res.writeHead(response.status, response.headers ?? { "Content-Type": "text/plain" });
    res.end(response.body);
  });

  server.listen(port, bind);
  return server;
}

/** Close the server, resolving once open connections are done. */
export function closeServer(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
