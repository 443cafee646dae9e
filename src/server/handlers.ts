import { timingSafeEqual } from "node:crypto";
import type { ZodType, ZodTypeDef } from "zod";
import { collectMetrics } from "../metrics/collector.js";
import type { RelayMetrics } from "../metrics/exporter.js";
import type { FilterRuleEngine } from "../filters/engine.js";
import { TagNotFoundError } from "../filters/errors.js";
import type { FilterStore } from "../store/filter-store.js";
import type { RelayService } from "../service/relay-service.js";
import type { PermissionCheck } from "../host/interfaces.js";
import type { SlashCommandHandler } from "../commands/slash.js";
import { commandChannel } from "../commands/slash.js";
import { PostCreatedEvent } from "../schemas/post.js";
import {
  AddFilterRequest,
  RemoveFilterRequest,
  SlashCommandRequest,
  TestNotificationRequest,
} from "../schemas/admin.js";

export interface GatewayRequest {
  method: string;
  path: string;
  query?: URLSearchParams;
  headers?: Record<string, string | undefined>;
  /** Raw request body. */
  body?: string;
}

export interface GatewayResponse {
  status: number;
  headers?: Record<string, string>;
  body: string;
}

export type GatewayHandler = (req: GatewayRequest) => Promise<GatewayResponse> | GatewayResponse;

function json(status: number, value: unknown): GatewayResponse {
  return {
    status,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(value),
  };
}

/** Body as a plain object: JSON, or form fields for form-encoded requests. */
export function parseBody(req: GatewayRequest): unknown {
  const raw = req.body ?? "";
  const contentType = req.headers?.["content-type"] ?? "";
  if (contentType.includes("application/x-www-form-urlencoded")) {
    return Object.fromEntries(new URLSearchParams(raw));
  }
  if (raw.trim().length === 0) return {};
  return JSON.parse(raw);
}

type BodyResult<T> = { ok: true; value: T } | { ok: false; response: GatewayResponse };

function readBody<T>(req: GatewayRequest, schema: ZodType<T, ZodTypeDef, unknown>): BodyResult<T> {
  let raw: unknown;
  try {
    raw = parseBody(req);
  } catch (err) {
    return { ok: false, response: json(400, { error: `Invalid body: ${(err as Error).message}` }) };
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      response: json(400, {
        error: "Invalid request",
        issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      }),
    };
  }
  return { ok: true, value: parsed.data };
}

export function createHealthHandler(opts: {
  service: RelayService;
  startedAt: number;
  now?: () => number;
}): GatewayHandler {
  const now = opts.now ?? Date.now;
  return () => {
    const status = opts.service.getStatus();
    return json(200, {
      status: "healthy",
      uptime: now() - opts.startedAt,
      ...status,
    });
  };
}

export function createMetricsHandler(opts: {
  filterStore: FilterStore;
  metrics: RelayMetrics;
}): GatewayHandler {
  return async () => {
    try {
      const state = await collectMetrics(opts.filterStore);
      opts.metrics.updateFromState(state);
      const body = await opts.metrics.getMetrics();
      return {
        status: 200,
        headers: { "Content-Type": opts.metrics.registry.contentType },
        body,
      };
    } catch (err) {
      return {
        status: 500,
        body: `Error: ${(err as Error).message}\n`,
      };
    }
  };
}

/** GET lists rules (optionally `?channel=`), PUT adds one, DELETE removes one. */
export function createFiltersHandler(engine: FilterRuleEngine): GatewayHandler {
  return async (req) => {
    switch (req.method) {
      case "GET": {
        const channel = req.query?.get("channel");
        const filters = channel ? await engine.rulesForChannel(channel) : await engine.listFilters();
        return json(200, { filters });
      }

      case "PUT": {
        const body = readBody(req, AddFilterRequest);
        if (!body.ok) return body.response;
        const { channel, categoryId, filter, tags } = body.value;
        try {
          const mutation = await engine.addFilter(channel, categoryId, filter, tags);
          return json(200, { rules: mutation.rules, changes: mutation.changes });
        } catch (err) {
          if (err instanceof TagNotFoundError) {
            return json(422, { error: err.message, missing: err.missing });
          }
          throw err;
        }
      }

      case "DELETE": {
        const body = readBody(req, RemoveFilterRequest);
        if (!body.ok) return body.response;
        const { channel, categoryId, tags } = body.value;
        const mutation = await engine.removeFilter(channel, categoryId, tags);
        if (mutation.changes.removed.length === 0) {
          return json(404, { error: "No matching rule" });
        }
        return json(200, { rules: mutation.rules, changes: mutation.changes });
      }

      default:
        return json(405, { error: `Method ${req.method} not allowed` });
    }
  };
}

function tokensMatch(expected: string, actual: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(actual);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Slash command endpoint. The request token must equal the configured one;
 * a server without a configured token rejects every command.
 */
export function createCommandHandler(opts: {
  commands: SlashCommandHandler;
  incomingToken: string;
}): GatewayHandler {
  return async (req) => {
    const body = readBody(req, SlashCommandRequest);
    if (!body.ok) return body.response;

    const { token, text, channel_name, user_name } = body.value;
    if (!token) {
      return json(400, { error: "Missing token" });
    }
    if (opts.incomingToken.length === 0 || !tokensMatch(opts.incomingToken, token)) {
      return json(403, { error: "Invalid token" });
    }

    const reply = await opts.commands.handle(commandChannel(channel_name, user_name), text);
    return json(200, { text: reply });
  };
}

export function createPostCreatedHandler(opts: {
  service: RelayService;
  guardian: PermissionCheck;
}): GatewayHandler {
  return async (req) => {
    const body = readBody(req, PostCreatedEvent);
    if (!body.ok) return body.response;
    const result = await opts.service.handlePostCreated(body.value, opts.guardian);
    return json(200, result);
  };
}

export function createTestHandler(service: RelayService): GatewayHandler {
  return async (req) => {
    const body = readBody(req, TestNotificationRequest);
    if (!body.ok) return body.response;
    const outcome = await service.sendTest(body.value.event, body.value.channel);
    return json(outcome.status === "sent" ? 200 : 502, outcome);
  };
}
