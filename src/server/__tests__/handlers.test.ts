import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { Server } from "node:http";
import { parseConfig } from "../../config/index.js";
import { createRelayContext, type RelayContext } from "../../service/bootstrap.js";
import { MemoryKeyValueStore } from "../../store/memory-kv.js";
import { RelayMetrics } from "../../metrics/exporter.js";
import { createRoutes, routeRequest, createRelayServer, closeServer, type Route } from "../server.js";
import type { GatewayRequest } from "../handlers.js";
import {
  CATEGORIES,
  TAGS,
  RecordingEventSink,
  RecordingThreadedTransport,
  makeEvent,
} from "../../../tests/utils/test-data.js";

function jsonRequest(method: string, path: string, body?: unknown): GatewayRequest {
  return {
    method,
    path,
    headers: { "content-type": "application/json" },
    body: body === undefined ? "" : JSON.stringify(body),
  };
}

function formRequest(path: string, fields: Record<string, string>): GatewayRequest {
  return {
    method: "POST",
    path,
    headers: { "content-type": "application/x-www-form-urlencoded" },
    body: new URLSearchParams(fields).toString(),
  };
}

describe("relay HTTP routes", () => {
  let ctx: RelayContext;
  let transport: RecordingThreadedTransport;
  let routes: Route[];

  beforeEach(async () => {
    transport = new RecordingThreadedTransport();
    ctx = await createRelayContext(
      parseConfig({ categories: CATEGORIES, tags: TAGS, slack: { incomingToken: "test-incoming" } }),
      {
        kv: new MemoryKeyValueStore(),
        transport,
        events: new RecordingEventSink(),
        metrics: new RelayMetrics({ collectDefaults: false }),
      },
    );
    routes = createRoutes(ctx, { startedAt: Date.now() });
  });

  it("returns 404 for unknown paths and 405 for wrong methods", async () => {
    expect((await routeRequest(routes, jsonRequest("GET", "/nope"))).status).toBe(404);
    const wrong = await routeRequest(routes, jsonRequest("POST", "/health"));
    expect(wrong.status).toBe(405);
    expect(wrong.headers?.["Allow"]).toBe("GET");
  });

  it("serves /health with relay status", async () => {
    const response = await routeRequest(routes, jsonRequest("GET", "/health"));
    const body: unknown = JSON.parse(response.body);

    expect(response.status).toBe(200);
    expect(body).toMatchObject({ status: "healthy", mode: "token", eventsHandled: 0 });
  });

  it("serves /metrics with rule gauges", async () => {
    await ctx.engine.setCategoryFilter("#ops", "*", "watch");
    const response = await routeRequest(routes, jsonRequest("GET", "/metrics"));

    expect(response.status).toBe(200);
    expect(response.headers?.["Content-Type"]).toBe(ctx.metrics.registry.contentType);
    expect(response.body).toContain('relay_filter_rules{scope="*",level="watch"} 1');
  });

  describe("/filters", () => {
    it("adds, lists and removes rules", async () => {
      const added = await routeRequest(routes, jsonRequest("PUT", "/filters", {
        channel: "#ops",
        categoryId: "2",
        filter: "watch",
        tags: ["urgent"],
      }));
      expect(added.status).toBe(200);

      const listed = await routeRequest(routes, { ...jsonRequest("GET", "/filters"), query: new URLSearchParams("channel=#ops") });
      expect(JSON.parse(listed.body)).toEqual({
        filters: [{ channel: "#ops", filter: "watch", tags: ["urgent"], scope: "2" }],
      });

      const removed = await routeRequest(routes, jsonRequest("DELETE", "/filters", { channel: "#ops", categoryId: "2", tags: ["urgent"] }));
      expect(removed.status).toBe(200);
      expect(await ctx.engine.listFilters()).toEqual([]);
    });

    it("returns 422 naming unknown tags", async () => {
      const response = await routeRequest(routes, jsonRequest("PUT", "/filters", { channel: "#ops", filter: "watch", tags: ["ghost"] }));
      expect(response.status).toBe(422);
      expect(JSON.parse(response.body)).toEqual({ error: "Tag not found: ghost", missing: ["ghost"] });
    });

    it("returns 400 for an invalid body", async () => {
      const response = await routeRequest(routes, jsonRequest("PUT", "/filters", { channel: "#ops", filter: "shout" }));
      expect(response.status).toBe(400);
    });

    it("returns 404 when removing a rule that does not exist", async () => {
      const response = await routeRequest(routes, jsonRequest("DELETE", "/filters", { channel: "#ops" }));
      expect(response.status).toBe(404);
    });
  });

  describe("/command", () => {
    it("runs the command for the channel", async () => {
      const response = await routeRequest(routes, formRequest("/command", {
        token: "test-incoming",
        text: "follow general",
        channel_name: "welcome",
        user_name: "jdoe",
      }));

      expect(response.status).toBe(200);
      expect(JSON.parse(response.body)).toEqual({ text: "Followed category *General*" });
      expect(await ctx.engine.getRules("1")).toEqual([{ channel: "#welcome", filter: "follow" }]);
    });

    it("returns 400 without a token", async () => {
      const response = await routeRequest(routes, formRequest("/command", { text: "status", channel_name: "welcome" }));
      expect(response.status).toBe(400);
    });

    it("returns 403 for a wrong token", async () => {
      const response = await routeRequest(routes, formRequest("/command", { token: "wrong", text: "status", channel_name: "welcome" }));
      expect(response.status).toBe(403);
    });

    it("returns 403 when no token is configured", async () => {
      const open = await createRelayContext(parseConfig({}), {
        kv: new MemoryKeyValueStore(),
        transport,
        events: new RecordingEventSink(),
        metrics: new RelayMetrics({ collectDefaults: false }),
      });
      const response = await routeRequest(createRoutes(open), formRequest("/command", {
        token: "anything",
        text: "status",
        channel_name: "welcome",
      }));
      expect(response.status).toBe(403);
    });
  });

  describe("/events/post-created", () => {
    it("relays the post to subscribed channels", async () => {
      await ctx.engine.setCategoryFilter("#welcome", "1", "follow");

      const response = await routeRequest(routes, jsonRequest("POST", "/events/post-created", makeEvent()));
      const body: unknown = JSON.parse(response.body);

      expect(response.status).toBe(200);
      expect(body).toMatchObject({ status: "dispatched", outcomes: [{ channel: "#welcome", status: "sent" }] });
      expect(transport.posted).toHaveLength(1);
    });

    it("returns 400 for a malformed event", async () => {
      const response = await routeRequest(routes, jsonRequest("POST", "/events/post-created", { post: {} }));
      expect(response.status).toBe(400);
    });

    it("returns 400 for a body that is not JSON", async () => {
      const response = await routeRequest(routes, { ...jsonRequest("POST", "/events/post-created"), body: "{" });
      expect(response.status).toBe(400);
    });
  });

  it("sends a test notification with /test", async () => {
    const response = await routeRequest(routes, jsonRequest("POST", "/test", { channel: "#sandbox", event: makeEvent() }));

    expect(response.status).toBe(200);
    expect(JSON.parse(response.body)).toMatchObject({ channel: "#sandbox", status: "sent", action: "create" });
    expect(transport.posted.map((m) => m.channel)).toEqual(["#sandbox"]);
  });
});

describe("createRelayServer", () => {
  let server: Server;

  afterEach(async () => {
    await closeServer(server);
  });

  it("serves routes over HTTP", async () => {
    const routes: Route[] = [
      { methods: ["GET"], path: "/health", handler: () => ({ status: 200, body: "ok" }) },
    ];
    server = createRelayServer(routes, 0, "127.0.0.1");
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server is not listening on a port");
    const { port } = address;

    const ok = await fetch(`http://127.0.0.1:${port}/health`);
    expect(ok.status).toBe(200);
    expect(await ok.text()).toBe("ok");

    const missing = await fetch(`http://127.0.0.1:${port}/missing`);
    expect(missing.status).toBe(404);
  });
});
