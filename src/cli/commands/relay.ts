/**
 * Relay commands: replay a post-created event, run the HTTP server.
 */

import { readFile } from "node:fs/promises";
import type { Command } from "commander";
import { PostCreatedEvent } from "../../schemas/post.js";
import type { RelayResult } from "../../service/relay-service.js";
import { createRelayServer, createRoutes, closeServer } from "../../server/server.js";
import { openContext } from "../context.js";

async function readEvent(path: string): Promise<PostCreatedEvent> {
  const raw: unknown = JSON.parse(await readFile(path, "utf-8"));
  const parsed = PostCreatedEvent.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid event in ${path}:\n  ${issues.join("\n  ")}`);
  }
  return parsed.data;
}

export function describeResult(result: RelayResult): string[] {
  switch (result.status) {
    case "skipped":
      return [`Skipped (${result.reason})`];
    case "no_match":
      return ["No subscribed channels"];
    case "dispatched":
      return result.outcomes.map((o) =>
        o.status === "sent"
          ? `  ✓ ${o.channel} (${o.filter}, ${o.action}${o.ts ? ` ts=${o.ts}` : ""})`
          : `  ✗ ${o.channel} (${o.filter}): ${o.error ?? "unknown error"}`,
      );
  }
}

export function registerRelayCommands(program: Command): void {
  program
    .command("notify <eventFile>")
    .description("Route a post-created event (JSON file) to subscribed channels")
    .option("--channel <channel>", "Send to this channel only, ignoring subscriptions")
    .action(async (eventFile: string, opts: { channel?: string }) => {
      const event = await readEvent(eventFile);
      const ctx = await openContext(program);

      if (opts.channel) {
        const outcome = await ctx.service.sendTest(event, opts.channel);
        console.log(describeResult({ status: "dispatched", targets: [], outcomes: [outcome] }).join("\n"));
        if (outcome.status === "failed") process.exitCode = 1;
        return;
      }

      const result = await ctx.service.handlePostCreated(event, ctx.guardian);
      console.log(describeResult(result).join("\n"));
      if (result.status === "dispatched" && result.outcomes.some((o) => o.status === "failed")) {
        process.exitCode = 1;
      }
    });

  program
    .command("serve")
    .description("Run the HTTP server (events, slash commands, admin, metrics)")
    .option("--port <port>", "Port (overrides config)")
    .option("--bind <addr>", "Bind address (overrides config)")
    .action(async (opts: { port?: string; bind?: string }) => {
      const ctx = await openContext(program);
      const port = opts.port ? Number.parseInt(opts.port, 10) : ctx.config.server.port;
      const bind = opts.bind ?? ctx.config.server.bind;
      if (Number.isNaN(port) || port <= 0) {
        console.error(`Invalid --port: ${opts.port}`);
        process.exitCode = 1;
        return;
      }

      const server = createRelayServer(createRoutes(ctx), port, bind);
      await ctx.events.log("system.startup", "system", { payload: { port, bind, mode: ctx.dispatcher.mode } });

      console.log(`[Relay] Listening on http://${bind}:${port} (${ctx.dispatcher.mode} mode)`);

      const shutdown = async () => {
        await closeServer(server);
        await ctx.events.log("system.shutdown", "system");
        ctx.kv.close?.();
        process.exit(0);
      };

      process.on("SIGINT", () => void shutdown());
      process.on("SIGTERM", () => void shutdown());
    });
}
