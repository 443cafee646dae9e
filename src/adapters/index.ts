import type { SlackConfig } from "../schemas/config.js";
import type { ChatTransport } from "../dispatch/transport.js";
import { SlackApiTransport } from "./slack-api-transport.js";
import { IncomingWebhookTransport } from "./webhook-transport.js";
import { ConsoleTransport } from "./console-transport.js";

export { SlackApiTransport, IncomingWebhookTransport, ConsoleTransport };
export type { SlackApiTransportOptions } from "./slack-api-transport.js";
export type { IncomingWebhookTransportOptions } from "./webhook-transport.js";

/**
 * Pick the transport for the configured mode: token mode when an access
 * token is set, webhook mode when a webhook URL is set, console otherwise.
 */
export function createTransport(config: SlackConfig, opts: { dryRun?: boolean; fetchImpl?: typeof fetch } = {}): ChatTransport {
  if (opts.dryRun) return new ConsoleTransport();

  if (config.accessToken) {
    return new SlackApiTransport({
      accessToken: config.accessToken,
      apiBaseUrl: config.apiBaseUrl,
      timeoutMs: config.timeoutMs,
      fetchImpl: opts.fetchImpl,
    });
  }

  if (config.webhookUrl) {
    return new IncomingWebhookTransport({
      webhookUrl: config.webhookUrl,
      timeoutMs: config.timeoutMs,
      fetchImpl: opts.fetchImpl,
    });
  }

  console.warn("[relay] No access token or webhook URL configured; messages will be printed only");
  return new ConsoleTransport();
}
