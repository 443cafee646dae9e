/**
 * SlackApiTransport: token mode: chat.postMessage / chat.update.
 *
 * Requests are form-encoded with `attachments` as a JSON string. The parsed
 * response body becomes the conversation state for the next edit.
 */

import { z } from "zod";
import type { ChatMessage, ConversationState } from "../schemas/conversation.js";
import { SentMessage } from "../schemas/conversation.js";
import { DeliveryError, type MessageUpdate, type ThreadedTransport } from "../dispatch/transport.js";

export interface SlackApiTransportOptions {
  accessToken: string;
  apiBaseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

const ApiResponse = z
  .object({
    ok: z.boolean(),
    error: z.string().optional(),
    ts: z.string().optional(),
    channel: z.string().optional(),
    message: SentMessage.optional(),
  })
  .passthrough();

export class SlackApiTransport implements ThreadedTransport {
  readonly mode = "token" as const;
  private readonly accessToken: string;
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: SlackApiTransportOptions) {
    this.accessToken = opts.accessToken;
    this.apiBaseUrl = (opts.apiBaseUrl ?? "https://slack.com/api").replace(/\/+$/, "");
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async postMessage(message: ChatMessage): Promise<ConversationState> {
    const params = new URLSearchParams({
      token: this.accessToken,
      username: message.username,
      channel: message.channel.replace(/#/g, ""),
      attachments: JSON.stringify(message.attachments),
    });
    if (message.icon_url) params.set("icon_url", message.icon_url);

    return this.call("chat.postMessage", message.channel, params, {
      username: message.username,
      text: message.text ?? "",
      attachments: message.attachments,
    });
  }

  async updateMessage(update: MessageUpdate): Promise<ConversationState> {
    const params = new URLSearchParams({
      token: this.accessToken,
      username: update.username,
      text: update.text,
      channel: update.channel,
      attachments: JSON.stringify(update.attachments),
      ts: update.ts,
    });

    return this.call("chat.update", update.channel, params, {
      username: update.username,
      text: update.text,
      attachments: update.attachments,
    });
  }

  /**
   * POST one API method. `sent` stands in for the echoed message when the
   * vendor response omits it.
   */
  private async call(
    method: string,
    channel: string,
    params: URLSearchParams,
    sent: SentMessage,
  ): Promise<ConversationState> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(`${this.apiBaseUrl}/${method}`, {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: params.toString(),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new DeliveryError(channel, `${method} failed: HTTP ${response.status}`, response.status);
      }

      const parsed = ApiResponse.safeParse(await response.json());
      if (!parsed.success) {
        throw new DeliveryError(channel, `${method} returned an unexpected body`, response.status);
      }

      const body = parsed.data;
      if (!body.ok || !body.ts || !body.channel) {
        throw new DeliveryError(channel, `${method} rejected: ${body.error ?? "unknown_error"}`, response.status);
      }

      return { ...body, ts: body.ts, channel: body.channel, message: body.message ?? sent };
    } catch (error) {
      if ((error as Error).name === "AbortError") {
        throw new DeliveryError(channel, `${method} timed out after ${this.timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }
}
