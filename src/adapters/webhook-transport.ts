/**
 * IncomingWebhookTransport: webhook mode: POST the whole message as JSON.
 *
 * No message id comes back, so nothing can be edited later.
 */

import type { ChatMessage } from "../schemas/conversation.js";
import { DeliveryError, type WebhookTransport } from "../dispatch/transport.js";

export interface IncomingWebhookTransportOptions {
  webhookUrl: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export class IncomingWebhookTransport implements WebhookTransport {
  readonly mode = "webhook" as const;
  private readonly webhookUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: IncomingWebhookTransportOptions) {
    this.webhookUrl = opts.webhookUrl;
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async send(message: ChatMessage): Promise<void> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(this.webhookUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(message),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new DeliveryError(message.channel, `Webhook failed: HTTP ${response.status}`, response.status);
      }
    } catch (error) {
      if ((error as Error).name === "AbortError") {
        throw new DeliveryError(message.channel, `Webhook timed out after ${this.timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }
}
