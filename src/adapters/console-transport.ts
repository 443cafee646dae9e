/**
 * ConsoleTransport: webhook-mode transport for dry runs.
 *
 * Prints messages instead of sending them so routing can be checked
 * without a chat workspace.
 */

import type { ChatMessage } from "../schemas/conversation.js";
import type { WebhookTransport } from "../dispatch/transport.js";

export class ConsoleTransport implements WebhookTransport {
  readonly mode = "webhook" as const;
  private readonly prefix: string;

  constructor(opts?: { prefix?: string }) {
    this.prefix = opts?.prefix ?? "[relay]";
  }

  async send(message: ChatMessage): Promise<void> {
    for (const attachment of message.attachments) {
      const title = attachment.title ? `${attachment.title} — ` : "";
      console.info(`${this.prefix} [${message.channel}] ${title}${attachment.fallback}`);
    }
  }
}
