/**
 * Chat transports: how a composed message leaves the process.
 *
 * Token mode talks to the vendor API and gets a message id back, so later
 * posts can edit the same message. Webhook mode fires and forgets.
 */

import type { ChatMessage, ConversationState } from "../schemas/conversation.js";

export type DeliveryMode = "token" | "webhook";

/** Edit of a previously sent message. */
export interface MessageUpdate {
  ts: string;
  channel: string;
  username: string;
  text: string;
  attachments: unknown[];
}

export interface ThreadedTransport {
  readonly mode: "token";
  /** Send a new message. Resolves to the vendor's record of it. */
  postMessage(message: ChatMessage): Promise<ConversationState>;
  /** Replace the content of a sent message. */
  updateMessage(update: MessageUpdate): Promise<ConversationState>;
}

export interface WebhookTransport {
  readonly mode: "webhook";
  send(message: ChatMessage): Promise<void>;
}

export type ChatTransport = ThreadedTransport | WebhookTransport;

/** Delivery to one channel failed. */
export class DeliveryError extends Error {
  readonly channel: string;
  readonly status?: number;

  constructor(channel: string, message: string, status?: number) {
    super(message);
    this.name = "DeliveryError";
    this.channel = channel;
    this.status = status;
  }
}
