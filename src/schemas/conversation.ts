/**
 * Chat message and conversation state schemas.
 *
 * A conversation is the chat-side thread for one (topic, channel) pair: the
 * message id the vendor returned plus the payload last sent, so a follow-up
 * post can be appended to it with an edit.
 */

import { z } from "zod";

/** One post rendered as a chat attachment. */
export const ChatAttachment = z.object({
  fallback: z.string(),
  author_name: z.string(),
  author_icon: z.string().optional(),
  color: z.string(),
  text: z.string(),
  mrkdwn_in: z.array(z.string()).default(["text"]),
  /** Set only when the attachment opens a new thread. */
  title: z.string().optional(),
  title_link: z.string().optional(),
  thumb_url: z.string().optional(),
});
export type ChatAttachment = z.infer<typeof ChatAttachment>;

/** Outbound chat message. */
export const ChatMessage = z.object({
  channel: z.string(),
  username: z.string(),
  icon_url: z.string().optional(),
  text: z.string().optional(),
  attachments: z.array(ChatAttachment),
});
export type ChatMessage = z.infer<typeof ChatMessage>;

/**
 * Message as echoed back by the vendor. Only the fields the next edit needs
 * are required; everything else passes through.
 */
export const SentMessage = z
  .object({
    username: z.string().default(""),
    text: z.string().default(""),
    attachments: z.array(z.unknown()).default([]),
  })
  .passthrough();
export type SentMessage = z.infer<typeof SentMessage>;

/** Persisted under topic_<topicId>_<channel>. */
export const ConversationState = z
  .object({
    /** Vendor message timestamp/id, "<seconds>.<micros>". */
    ts: z.string().min(1),
    /** Channel id as returned by the vendor. */
    channel: z.string().min(1),
    message: SentMessage,
  })
  .passthrough();
export type ConversationState = z.infer<typeof ConversationState>;

/** Seconds part of a vendor timestamp, or undefined when unparseable. */
export function tsSeconds(ts: string): number | undefined {
  const seconds = Number.parseInt(ts.split(".")[0] ?? "", 10);
  return Number.isNaN(seconds) ? undefined : seconds;
}
