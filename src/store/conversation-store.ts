/**
 * Conversation store: last delivery per (topic, channel).
 */

import type { IKeyValueStore } from "./interfaces.js";
import { ConversationState } from "../schemas/conversation.js";

export function conversationKey(topicId: number, channel: string): string {
  return `topic_${topicId}_${channel}`;
}

export class ConversationStore {
  constructor(private readonly kv: IKeyValueStore) {}

  /** Returns undefined when there is no record or the record is unusable. */
  async get(topicId: number, channel: string): Promise<ConversationState | undefined> {
    const key = conversationKey(topicId, channel);
    const raw = await this.kv.get(key);
    if (raw === undefined || raw === null) return undefined;

    const parsed = ConversationState.safeParse(raw);
    if (!parsed.success) {
      console.warn(`[ConversationStore] Ignoring malformed record ${key}`);
      return undefined;
    }
    return parsed.data;
  }

  async set(topicId: number, channel: string, state: ConversationState): Promise<void> {
    await this.kv.set(conversationKey(topicId, channel), state);
  }
}
