/**
 * Dispatcher — per-channel delivery with conversation coalescing.
 *
 * For each target channel:
 *   lock(topic, channel) → read state → plan → compose → send/edit → write state
 *
 * Design constraints:
 * - Targets are independent: one channel failing never stops the others
 * - State for a (topic, channel) is read and written under one lock, so two
 *   events for the same topic cannot both decide to start a new thread
 * - Webhook mode keeps no state; every post is a new message
 */

import type { ChatMessage, ConversationState } from "../schemas/conversation.js";
import { tsSeconds } from "../schemas/conversation.js";
import type { ConversationStore } from "../store/conversation-store.js";
import { conversationKey } from "../store/conversation-store.js";
import type { KeyedLockManager } from "../store/interfaces.js";
import { InMemoryKeyedLockManager } from "../store/key-lock.js";
import type { RelayEventSink } from "../events/logger.js";
import type { DeliveryPayload } from "../schemas/event.js";
import type { DeliveryTarget } from "../matcher/matcher.js";
import type { ChatTransport, DeliveryMode, ThreadedTransport } from "./transport.js";

export const DEFAULT_FRESHNESS_WINDOW_MS = 300_000; // 5 minutes
export const DEFAULT_ATTACHMENT_CAP = 5;

export type DeliveryAction = "create" | "update";

export interface DispatcherOptions {
  /** Age after which a sent message is no longer edited. */
  freshnessWindowMs?: number;
  /** Attachments per message before a new thread is started. */
  attachmentCap?: number;
  locks?: KeyedLockManager;
  events?: RelayEventSink;
  /** Clock, in epoch ms. */
  now?: () => number;
}

export interface DeliveryOutcome {
  channel: string;
  filter: DeliveryTarget["filter"];
  mode: DeliveryMode;
  action: DeliveryAction;
  status: "sent" | "failed";
  /** Vendor message id after delivery (token mode). */
  ts?: string;
  error?: string;
}

/** Builds the message for one channel; title/link only when newThread. */
export type ComposeFn = (channel: string, opts: { newThread: boolean }) => Promise<ChatMessage>;

/**
 * Decide whether a delivery edits the prior message or starts a new one.
 * Unparseable timestamps count as stale.
 */
export function planDelivery(
  state: ConversationState | undefined,
  nowMs: number,
  opts: { freshnessWindowMs: number; attachmentCap: number },
): DeliveryAction {
  if (!state) return "create";

  const sentAtSeconds = tsSeconds(state.ts);
  if (sentAtSeconds === undefined) return "create";

  const ageMs = nowMs - sentAtSeconds * 1000;
  if (ageMs >= opts.freshnessWindowMs) return "create";
  if (state.message.attachments.length >= opts.attachmentCap) return "create";

  return "update";
}

export class Dispatcher {
  private readonly transport: ChatTransport;
  private readonly conversations: ConversationStore;
  private readonly locks: KeyedLockManager;
  private readonly events?: RelayEventSink;
  private readonly freshnessWindowMs: number;
  private readonly attachmentCap: number;
  private readonly now: () => number;

  constructor(transport: ChatTransport, conversations: ConversationStore, opts: DispatcherOptions = {}) {
    this.transport = transport;
    this.conversations = conversations;
    this.locks = opts.locks ?? new InMemoryKeyedLockManager();
    this.events = opts.events;
    this.freshnessWindowMs = opts.freshnessWindowMs ?? DEFAULT_FRESHNESS_WINDOW_MS;
    this.attachmentCap = opts.attachmentCap ?? DEFAULT_ATTACHMENT_CAP;
    this.now = opts.now ?? Date.now;
  }

  get mode(): DeliveryMode {
    return this.transport.mode;
  }

  /**
   * Deliver to every target in order. Never throws for a delivery failure;
   * each target gets exactly one outcome.
   */
  async dispatch(topicId: number, targets: readonly DeliveryTarget[], compose: ComposeFn): Promise<DeliveryOutcome[]> {
    const outcomes: DeliveryOutcome[] = [];

    for (const target of targets) {
      outcomes.push(await this.deliverOne(topicId, target, compose));
    }

    return outcomes;
  }

  private async deliverOne(topicId: number, target: DeliveryTarget, compose: ComposeFn): Promise<DeliveryOutcome> {
    const mode = this.transport.mode;
    let action: DeliveryAction = "create";
    let outcome: DeliveryOutcome;

    try {
      let ts: string | undefined;

      if (this.transport.mode === "webhook") {
        await this.transport.send(await compose(target.channel, { newThread: true }));
      } else {
        const transport = this.transport;
        const result = await this.locks.withLock(conversationKey(topicId, target.channel), () =>
          this.deliverThreaded(transport, topicId, target.channel, compose),
        );
        action = result.action;
        ts = result.ts;
      }

      outcome = { channel: target.channel, filter: target.filter, mode, action, status: "sent", ts };
    } catch (err) {
      const message = (err as Error).message;
      console.error(`[Dispatcher] Delivery to ${target.channel} failed (topic ${topicId}): ${message}`);
      outcome = { channel: target.channel, filter: target.filter, mode, action, status: "failed", error: message };
    }

    await this.record(topicId, outcome);
    return outcome;
  }

  /** Event log failures are non-fatal: the outcome stands either way. */
  private async record(topicId: number, outcome: DeliveryOutcome): Promise<void> {
    const payload: DeliveryPayload = {
      channel: outcome.channel,
      mode: outcome.mode,
      action: outcome.action,
      ...(outcome.status === "sent" ? { ts: outcome.ts } : { error: outcome.error }),
    };
    const type = outcome.status === "failed"
      ? "delivery.failed"
      : outcome.action === "update" ? "delivery.updated" : "delivery.sent";

    try {
      await this.events?.log(type, "dispatcher", { topicId, payload });
    } catch (err) {
      console.warn(`[Dispatcher] Failed to record ${type} for ${outcome.channel}: ${(err as Error).message}`);
    }
  }

  /** Runs inside the (topic, channel) lock. */
  private async deliverThreaded(
    transport: ThreadedTransport,
    topicId: number,
    channel: string,
    compose: ComposeFn,
  ): Promise<{ action: DeliveryAction; ts: string }> {
    const prior = await this.conversations.get(topicId, channel);
    const action = planDelivery(prior, this.now(), {
      freshnessWindowMs: this.freshnessWindowMs,
      attachmentCap: this.attachmentCap,
    });

    let next: ConversationState;
    if (action === "update" && prior) {
      const message = await compose(channel, { newThread: false });
      next = await transport.updateMessage({
        ts: prior.ts,
        channel: prior.channel,
        username: prior.message.username,
        text: prior.message.text,
        attachments: [...prior.message.attachments, ...message.attachments],
      });
    } else {
      next = await transport.postMessage(await compose(channel, { newThread: true }));
    }

    await this.conversations.set(topicId, channel, next);
    return { action, ts: next.ts };
  }
}
