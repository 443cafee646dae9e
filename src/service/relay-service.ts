/**
 * RelayService — handles one post-created event end to end.
 *
 * Processing pipeline:
 *   PostCreatedEvent → gates (post type, archetype, permission) → Matcher
 *     → Dispatcher (composing per channel) → outcomes
 *
 * Runs out-of-band from the forum request: it never throws for a skipped
 * event or a failed delivery, it reports them.
 */

import type { PostCreatedEvent } from "../schemas/post.js";
import { toMatchInput, isFirstPost } from "../schemas/post.js";
import type { PermissionCheck } from "../host/interfaces.js";
import type { RelayEventSink } from "../events/logger.js";
import type { Matcher, DeliveryTarget } from "../matcher/matcher.js";
import type { MessageComposer } from "../composer/composer.js";
import type { Dispatcher, DeliveryOutcome } from "../dispatch/dispatcher.js";
import type { EventOutcome, RelayMetrics } from "../metrics/exporter.js";

export interface RelayServiceDependencies {
  matcher: Matcher;
  composer: MessageComposer;
  dispatcher: Dispatcher;
  events?: RelayEventSink;
  metrics?: RelayMetrics;
}

export type SkipReason = "not_regular_post" | "private_message" | "permission_denied";

export type RelayResult =
  | { status: "skipped"; reason: SkipReason }
  | { status: "no_match" }
  | { status: "dispatched"; targets: DeliveryTarget[]; outcomes: DeliveryOutcome[] };

export interface RelayServiceStatus {
  mode: Dispatcher["mode"];
  eventsHandled: number;
  lastEventAt?: string;
  lastError?: string;
}

function summarise(outcomes: readonly DeliveryOutcome[]): EventOutcome {
  const failed = outcomes.filter((o) => o.status === "failed").length;
  if (failed === 0) return "delivered";
  return failed === outcomes.length ? "failed" : "partial";
}

export class RelayService {
  private readonly matcher: Matcher;
  private readonly composer: MessageComposer;
  private readonly dispatcher: Dispatcher;
  private readonly events?: RelayEventSink;
  private readonly metrics?: RelayMetrics;

  private eventsHandled = 0;
  private lastEventAt?: string;
  private lastError?: string;

  constructor(deps: RelayServiceDependencies) {
    this.matcher = deps.matcher;
    this.composer = deps.composer;
    this.dispatcher = deps.dispatcher;
    this.events = deps.events;
    this.metrics = deps.metrics;
  }

  /**
   * Route a new post to every subscribed channel.
   *
   * `guardian` decides whether the relay's acting user may see the post;
   * it is passed per call rather than held as ambient state.
   */
  async handlePostCreated(event: PostCreatedEvent, guardian: PermissionCheck): Promise<RelayResult> {
    const started = process.hrtime.bigint();
    this.eventsHandled += 1;
    this.lastEventAt = new Date().toISOString();

    const skip = await this.skipReason(event, guardian);
    if (skip) {
      await this.events?.log("relay.skipped", "relay", {
        topicId: event.topic.id,
        payload: { postId: event.post.id, reason: skip },
      });
      this.metrics?.recordEvent("skipped");
      return { status: "skipped", reason: skip };
    }

    const targets = await this.matcher.match(toMatchInput(event));
    if (targets.length === 0) {
      this.metrics?.recordEvent("no_match", elapsedSeconds(started));
      return { status: "no_match" };
    }

    await this.events?.log("relay.matched", "relay", {
      topicId: event.topic.id,
      payload: {
        postId: event.post.id,
        firstPost: isFirstPost(event),
        channels: targets.map((t) => `${t.channel}:${t.filter}`),
      },
    });

    const outcomes = await this.dispatcher.dispatch(event.topic.id, targets, (channel, opts) =>
      this.composer.compose(event, channel, opts),
    );

    const failures = outcomes.filter((o) => o.status === "failed");
    this.lastError = failures.length > 0 ? failures.map((f) => `${f.channel}: ${f.error}`).join("; ") : undefined;

    this.metrics?.recordDeliveries(outcomes);
    this.metrics?.recordEvent(summarise(outcomes), elapsedSeconds(started));

    return { status: "dispatched", targets, outcomes };
  }

  /** Send a post to one channel regardless of subscriptions (admin "test"). */
  async sendTest(event: PostCreatedEvent, channel: string): Promise<DeliveryOutcome> {
    const target: DeliveryTarget = { channel, filter: "watch", scope: "*" };
    const [outcome] = await this.dispatcher.dispatch(event.topic.id, [target], (ch, opts) =>
      this.composer.compose(event, ch, opts),
    );
    if (!outcome) {
      throw new Error(`No delivery outcome for ${channel}`);
    }
    this.metrics?.recordDeliveries([outcome]);
    return outcome;
  }

  getStatus(): RelayServiceStatus {
    return {
      mode: this.dispatcher.mode,
      eventsHandled: this.eventsHandled,
      lastEventAt: this.lastEventAt,
      lastError: this.lastError,
    };
  }

  private async skipReason(event: PostCreatedEvent, guardian: PermissionCheck): Promise<SkipReason | undefined> {
    if (event.post.type !== "regular") return "not_regular_post";
    if (event.topic.archetype === "private_message") return "private_message";
    if (!(await guardian.canSee(event))) return "permission_denied";
    return undefined;
  }
}

function elapsedSeconds(started: bigint): number {
  return Number(process.hrtime.bigint() - started) / 1e9;
}
