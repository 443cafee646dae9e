/**
 * Matcher: which channels receive a post, and at what level.
 *
 * Pipeline:
 *   category rules ∪ wildcard rules → order (mute first) → dedupe by
 *   (channel, tag set) → tag filter → level filter → targets
 *
 * Ordering before dedupe means that when the same identity appears with
 * both a mute and a non-mute level, the mute is the one kept.
 */

import type { FilterStore } from "../store/filter-store.js";
import {
  ALL_CATEGORIES,
  ruleIdentity,
  type FilterLevel,
  type FilterScope,
  type ScopedRule,
} from "../schemas/subscription.js";
import type { MatchInput } from "../schemas/post.js";

/** Lower sorts first. watch and follow share a rank. */
export const FILTER_PRECEDENCE: Readonly<Record<FilterLevel, number>> = {
  mute: 0,
  watch: 1,
  follow: 1,
};

export interface DeliveryTarget {
  channel: string;
  filter: Exclude<FilterLevel, "mute">;
  tags?: string[];
  /** Scope the winning rule came from. */
  scope: FilterScope;
}

export interface MatchOptions {
  /** When false, tag sets on rules are ignored. Default: true. */
  taggingEnabled?: boolean;
}

function intersects(ruleTags: readonly string[], eventTags: ReadonlySet<string>): boolean {
  return ruleTags.some((tag) => eventTags.has(tag));
}

/**
 * Pure matching over already-loaded rules. `candidates` is the category
 * scope's rules followed by the wildcard scope's rules.
 */
export function matchRules(
  input: MatchInput,
  candidates: readonly ScopedRule[],
  opts: MatchOptions = {},
): DeliveryTarget[] {
  const taggingEnabled = opts.taggingEnabled ?? true;
  const eventTags = new Set(input.tags);

  const ordered = candidates
    .filter((rule) => rule.channel.length > 0 && rule.filter in FILTER_PRECEDENCE)
    .map((rule, position) => ({ rule, position }))
    .sort((a, b) =>
      FILTER_PRECEDENCE[a.rule.filter] - FILTER_PRECEDENCE[b.rule.filter] || a.position - b.position,
    )
    .map(({ rule }) => rule);

  const seen = new Set<string>();
  const targets: DeliveryTarget[] = [];

  for (const rule of ordered) {
    const identity = ruleIdentity(rule);
    if (seen.has(identity)) continue;
    seen.add(identity);

    if (taggingEnabled && rule.tags && !intersects(rule.tags, eventTags)) continue;
    if (rule.filter === "mute") continue;
    if (rule.filter === "follow" && !input.isFirstPost) continue;

    targets.push({
      channel: rule.channel,
      filter: rule.filter,
      tags: rule.tags,
      scope: rule.scope,
    });
  }

  return targets;
}

export class Matcher {
  constructor(
    private readonly store: FilterStore,
    private readonly opts: MatchOptions = {},
  ) {}

  /** Load both scopes for the event's category and match. */
  async match(input: MatchInput): Promise<DeliveryTarget[]> {
    const categoryRules = input.categoryId === ALL_CATEGORIES
      ? []
      : (await this.store.getRules(input.categoryId)).map((rule) => ({ ...rule, scope: input.categoryId }));
    const wildcardRules = (await this.store.getRules(ALL_CATEGORIES)).map((rule) => ({ ...rule, scope: ALL_CATEGORIES }));

    return matchRules(input, [...categoryRules, ...wildcardRules], this.opts);
  }
}
