/**
 * Subscription rule schema: how a chat channel follows forum activity.
 *
 * Rules live in per-scope lists: one list per category id, plus the
 * wildcard scope "*" that applies to every category.
 */

import { z } from "zod";

/** Subscription intensity. */
export const FilterLevel = z.enum([
  "mute",    // Suppress notifications
  "watch",   // Every post, replies included
  "follow",  // New topics only
]);
export type FilterLevel = z.infer<typeof FilterLevel>;

/** Level accepted from commands and the admin surface; "unset" removes a rule. */
export const FilterLevelInput = z.enum(["mute", "watch", "follow", "unset"]);
export type FilterLevelInput = z.infer<typeof FilterLevelInput>;

/** Wildcard scope covering all categories. */
export const ALL_CATEGORIES = "*";

/** Category id, or "*" for all categories. */
export const FilterScope = z.string().min(1);
export type FilterScope = z.infer<typeof FilterScope>;

/** Tag list; an empty list means "no tag filter" and is stored as absent. */
const RuleTags = z
  .array(z.string().min(1))
  .nullish()
  .transform((tags) => (tags && tags.length > 0 ? tags : undefined));

export const SubscriptionRule = z.object({
  /** Channel reference, e.g. "#general" or "@someone". */
  channel: z.string().min(1),
  filter: FilterLevel,
  tags: RuleTags,
});
export type SubscriptionRule = z.infer<typeof SubscriptionRule>;

/** A rule together with the scope it was read from. */
export interface ScopedRule extends SubscriptionRule {
  scope: FilterScope;
}

export interface ParsedRuleList {
  rules: SubscriptionRule[];
  /** Entries that failed validation, with their index in the stored list. */
  rejected: Array<{ index: number; issues: string }>;
}

/**
 * Parse a stored rule list entry by entry. Malformed entries are reported
 * and dropped instead of failing the whole list.
 */
export function parseRuleList(raw: unknown): ParsedRuleList {
  if (!Array.isArray(raw)) {
    return { rules: [], rejected: raw === undefined || raw === null ? [] : [{ index: -1, issues: "not a list" }] };
  }

  const rules: SubscriptionRule[] = [];
  const rejected: ParsedRuleList["rejected"] = [];

  raw.forEach((entry: unknown, index) => {
    const result = SubscriptionRule.safeParse(entry);
    if (result.success) {
      rules.push(result.data);
    } else {
      rejected.push({
        index,
        issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
      });
    }
  });

  return { rules, rejected };
}

/** Normalise a tag list for identity comparison (order-insensitive). */
export function tagSetKey(tags: readonly string[] | undefined): string {
  if (!tags || tags.length === 0) return "";
  return Array.from(new Set(tags)).sort().join("\u0000");
}

/** Identity of a rule within a scope: (channel, tag set). */
export function ruleIdentity(rule: Pick<SubscriptionRule, "channel" | "tags">): string {
  return `${rule.channel}\u0001${tagSetKey(rule.tags)}`;
}
