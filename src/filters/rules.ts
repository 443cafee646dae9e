/**
 * Rule list mutations as pure functions.
 *
 * Each operation takes the current list of one scope and returns the next
 * list plus a change-set. Nothing here touches storage; the engine applies
 * the result inside the scope lock.
 *
 * Invariants kept by every operation:
 * - at most one rule per (channel, tag set) in the list
 * - a tag belongs to at most one tagged rule per channel (setTagFilter)
 * - no rule is left with an empty tag list
 */

import {
  ruleIdentity,
  tagSetKey,
  type FilterLevel,
  type FilterLevelInput,
  type SubscriptionRule,
} from "../schemas/subscription.js";

export interface RuleChangeSet {
  added: SubscriptionRule[];
  removed: SubscriptionRule[];
  updated: Array<{ before: SubscriptionRule; after: SubscriptionRule }>;
}

export interface RuleMutation {
  rules: SubscriptionRule[];
  changes: RuleChangeSet;
}

export function isEmptyChangeSet(changes: RuleChangeSet): boolean {
  return changes.added.length === 0 && changes.removed.length === 0 && changes.updated.length === 0;
}

function makeRule(channel: string, filter: FilterLevel, tags?: readonly string[]): SubscriptionRule {
  return tags && tags.length > 0 ? { channel, filter, tags: [...tags] } : { channel, filter };
}

function sameRule(a: SubscriptionRule, b: SubscriptionRule): boolean {
  return a.channel === b.channel && a.filter === b.filter && tagSetKey(a.tags) === tagSetKey(b.tags);
}

/**
 * Diff a list against its edited form. `edited[i]` is the new value of
 * `before[i]`, or null when it was deleted; `appended` go at the end.
 */
function buildMutation(
  before: readonly SubscriptionRule[],
  edited: ReadonlyArray<SubscriptionRule | null>,
  appended: readonly SubscriptionRule[] = [],
): RuleMutation {
  const changes: RuleChangeSet = { added: [...appended], removed: [], updated: [] };
  const rules: SubscriptionRule[] = [];

  before.forEach((rule, i) => {
    const next = edited[i] ?? null;
    if (next === null) {
      changes.removed.push(rule);
      return;
    }
    if (!sameRule(rule, next)) {
      changes.updated.push({ before: rule, after: next });
    }
    rules.push(next);
  });

  rules.push(...appended);
  return { rules, changes };
}

/**
 * Set the tag-less rule of a channel. Updates the level in place, creates
 * the rule when missing, or deletes it for "unset".
 */
export function applyCategoryFilter(
  rules: readonly SubscriptionRule[],
  channel: string,
  level: FilterLevelInput,
): RuleMutation {
  const index = rules.findIndex((rule) => rule.channel === channel && !rule.tags);
  const edited: Array<SubscriptionRule | null> = [...rules];

  if (level === "unset") {
    if (index >= 0) edited[index] = null;
    return buildMutation(rules, edited);
  }

  if (index >= 0) {
    edited[index] = makeRule(channel, level);
    return buildMutation(rules, edited);
  }

  return buildMutation(rules, edited, [makeRule(channel, level)]);
}

/**
 * Move a tag to a level for a channel.
 *
 * The tag is first stripped from every tagged rule of the channel (rules
 * left without tags are deleted), then appended to the channel's tagged rule
 * at `level` or to a new rule. "unset" only strips.
 */
export function applyTagFilter(
  rules: readonly SubscriptionRule[],
  channel: string,
  level: FilterLevelInput,
  tag: string,
): RuleMutation {
  const edited: Array<SubscriptionRule | null> = rules.map((rule) => {
    if (rule.channel !== channel || !rule.tags) return rule;
    const remaining = rule.tags.filter((t) => t !== tag);
    if (remaining.length === 0) return null;
    return remaining.length === rule.tags.length ? rule : makeRule(rule.channel, rule.filter, remaining);
  });

  if (level === "unset") {
    return buildMutation(rules, edited);
  }

  const target = edited.findIndex(
    (rule) => rule !== null && rule.channel === channel && rule.filter === level && rule.tags !== undefined,
  );
  const current = target >= 0 ? edited[target] : null;
  if (current) {
    edited[target] = makeRule(channel, level, [...(current.tags ?? []), tag]);
    return buildMutation(rules, edited);
  }

  return buildMutation(rules, edited, [makeRule(channel, level, [tag])]);
}

/**
 * Add a rule. A rule with the same (channel, tag set) identity is replaced
 * in place so identities stay unique.
 */
export function appendRule(
  rules: readonly SubscriptionRule[],
  channel: string,
  level: FilterLevel,
  tags?: readonly string[],
): RuleMutation {
  const rule = makeRule(channel, level, tags ? Array.from(new Set(tags)) : undefined);
  const identity = ruleIdentity(rule);
  const index = rules.findIndex((existing) => ruleIdentity(existing) === identity);

  if (index >= 0) {
    const edited: Array<SubscriptionRule | null> = [...rules];
    edited[index] = rule;
    return buildMutation(rules, edited);
  }

  return buildMutation(rules, [...rules], [rule]);
}

/** Delete the rule exactly matching (channel, tag set). */
export function removeRule(
  rules: readonly SubscriptionRule[],
  channel: string,
  tags?: readonly string[],
): RuleMutation {
  const identity = ruleIdentity({ channel, tags: tags && tags.length > 0 ? [...tags] : undefined });
  const edited = rules.map((rule) => (ruleIdentity(rule) === identity ? null : rule));
  return buildMutation(rules, edited);
}
