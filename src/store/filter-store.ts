/**
 * Filter store: subscription rule lists keyed by category scope.
 *
 * Pure data access: no policy, no locking. The rule engine owns both.
 */

import type { IKeyValueStore } from "./interfaces.js";
import {
  ALL_CATEGORIES,
  parseRuleList,
  type FilterScope,
  type ScopedRule,
  type SubscriptionRule,
} from "../schemas/subscription.js";

export const CATEGORY_KEY_PREFIX = "category_";

/** Storage key for a scope. Undefined or "*" means all categories. */
export function scopeKey(scope?: FilterScope): string {
  return `${CATEGORY_KEY_PREFIX}${scope && scope.length > 0 ? scope : ALL_CATEGORIES}`;
}

/** Strip undefined tags so persisted rules read {channel, filter} or {channel, filter, tags}. */
function toRecord(rule: SubscriptionRule): Record<string, unknown> {
  return rule.tags
    ? { channel: rule.channel, filter: rule.filter, tags: [...rule.tags] }
    : { channel: rule.channel, filter: rule.filter };
}

export class FilterStore {
  constructor(private readonly kv: IKeyValueStore) {}

  /** Rules stored under a scope, in stored order. Malformed entries are dropped. */
  async getRules(scope?: FilterScope): Promise<SubscriptionRule[]> {
    const key = scopeKey(scope);
    const { rules, rejected } = parseRuleList(await this.kv.get(key));
    for (const bad of rejected) {
      console.warn(`[FilterStore] Ignoring malformed rule ${bad.index} in ${key}: ${bad.issues}`);
    }
    return rules;
  }

  /** Replace a scope's rule list. An empty list removes the key. */
  async saveRules(scope: FilterScope | undefined, rules: readonly SubscriptionRule[]): Promise<void> {
    const key = scopeKey(scope);
    if (rules.length === 0) {
      await this.kv.remove(key);
      return;
    }
    await this.kv.set(key, rules.map(toRecord));
  }

  /** Every scope that currently has a stored list. */
  async listScopes(): Promise<FilterScope[]> {
    const keys = await this.kv.keys(CATEGORY_KEY_PREFIX);
    return keys.map((key) => key.slice(CATEGORY_KEY_PREFIX.length));
  }

  /** All rules across all scopes, each tagged with its scope. */
  async listAll(): Promise<ScopedRule[]> {
    const result: ScopedRule[] = [];
    for (const scope of await this.listScopes()) {
      for (const rule of await this.getRules(scope)) {
        result.push({ ...rule, scope });
      }
    }
    return result;
  }
}
