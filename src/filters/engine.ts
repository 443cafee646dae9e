/**
 * FilterRuleEngine: subscribe / unsubscribe / tag operations on rule lists.
 *
 * Every mutation is a read-modify-write of one scope's list, run under that
 * scope's lock so concurrent admin edits never lose updates:
 *
 *   lock(scope) → load → pure mutation (rules.ts) → save if changed → unlock
 */

import type { FilterStore } from "../store/filter-store.js";
import { scopeKey } from "../store/filter-store.js";
import type { KeyedLockManager } from "../store/interfaces.js";
import { InMemoryKeyedLockManager } from "../store/key-lock.js";
import type { TagRegistry } from "../host/interfaces.js";
import type { RelayEventSink } from "../events/logger.js";
import {
  ALL_CATEGORIES,
  type FilterLevel,
  type FilterLevelInput,
  type FilterScope,
  type ScopedRule,
  type SubscriptionRule,
} from "../schemas/subscription.js";
import {
  applyCategoryFilter,
  applyTagFilter,
  appendRule,
  removeRule,
  isEmptyChangeSet,
  type RuleMutation,
} from "./rules.js";
import { TagNotFoundError } from "./errors.js";

export interface FilterRuleEngineDependencies {
  store: FilterStore;
  tags: TagRegistry;
  locks?: KeyedLockManager;
  events?: RelayEventSink;
}

function normaliseScope(scope: FilterScope | undefined): FilterScope {
  return scope && scope.length > 0 ? scope : ALL_CATEGORIES;
}

export class FilterRuleEngine {
  private readonly store: FilterStore;
  private readonly tags: TagRegistry;
  private readonly locks: KeyedLockManager;
  private readonly events?: RelayEventSink;

  constructor(deps: FilterRuleEngineDependencies) {
    this.store = deps.store;
    this.tags = deps.tags;
    this.locks = deps.locks ?? new InMemoryKeyedLockManager();
    this.events = deps.events;
  }

  /** Create, update or (with "unset") delete the channel's tag-less rule in a scope. */
  async setCategoryFilter(
    channel: string,
    scope: FilterScope | undefined,
    level: FilterLevelInput,
  ): Promise<RuleMutation> {
    return this.mutate(scope, channel, "set-category", (rules) =>
      applyCategoryFilter(rules, channel, level),
    );
  }

  /**
   * Move `tag` to `level` for the channel, stripping it from the channel's
   * other tagged rules first. "unset" only strips.
   *
   * @throws TagNotFoundError when the tag is unknown (nothing is written)
   */
  async setTagFilter(
    channel: string,
    scope: FilterScope | undefined,
    level: FilterLevelInput,
    tag: string,
  ): Promise<RuleMutation> {
    // Unsetting must keep working for tags the forum has since deleted
    if (level !== "unset") {
      await this.assertTagsExist([tag]);
    }
    return this.mutate(scope, channel, "set-tag", (rules) =>
      applyTagFilter(rules, channel, level, tag),
    );
  }

  /**
   * Add a rule with an explicit tag set.
   *
   * @throws TagNotFoundError listing every unknown tag (nothing is written)
   */
  async addFilter(
    channel: string,
    scope: FilterScope | undefined,
    level: FilterLevel,
    tags?: readonly string[],
  ): Promise<RuleMutation> {
    const wanted = tags && tags.length > 0 ? Array.from(new Set(tags)) : undefined;
    if (wanted) {
      await this.assertTagsExist(wanted);
    }
    return this.mutate(scope, channel, "add", (rules) => appendRule(rules, channel, level, wanted));
  }

  /** Delete the rule matching (channel, tags) exactly. */
  async removeFilter(
    channel: string,
    scope: FilterScope | undefined,
    tags?: readonly string[],
  ): Promise<RuleMutation> {
    return this.mutate(scope, channel, "remove", (rules) => removeRule(rules, channel, tags));
  }

  /** Rules of one scope, as stored. */
  async getRules(scope?: FilterScope): Promise<SubscriptionRule[]> {
    return this.store.getRules(normaliseScope(scope));
  }

  /** Every rule of every scope. */
  async listFilters(): Promise<ScopedRule[]> {
    return this.store.listAll();
  }

  /** The channel's rules, concrete scopes first and the wildcard scope last. */
  async rulesForChannel(channel: string): Promise<ScopedRule[]> {
    const all = await this.store.listAll();
    const mine = all.filter((rule) => rule.channel === channel);
    return [
      ...mine.filter((rule) => rule.scope !== ALL_CATEGORIES),
      ...mine.filter((rule) => rule.scope === ALL_CATEGORIES),
    ];
  }

  private async assertTagsExist(names: readonly string[]): Promise<void> {
    const existing = new Set(await this.tags.findExisting(names));
    const missing = names.filter((name) => !existing.has(name));
    if (missing.length > 0) {
      await this.events?.log("filter.rejected", "filters", { payload: { missing } });
      throw new TagNotFoundError(missing);
    }
  }

  private async mutate(
    rawScope: FilterScope | undefined,
    channel: string,
    operation: string,
    apply: (rules: readonly SubscriptionRule[]) => RuleMutation,
  ): Promise<RuleMutation> {
    const scope = normaliseScope(rawScope);

    const mutation = await this.locks.withLock(scopeKey(scope), async () => {
      const current = await this.store.getRules(scope);
      const result = apply(current);
      if (!isEmptyChangeSet(result.changes)) {
        await this.store.saveRules(scope, result.rules);
      }
      return result;
    });

    if (isEmptyChangeSet(mutation.changes)) return mutation;

    await this.events?.log("filter.changed", channel, {
      payload: {
        scope,
        channel,
        operation,
        added: mutation.changes.added.length,
        removed: mutation.changes.removed.length,
        updated: mutation.changes.updated.length,
      },
    });

    return mutation;
  }
}
