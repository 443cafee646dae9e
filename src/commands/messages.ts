/**
 * Reply strings for slash commands.
 */

import type { FilterLevel, FilterLevelInput } from "../schemas/subscription.js";

const PRESENT: Record<FilterLevel, string> = {
  follow: "Following",
  watch: "Watching",
  mute: "Muting",
};

const PAST: Record<FilterLevelInput, string> = {
  follow: "Followed",
  watch: "Watched",
  mute: "Muted",
  unset: "Unset",
};

export const messages = {
  filterToPresent: (level: FilterLevel): string => PRESENT[level],
  filterToPast: (level: FilterLevelInput): string => PAST[level],

  successCategory: (level: FilterLevelInput, name: string): string => `${PAST[level]} category *${name}*`,
  successAll: (level: FilterLevelInput): string => `${PAST[level]} all categories`,
  successTag: (level: FilterLevelInput, name: string): string => `${PAST[level]} tag *${name}*`,

  notFoundCategory: (name: string, available: string): string => `Category *${name}* not found. ${available}`,
  notFoundTag: (name: string): string => `Tag *${name}* not found.`,

  statusCategory: (level: FilterLevel, name: string): string => `${PRESENT[level]} category *${name}*`,
  statusAllCategories: (level: FilterLevel): string => `${PRESENT[level]} all categories`,
  withTags: (tags: readonly string[]): string => ` with tags: ${tags.join(", ")}`,
  availableCategories: (slugs: readonly string[]): string => `Available categories: ${slugs.join(", ")}`,

  help: [
    "`follow [category|all|tag:name]` - notify this channel of new topics",
    "`watch [category|all|tag:name]` - notify this channel of every post",
    "`mute [category|all|tag:name]` - stop notifications",
    "`unset [category|all|tag:name]` - remove the subscription",
    "`status` - list this channel's subscriptions",
    "`help` - show this message",
  ].join("\n"),
};
