import { describe, it, expect } from "vitest";
import type { SubscriptionRule } from "../../schemas/subscription.js";
import {
  applyCategoryFilter,
  applyTagFilter,
  appendRule,
  removeRule,
  isEmptyChangeSet,
} from "../rules.js";

describe("applyCategoryFilter", () => {
  it("appends a tag-less rule when the channel has none", () => {
    const { rules, changes } = applyCategoryFilter([], "#welcome", "follow");
    expect(rules).toEqual([{ channel: "#welcome", filter: "follow" }]);
    expect(changes.added).toHaveLength(1);
  });

  it("updates the level in place and leaves tagged rules alone", () => {
    const before: SubscriptionRule[] = [
      { channel: "#ops", filter: "watch", tags: ["urgent"] },
      { channel: "#ops", filter: "follow" },
    ];
    const { rules, changes } = applyCategoryFilter(before, "#ops", "mute");

    expect(rules).toEqual([
      { channel: "#ops", filter: "watch", tags: ["urgent"] },
      { channel: "#ops", filter: "mute" },
    ]);
    expect(changes.updated).toEqual([
      { before: { channel: "#ops", filter: "follow" }, after: { channel: "#ops", filter: "mute" } },
    ]);
  });

  it("deletes the tag-less rule on unset", () => {
    const before: SubscriptionRule[] = [
      { channel: "#ops", filter: "follow" },
      { channel: "#dev", filter: "watch" },
    ];
    const { rules, changes } = applyCategoryFilter(before, "#ops", "unset");
    expect(rules).toEqual([{ channel: "#dev", filter: "watch" }]);
    expect(changes.removed).toEqual([{ channel: "#ops", filter: "follow" }]);
  });

  it("reports no change when setting the same level again", () => {
    const { changes } = applyCategoryFilter([{ channel: "#ops", filter: "watch" }], "#ops", "watch");
    expect(isEmptyChangeSet(changes)).toBe(true);
  });

  it("reports no change when unsetting a missing rule", () => {
    const { rules, changes } = applyCategoryFilter([], "#ops", "unset");
    expect(rules).toEqual([]);
    expect(isEmptyChangeSet(changes)).toBe(true);
  });
});

describe("applyTagFilter", () => {
  it("creates a tagged rule", () => {
    const { rules } = applyTagFilter([], "#ops", "watch", "urgent");
    expect(rules).toEqual([{ channel: "#ops", filter: "watch", tags: ["urgent"] }]);
  });

  it("moves a tag between levels, deleting the emptied rule", () => {
    const before: SubscriptionRule[] = [{ channel: "#ops", filter: "watch", tags: ["urgent"] }];
    const { rules } = applyTagFilter(before, "#ops", "mute", "urgent");
    expect(rules).toEqual([{ channel: "#ops", filter: "mute", tags: ["urgent"] }]);
  });

  it("adds the tag to the channel's existing rule at that level", () => {
    const before: SubscriptionRule[] = [
      { channel: "#ops", filter: "watch", tags: ["urgent"] },
      { channel: "#ops", filter: "mute", tags: ["misc", "noise"] },
    ];
    const { rules } = applyTagFilter(before, "#ops", "watch", "misc");
    expect(rules).toEqual([
      { channel: "#ops", filter: "watch", tags: ["urgent", "misc"] },
      { channel: "#ops", filter: "mute", tags: ["noise"] },
    ]);
  });

  it("keeps the tag when re-applying the same level", () => {
    const before: SubscriptionRule[] = [{ channel: "#ops", filter: "watch", tags: ["urgent"] }];
    const { rules, changes } = applyTagFilter(before, "#ops", "watch", "urgent");
    expect(rules).toEqual([{ channel: "#ops", filter: "watch", tags: ["urgent"] }]);
    expect(isEmptyChangeSet(changes)).toBe(true);
  });

  it("never attaches a tag to the tag-less rule", () => {
    const before: SubscriptionRule[] = [{ channel: "#ops", filter: "watch" }];
    const { rules } = applyTagFilter(before, "#ops", "watch", "urgent");
    expect(rules).toEqual([
      { channel: "#ops", filter: "watch" },
      { channel: "#ops", filter: "watch", tags: ["urgent"] },
    ]);
  });

  it("only strips on unset", () => {
    const before: SubscriptionRule[] = [
      { channel: "#ops", filter: "watch", tags: ["urgent", "misc"] },
      { channel: "#dev", filter: "watch", tags: ["urgent"] },
    ];
    const { rules } = applyTagFilter(before, "#ops", "unset", "urgent");
    expect(rules).toEqual([
      { channel: "#ops", filter: "watch", tags: ["misc"] },
      { channel: "#dev", filter: "watch", tags: ["urgent"] },
    ]);
  });
});

describe("appendRule", () => {
  it("appends a new identity at the end", () => {
    const before: SubscriptionRule[] = [{ channel: "#ops", filter: "watch" }];
    const { rules } = appendRule(before, "#ops", "mute", ["a", "b"]);
    expect(rules).toEqual([
      { channel: "#ops", filter: "watch" },
      { channel: "#ops", filter: "mute", tags: ["a", "b"] },
    ]);
  });

  it("replaces the rule with the same channel and tag set regardless of tag order", () => {
    const before: SubscriptionRule[] = [{ channel: "#ops", filter: "watch", tags: ["b", "a"] }];
    const { rules, changes } = appendRule(before, "#ops", "mute", ["a", "b"]);
    expect(rules).toEqual([{ channel: "#ops", filter: "mute", tags: ["a", "b"] }]);
    expect(changes.updated).toHaveLength(1);
    expect(changes.added).toHaveLength(0);
  });
});

describe("removeRule", () => {
  it("removes only the exact (channel, tag set) match", () => {
    const before: SubscriptionRule[] = [
      { channel: "#ops", filter: "watch" },
      { channel: "#ops", filter: "mute", tags: ["misc"] },
    ];
    const { rules, changes } = removeRule(before, "#ops", ["misc"]);
    expect(rules).toEqual([{ channel: "#ops", filter: "watch" }]);
    expect(changes.removed).toEqual([{ channel: "#ops", filter: "mute", tags: ["misc"] }]);
  });

  it("treats an empty tag list as the tag-less rule", () => {
    const before: SubscriptionRule[] = [
      { channel: "#ops", filter: "watch" },
      { channel: "#ops", filter: "mute", tags: ["misc"] },
    ];
    const { rules } = removeRule(before, "#ops", []);
    expect(rules).toEqual([{ channel: "#ops", filter: "mute", tags: ["misc"] }]);
  });

  it("is a no-op when nothing matches", () => {
    const { changes } = removeRule([{ channel: "#ops", filter: "watch" }], "#dev");
    expect(isEmptyChangeSet(changes)).toBe(true);
  });
});
