import { describe, it, expect, beforeEach } from "vitest";
import type { ScopedRule } from "../../schemas/subscription.js";
import { MemoryKeyValueStore } from "../../store/memory-kv.js";
import { FilterStore } from "../../store/filter-store.js";
import { Matcher, matchRules } from "../matcher.js";

const firstPost = { categoryId: "1", tags: [], isFirstPost: true };
const reply = { categoryId: "1", tags: [], isFirstPost: false };

describe("matchRules", () => {
  it("delivers follow only for the first post", () => {
    const rules: ScopedRule[] = [{ channel: "#welcome", filter: "follow", scope: "1" }];
    expect(matchRules(firstPost, rules)).toEqual([{ channel: "#welcome", filter: "follow", tags: undefined, scope: "1" }]);
    expect(matchRules(reply, rules)).toEqual([]);
  });

  it("delivers watch for every post", () => {
    const rules: ScopedRule[] = [{ channel: "#ops", filter: "watch", scope: "*" }];
    expect(matchRules(reply, rules).map((t) => t.channel)).toEqual(["#ops"]);
  });

  it("lets a mute win over the same identity from the other scope", () => {
    const rules: ScopedRule[] = [
      { channel: "#ops", filter: "watch", scope: "1" },
      { channel: "#ops", filter: "mute", scope: "*" },
    ];
    expect(matchRules(firstPost, rules)).toEqual([]);
  });

  it("keeps the category scope's rule when both scopes have a non-mute rule", () => {
    const rules: ScopedRule[] = [
      { channel: "#ops", filter: "follow", scope: "1" },
      { channel: "#ops", filter: "watch", scope: "*" },
    ];
    expect(matchRules(firstPost, rules)).toEqual([{ channel: "#ops", filter: "follow", tags: undefined, scope: "1" }]);
    // the follow shadows the wildcard watch, so a reply goes nowhere
    expect(matchRules(reply, rules)).toEqual([]);
  });

  it("treats different tag sets of one channel as different identities", () => {
    const rules: ScopedRule[] = [
      { channel: "#ops", filter: "mute", tags: ["misc"], scope: "*" },
      { channel: "#ops", filter: "watch", tags: ["urgent"], scope: "*" },
    ];
    const targets = matchRules({ categoryId: "1", tags: ["urgent", "misc"], isFirstPost: false }, rules);
    expect(targets).toEqual([{ channel: "#ops", filter: "watch", tags: ["urgent"], scope: "*" }]);
  });

  it("requires a tagged rule to share a tag with the topic", () => {
    const rules: ScopedRule[] = [{ channel: "#ops", filter: "watch", tags: ["urgent"], scope: "*" }];
    expect(matchRules({ ...reply, tags: ["misc"] }, rules)).toEqual([]);
    expect(matchRules({ ...reply, tags: [] }, rules)).toEqual([]);
  });

  it("ignores rule tags when tagging is disabled", () => {
    const rules: ScopedRule[] = [{ channel: "#ops", filter: "watch", tags: ["urgent"], scope: "*" }];
    const targets = matchRules({ ...reply, tags: ["misc"] }, rules, { taggingEnabled: false });
    expect(targets.map((t) => t.channel)).toEqual(["#ops"]);
  });

  it("delivers to each channel at most once per identity", () => {
    const rules: ScopedRule[] = [
      { channel: "#ops", filter: "watch", scope: "1" },
      { channel: "#ops", filter: "watch", scope: "*" },
      { channel: "#dev", filter: "watch", scope: "*" },
    ];
    expect(matchRules(reply, rules).map((t) => `${t.channel}@${t.scope}`)).toEqual(["#ops@1", "#dev@*"]);
  });
});

describe("Matcher", () => {
  let store: FilterStore;

  beforeEach(() => {
    store = new FilterStore(new MemoryKeyValueStore());
  });

  it("combines the category scope with the wildcard scope", async () => {
    await store.saveRules("1", [{ channel: "#welcome", filter: "follow" }]);
    await store.saveRules("*", [{ channel: "#all", filter: "watch" }]);
    await store.saveRules("2", [{ channel: "#support", filter: "watch" }]);

    const targets = await new Matcher(store).match(firstPost);

    expect(targets).toEqual([
      { channel: "#welcome", filter: "follow", tags: undefined, scope: "1" },
      { channel: "#all", filter: "watch", tags: undefined, scope: "*" },
    ]);
  });

  it("returns nothing when no scope has rules", async () => {
    expect(await new Matcher(store).match(firstPost)).toEqual([]);
  });
});
