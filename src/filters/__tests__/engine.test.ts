import { describe, it, expect, beforeEach, vi } from "vitest";
import { MemoryKeyValueStore } from "../../store/memory-kv.js";
import { FilterStore } from "../../store/filter-store.js";
import { StaticTagRegistry } from "../../host/static-directory.js";
import { FilterRuleEngine } from "../engine.js";
import { TagNotFoundError } from "../errors.js";
import { RecordingEventSink, TAGS } from "../../../tests/utils/test-data.js";

describe("FilterRuleEngine", () => {
  let kv: MemoryKeyValueStore;
  let store: FilterStore;
  let events: RecordingEventSink;
  let engine: FilterRuleEngine;

  beforeEach(() => {
    kv = new MemoryKeyValueStore();
    store = new FilterStore(kv);
    events = new RecordingEventSink();
    engine = new FilterRuleEngine({ store, tags: new StaticTagRegistry(TAGS), events });
  });

  describe("setCategoryFilter", () => {
    it("stores the rule under the category key", async () => {
      await engine.setCategoryFilter("#welcome", "1", "follow");
      expect(await kv.get("category_1")).toEqual([{ channel: "#welcome", filter: "follow" }]);
    });

    it("uses the wildcard scope when no category is given", async () => {
      await engine.setCategoryFilter("#welcome", undefined, "watch");
      expect(await kv.get("category_*")).toEqual([{ channel: "#welcome", filter: "watch" }]);
    });

    it("deletes the key when the last rule is unset", async () => {
      await engine.setCategoryFilter("#welcome", "1", "follow");
      await engine.setCategoryFilter("#welcome", "1", "unset");
      expect(await kv.keys()).toEqual([]);
    });

    it("logs a change with the channel as actor", async () => {
      await engine.setCategoryFilter("#welcome", "1", "follow");
      expect(events.events).toEqual([
        {
          type: "filter.changed",
          actor: "#welcome",
          topicId: undefined,
          payload: { scope: "1", channel: "#welcome", operation: "set-category", added: 1, removed: 0, updated: 0 },
        },
      ]);
    });

    it("writes and logs nothing when the level is unchanged", async () => {
      await engine.setCategoryFilter("#welcome", "1", "follow");
      const set = vi.spyOn(kv, "set");
      await engine.setCategoryFilter("#welcome", "1", "follow");
      expect(set).not.toHaveBeenCalled();
      expect(events.ofType("filter.changed")).toHaveLength(1);
    });
  });

  describe("setTagFilter", () => {
    it("moves a tag from watch to mute for the channel", async () => {
      await engine.setTagFilter("#ops", "*", "watch", "urgent");
      await engine.setTagFilter("#ops", "*", "mute", "urgent");
      expect(await engine.getRules("*")).toEqual([{ channel: "#ops", filter: "mute", tags: ["urgent"] }]);
    });

    it("unset removes the tag and the rule it emptied", async () => {
      await engine.setTagFilter("#ops", "*", "watch", "urgent");
      await engine.setTagFilter("#ops", "*", "unset", "urgent");
      expect(await engine.getRules("*")).toEqual([]);
    });

    it("unset works for tags the forum no longer knows", async () => {
      await kv.set("category_*", [{ channel: "#ops", filter: "watch", tags: ["retired"] }]);
      await engine.setTagFilter("#ops", "*", "unset", "retired");
      expect(await engine.getRules("*")).toEqual([]);
    });

    it("rejects an unknown tag without writing", async () => {
      const set = vi.spyOn(kv, "set");
      await expect(engine.setTagFilter("#ops", "*", "watch", "nope")).rejects.toThrow(TagNotFoundError);
      expect(set).not.toHaveBeenCalled();
      expect(events.ofType("filter.rejected")).toEqual([
        { type: "filter.rejected", actor: "filters", topicId: undefined, payload: { missing: ["nope"] } },
      ]);
    });
  });

  describe("addFilter", () => {
    it("adds a rule with an explicit tag set", async () => {
      await engine.addFilter("#ops", "2", "watch", ["urgent", "release"]);
      expect(await engine.getRules("2")).toEqual([{ channel: "#ops", filter: "watch", tags: ["urgent", "release"] }]);
    });

    it("names the missing tag and makes no change", async () => {
      await engine.addFilter("#ops", "2", "watch", ["urgent"]);
      const error = await engine.addFilter("#ops", "2", "mute", ["urgent", "ghost"]).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TagNotFoundError);
      expect(error instanceof TagNotFoundError && error.missing).toEqual(["ghost"]);
      expect(await engine.getRules("2")).toEqual([{ channel: "#ops", filter: "watch", tags: ["urgent"] }]);
    });

    it("collapses duplicate tags", async () => {
      await engine.addFilter("#ops", "2", "watch", ["urgent", "urgent"]);
      expect(await engine.getRules("2")).toEqual([{ channel: "#ops", filter: "watch", tags: ["urgent"] }]);
    });
  });

  describe("removeFilter", () => {
    it("removes the rule with the exact tag set", async () => {
      await engine.addFilter("#ops", "2", "watch");
      await engine.addFilter("#ops", "2", "mute", ["misc"]);

      const { changes } = await engine.removeFilter("#ops", "2", ["misc"]);

      expect(changes.removed).toEqual([{ channel: "#ops", filter: "mute", tags: ["misc"] }]);
      expect(await engine.getRules("2")).toEqual([{ channel: "#ops", filter: "watch" }]);
    });
  });

  describe("rulesForChannel", () => {
    it("lists concrete scopes before the wildcard scope", async () => {
      await engine.setCategoryFilter("#ops", "*", "watch");
      await engine.setCategoryFilter("#ops", "2", "mute");
      await engine.setCategoryFilter("#dev", "2", "follow");

      expect(await engine.rulesForChannel("#ops")).toEqual([
        { channel: "#ops", filter: "mute", scope: "2" },
        { channel: "#ops", filter: "watch", scope: "*" },
      ]);
    });
  });

  it("serialises concurrent edits of one scope", async () => {
    await Promise.all([
      engine.setCategoryFilter("#a", "1", "follow"),
      engine.setCategoryFilter("#b", "1", "watch"),
      engine.setTagFilter("#c", "1", "mute", "misc"),
    ]);

    expect(await engine.getRules("1")).toEqual([
      { channel: "#a", filter: "follow" },
      { channel: "#b", filter: "watch" },
      { channel: "#c", filter: "mute", tags: ["misc"] },
    ]);
  });

  it("keeps each tag at one level per channel across any sequence of tag edits", async () => {
    // Small seeded LCG so every run replays the same sequences
    let seed = 0x2f6b;
    const next = (n: number): number => {
      seed = (seed * 1_103_515_245 + 12_345) % 2_147_483_648;
      return seed % n;
    };
    const channels = ["#a", "#b"];
    const levels = ["follow", "watch", "mute", "unset"] as const;

    for (let run = 0; run < 25; run++) {
      const fresh = new FilterRuleEngine({ store: new FilterStore(new MemoryKeyValueStore()), tags: new StaticTagRegistry(TAGS) });
      for (let step = 0; step < 20; step++) {
        const channel = channels[next(channels.length)] ?? "#a";
        const level = levels[next(levels.length)] ?? "unset";
        const tag = TAGS[next(TAGS.length)] ?? "misc";
        await fresh.setTagFilter(channel, "1", level, tag);

        const rules = await fresh.getRules("1");
        const holders = new Map<string, number>();
        for (const rule of rules) {
          expect(rule.tags).toBeDefined();
          expect(rule.tags?.length).toBeGreaterThan(0);
          for (const t of rule.tags ?? []) {
            const key = `${rule.channel}|${t}`;
            holders.set(key, (holders.get(key) ?? 0) + 1);
          }
        }
        for (const count of holders.values()) {
          expect(count).toBe(1);
        }

        const last = rules.find((r) => r.channel === channel && r.tags?.includes(tag));
        expect(last?.filter).toBe(level === "unset" ? undefined : level);
      }
    }
  });
});
