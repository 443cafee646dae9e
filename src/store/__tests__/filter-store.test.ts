import { describe, it, expect, beforeEach, vi } from "vitest";
import { MemoryKeyValueStore } from "../memory-kv.js";
import { FilterStore, scopeKey } from "../filter-store.js";
import { ConversationStore, conversationKey } from "../conversation-store.js";

describe("scopeKey", () => {
  it("maps category ids and the wildcard to storage keys", () => {
    expect(scopeKey("5")).toBe("category_5");
    expect(scopeKey("*")).toBe("category_*");
    expect(scopeKey(undefined)).toBe("category_*");
    expect(scopeKey("")).toBe("category_*");
  });
});

describe("FilterStore", () => {
  let kv: MemoryKeyValueStore;
  let store: FilterStore;

  beforeEach(() => {
    kv = new MemoryKeyValueStore();
    store = new FilterStore(kv);
  });

  it("returns an empty list for a scope with no rules", async () => {
    expect(await store.getRules("5")).toEqual([]);
  });

  it("persists rules without an empty tags field", async () => {
    await store.saveRules("5", [
      { channel: "#ops", filter: "watch" },
      { channel: "#ops", filter: "mute", tags: ["misc"] },
    ]);

    expect(await kv.get("category_5")).toEqual([
      { channel: "#ops", filter: "watch" },
      { channel: "#ops", filter: "mute", tags: ["misc"] },
    ]);
  });

  it("removes the key when saving an empty list", async () => {
    await store.saveRules("5", [{ channel: "#ops", filter: "watch" }]);
    await store.saveRules("5", []);
    expect(await kv.keys()).toEqual([]);
  });

  it("drops malformed entries and warns", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    await kv.set("category_5", [
      { channel: "#ops", filter: "watch" },
      { channel: "#ops", filter: "shout" },
      { channel: "#dev", filter: "follow", tags: [] },
    ]);

    expect(await store.getRules("5")).toEqual([
      { channel: "#ops", filter: "watch" },
      { channel: "#dev", filter: "follow" },
    ]);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it("lists every rule with its scope", async () => {
    await store.saveRules("*", [{ channel: "#all", filter: "follow" }]);
    await store.saveRules("5", [{ channel: "#ops", filter: "watch" }]);
    await kv.set(conversationKey(1, "#ops"), { ts: "1.0", channel: "C1", message: {} });

    expect(await store.listScopes()).toEqual(["*", "5"]);
    expect(await store.listAll()).toEqual([
      { channel: "#all", filter: "follow", scope: "*" },
      { channel: "#ops", filter: "watch", scope: "5" },
    ]);
  });
});

describe("ConversationStore", () => {
  let kv: MemoryKeyValueStore;
  let store: ConversationStore;

  beforeEach(() => {
    kv = new MemoryKeyValueStore();
    store = new ConversationStore(kv);
  });

  it("keys records by topic and channel", () => {
    expect(conversationKey(42, "#general")).toBe("topic_42_#general");
  });

  it("round-trips state and fills message defaults", async () => {
    await kv.set("topic_42_#general", { ts: "1700000000.000100", channel: "C123", message: { attachments: [{}] } });

    expect(await store.get(42, "#general")).toEqual({
      ts: "1700000000.000100",
      channel: "C123",
      message: { username: "", text: "", attachments: [{}] },
    });
  });

  it("treats a malformed record as absent", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    await kv.set("topic_42_#general", { channel: "C123" });

    expect(await store.get(42, "#general")).toBeUndefined();
    expect(warn).toHaveBeenCalledWith("[ConversationStore] Ignoring malformed record topic_42_#general");
    warn.mockRestore();
  });
});
