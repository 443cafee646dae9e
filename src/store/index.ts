export type { IKeyValueStore, KeyedLockManager } from "./interfaces.js";
export { MemoryKeyValueStore } from "./memory-kv.js";
export { FilesystemKeyValueStore } from "./filesystem-kv.js";
export { SqliteKeyValueStore } from "./sqlite-kv.js";
export { InMemoryKeyedLockManager } from "./key-lock.js";
export { FilterStore, scopeKey, CATEGORY_KEY_PREFIX } from "./filter-store.js";
export { ConversationStore, conversationKey } from "./conversation-store.js";
export { openKeyValueStore } from "./factory.js";
