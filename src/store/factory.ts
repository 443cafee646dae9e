import { FilesystemKeyValueStore } from "./filesystem-kv.js";
import { MemoryKeyValueStore } from "./memory-kv.js";
import { SqliteKeyValueStore } from "./sqlite-kv.js";
import type { IKeyValueStore } from "./interfaces.js";
import type { StorageConfig } from "../schemas/config.js";

/** Open the key-value store selected by configuration. */
export async function openKeyValueStore(config: StorageConfig): Promise<IKeyValueStore> {
  switch (config.driver) {
    case "memory":
      return new MemoryKeyValueStore();
    case "sqlite":
      return SqliteKeyValueStore.open(config.path);
    case "filesystem": {
      const store = new FilesystemKeyValueStore(config.path);
      await store.init();
      return store;
    }
  }
}
