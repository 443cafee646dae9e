/**
 * In-memory key-value store. Used by tests and the "memory" storage driver.
 */

import type { IKeyValueStore } from "./interfaces.js";

export class MemoryKeyValueStore implements IKeyValueStore {
  private readonly data = new Map<string, string>();

  async get(key: string): Promise<unknown> {
    const raw = this.data.get(key);
    // Values are copies, never shared references
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  async set(key: string, value: unknown): Promise<void> {
    this.data.set(key, JSON.stringify(value));
  }

  async remove(key: string): Promise<boolean> {
    return this.data.delete(key);
  }

  async keys(prefix = ""): Promise<string[]> {
    return Array.from(this.data.keys())
      .filter((key) => key.startsWith(prefix))
      .sort();
  }
}
