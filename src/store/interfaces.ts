/**
 * IKeyValueStore: the persistence collaborator.
 *
 * The relay keeps two record families in one opaque key-value space:
 *   category_<id> / category_*       → subscription rule list
 *   topic_<topicId>_<channel>        → conversation state
 *
 * Values are JSON-serialisable; stores never interpret them.
 */

export interface IKeyValueStore {
  /**
   * Read a value.
   * Returns undefined if the key is absent.
   */
  get(key: string): Promise<unknown>;

  /** Write a value, replacing any previous one. */
  set(key: string, value: unknown): Promise<void>;

  /**
   * Delete a key.
   * Returns true if something was removed.
   */
  remove(key: string): Promise<boolean>;

  /** List keys starting with prefix, sorted. */
  keys(prefix?: string): Promise<string[]>;

  /** Release underlying handles, where the store holds any. */
  close?(): void;
}

/**
 * Serialises async work per key. Callers holding different keys run
 * concurrently; callers on the same key run one after another.
 */
export interface KeyedLockManager {
  withLock<T>(key: string, fn: () => Promise<T>): Promise<T>;
}
