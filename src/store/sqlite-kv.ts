import Database from "better-sqlite3";

import type { IKeyValueStore } from "./interfaces.js";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS relay_store (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
`;

const GET_SQL = "SELECT value FROM relay_store WHERE key = ?";
const UPSERT_SQL = `
  INSERT INTO relay_store(key, value, updated_at) VALUES (?, ?, ?)
  ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
`;
const DELETE_SQL = "DELETE FROM relay_store WHERE key = ?";
const KEYS_SQL = "SELECT key FROM relay_store WHERE substr(key, 1, ?) = ? ORDER BY key";

type ValueRow = { value: string };
type KeyRow = { key: string };

/** SQLite-backed key-value store, one row per key. */
export class SqliteKeyValueStore implements IKeyValueStore {
  private readonly getStmt;
  private readonly upsertStmt;
  private readonly deleteStmt;
  private readonly keysStmt;

  constructor(private readonly db: Database.Database) {
    db.exec(SCHEMA);
    this.getStmt = db.prepare<[string], ValueRow>(GET_SQL);
    this.upsertStmt = db.prepare<[string, string, string]>(UPSERT_SQL);
    this.deleteStmt = db.prepare<[string]>(DELETE_SQL);
    this.keysStmt = db.prepare<[number, string], KeyRow>(KEYS_SQL);
  }

  /** Open (or create) a database file. Pass ":memory:" for a throwaway store. */
  static open(path: string): SqliteKeyValueStore {
    const db = new Database(path);
    db.pragma("journal_mode = WAL");
    return new SqliteKeyValueStore(db);
  }

  async get(key: string): Promise<unknown> {
    const row = this.getStmt.get(key);
    return row ? JSON.parse(row.value) : undefined;
  }

  async set(key: string, value: unknown): Promise<void> {
    this.upsertStmt.run(key, JSON.stringify(value), new Date().toISOString());
  }

  async remove(key: string): Promise<boolean> {
    return this.deleteStmt.run(key).changes > 0;
  }

  async keys(prefix = ""): Promise<string[]> {
    return this.keysStmt.all(prefix.length, prefix).map((row) => row.key);
  }

  close(): void {
    this.db.close();
  }
}
