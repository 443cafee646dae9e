/**
 * Filesystem-backed key-value store.
 *
 * Layout: <dir>/<encoded key>.json, one record per file.
 * Writes go through write-file-atomic so a crash never leaves a torn record.
 */

import { readFile, readdir, mkdir, unlink } from "node:fs/promises";
import { join, resolve } from "node:path";
import writeFileAtomic from "write-file-atomic";
import type { IKeyValueStore } from "./interfaces.js";

const SUFFIX = ".json";

function encodeKey(key: string): string {
  return encodeURIComponent(key).replace(/\*/g, "%2A") + SUFFIX;
}

function decodeKey(filename: string): string {
  return decodeURIComponent(filename.slice(0, -SUFFIX.length));
}

export class FilesystemKeyValueStore implements IKeyValueStore {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = resolve(dir);
  }

  /** Ensure the storage directory exists. */
  async init(): Promise<void> {
    await mkdir(this.dir, { recursive: true });
  }

  private pathFor(key: string): string {
    return join(this.dir, encodeKey(key));
  }

  async get(key: string): Promise<unknown> {
    let content: string;
    try {
      content = await readFile(this.pathFor(key), "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return undefined;
      throw err;
    }
    return JSON.parse(content);
  }

  async set(key: string, value: unknown): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await writeFileAtomic(this.pathFor(key), JSON.stringify(value, null, 2) + "\n");
  }

  async remove(key: string): Promise<boolean> {
    try {
      await unlink(this.pathFor(key));
      return true;
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
      throw err;
    }
  }

  async keys(prefix = ""): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
      throw err;
    }

    return entries
      .filter((entry) => entry.endsWith(SUFFIX))
      .map(decodeKey)
      .filter((key) => key.startsWith(prefix))
      .sort();
  }
}
