/**
 * Event Logger — append-only JSONL event log.
 *
 * Writes one JSON object per line to events/YYYY-MM-DD.jsonl.
 * Uses the BaseEvent schema from schemas/event.ts.
 */

import { appendFile, mkdir, symlink, unlink, readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { BaseEvent } from "../schemas/event.js";
import type { EventType } from "../schemas/event.js";

export type EventCallback = (event: BaseEvent) => void | Promise<void>;

export interface EventLoggerOptions {
  onEvent?: EventCallback;
}

/** Anything that can record relay events. Tests pass a recording stub. */
export interface RelayEventSink {
  log(
    type: EventType,
    actor: string,
    opts?: { topicId?: number; payload?: Record<string, unknown> },
  ): Promise<BaseEvent | void>;
}

export class EventLogger implements RelayEventSink {
  private readonly eventsDir: string;
  private readonly onEvent?: EventCallback;
  private eventCounter: number = 0;

  constructor(eventsDir: string, options?: EventLoggerOptions) {
    this.eventsDir = eventsDir;
    this.onEvent = options?.onEvent;
  }

  /** Append an event to today's JSONL file. */
  async log(
    type: EventType,
    actor: string,
    opts?: {
      topicId?: number;
      payload?: Record<string, unknown>;
    },
  ): Promise<BaseEvent> {
    this.eventCounter += 1;

    const event: BaseEvent = {
      eventId: this.eventCounter,
      type,
      timestamp: new Date().toISOString(),
      actor,
      topicId: opts?.topicId,
      payload: opts?.payload ?? {},
    };

    const date = event.timestamp.slice(0, 10); // YYYY-MM-DD
    const filePath = join(this.eventsDir, `${date}.jsonl`);

    await mkdir(this.eventsDir, { recursive: true });
    await appendFile(filePath, JSON.stringify(event) + "\n", "utf-8");

    await this.updateSymlink(date);

    if (this.onEvent) {
      await Promise.resolve(this.onEvent(event));
    }

    return event;
  }

  /** Point events.jsonl at the current day's log. */
  private async updateSymlink(date: string): Promise<void> {
    const symlinkPath = join(this.eventsDir, "events.jsonl");
    const targetFilename = `${date}.jsonl`;

    try {
      await unlink(symlinkPath);
    } catch {
      // Symlink doesn't exist yet, that's fine
    }

    try {
      await symlink(targetFilename, symlinkPath);
    } catch (err) {
      console.warn(`[EventLogger] Failed to update symlink: ${(err as Error).message}`);
    }
  }

  /**
   * Query events from the log.
   *
   * Reads all JSONL files in the events directory and filters by criteria.
   */
  async query(filter?: { type?: string; topicId?: number; actor?: string }): Promise<BaseEvent[]> {
    let files: string[];
    try {
      files = await readdir(this.eventsDir);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
      throw err;
    }
    const jsonlFiles = files.filter(f => f.endsWith(".jsonl") && f !== "events.jsonl").sort();

    const events: BaseEvent[] = [];

    for (const file of jsonlFiles) {
      const content = await readFile(join(this.eventsDir, file), "utf-8");
      const lines = content.trim().split("\n").filter(line => line.length > 0);

      for (const line of lines) {
        let raw: unknown;
        try {
          raw = JSON.parse(line);
        } catch {
          console.warn(`[EventLogger] Skipping malformed line in ${file}`);
          continue;
        }
        const parsed = BaseEvent.safeParse(raw);
        if (!parsed.success) continue;
        const event = parsed.data;

        if (filter?.type && event.type !== filter.type) continue;
        if (filter?.topicId !== undefined && event.topicId !== filter.topicId) continue;
        if (filter?.actor && event.actor !== filter.actor) continue;

        events.push(event);
      }
    }

    return events;
  }
}
