/**
 * Slash command handling: parse the command text, apply it through the
 * filter rule engine, and build the reply.
 *
 * Grammar:
 *   help | status | <follow|watch|mute|unset> <category-slug|all|tag:name>
 */

import { ALL_CATEGORIES, FilterLevelInput } from "../schemas/subscription.js";
import type { FilterRuleEngine } from "../filters/engine.js";
import { TagNotFoundError } from "../filters/errors.js";
import type { CategoryRegistry } from "../host/interfaces.js";
import { messages } from "./messages.js";

export type FilterTarget =
  | { kind: "all" }
  | { kind: "tag"; tag: string }
  | { kind: "category"; slug: string };

export type ParsedCommand =
  | { kind: "help" }
  | { kind: "status" }
  | { kind: "filter"; level: FilterLevelInput; target: FilterTarget };

const TAG_PREFIX = "tag:";

/** `all`, `tag:<name>`, or a category slug. */
export function parseTarget(arg: string): FilterTarget {
  if (arg.toLowerCase() === "all") return { kind: "all" };
  if (arg.toLowerCase().startsWith(TAG_PREFIX) && arg.length > TAG_PREFIX.length) {
    return { kind: "tag", tag: arg.slice(TAG_PREFIX.length) };
  }
  return { kind: "category", slug: arg };
}

export function parseCommand(text: string): ParsedCommand {
  const [verb = "", arg] = text.trim().split(/\s+/);
  const command = verb.toLowerCase();

  if (command === "status") return { kind: "status" };

  const level = FilterLevelInput.safeParse(command);
  if (!level.success || !arg) return { kind: "help" };

  return { kind: "filter", level: level.data, target: parseTarget(arg) };
}

/** Chat channel reference for an incoming command. */
export function commandChannel(channelName: string, userName?: string): string {
  if (channelName === "directmessage" && userName) return `@${userName}`;
  return channelName.startsWith("#") || channelName.startsWith("@") ? channelName : `#${channelName}`;
}

export interface SlashCommandHandlerOptions {
  engine: FilterRuleEngine;
  categories: CategoryRegistry;
  taggingEnabled?: boolean;
}

export class SlashCommandHandler {
  private readonly engine: FilterRuleEngine;
  private readonly categories: CategoryRegistry;
  private readonly taggingEnabled: boolean;

  constructor(opts: SlashCommandHandlerOptions) {
    this.engine = opts.engine;
    this.categories = opts.categories;
    this.taggingEnabled = opts.taggingEnabled ?? true;
  }

  /** Run a command for a channel and return the reply text. */
  async handle(channel: string, text: string): Promise<string> {
    const command = parseCommand(text);

    switch (command.kind) {
      case "help":
        return messages.help;
      case "status":
        return this.status(channel);
      case "filter":
        return this.subscribe(channel, command.level, command.target);
    }
  }

  /** One line per subscription, then the available category slugs. */
  async status(channel: string): Promise<string> {
    let text = "";

    for (const rule of await this.engine.rulesForChannel(channel)) {
      let line: string;
      if (rule.scope === ALL_CATEGORIES) {
        line = messages.statusAllCategories(rule.filter);
      } else {
        const category = await this.categories.get(rule.scope);
        if (!category) continue;
        line = messages.statusCategory(rule.filter, category.name);
      }
      if (this.taggingEnabled && rule.tags) {
        line += messages.withTags(rule.tags);
      }
      text += `${line}\n`;
    }

    return text + (await this.availableCategories());
  }

  /** Apply one filter change and return the reply line. */
  async subscribe(channel: string, level: FilterLevelInput, target: FilterTarget): Promise<string> {
    switch (target.kind) {
      case "all":
        await this.engine.setCategoryFilter(channel, ALL_CATEGORIES, level);
        return messages.successAll(level);

      case "tag":
        if (!this.taggingEnabled) return messages.help;
        try {
          await this.engine.setTagFilter(channel, ALL_CATEGORIES, level, target.tag);
        } catch (err) {
          if (err instanceof TagNotFoundError) return messages.notFoundTag(err.tag);
          throw err;
        }
        return messages.successTag(level, target.tag);

      case "category": {
        const category = await this.categories.findBySlug(target.slug);
        if (!category) {
          return messages.notFoundCategory(target.slug, await this.availableCategories());
        }
        await this.engine.setCategoryFilter(channel, category.id, level);
        return messages.successCategory(level, category.name);
      }
    }
  }

  private async availableCategories(): Promise<string> {
    const categories = await this.categories.list();
    return messages.availableCategories(categories.map((c) => c.slug));
  }
}
