/**
 * Filter rule commands: list, add, remove, subscribe, status.
 */

import type { Command } from "commander";
import { FilterLevel, FilterLevelInput, ALL_CATEGORIES } from "../../schemas/subscription.js";
import type { ScopedRule } from "../../schemas/subscription.js";
import { TagNotFoundError } from "../../filters/errors.js";
import { SlashCommandHandler, parseTarget } from "../../commands/slash.js";
import { openContext } from "../context.js";

function parseTags(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const tags = value.split(",").map((t) => t.trim()).filter((t) => t.length > 0);
  return tags.length > 0 ? tags : undefined;
}

export function formatRule(rule: ScopedRule): string {
  const tags = rule.tags ? ` tags=${rule.tags.join(",")}` : "";
  return `${rule.scope.padEnd(8)} ${rule.channel.padEnd(20)} ${rule.filter}${tags}`;
}

export function registerFilterCommands(program: Command): void {
  const filters = program
    .command("filters")
    .description("Manage channel subscription rules");

  filters
    .command("list")
    .description("List rules of every scope")
    .option("--channel <channel>", "Only rules for this channel")
    .option("--json", "Output as JSON", false)
    .action(async (opts: { channel?: string; json: boolean }) => {
      const ctx = await openContext(program);
      const rules = opts.channel
        ? await ctx.engine.rulesForChannel(opts.channel)
        : await ctx.engine.listFilters();

      if (opts.json) {
        console.log(JSON.stringify(rules, null, 2));
        return;
      }
      if (rules.length === 0) {
        console.log("No rules.");
        return;
      }
      for (const rule of rules) {
        console.log(formatRule(rule));
      }
    });

  filters
    .command("add <channel> <filter>")
    .description("Add a rule (filter: follow | watch | mute)")
    .option("--category <id>", "Category id", ALL_CATEGORIES)
    .option("--tags <list>", "Comma-separated tags")
    .action(async (channel: string, filter: string, opts: { category: string; tags?: string }) => {
      const level = FilterLevel.safeParse(filter);
      if (!level.success) {
        console.error(`Invalid filter '${filter}' (expected follow, watch or mute)`);
        process.exitCode = 1;
        return;
      }

      const ctx = await openContext(program);
      try {
        const { changes } = await ctx.engine.addFilter(channel, opts.category, level.data, parseTags(opts.tags));
        const verb = changes.updated.length > 0 ? "Replaced" : "Added";
        console.log(`✅ ${verb} ${level.data} rule for ${channel} in ${opts.category}`);
      } catch (err) {
        if (err instanceof TagNotFoundError) {
          console.error(`❌ ${err.message}`);
          process.exitCode = 1;
          return;
        }
        throw err;
      }
    });

  filters
    .command("remove <channel>")
    .description("Remove the rule matching channel and tag set exactly")
    .option("--category <id>", "Category id", ALL_CATEGORIES)
    .option("--tags <list>", "Comma-separated tags")
    .action(async (channel: string, opts: { category: string; tags?: string }) => {
      const ctx = await openContext(program);
      const { changes } = await ctx.engine.removeFilter(channel, opts.category, parseTags(opts.tags));
      if (changes.removed.length === 0) {
        console.log(`No matching rule for ${channel} in ${opts.category}`);
        process.exitCode = 1;
        return;
      }
      console.log(`✅ Removed ${changes.removed.length} rule(s) for ${channel} in ${opts.category}`);
    });

  program
    .command("subscribe <channel> <level> <target>")
    .description("Set a channel's filter for a category slug, 'all', or 'tag:<name>' (level may be 'unset')")
    .action(async (channel: string, level: string, target: string) => {
      const parsed = FilterLevelInput.safeParse(level);
      if (!parsed.success) {
        console.error(`Invalid level '${level}' (expected follow, watch, mute or unset)`);
        process.exitCode = 1;
        return;
      }

      const ctx = await openContext(program);
      const commands = new SlashCommandHandler({
        engine: ctx.engine,
        categories: ctx.categories,
        taggingEnabled: ctx.config.taggingEnabled,
      });
      console.log(await commands.subscribe(channel, parsed.data, parseTarget(target)));
    });

  program
    .command("status <channel>")
    .description("Show a channel's subscriptions")
    .action(async (channel: string) => {
      const ctx = await openContext(program);
      const commands = new SlashCommandHandler({
        engine: ctx.engine,
        categories: ctx.categories,
        taggingEnabled: ctx.config.taggingEnabled,
      });
      console.log(await commands.status(channel));
    });
}
