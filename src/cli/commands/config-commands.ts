/**
 * Configuration commands.
 */

import { resolve } from "node:path";
import type { Command } from "commander";
import { getConfigValue, loadConfig } from "../../config/index.js";
import { globalOptions } from "../context.js";

const SECRET_KEYS = new Set(["slack.accessToken", "slack.incomingToken", "slack.webhookUrl"]);

export function formatConfigValue(key: string, value: unknown): string {
  if (SECRET_KEYS.has(key) && typeof value === "string" && value.length > 0) return "********";
  return typeof value === "object" && value !== null ? JSON.stringify(value, null, 2) : String(value);
}

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Configuration inspection");

  config
    .command("get <key>")
    .description("Get config value (dot-notation, after defaults and env overrides)")
    .action(async (key: string) => {
      const loaded = await loadConfig(resolve(globalOptions(program).config));
      const value = getConfigValue(loaded, key);
      if (value === undefined) {
        console.log(`Key '${key}' not found`);
        process.exitCode = 1;
      } else {
        console.log(formatConfigValue(key, value));
      }
    });
}
