/**
 * topic-relay CLI: routes forum posts to chat channels.
 * Built with Commander for arg parsing, help generation, and subcommands.
 *
 * This module configures the Commander program with all commands registered.
 * It is separated from the entrypoint (index.ts) so that tests can import
 * the program object without triggering parseAsync.
 */

import { Command } from "commander";
import { DEFAULT_CONFIG_PATH } from "./context.js";
import { registerFilterCommands } from "./commands/filters.js";
import { registerRelayCommands } from "./commands/relay.js";
import { registerConfigCommands } from "./commands/config-commands.js";

export function createProgram(): Command {
  const program = new Command()
    .name("topic-relay")
    .version("0.1.0")
    .description("Route new forum posts to subscribed chat channels")
    .option("--config <path>", "Path to relay.yaml", DEFAULT_CONFIG_PATH)
    .option("--dry-run", "Print messages instead of sending them", false);

  // --- filters, subscribe, status ---
  registerFilterCommands(program);

  // --- notify, serve ---
  registerRelayCommands(program);

  // --- config ---
  registerConfigCommands(program);

  return program;
}

export const program = createProgram();
