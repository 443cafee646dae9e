import { resolve } from "node:path";
import type { Command } from "commander";
import { loadConfig } from "../config/index.js";
import { createRelayContext, type RelayContext } from "../service/bootstrap.js";

export const DEFAULT_CONFIG_PATH = process.env["RELAY_CONFIG"] ?? "relay.yaml";

export interface GlobalOptions {
  config: string;
  dryRun: boolean;
}

export function globalOptions(program: Command): GlobalOptions {
  return program.opts<GlobalOptions>();
}

/** Load configuration and wire the relay for one CLI invocation. */
export async function openContext(program: Command): Promise<RelayContext> {
  const opts = globalOptions(program);
  const config = await loadConfig(resolve(opts.config));
  return createRelayContext(config, { dryRun: opts.dryRun });
}
