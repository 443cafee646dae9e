/**
 * Relay configuration: relay.yaml validated against RelayConfig.
 *
 * Environment variables override the file:
 *   RELAY_ACCESS_TOKEN, RELAY_WEBHOOK_URL, RELAY_INCOMING_TOKEN, RELAY_PORT
 */

import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { RelayConfig } from "../schemas/config.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Apply environment overrides to raw (unvalidated) config data. */
export function applyEnvOverrides(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  const slack = isRecord(raw["slack"]) ? { ...raw["slack"] } : {};
  const server = isRecord(raw["server"]) ? { ...raw["server"] } : {};

  if (env["RELAY_ACCESS_TOKEN"] !== undefined) slack["accessToken"] = env["RELAY_ACCESS_TOKEN"];
  if (env["RELAY_WEBHOOK_URL"] !== undefined) slack["webhookUrl"] = env["RELAY_WEBHOOK_URL"];
  if (env["RELAY_INCOMING_TOKEN"] !== undefined) slack["incomingToken"] = env["RELAY_INCOMING_TOKEN"];
  if (env["RELAY_PORT"] !== undefined) {
    const port = Number.parseInt(env["RELAY_PORT"], 10);
    if (Number.isNaN(port)) throw new ConfigError(`Invalid RELAY_PORT: ${env["RELAY_PORT"]}`);
    server["port"] = port;
  }

  return { ...raw, slack, server };
}

/** Validate already-parsed config data. */
export function parseConfig(raw: unknown, env: Env = {}): RelayConfig {
  const base = raw === undefined || raw === null ? {} : raw;
  if (!isRecord(base)) {
    throw new ConfigError("Config must be a YAML mapping");
  }

  const result = RelayConfig.safeParse(applyEnvOverrides(base, env));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError(`Invalid config:\n  ${issues.join("\n  ")}`);
  }
  return result.data;
}

/**
 * Load relay.yaml. A missing file yields defaults (plus environment
 * overrides); a malformed one throws ConfigError.
 */
export async function loadConfig(configPath: string, env: Env = process.env): Promise<RelayConfig> {
  let content: string | undefined;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== "ENOENT") throw err;
  }

  let raw: unknown;
  try {
    raw = content === undefined ? {} : parseYaml(content);
  } catch (err) {
    throw new ConfigError(`Failed to parse ${configPath}: ${(err as Error).message}`);
  }

  return parseConfig(raw, env);
}

/** Read a value by dot-notation path (e.g. "dispatch.attachmentCap"). */
export function getConfigValue(config: RelayConfig, key: string): unknown {
  let current: unknown = config;
  for (const part of key.split(".")) {
    if (Array.isArray(current)) {
      const index = Number.parseInt(part, 10);
      current = Number.isNaN(index) ? undefined : current[index];
    } else if (isRecord(current)) {
      current = current[part];
    } else {
      return undefined;
    }
  }
  return current;
}
