/**
 * Relay configuration schema (relay.yaml).
 */

import { z } from "zod";
import { Category } from "./post.js";

/** Chat vendor settings. Token mode when accessToken is set, webhook mode otherwise. */
export const SlackConfig = z.object({
  accessToken: z.string().default(""),
  webhookUrl: z.string().default(""),
  /** Shared secret the chat vendor sends with slash commands. */
  incomingToken: z.string().default(""),
  apiBaseUrl: z.string().url().default("https://slack.com/api"),
  /** Per-request timeout for outbound calls. */
  timeoutMs: z.number().int().positive().default(10_000),
});
export type SlackConfig = z.infer<typeof SlackConfig>;

export const DispatchConfig = z.object({
  /** Age after which a sent message is no longer edited. Default: 5 minutes. */
  freshnessWindowMs: z.number().int().positive().default(300_000),
  /** Attachments per message before a new thread is started. */
  attachmentCap: z.number().int().positive().default(5),
});
export type DispatchConfig = z.infer<typeof DispatchConfig>;

export const StorageConfig = z.object({
  driver: z.enum(["filesystem", "sqlite", "memory"]).default("filesystem"),
  /** Directory (filesystem) or database file (sqlite). */
  path: z.string().default("./data"),
});
export type StorageConfig = z.infer<typeof StorageConfig>;

export const ServerConfig = z.object({
  port: z.number().int().positive().default(18010),
  bind: z.string().default("127.0.0.1"),
});
export type ServerConfig = z.infer<typeof ServerConfig>;

export const RelayConfig = z.object({
  schemaVersion: z.literal(1).default(1),
  siteTitle: z.string().default("Forum"),
  baseUrl: z.string().default(""),
  iconUrl: z.string().optional(),
  logoSmallUrl: z.string().optional(),
  excerptLength: z.number().int().positive().default(400),
  taggingEnabled: z.boolean().default(true),
  slack: SlackConfig.default({}),
  dispatch: DispatchConfig.default({}),
  storage: StorageConfig.default({}),
  server: ServerConfig.default({}),
  eventsDir: z.string().default("./events"),
  categories: z.array(Category).default([]),
  tags: z.array(z.string().min(1)).default([]),
  /** Category ids whose posts the relay may not see. */
  restrictedCategories: z.array(z.string()).default([]),
});
export type RelayConfig = z.infer<typeof RelayConfig>;
