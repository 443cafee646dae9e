/**
 * Request bodies accepted by the admin HTTP surface.
 */

import { z } from "zod";
import { FilterLevel } from "./subscription.js";
import { PostCreatedEvent } from "./post.js";

const Tags = z.array(z.string().min(1)).optional();

export const AddFilterRequest = z.object({
  channel: z.string().min(1),
  /** Omitted or "*" for every category. */
  categoryId: z.string().optional(),
  filter: FilterLevel,
  tags: Tags,
});
export type AddFilterRequest = z.infer<typeof AddFilterRequest>;

export const RemoveFilterRequest = z.object({
  channel: z.string().min(1),
  categoryId: z.string().optional(),
  tags: Tags,
});
export type RemoveFilterRequest = z.infer<typeof RemoveFilterRequest>;

/** Chat platform slash command payload (form-encoded). */
export const SlashCommandRequest = z.object({
  token: z.string().optional(),
  text: z.string().default(""),
  channel_name: z.string().min(1),
  user_name: z.string().optional(),
});
export type SlashCommandRequest = z.infer<typeof SlashCommandRequest>;

export const TestNotificationRequest = z.object({
  channel: z.string().min(1),
  event: PostCreatedEvent,
});
export type TestNotificationRequest = z.infer<typeof TestNotificationRequest>;
