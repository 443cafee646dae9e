/**
 * Forum-side shapes: the post-created event and the registry records the
 * relay looks up while handling it.
 */

import { z } from "zod";

export const PostType = z.enum(["regular", "moderator_action", "small_action", "whisper"]);
export type PostType = z.infer<typeof PostType>;

export const TopicArchetype = z.enum(["regular", "private_message"]);
export type TopicArchetype = z.infer<typeof TopicArchetype>;

export const PostAuthor = z.object({
  username: z.string().min(1),
  /** Full name; may be blank. */
  name: z.string().nullish(),
  avatarUrl: z.string().optional(),
});
export type PostAuthor = z.infer<typeof PostAuthor>;

export const TopicInfo = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  categoryId: z.string().min(1),
  tags: z.array(z.string()).default([]),
  archetype: TopicArchetype.default("regular"),
});
export type TopicInfo = z.infer<typeof TopicInfo>;

export const PostInfo = z.object({
  id: z.number().int().positive(),
  postNumber: z.number().int().positive(),
  type: PostType.default("regular"),
  /** Absolute URL of the post. */
  url: z.string(),
  /** Cooked HTML, handed to the excerpt formatter. */
  cooked: z.string().default(""),
});
export type PostInfo = z.infer<typeof PostInfo>;

/** Event emitted by the forum when a post is created. */
export const PostCreatedEvent = z.object({
  post: PostInfo,
  topic: TopicInfo,
  author: PostAuthor,
});
export type PostCreatedEvent = z.infer<typeof PostCreatedEvent>;

/** Forum category as known to the category registry. */
export const Category = z.object({
  id: z.string().min(1),
  name: z.string(),
  slug: z.string(),
  /** Hex colour without the leading "#". */
  color: z.string().default("0088CC"),
  parentId: z.string().optional(),
});
export type Category = z.infer<typeof Category>;

/** The subset of an event the matcher looks at. */
export interface MatchInput {
  categoryId: string;
  tags: readonly string[];
  isFirstPost: boolean;
}

export function isFirstPost(event: PostCreatedEvent): boolean {
  return event.post.postNumber === 1;
}

export function toMatchInput(event: PostCreatedEvent): MatchInput {
  return {
    categoryId: event.topic.categoryId,
    tags: event.topic.tags,
    isFirstPost: isFirstPost(event),
  };
}
