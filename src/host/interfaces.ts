/**
 * Forum-side collaborators the relay consumes.
 *
 * The relay never reaches into the forum directly; the host process wires
 * these to its own tag table, category tree, permission system and post
 * renderer.
 */

import type { Category, PostCreatedEvent } from "../schemas/post.js";

export interface TagRegistry {
  /** Of the given names, return those that exist. */
  findExisting(names: readonly string[]): Promise<string[]>;
}

export interface CategoryRegistry {
  get(id: string): Promise<Category | undefined>;
  findBySlug(slug: string): Promise<Category | undefined>;
  list(): Promise<Category[]>;
}

/** Can the relay's acting user see this post? */
export interface PermissionCheck {
  canSee(event: PostCreatedEvent): Promise<boolean>;
}

/** Renders a post to a chat-markup excerpt. */
export interface ExcerptFormatter {
  excerpt(event: PostCreatedEvent, maxLength: number): string;
}
