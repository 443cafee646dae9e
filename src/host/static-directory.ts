/**
 * Config-backed host collaborators for standalone mode (CLI, HTTP server).
 *
 * Categories and tags come from relay.yaml. Posts are visible unless their
 * category is listed as restricted.
 */

import type { Category, PostCreatedEvent } from "../schemas/post.js";
import type { CategoryRegistry, ExcerptFormatter, PermissionCheck, TagRegistry } from "./interfaces.js";

export class StaticTagRegistry implements TagRegistry {
  private readonly names: Set<string>;

  constructor(names: readonly string[]) {
    this.names = new Set(names);
  }

  async findExisting(names: readonly string[]): Promise<string[]> {
    return names.filter((name) => this.names.has(name));
  }
}

export class StaticCategoryRegistry implements CategoryRegistry {
  private readonly byId: Map<string, Category>;

  constructor(categories: readonly Category[]) {
    this.byId = new Map(categories.map((c) => [c.id, c]));
  }

  async get(id: string): Promise<Category | undefined> {
    return this.byId.get(id);
  }

  async findBySlug(slug: string): Promise<Category | undefined> {
    const wanted = slug.toLowerCase();
    for (const category of this.byId.values()) {
      if (category.slug.toLowerCase() === wanted) return category;
    }
    return undefined;
  }

  async list(): Promise<Category[]> {
    return Array.from(this.byId.values());
  }
}

export class CategoryPermissionCheck implements PermissionCheck {
  private readonly restricted: Set<string>;

  constructor(restrictedCategoryIds: readonly string[] = []) {
    this.restricted = new Set(restrictedCategoryIds);
  }

  async canSee(event: PostCreatedEvent): Promise<boolean> {
    return !this.restricted.has(event.topic.categoryId);
  }
}

const ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": "\"",
  "&#39;": "'",
  "&nbsp;": " ",
};

/**
 * Plain-text excerpt of the cooked HTML: links become <url|label>, bold and
 * italic become *x* / _x_, other tags are dropped, then it is truncated.
 */
export class PlainExcerptFormatter implements ExcerptFormatter {
  excerpt(event: PostCreatedEvent, maxLength: number): string {
    const text = event.post.cooked
      .replace(/<a [^>]*href="([^"]+)"[^>]*>(.*?)<\/a>/gi, "<$1|$2>")
      .replace(/<\/?(strong|b)>/gi, "*")
      .replace(/<\/?(em|i)>/gi, "_")
      .replace(/<br\s*\/?>|<\/p>/gi, "\n")
      .replace(/<(?!https?:)[^>]+>/gi, "")
      .replace(/&(amp|lt|gt|quot|#39|nbsp);/g, (entity) => ENTITIES[entity] ?? entity)
      .replace(/\n{2,}/g, "\n")
      .trim();

    const chars = Array.from(text);
    if (chars.length <= maxLength) return text;

    let cut = chars.slice(0, maxLength).join("");
    // Never leave half a <url|label> link
    const open = cut.lastIndexOf("<");
    if (open > cut.lastIndexOf(">")) cut = cut.slice(0, open);
    return `${cut.trimEnd()}…`;
  }
}
