/**
 * MessageComposer: renders a post as a chat message.
 *
 * Title, link and thumbnail are only set on the first attachment of a new
 * thread. Edits of an existing thread leave them out so the chat client does
 * not re-render a link preview on every update.
 */

import type { ChatAttachment, ChatMessage } from "../schemas/conversation.js";
import type { Category, PostAuthor, PostCreatedEvent } from "../schemas/post.js";
import type { CategoryRegistry, ExcerptFormatter } from "../host/interfaces.js";

export interface ComposerSettings {
  /** Bot username shown in chat. */
  siteTitle: string;
  baseUrl: string;
  iconUrl?: string;
  logoSmallUrl?: string;
  excerptLength: number;
  taggingEnabled: boolean;
}

export interface ComposeOptions {
  /** True when this message opens a new chat thread. */
  newThread: boolean;
}

const DEFAULT_COLOR = "0088CC";

function collapseWhitespace(value: string): string {
  return value.trim().replace(/\s+/g, " ");
}

/**
 * "Full Name @username", or "@username" when the full name is blank or just
 * restates the username (ignoring case, with spaces dropped or turned into
 * underscores).
 */
export function displayName(author: PostAuthor): string {
  const handle = `@${author.username}`;
  const fullName = collapseWhitespace(author.name ?? "");
  if (fullName.length === 0) return handle;

  const username = author.username.toLowerCase();
  const compact = fullName.replace(/ /g, "").toLowerCase();
  const underscored = fullName.replace(/ /g, "_").toLowerCase();
  if (compact === username || underscored === username) return handle;

  return `${fullName} ${handle}`;
}

/** "[Parent/Child]" or "[Child]"; empty for the uncategorized category. */
export function categoryLabel(category: Category | undefined, parent: Category | undefined): string {
  if (!category || category.slug === "uncategorized") return "";
  return parent ? `[${parent.name}/${category.name}]` : `[${category.name}]`;
}

export function composeTitle(
  event: PostCreatedEvent,
  category: Category | undefined,
  parent: Category | undefined,
  taggingEnabled: boolean,
): string {
  const parts = [event.topic.title, categoryLabel(category, parent)];
  if (taggingEnabled && event.topic.tags.length > 0) {
    parts.push(event.topic.tags.join(", "));
  }
  return parts.filter((part) => part.length > 0).join(" ");
}

export function resolveIconUrl(settings: ComposerSettings): string | undefined {
  if (settings.iconUrl) return settings.iconUrl;
  if (settings.logoSmallUrl) return `${settings.baseUrl}${settings.logoSmallUrl}`;
  return undefined;
}

export interface ComposeInput {
  event: PostCreatedEvent;
  channel: string;
  excerpt: string;
  category?: Category;
  parentCategory?: Category;
}

/** Pure message assembly from already-resolved inputs. */
export function composeMessage(
  input: ComposeInput,
  settings: ComposerSettings,
  opts: ComposeOptions,
): ChatMessage {
  const { event } = input;
  const author = displayName(event.author);

  const attachment: ChatAttachment = {
    fallback: `${event.topic.title} - ${author}`,
    author_name: author,
    author_icon: event.author.avatarUrl,
    color: `#${input.category?.color ?? DEFAULT_COLOR}`,
    text: input.excerpt,
    mrkdwn_in: ["text"],
  };

  if (opts.newThread) {
    attachment.title = composeTitle(event, input.category, input.parentCategory, settings.taggingEnabled);
    attachment.title_link = event.post.url;
    attachment.thumb_url = event.post.url;
  }

  return {
    channel: input.channel,
    username: settings.siteTitle,
    icon_url: resolveIconUrl(settings),
    attachments: [attachment],
  };
}

export class MessageComposer {
  constructor(
    private readonly categories: CategoryRegistry,
    private readonly formatter: ExcerptFormatter,
    private readonly settings: ComposerSettings,
  ) {}

  async compose(event: PostCreatedEvent, channel: string, opts: ComposeOptions): Promise<ChatMessage> {
    const category = await this.categories.get(event.topic.categoryId);
    const parentCategory = category?.parentId ? await this.categories.get(category.parentId) : undefined;
    const excerpt = this.formatter.excerpt(event, this.settings.excerptLength);

    return composeMessage({ event, channel, excerpt, category, parentCategory }, this.settings, opts);
  }
}
