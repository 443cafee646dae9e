/**
 * Schema barrel export: all Zod schemas for the relay.
 */

export {
  FilterLevel,
  FilterLevelInput,
  FilterScope,
  SubscriptionRule,
  ALL_CATEGORIES,
  parseRuleList,
  ruleIdentity,
  tagSetKey,
} from "./subscription.js";

export {
  ChatAttachment,
  ChatMessage,
  SentMessage,
  ConversationState,
  tsSeconds,
} from "./conversation.js";

export {
  PostType,
  TopicArchetype,
  PostAuthor,
  TopicInfo,
  PostInfo,
  PostCreatedEvent,
  Category,
  isFirstPost,
  toMatchInput,
} from "./post.js";

export {
  SlackConfig,
  DispatchConfig,
  StorageConfig,
  ServerConfig,
  RelayConfig,
} from "./config.js";

export {
  EventType,
  BaseEvent,
  DeliveryPayload,
} from "./event.js";

export {
  AddFilterRequest,
  RemoveFilterRequest,
  SlashCommandRequest,
  TestNotificationRequest,
} from "./admin.js";

export type { ScopedRule, ParsedRuleList } from "./subscription.js";
export type { MatchInput } from "./post.js";
