import { resolve } from "node:path";
import type { RelayConfig } from "../schemas/config.js";
import type { IKeyValueStore, KeyedLockManager } from "../store/interfaces.js";
import { openKeyValueStore } from "../store/factory.js";
import { InMemoryKeyedLockManager } from "../store/key-lock.js";
import { FilterStore } from "../store/filter-store.js";
import { ConversationStore } from "../store/conversation-store.js";
import { EventLogger, type RelayEventSink } from "../events/logger.js";
import { FilterRuleEngine } from "../filters/engine.js";
import { Matcher } from "../matcher/matcher.js";
import { MessageComposer } from "../composer/composer.js";
import { Dispatcher } from "../dispatch/dispatcher.js";
import type { ChatTransport } from "../dispatch/transport.js";
import { createTransport } from "../adapters/index.js";
import { RelayMetrics } from "../metrics/exporter.js";
import type { CategoryRegistry, ExcerptFormatter, PermissionCheck, TagRegistry } from "../host/interfaces.js";
import {
  CategoryPermissionCheck,
  PlainExcerptFormatter,
  StaticCategoryRegistry,
  StaticTagRegistry,
} from "../host/static-directory.js";
import { RelayService } from "./relay-service.js";

export interface RelayContextOverrides {
  kv?: IKeyValueStore;
  transport?: ChatTransport;
  events?: RelayEventSink;
  metrics?: RelayMetrics;
  tags?: TagRegistry;
  categories?: CategoryRegistry;
  guardian?: PermissionCheck;
  formatter?: ExcerptFormatter;
  now?: () => number;
  /** Print messages instead of sending them. */
  dryRun?: boolean;
}

export interface RelayContext {
  config: RelayConfig;
  kv: IKeyValueStore;
  filterStore: FilterStore;
  conversations: ConversationStore;
  engine: FilterRuleEngine;
  matcher: Matcher;
  composer: MessageComposer;
  dispatcher: Dispatcher;
  service: RelayService;
  events: RelayEventSink;
  metrics: RelayMetrics;
  tags: TagRegistry;
  categories: CategoryRegistry;
  guardian: PermissionCheck;
}

/** Wire every relay component from configuration. */
export async function createRelayContext(
  config: RelayConfig,
  overrides: RelayContextOverrides = {},
): Promise<RelayContext> {
  const kv = overrides.kv ?? await openKeyValueStore(config.storage);
  const events = overrides.events ?? new EventLogger(resolve(config.eventsDir));
  const metrics = overrides.metrics ?? new RelayMetrics();
  const tags = overrides.tags ?? new StaticTagRegistry(config.tags);
  const categories = overrides.categories ?? new StaticCategoryRegistry(config.categories);
  const guardian = overrides.guardian ?? new CategoryPermissionCheck(config.restrictedCategories);
  const formatter = overrides.formatter ?? new PlainExcerptFormatter();
  const transport = overrides.transport ?? createTransport(config.slack, { dryRun: overrides.dryRun });
  const locks: KeyedLockManager = new InMemoryKeyedLockManager();

  const filterStore = new FilterStore(kv);
  const conversations = new ConversationStore(kv);

  const engine = new FilterRuleEngine({ store: filterStore, tags, locks, events });
  const matcher = new Matcher(filterStore, { taggingEnabled: config.taggingEnabled });
  const composer = new MessageComposer(categories, formatter, {
    siteTitle: config.siteTitle,
    baseUrl: config.baseUrl,
    iconUrl: config.iconUrl,
    logoSmallUrl: config.logoSmallUrl,
    excerptLength: config.excerptLength,
    taggingEnabled: config.taggingEnabled,
  });
  const dispatcher = new Dispatcher(transport, conversations, {
    freshnessWindowMs: config.dispatch.freshnessWindowMs,
    attachmentCap: config.dispatch.attachmentCap,
    locks,
    events,
    now: overrides.now,
  });
  const service = new RelayService({ matcher, composer, dispatcher, events, metrics });

  return {
    config,
    kv,
    filterStore,
    conversations,
    engine,
    matcher,
    composer,
    dispatcher,
    service,
    events,
    metrics,
    tags,
    categories,
    guardian,
  };
}
