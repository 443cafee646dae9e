/**
 * topic-relay: route new forum posts to subscribed chat channels.
 */

export * from "./schemas/index.js";
export * from "./store/index.js";
export * from "./filters/index.js";
export * from "./matcher/index.js";
export * from "./composer/index.js";
export * from "./dispatch/index.js";
export * from "./adapters/index.js";

export { EventLogger } from "./events/logger.js";
export type { RelayEventSink, EventLoggerOptions, EventCallback } from "./events/logger.js";

export type { TagRegistry, CategoryRegistry, PermissionCheck, ExcerptFormatter } from "./host/interfaces.js";
export {
  StaticTagRegistry,
  StaticCategoryRegistry,
  CategoryPermissionCheck,
  PlainExcerptFormatter,
} from "./host/static-directory.js";

export { RelayService } from "./service/relay-service.js";
export type { RelayResult, RelayServiceStatus, SkipReason } from "./service/relay-service.js";
export { createRelayContext } from "./service/bootstrap.js";
export type { RelayContext, RelayContextOverrides } from "./service/bootstrap.js";

export { SlashCommandHandler, parseCommand, parseTarget, commandChannel } from "./commands/slash.js";
export type { ParsedCommand, FilterTarget } from "./commands/slash.js";

export { RelayMetrics } from "./metrics/exporter.js";
export { collectMetrics } from "./metrics/collector.js";

export { createRelayServer, createRoutes, routeRequest, closeServer } from "./server/server.js";
export type { GatewayRequest, GatewayResponse, GatewayHandler } from "./server/handlers.js";

export { loadConfig, parseConfig, getConfigValue, ConfigError } from "./config/index.js";
