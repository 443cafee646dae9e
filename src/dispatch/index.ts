export {
  Dispatcher,
  planDelivery,
  DEFAULT_FRESHNESS_WINDOW_MS,
  DEFAULT_ATTACHMENT_CAP,
} from "./dispatcher.js";
export type { DispatcherOptions, DeliveryOutcome, DeliveryAction, ComposeFn } from "./dispatcher.js";
export { DeliveryError } from "./transport.js";
export type {
  ChatTransport,
  ThreadedTransport,
  WebhookTransport,
  MessageUpdate,
  DeliveryMode,
} from "./transport.js";
