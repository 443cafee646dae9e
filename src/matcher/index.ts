export { Matcher, matchRules, FILTER_PRECEDENCE } from "./matcher.js";
export type { DeliveryTarget, MatchOptions } from "./matcher.js";
