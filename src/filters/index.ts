/**
 * Filter rule engine: public surface.
 *
 * Usage:
 *   const engine = new FilterRuleEngine({ store: new FilterStore(kv), tags });
 *   await engine.setTagFilter("#general", "*", "watch", "urgent");
 */

export { FilterRuleEngine } from "./engine.js";
export type { FilterRuleEngineDependencies } from "./engine.js";

export {
  applyCategoryFilter,
  applyTagFilter,
  appendRule,
  removeRule,
  isEmptyChangeSet,
} from "./rules.js";
export type { RuleChangeSet, RuleMutation } from "./rules.js";

export { TagNotFoundError } from "./errors.js";
