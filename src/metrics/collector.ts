import type { FilterStore } from "../store/filter-store.js";
import type { MetricsState, RuleCount } from "./exporter.js";

/** Count stored rules per (scope, level). */
export async function collectMetrics(store: FilterStore): Promise<MetricsState> {
  const counts = new Map<string, RuleCount>();

  for (const rule of await store.listAll()) {
    const key = `${rule.scope}\u0000${rule.filter}`;
    const entry = counts.get(key);
    if (entry) {
      entry.count += 1;
    } else {
      counts.set(key, { scope: rule.scope, level: rule.filter, count: 1 });
    }
  }

  return { ruleCounts: Array.from(counts.values()) };
}
