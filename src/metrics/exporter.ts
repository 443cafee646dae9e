/**
 * Prometheus metrics for the relay using prom-client.
 *
 * Served at /metrics by the relay HTTP server.
 *
 * Metrics:
 * - relay_events_total{outcome}                 counter
 * - relay_deliveries_total{mode,action,status}  counter
 * - relay_filter_rules{scope,level}             gauge
 * - relay_event_duration_seconds                histogram
 */

import {
  Registry,
  Gauge,
  Counter,
  Histogram,
  collectDefaultMetrics,
} from "prom-client";
import type { DeliveryOutcome } from "../dispatch/dispatcher.js";

export type EventOutcome = "delivered" | "partial" | "failed" | "no_match" | "skipped";

export interface RuleCount {
  scope: string;
  level: string;
  count: number;
}

export interface MetricsState {
  ruleCounts: RuleCount[];
}

export class RelayMetrics {
  readonly registry: Registry;

  readonly eventsTotal: Counter;
  readonly deliveriesTotal: Counter;
  readonly filterRules: Gauge;
  readonly eventDuration: Histogram;

  constructor(opts: { collectDefaults?: boolean } = {}) {
    this.registry = new Registry();

    if (opts.collectDefaults ?? true) {
      // Node.js default metrics (GC, event loop, etc.)
      collectDefaultMetrics({ register: this.registry, prefix: "relay_" });
    }

    this.eventsTotal = new Counter({
      name: "relay_events_total",
      help: "Post events handled, by outcome",
      labelNames: ["outcome"] as const,
      registers: [this.registry],
    });

    this.deliveriesTotal = new Counter({
      name: "relay_deliveries_total",
      help: "Per-channel delivery attempts",
      labelNames: ["mode", "action", "status"] as const,
      registers: [this.registry],
    });

    this.filterRules = new Gauge({
      name: "relay_filter_rules",
      help: "Stored subscription rules by scope and level",
      labelNames: ["scope", "level"] as const,
      registers: [this.registry],
    });

    this.eventDuration = new Histogram({
      name: "relay_event_duration_seconds",
      help: "Time to match and deliver one post event",
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 5, 10],
      registers: [this.registry],
    });
  }

  /** Refresh point-in-time gauges. Called before each /metrics scrape. */
  updateFromState(state: MetricsState): void {
    this.filterRules.reset();
    for (const { scope, level, count } of state.ruleCounts) {
      this.filterRules.labels({ scope, level }).set(count);
    }
  }

  recordEvent(outcome: EventOutcome, durationSeconds?: number): void {
    this.eventsTotal.labels({ outcome }).inc();
    if (durationSeconds !== undefined) {
      this.eventDuration.observe(durationSeconds);
    }
  }

  recordDeliveries(outcomes: readonly DeliveryOutcome[]): void {
    for (const outcome of outcomes) {
      this.deliveriesTotal
        .labels({ mode: outcome.mode, action: outcome.action, status: outcome.status })
        .inc();
    }
  }

  /** Get metrics in Prometheus text format. */
  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
