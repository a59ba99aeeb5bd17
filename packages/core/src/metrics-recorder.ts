import type {
  EmbeddingCacheStats,
  MetricEvent,
  MetricName,
  MetricSummary,
  TimeWindow,
} from "@docsift/types";
import type { IMetricsStore } from "@docsift/db";
import { ValidationError, errorMessage } from "@docsift/errors";
import { createSilentLogger, type Logger } from "@docsift/logger";

export type MetricTags = Record<string, string | number | boolean>;

export function assertWindow(window: TimeWindow): void {
  if (Number.isNaN(window.from.getTime()) || Number.isNaN(window.to.getTime())) {
    throw new ValidationError("Invalid time window", { window: "from and to must be valid dates" });
  }
  if (window.from > window.to) {
    throw new ValidationError("Invalid time window", { window: "from must not be after to" });
  }
}

/**
 * Append-only operational metrics. Writes never fail the caller; a store
 * error is logged and dropped.
 */
export class MetricsRecorder {
  private readonly store: IMetricsStore;
  private readonly logger: Logger;

  constructor(store: IMetricsStore, logger?: Logger) {
    this.store = store;
    this.logger = logger ?? createSilentLogger();
  }

  async record(tenant: string, name: MetricName, value: number, tags: MetricTags = {}): Promise<void> {
    try {
      await this.store.recordMetric({ tenant, name, value, tags });
    } catch (err) {
      this.logger.warn({ tenant, metric: name, err: errorMessage(err) }, "metric write failed");
    }
  }

  recordCacheStats(tenant: string, stats: EmbeddingCacheStats): Promise<void> {
    return this.record(tenant, "embedding_cache_hit_rate", stats.hitRate, {
      hits: stats.hits,
      misses: stats.misses,
      size: stats.size,
    });
  }

  list(tenant: string, window: TimeWindow, name?: MetricName): Promise<MetricEvent[]> {
    assertWindow(window);
    return this.store.listMetrics(tenant, window, name);
  }

  summarize(tenant: string, window: TimeWindow): Promise<MetricSummary[]> {
    assertWindow(window);
    return this.store.summarizeMetrics(tenant, window);
  }
}
