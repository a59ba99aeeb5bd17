export type MetricName =
  | "ingestion_duration_ms"
  | "ingestion_chunks"
  | "query_latency_ms"
  | "answer_latency_ms"
  | "embedding_cache_hit_rate"
  | "job_transition";

export interface MetricEvent {
  id: string;
  tenant: string;
  name: MetricName;
  value: number;
  tags: Record<string, string | number | boolean>;
  createdAt: Date;
}

export interface NewMetricEvent {
  tenant: string;
  name: MetricName;
  value: number;
  tags?: Record<string, string | number | boolean>;
}

export interface TimeWindow {
  from: Date;
  to: Date;
}

export interface MetricSummary {
  name: MetricName;
  count: number;
  avg: number;
  min: number;
  max: number;
}
