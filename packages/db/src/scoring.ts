import type { FeedbackSummary, IngestionJob, JobUpdate, MetricEvent, MetricSummary } from "@docsift/types";
import { ConflictError } from "@docsift/errors";

const PARTIAL_MATCH_WEIGHT = 0.8;

/**
 * 1 for an exact occurrence of the phrase, otherwise 0.8 times the share of
 * terms present. Case-insensitive substring matching throughout.
 */
export function scoreKeywordMatch(content: string, phrase: string, terms: string[]): number {
  const haystack = content.toLowerCase();
  const needle = phrase.trim().toLowerCase();
  if (needle.length > 0 && haystack.includes(needle)) return 1;
  if (terms.length === 0) return 0;

  const matched = terms.filter((term) => haystack.includes(term.toLowerCase())).length;
  return (PARTIAL_MATCH_WEIGHT * matched) / terms.length;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

const STATUS_ORDER = { queued: 0, processing: 1, completed: 2, failed: 2 } as const;

/**
 * Next state of a job. Status only moves forward, a finished job never
 * changes, and progress never decreases.
 */
export function applyJobUpdate(job: IngestionJob, update: JobUpdate, now: Date): IngestionJob {
  if (STATUS_ORDER[job.status] === 2) {
    throw new ConflictError(`Job ${job.id} is already ${job.status}`);
  }

  const status = update.status ?? job.status;
  if (STATUS_ORDER[status] < STATUS_ORDER[job.status]) {
    throw new ConflictError(`Job ${job.id} cannot move from ${job.status} to ${status}`);
  }

  const requested = update.progress ?? job.progress;
  const progress = Math.min(100, Math.max(job.progress, requested));

  return {
    ...job,
    status,
    progress: status === "completed" ? 100 : progress,
    result: update.result ?? job.result,
    error: update.error ?? job.error,
    updatedAt: now,
  };
}

export function summarizeFeedbackRatings(ratings: number[]): FeedbackSummary {
  const positive = ratings.filter((r) => r > 0).length;
  const negative = ratings.length - positive;
  return {
    total: ratings.length,
    positive,
    negative,
    positiveRate: ratings.length === 0 ? 0 : positive / ratings.length,
  };
}

export function summarizeMetricEvents(events: MetricEvent[]): MetricSummary[] {
  const byName = new Map<MetricEvent["name"], number[]>();
  for (const event of events) {
    const values = byName.get(event.name) ?? [];
    values.push(event.value);
    byName.set(event.name, values);
  }

  return [...byName.entries()]
    .map(([name, values]) => ({
      name,
      count: values.length,
      avg: values.reduce((sum, v) => sum + v, 0) / values.length,
      min: Math.min(...values),
      max: Math.max(...values),
    }))
    .sort((a, b) => a.name.localeCompare(b.name));
}
