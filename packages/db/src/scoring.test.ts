import { describe, it, expect } from "vitest";
import type { IngestionJob, MetricEvent } from "@docsift/types";
import { ConflictError } from "@docsift/errors";
import {
  applyJobUpdate,
  cosineSimilarity,
  scoreKeywordMatch,
  summarizeFeedbackRatings,
  summarizeMetricEvents,
} from "./scoring.js";
import { containsPattern } from "./postgres-stores.js";
import { getSetupSql } from "./setup-sql.js";

function makeJob(overrides: Partial<IngestionJob> = {}): IngestionJob {
  const at = new Date("2026-01-01T00:00:00Z");
  return {
    id: "job-1",
    tenant: "acme",
    status: "queued",
    progress: 0,
    result: null,
    error: null,
    createdAt: at,
    updatedAt: at,
    ...overrides,
  };
}

describe("scoreKeywordMatch", () => {
  it("scores an exact phrase occurrence as 1 regardless of case", () => {
    expect(scoreKeywordMatch("The Refund Policy applies.", "refund policy", ["refund", "policy"])).toBe(1);
  });

  it("scores partial term matches by share of terms", () => {
    expect(scoreKeywordMatch("refunds are issued", "refund window", ["refund", "window"])).toBe(0.4);
  });

  it("scores zero when nothing matches", () => {
    expect(scoreKeywordMatch("shipping times", "refund", ["refund"])).toBe(0);
    expect(scoreKeywordMatch("anything", "", [])).toBe(0);
  });
});

describe("cosineSimilarity", () => {
  it("is 1 for parallel vectors and 0 for orthogonal ones", () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it("is 0 against a zero vector", () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });
});

describe("applyJobUpdate", () => {
  const now = new Date("2026-01-01T00:01:00Z");

  it("moves forward and keeps the highest progress", () => {
    const processing = applyJobUpdate(makeJob(), { status: "processing", progress: 30 }, now);
    const lower = applyJobUpdate(processing, { progress: 10 }, now);

    expect(lower).toMatchObject({ status: "processing", progress: 30, updatedAt: now });
  });

  it("sets progress to 100 on completion", () => {
    const done = applyJobUpdate(makeJob({ status: "processing", progress: 90 }), { status: "completed" }, now);
    expect(done.progress).toBe(100);
  });

  it("rejects changes to finished jobs", () => {
    expect(() => applyJobUpdate(makeJob({ status: "failed" }), { status: "processing" }, now)).toThrow(
      ConflictError,
    );
    expect(() => applyJobUpdate(makeJob({ status: "completed" }), { progress: 50 }, now)).toThrow(
      "Job job-1 is already completed",
    );
  });

  it("rejects a status regression", () => {
    expect(() => applyJobUpdate(makeJob({ status: "processing" }), { status: "queued" }, now)).toThrow(
      "Job job-1 cannot move from processing to queued",
    );
  });
});

describe("summaries", () => {
  it("counts feedback ratings", () => {
    expect(summarizeFeedbackRatings([1, 1, -1, 1])).toEqual({
      total: 4,
      positive: 3,
      negative: 1,
      positiveRate: 0.75,
    });
    expect(summarizeFeedbackRatings([]).positiveRate).toBe(0);
  });

  it("aggregates metrics per name", () => {
    const at = new Date();
    const events: MetricEvent[] = [
      { id: "1", tenant: "acme", name: "query_latency_ms", value: 100, tags: {}, createdAt: at },
      { id: "2", tenant: "acme", name: "query_latency_ms", value: 300, tags: {}, createdAt: at },
      { id: "3", tenant: "acme", name: "ingestion_chunks", value: 12, tags: {}, createdAt: at },
    ];

    expect(summarizeMetricEvents(events)).toEqual([
      { name: "ingestion_chunks", count: 1, avg: 12, min: 12, max: 12 },
      { name: "query_latency_ms", count: 2, avg: 200, min: 100, max: 300 },
    ]);
  });
});

describe("SQL helpers", () => {
  it("escapes LIKE wildcards", () => {
    expect(containsPattern("50%_off")).toBe("%50\\%\\_off%");
  });

  it("creates the vector extension before the vector index", () => {
    const statements = getSetupSql();
    expect(statements[0]).toBe("CREATE EXTENSION IF NOT EXISTS vector");
    expect(statements.findIndex((s) => s.includes("hnsw"))).toBeGreaterThan(0);
  });

  it("skips the chunk indexes until the chunks table exists", () => {
    const indexes = getSetupSql().filter((s) => s.includes("CREATE INDEX"));

    expect(indexes).toHaveLength(3);
    for (const statement of indexes) {
      expect(statement.startsWith("DO $$ BEGIN\n  IF to_regclass('public.chunks') IS NOT NULL THEN")).toBe(true);
    }
  });
});
