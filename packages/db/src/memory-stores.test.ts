import { describe, it, expect, beforeEach } from "vitest";
import type { NewChunk } from "@docsift/types";
import { ConflictError, NotFoundError } from "@docsift/errors";
import { MemoryDocumentStore, MemoryFeedbackStore, MemoryJobStore, MemoryMetricsStore } from "./memory-stores.js";

function chunk(ordinal: number, content: string, embedding: number[] | null = null): NewChunk {
  return { ordinal, content, embedding, meta: { strategy: "window" } };
}

const allTime = { from: new Date(0), to: new Date(Date.now() + 60_000) };

describe("MemoryDocumentStore", () => {
  let store: MemoryDocumentStore;

  beforeEach(() => {
    store = new MemoryDocumentStore();
  });

  it("scopes documents by tenant", async () => {
    const doc = await store.createDocument({ tenant: "acme", title: "Guide", source: "upload", metadata: {} });

    expect(await store.getDocument("acme", doc.id)).toMatchObject({ title: "Guide" });
    expect(await store.getDocument("other", doc.id)).toBeNull();
  });

  it("returns the most recently created document", async () => {
    await store.createDocument({ tenant: "acme", title: "first", source: "paste", metadata: {} });
    await store.createDocument({ tenant: "acme", title: "second", source: "paste", metadata: {} });
    await store.createDocument({ tenant: "other", title: "third", source: "paste", metadata: {} });

    expect((await store.latestDocument("acme"))?.title).toBe("second");
  });

  it("merges metadata patches", async () => {
    const doc = await store.createDocument({
      tenant: "acme",
      title: "Guide",
      source: "upload",
      metadata: { language: "en" },
    });
    const updated = await store.updateMetadata("acme", doc.id, { suggestedQuestions: ["Why?"] });

    expect(updated?.metadata).toEqual({ language: "en", suggestedQuestions: ["Why?"] });
  });

  it("lists chunks by ordinal with paging and deletes them with the document", async () => {
    const doc = await store.createDocument({ tenant: "acme", title: "Guide", source: "upload", metadata: {} });
    await store.insertChunks("acme", doc.id, [chunk(2, "c"), chunk(0, "a"), chunk(1, "b")]);

    expect((await store.listChunks("acme", doc.id)).map((c) => c.content)).toEqual(["a", "b", "c"]);
    expect((await store.listChunks("acme", doc.id, { offset: 1, limit: 1 })).map((c) => c.content)).toEqual(["b"]);

    expect(await store.deleteDocument("acme", doc.id)).toBe(true);
    expect(await store.countChunks("acme", doc.id)).toBe(0);
    expect(await store.deleteDocument("acme", doc.id)).toBe(false);
  });

  it("inserts nothing when an ordinal collides", async () => {
    const doc = await store.createDocument({ tenant: "acme", title: "Guide", source: "upload", metadata: {} });
    await store.insertChunks("acme", doc.id, [chunk(0, "a")]);

    await expect(store.insertChunks("acme", doc.id, [chunk(1, "b"), chunk(0, "again")])).rejects.toBeInstanceOf(
      ConflictError,
    );
    expect(await store.countChunks("acme", doc.id)).toBe(1);
  });

  it("rejects chunks for an unknown document", async () => {
    await expect(store.insertChunks("acme", "missing", [chunk(0, "a")])).rejects.toBeInstanceOf(NotFoundError);
  });

  it("searches vectors above the similarity floor", async () => {
    const doc = await store.createDocument({ tenant: "acme", title: "Guide", source: "upload", metadata: {} });
    await store.insertChunks("acme", doc.id, [
      chunk(0, "close", [1, 0]),
      chunk(1, "far", [0, 1]),
      chunk(2, "unembedded"),
    ]);

    const hits = await store.searchByVector({ tenant: "acme", embedding: [1, 0.1], limit: 5, minSimilarity: 0.5 });

    expect(hits.map((h) => h.chunk.content)).toEqual(["close"]);
    expect(await store.countEmbeddedChunks("acme", [doc.id])).toBe(2);
  });

  it("ranks keyword hits by score, then ordinal", async () => {
    const doc = await store.createDocument({ tenant: "acme", title: "Guide", source: "upload", metadata: {} });
    await store.insertChunks("acme", doc.id, [
      chunk(0, "refund only"),
      chunk(1, "The refund window is 30 days"),
      chunk(2, "window refund"),
      chunk(3, "shipping"),
    ]);

    const hits = await store.searchByKeyword({
      tenant: "acme",
      phrase: "refund window",
      terms: ["refund", "window"],
      limit: 10,
    });

    expect(hits.map((h) => [h.chunk.ordinal, h.score])).toEqual([
      [1, 1],
      [2, 0.8],
      [0, 0.4],
    ]);
  });

  it("backfills missing embeddings", async () => {
    const doc = await store.createDocument({ tenant: "acme", title: "Guide", source: "upload", metadata: {} });
    await store.insertChunks("acme", doc.id, [chunk(0, "a"), chunk(1, "b", [1])]);

    const missing = await store.listChunksMissingEmbeddings("acme", 10);
    expect(missing.map((c) => c.content)).toEqual(["a"]);

    const first = missing[0];
    if (!first) throw new Error("expected a chunk");
    expect(await store.setChunkEmbeddings("acme", [{ chunkId: first.id, embedding: [0.5] }])).toBe(1);
    expect(await store.listChunksMissingEmbeddings("acme", 10)).toEqual([]);
  });
});

describe("MemoryJobStore", () => {
  it("tracks progress and refuses to reopen a finished job", async () => {
    const store = new MemoryJobStore();
    const job = await store.createJob("acme");

    await store.updateJob(job.id, { status: "processing", progress: 10 });
    await store.updateJob(job.id, { status: "failed", error: "boom" });

    expect(await store.getJob("acme", job.id)).toMatchObject({ status: "failed", progress: 10, error: "boom" });
    await expect(store.updateJob(job.id, { status: "processing" })).rejects.toBeInstanceOf(ConflictError);
    expect(await store.getJob("other", job.id)).toBeNull();
  });
});

describe("MemoryFeedbackStore", () => {
  it("appends and summarizes ratings per tenant", async () => {
    const store = new MemoryFeedbackStore();
    await store.appendFeedback({ tenant: "acme", query: "refunds?", rating: 1 });
    await store.appendFeedback({ tenant: "acme", query: "refunds?", rating: -1, comment: "wrong doc" });
    await store.appendFeedback({ tenant: "other", query: "x", rating: 1 });

    expect(await store.summarizeFeedback("acme", allTime)).toEqual({
      total: 2,
      positive: 1,
      negative: 1,
      positiveRate: 0.5,
    });
    const [first] = await store.listFeedback("acme", allTime);
    expect(first).toMatchObject({ documentId: null, comment: null });
  });
});

describe("MemoryMetricsStore", () => {
  it("filters by name and summarizes", async () => {
    const store = new MemoryMetricsStore();
    await store.recordMetric({ tenant: "acme", name: "query_latency_ms", value: 40 });
    await store.recordMetric({ tenant: "acme", name: "query_latency_ms", value: 60, tags: { cached: true } });
    await store.recordMetric({ tenant: "acme", name: "ingestion_chunks", value: 7 });

    expect(await store.listMetrics("acme", allTime, "ingestion_chunks")).toHaveLength(1);
    expect(await store.summarizeMetrics("acme", allTime)).toEqual([
      { name: "ingestion_chunks", count: 1, avg: 7, min: 7, max: 7 },
      { name: "query_latency_ms", count: 2, avg: 50, min: 40, max: 60 },
    ]);
  });
});
