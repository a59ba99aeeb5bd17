import { describe, it, expect, beforeEach } from "vitest";
import type { AppConfig, Chunk, Document, EmbeddingResult } from "@docsift/types";
import { MemoryDocumentStore } from "@docsift/db";
import type { IEmbeddingProvider } from "@docsift/embeddings";
import { ValidationError } from "@docsift/errors";
import { HybridRetriever, diversifyByDocument, prepareKeywordQuery } from "./hybrid-retriever.js";

const TENANT = "tenant-a";
const config: Pick<AppConfig, "search"> = {
  search: { vectorWeight: 0.7, keywordWeight: 0.3, similarityThreshold: 0.1 },
};

class QueryEmbeddings implements IEmbeddingProvider {
  readonly name = "fake";
  readonly model = "fake-embed";
  readonly dimensions = 2;
  vector = [1, 0];
  calls = 0;
  failing = false;

  embed(): Promise<EmbeddingResult> {
    this.calls++;
    if (this.failing) return Promise.reject(new Error("model offline"));
    return Promise.resolve({ embeddings: [this.vector], model: this.model, tokensUsed: 0, dimensions: 2 });
  }

  batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    return Promise.resolve({
      embeddings: texts.map(() => this.vector),
      model: this.model,
      tokensUsed: 0,
      dimensions: 2,
    });
  }

  healthCheck(): Promise<boolean> {
    return Promise.resolve(true);
  }
}

interface ChunkSeed {
  content: string;
  embedding?: number[];
}

describe("HybridRetriever", () => {
  let documents: MemoryDocumentStore;
  let embeddings: QueryEmbeddings;
  let retriever: HybridRetriever;

  async function addDocument(title: string, seeds: ChunkSeed[]): Promise<{ document: Document; chunks: Chunk[] }> {
    const document = await documents.createDocument({ tenant: TENANT, title, source: "upload", metadata: {} });
    await documents.insertChunks(
      TENANT,
      document.id,
      seeds.map((seed, ordinal) => ({
        ordinal,
        content: seed.content,
        meta: { strategy: "window" },
        embedding: seed.embedding ?? null,
      })),
    );
    return { document, chunks: await documents.listChunks(TENANT, document.id) };
  }

  beforeEach(() => {
    documents = new MemoryDocumentStore();
    embeddings = new QueryEmbeddings();
    retriever = new HybridRetriever({ documents, embeddings, config });
  });

  it("answers from keywords alone, without calling the model, when no chunk has a vector", async () => {
    const { chunks } = await addDocument("Policy", [
      { content: "Refund policy: items can be returned within 30 days." },
      { content: "Shipping takes five business days." },
    ]);

    const hits = await retriever.search(TENANT, "refund policy");

    expect(embeddings.calls).toBe(0);
    expect(hits).toEqual([{ chunk: chunks[0], score: 1, source: "keyword", keywordScore: 1, keywordRank: 0 }]);
    expect(retriever.getStats()).toMatchObject({ searches: 1, vectorSearches: 0, keywordSearches: 1, keywordHits: 1 });
  });

  it("fuses vector and keyword ranks", async () => {
    const { chunks } = await addDocument("Billing", [
      { content: "invoice payment terms are net thirty", embedding: [1, 0] },
      { content: "shipping schedule for invoice copies", embedding: [0.6, 0.8] },
      { content: "warehouse staffing plan", embedding: [0, 1] },
    ]);

    const hits = await retriever.search(TENANT, "invoice");

    expect(hits.map((hit) => hit.chunk.id)).toEqual([chunks[0]?.id, chunks[1]?.id]);
    expect(hits.map((hit) => hit.source)).toEqual(["hybrid", "hybrid"]);
    expect(hits[0]?.score).toBe(1);
    // (1/62) / (1/61)
    expect(hits[1]?.score).toBeCloseTo(61 / 62, 10);
    expect(hits[1]?.vectorScore).toBeCloseTo(0.6, 10);
    expect(retriever.getStats().fusions).toBe(2);
  });

  it("orders by fused score unless rerank is turned off", async () => {
    const { chunks } = await addDocument("Mixed", [
      { content: "payment reminder letter", embedding: [0, 1] },
      { content: "quarterly budget summary", embedding: [1, 0] },
    ]);
    const [payment, budget] = chunks;
    const weights = { vectorWeight: 0.3, keywordWeight: 0.7 };

    const reranked = await retriever.search(TENANT, "payment", weights);
    expect(reranked.map((hit) => hit.chunk.id)).toEqual([payment?.id, budget?.id]);
    expect(reranked[1]?.score).toBeCloseTo(3 / 7, 10);

    const unranked = await retriever.search(TENANT, "payment", { ...weights, rerank: false });
    expect(unranked.map((hit) => hit.chunk.id)).toEqual([budget?.id, payment?.id]);
  });

  it("returns the same order for the same query", async () => {
    await addDocument("A", [{ content: "alpha one" }, { content: "alpha two" }]);
    await addDocument("B", [{ content: "alpha three" }]);

    const first = await retriever.search(TENANT, "alpha");
    const second = await retriever.search(TENANT, "alpha");

    expect(second.map((hit) => hit.chunk.id)).toEqual(first.map((hit) => hit.chunk.id));
  });

  it("spreads results across documents when diversify is set", async () => {
    const one = await addDocument("One", [
      { content: "alpha first" },
      { content: "alpha second" },
      { content: "alpha third" },
      { content: "alpha fourth" },
    ]);
    const two = await addDocument("Two", [{ content: "alpha elsewhere" }]);

    const plain = await retriever.search(TENANT, "alpha");
    expect(plain).toHaveLength(5);

    const spread = await retriever.search(TENANT, "alpha", { diversify: true, maxPerDocument: 2 });
    expect(spread.map((hit) => hit.chunk.id)).toEqual([one.chunks[0]?.id, two.chunks[0]?.id, one.chunks[1]?.id]);
  });

  it("limits the search to the latest document under the latest scope", async () => {
    await addDocument("Old", [{ content: "alpha archived" }]);
    const { chunks } = await addDocument("New", [{ content: "alpha current" }]);

    const hits = await retriever.search(TENANT, "alpha", { scope: "latest" });

    expect(hits.map((hit) => hit.chunk.id)).toEqual([chunks[0]?.id]);
  });

  it("returns nothing under the latest scope when the tenant has no documents", async () => {
    expect(await retriever.resolveScope(TENANT, { scope: "latest" })).toEqual([]);
    expect(await retriever.search(TENANT, "alpha", { scope: "latest" })).toEqual([]);
  });

  it("prefers explicit document ids over the scope policy", async () => {
    const { document } = await addDocument("Old", [{ content: "alpha archived" }]);
    await addDocument("New", [{ content: "alpha current" }]);

    expect(await retriever.resolveScope(TENANT, { documentIds: [document.id], scope: "latest" })).toEqual([
      document.id,
    ]);
    expect(await retriever.resolveScope(TENANT, {})).toBeUndefined();
  });

  it("falls back to keyword results when the vector search fails", async () => {
    const { chunks } = await addDocument("Billing", [{ content: "invoice payment terms", embedding: [1, 0] }]);
    embeddings.failing = true;

    const hits = await retriever.search(TENANT, "invoice");

    expect(hits.map((hit) => [hit.chunk.id, hit.source])).toEqual([[chunks[0]?.id, "keyword"]]);
    expect(retriever.getStats()).toMatchObject({ errors: 1, vectorSearchErrors: 1, keywordSearchErrors: 0 });
  });

  it("clears counters on resetStats", async () => {
    await addDocument("A", [{ content: "alpha one" }]);
    await retriever.search(TENANT, "alpha");

    retriever.resetStats();

    expect(retriever.getStats()).toEqual({
      searches: 0,
      vectorSearches: 0,
      keywordSearches: 0,
      vectorHits: 0,
      keywordHits: 0,
      fusions: 0,
      errors: 0,
      vectorSearchErrors: 0,
      keywordSearchErrors: 0,
    });
  });

  it("rejects an empty query and zero weights", async () => {
    await expect(retriever.search(TENANT, "   ")).rejects.toThrow("Query is required");
    await expect(retriever.search(TENANT, "alpha", { vectorWeight: 0, keywordWeight: 0 })).rejects.toThrow(
      ValidationError,
    );
  });

  it("never returns another tenant's chunks", async () => {
    await addDocument("Mine", [{ content: "alpha mine" }]);

    expect(await retriever.search("tenant-b", "alpha")).toEqual([]);
  });
});

describe("prepareKeywordQuery", () => {
  it("turns punctuation into spaces and keeps words of two or more characters", () => {
    expect(prepareKeywordQuery("What's the refund-policy?")).toEqual({
      phrase: "What s the refund policy",
      terms: ["what", "the", "refund", "policy"],
    });
  });
});

describe("diversifyByDocument", () => {
  it("takes documents in turn and caps each", () => {
    const item = (documentId: string, id: string): { id: string; chunk: Chunk } => ({
      id,
      chunk: {
        id,
        documentId,
        tenant: TENANT,
        ordinal: 0,
        content: id,
        meta: { strategy: "window" },
        embedding: null,
        createdAt: new Date(0),
      },
    });

    const result = diversifyByDocument(
      [item("a", "a1"), item("a", "a2"), item("a", "a3"), item("b", "b1"), item("c", "c1"), item("b", "b2")],
      2,
    );

    expect(result.map((entry) => entry.id)).toEqual(["a1", "b1", "c1", "a2", "b2"]);
  });
});
