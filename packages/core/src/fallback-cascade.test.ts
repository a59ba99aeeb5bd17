import { describe, it, expect, beforeEach } from "vitest";
import type { AppConfig, EmbeddingResult } from "@docsift/types";
import { MemoryDocumentStore } from "@docsift/db";
import type { IEmbeddingProvider } from "@docsift/embeddings";
import { CASCADE_EXHAUSTED_LEVEL, firstChunkHits, searchWithFallbacks } from "./fallback-cascade.js";
import { HybridRetriever } from "./hybrid-retriever.js";
import { expandQuery, simplifyQuery } from "./query-rewriter.js";

const TENANT = "tenant-a";
const config: Pick<AppConfig, "search"> = {
  search: { vectorWeight: 0.7, keywordWeight: 0.3, similarityThreshold: 0.1 },
};

const noVectors: IEmbeddingProvider = {
  name: "fake",
  model: "fake-embed",
  dimensions: 2,
  embed: (): Promise<EmbeddingResult> => Promise.reject(new Error("unused")),
  batchEmbed: (): Promise<EmbeddingResult> => Promise.reject(new Error("unused")),
  healthCheck: () => Promise.resolve(true),
};

describe("searchWithFallbacks", () => {
  let documents: MemoryDocumentStore;
  let retriever: HybridRetriever;

  async function addDocument(contents: string[]): Promise<string> {
    const document = await documents.createDocument({ tenant: TENANT, title: "Doc", source: "upload", metadata: {} });
    await documents.insertChunks(
      TENANT,
      document.id,
      contents.map((content, ordinal) => ({ ordinal, content, meta: { strategy: "window" }, embedding: null })),
    );
    return document.id;
  }

  beforeEach(() => {
    documents = new MemoryDocumentStore();
    retriever = new HybridRetriever({ documents, embeddings: noVectors, config });
  });

  it("stops at the original query when it finds something", async () => {
    await addDocument(["The price list is attached."]);

    const result = await searchWithFallbacks({ retriever, documents }, TENANT, "price list");

    expect(result.fallbackLevel).toBe(0);
    expect(result.strategy).toBe("original");
    expect(result.query).toBe("price list");
    expect(result.hits).toHaveLength(1);
  });

  it("expands the query with synonyms at level 1", async () => {
    await addDocument(["The annual fee is due in March."]);

    const result = await searchWithFallbacks({ retriever, documents }, TENANT, "price");

    expect(result.fallbackLevel).toBe(1);
    expect(result.strategy).toBe("expanded_query");
    expect(result.query).toBe("price cost value fee");
  });

  it("falls back to the first chunks of the latest document under the latest scope", async () => {
    await addDocument(["Older document text."]);
    const latest = await addDocument(["Opening section.", "Second section.", "Third section."]);

    const result = await searchWithFallbacks({ retriever, documents }, TENANT, "zebra migration", {
      limit: 2,
      scope: "latest",
    });

    expect(result.fallbackLevel).toBe(3);
    expect(result.strategy).toBe("first_chunks");
    expect(result.hits.map((hit) => [hit.chunk.documentId, hit.chunk.ordinal, hit.score, hit.source])).toEqual([
      [latest, 0, 1, "fallback"],
      [latest, 1, 0.5, "fallback"],
    ]);
  });

  it("reads first chunks of explicitly listed documents", async () => {
    const older = await addDocument(["Older document text."]);
    await addDocument(["Newer document text."]);

    const result = await searchWithFallbacks({ retriever, documents }, TENANT, "zebra migration", {
      documentIds: [older],
    });

    expect(result.fallbackLevel).toBe(3);
    expect(result.hits.map((hit) => hit.chunk.content)).toEqual(["Older document text."]);
  });

  it("skips the first-chunks level for an unscoped query", async () => {
    await addDocument(["The warehouse opens at 7am on weekdays."]);

    const result = await searchWithFallbacks({ retriever, documents }, TENANT, "zebra migration patterns");

    expect(result).toEqual({
      hits: [],
      fallbackLevel: CASCADE_EXHAUSTED_LEVEL,
      strategy: "none",
      query: "zebra migration patterns",
    });
  });

  it("reports the exhausted level when the tenant has no documents", async () => {
    const result = await searchWithFallbacks({ retriever, documents }, TENANT, "anything at all");

    expect(result).toEqual({
      hits: [],
      fallbackLevel: CASCADE_EXHAUSTED_LEVEL,
      strategy: "none",
      query: "anything at all",
    });
  });

  it("reads first chunks across several documents up to the limit", async () => {
    const a = await addDocument(["a0", "a1"]);
    const b = await addDocument(["b0", "b1"]);

    const hits = await firstChunkHits(documents, TENANT, [a, b], 3);

    expect(hits.map((hit) => hit.chunk.content)).toEqual(["a0", "a1", "b0"]);
  });
});

describe("expandQuery", () => {
  it("leaves a query without known words unchanged", () => {
    expect(expandQuery("zebra migration")).toBe("zebra migration");
  });

  it("appends the synonyms of a known word", () => {
    expect(expandQuery("What is the deadline?")).toBe("What is the deadline? due date term");
  });

  it("appends at most three synonyms", () => {
    expect(expandQuery("price and cost")).toBe("price and cost cost value fee");
  });
});

describe("simplifyQuery", () => {
  it("drops stopwords and short words and puts numbered words first", () => {
    expect(simplifyQuery("What is the total for invoice 2024-17?")).toBe("2024 total invoice");
  });

  it("returns the original query when nothing is left", () => {
    expect(simplifyQuery("what is it")).toBe("what is it");
  });
});
