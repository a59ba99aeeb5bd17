import { describe, it, expect, beforeEach } from "vitest";
import type { EmbeddingResult } from "@docsift/types";
import { MemoryDocumentStore } from "@docsift/db";
import type { IEmbeddingProvider } from "@docsift/embeddings";
import { EmbeddingBackfill } from "./embedding-backfill.js";

const TENANT = "tenant-a";

class BatchEmbeddings implements IEmbeddingProvider {
  readonly name = "fake";
  readonly model = "fake-embed";
  readonly dimensions = 2;
  batches: string[][] = [];
  failAfter = Number.POSITIVE_INFINITY;

  embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    if (this.batches.length >= this.failAfter) return Promise.reject(new Error("rate limited"));
    this.batches.push(texts);
    return Promise.resolve({
      embeddings: texts.map((text) => [1, text.length]),
      model: this.model,
      tokensUsed: 0,
      dimensions: 2,
    });
  }

  healthCheck(): Promise<boolean> {
    return Promise.resolve(true);
  }
}

describe("EmbeddingBackfill", () => {
  let documents: MemoryDocumentStore;
  let embeddings: BatchEmbeddings;
  let documentId: string;

  beforeEach(async () => {
    documents = new MemoryDocumentStore();
    embeddings = new BatchEmbeddings();
    const document = await documents.createDocument({ tenant: TENANT, title: "Doc", source: "upload", metadata: {} });
    documentId = document.id;
    await documents.insertChunks(
      TENANT,
      document.id,
      ["c0", "c1", "c2", "c3", "c4"].map((content, ordinal) => ({
        ordinal,
        content,
        meta: { strategy: "window" },
        embedding: ordinal === 0 ? [0, 1] : null,
      })),
    );
  });

  it("embeds every chunk without a vector, batch by batch", async () => {
    const report = await new EmbeddingBackfill(documents, embeddings).run(TENANT, { batchSize: 2 });

    expect(report).toEqual({ batches: 2, embedded: 4, interrupted: false });
    expect(embeddings.batches).toEqual([
      ["c1", "c2"],
      ["c3", "c4"],
    ]);
    expect(await documents.listChunksMissingEmbeddings(TENANT, 10)).toEqual([]);
    const chunks = await documents.listChunks(TENANT, documentId);
    expect(chunks.map((chunk) => chunk.embedding)).toEqual([
      [0, 1],
      [1, 2],
      [1, 2],
      [1, 2],
      [1, 2],
    ]);
  });

  it("stops after maxBatches", async () => {
    const report = await new EmbeddingBackfill(documents, embeddings).run(TENANT, { batchSize: 1, maxBatches: 3 });

    expect(report).toEqual({ batches: 3, embedded: 3, interrupted: false });
    expect(await documents.listChunksMissingEmbeddings(TENANT, 10)).toHaveLength(1);
  });

  it("reports an interrupted run when the model fails and keeps earlier batches", async () => {
    embeddings.failAfter = 1;

    const report = await new EmbeddingBackfill(documents, embeddings).run(TENANT, { batchSize: 2 });

    expect(report).toEqual({ batches: 1, embedded: 2, interrupted: true, error: "rate limited" });
    expect((await documents.listChunksMissingEmbeddings(TENANT, 10)).map((chunk) => chunk.content)).toEqual([
      "c3",
      "c4",
    ]);
  });

  it("leaves other tenants alone", async () => {
    const report = await new EmbeddingBackfill(documents, embeddings).run("tenant-b");

    expect(report).toEqual({ batches: 0, embedded: 0, interrupted: false });
    expect(embeddings.batches).toEqual([]);
  });

  it("rejects a batch size below one", async () => {
    await expect(new EmbeddingBackfill(documents, embeddings).run(TENANT, { batchSize: 0 })).rejects.toThrow(
      "batchSize must be a positive integer",
    );
  });
});
