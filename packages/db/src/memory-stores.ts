import { randomUUID } from "node:crypto";
import type {
  Chunk,
  ChunkEmbedding,
  Document,
  DocumentMetadata,
  Feedback,
  FeedbackSummary,
  IngestionJob,
  JobUpdate,
  MetricEvent,
  MetricName,
  MetricSummary,
  NewChunk,
  NewDocument,
  NewFeedback,
  NewMetricEvent,
  TimeWindow,
} from "@docsift/types";
import { ConflictError, NotFoundError } from "@docsift/errors";
import type {
  ChunkPage,
  IDocumentStore,
  IFeedbackStore,
  IJobStore,
  IMetricsStore,
  KeywordSearchQuery,
  ScoredChunk,
  VectorSearchQuery,
} from "./store.interface.js";
import {
  applyJobUpdate,
  cosineSimilarity,
  scoreKeywordMatch,
  summarizeFeedbackRatings,
  summarizeMetricEvents,
} from "./scoring.js";

function inWindow(date: Date, window: TimeWindow): boolean {
  return date >= window.from && date <= window.to;
}

function inScope(chunk: Chunk, tenant: string, documentIds?: string[]): boolean {
  if (chunk.tenant !== tenant) return false;
  return !documentIds || documentIds.length === 0 || documentIds.includes(chunk.documentId);
}

function byScoreThenOrdinal(a: ScoredChunk, b: ScoredChunk): number {
  return b.score - a.score || a.chunk.ordinal - b.chunk.ordinal;
}

/**
 * In-process document and chunk store for tests and single-process tools.
 */
export class MemoryDocumentStore implements IDocumentStore {
  private readonly documents = new Map<string, Document>();
  private readonly chunks = new Map<string, Chunk>();
  private clock = 0;

  // Creation times strictly increase so "latest" is well defined within one tick.
  private now(): Date {
    this.clock = Math.max(this.clock + 1, Date.now());
    return new Date(this.clock);
  }

  createDocument(input: NewDocument): Promise<Document> {
    const document: Document = { id: randomUUID(), ...input, createdAt: this.now() };
    this.documents.set(document.id, document);
    return Promise.resolve({ ...document });
  }

  getDocument(tenant: string, id: string): Promise<Document | null> {
    const document = this.documents.get(id);
    return Promise.resolve(document && document.tenant === tenant ? { ...document } : null);
  }

  latestDocument(tenant: string): Promise<Document | null> {
    let latest: Document | null = null;
    for (const document of this.documents.values()) {
      if (document.tenant !== tenant) continue;
      if (!latest || document.createdAt > latest.createdAt) latest = document;
    }
    return Promise.resolve(latest ? { ...latest } : null);
  }

  updateMetadata(tenant: string, id: string, patch: DocumentMetadata): Promise<Document | null> {
    const document = this.documents.get(id);
    if (!document || document.tenant !== tenant) return Promise.resolve(null);
    const updated = { ...document, metadata: { ...document.metadata, ...patch } };
    this.documents.set(id, updated);
    return Promise.resolve({ ...updated });
  }

  deleteDocument(tenant: string, id: string): Promise<boolean> {
    const document = this.documents.get(id);
    if (!document || document.tenant !== tenant) return Promise.resolve(false);
    this.documents.delete(id);
    for (const [chunkId, chunk] of this.chunks) {
      if (chunk.documentId === id) this.chunks.delete(chunkId);
    }
    return Promise.resolve(true);
  }

  insertChunks(tenant: string, documentId: string, chunks: NewChunk[]): Promise<number> {
    const document = this.documents.get(documentId);
    if (!document || document.tenant !== tenant) {
      return Promise.reject(new NotFoundError(`Document ${documentId} not found`));
    }

    const taken = new Set(
      [...this.chunks.values()].filter((c) => c.documentId === documentId).map((c) => c.ordinal),
    );
    for (const chunk of chunks) {
      if (taken.has(chunk.ordinal)) {
        return Promise.reject(
          new ConflictError(`Chunk ordinal ${String(chunk.ordinal)} already exists for document ${documentId}`),
        );
      }
      taken.add(chunk.ordinal);
    }

    const createdAt = new Date();
    for (const chunk of chunks) {
      const id = randomUUID();
      this.chunks.set(id, { id, documentId, tenant, ...chunk, createdAt });
    }
    return Promise.resolve(chunks.length);
  }

  listChunks(tenant: string, documentId: string, page?: ChunkPage): Promise<Chunk[]> {
    const all = [...this.chunks.values()]
      .filter((c) => c.tenant === tenant && c.documentId === documentId)
      .sort((a, b) => a.ordinal - b.ordinal);
    const offset = page?.offset ?? 0;
    const sliced = page ? all.slice(offset, offset + page.limit) : all;
    return Promise.resolve(sliced.map((c) => ({ ...c })));
  }

  async countChunks(tenant: string, documentId: string): Promise<number> {
    return (await this.listChunks(tenant, documentId)).length;
  }

  countEmbeddedChunks(tenant: string, documentIds?: string[]): Promise<number> {
    let count = 0;
    for (const chunk of this.chunks.values()) {
      if (chunk.embedding && inScope(chunk, tenant, documentIds)) count++;
    }
    return Promise.resolve(count);
  }

  listChunksMissingEmbeddings(tenant: string, limit: number, documentId?: string): Promise<Chunk[]> {
    const missing = [...this.chunks.values()]
      .filter((c) => c.embedding === null && inScope(c, tenant, documentId ? [documentId] : undefined))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.ordinal - b.ordinal)
      .slice(0, limit);
    return Promise.resolve(missing.map((c) => ({ ...c })));
  }

  setChunkEmbeddings(tenant: string, embeddings: ChunkEmbedding[]): Promise<number> {
    let updated = 0;
    for (const { chunkId, embedding } of embeddings) {
      const chunk = this.chunks.get(chunkId);
      if (!chunk || chunk.tenant !== tenant) continue;
      this.chunks.set(chunkId, { ...chunk, embedding });
      updated++;
    }
    return Promise.resolve(updated);
  }

  searchByVector(query: VectorSearchQuery): Promise<ScoredChunk[]> {
    const results: ScoredChunk[] = [];
    for (const chunk of this.chunks.values()) {
      if (!chunk.embedding || !inScope(chunk, query.tenant, query.documentIds)) continue;
      const score = cosineSimilarity(chunk.embedding, query.embedding);
      if (score >= query.minSimilarity) results.push({ chunk: { ...chunk }, score });
    }
    return Promise.resolve(results.sort(byScoreThenOrdinal).slice(0, query.limit));
  }

  searchByKeyword(query: KeywordSearchQuery): Promise<ScoredChunk[]> {
    const results: ScoredChunk[] = [];
    for (const chunk of this.chunks.values()) {
      if (!inScope(chunk, query.tenant, query.documentIds)) continue;
      const score = scoreKeywordMatch(chunk.content, query.phrase, query.terms);
      if (score > 0) results.push({ chunk: { ...chunk }, score });
    }
    return Promise.resolve(results.sort(byScoreThenOrdinal).slice(0, query.limit));
  }
}

export class MemoryJobStore implements IJobStore {
  private readonly jobs = new Map<string, IngestionJob>();

  createJob(tenant: string): Promise<IngestionJob> {
    const now = new Date();
    const job: IngestionJob = {
      id: randomUUID(),
      tenant,
      status: "queued",
      progress: 0,
      result: null,
      error: null,
      createdAt: now,
      updatedAt: now,
    };
    this.jobs.set(job.id, job);
    return Promise.resolve({ ...job });
  }

  getJob(tenant: string, id: string): Promise<IngestionJob | null> {
    const job = this.jobs.get(id);
    return Promise.resolve(job && job.tenant === tenant ? { ...job } : null);
  }

  updateJob(id: string, update: JobUpdate): Promise<IngestionJob> {
    const job = this.jobs.get(id);
    if (!job) return Promise.reject(new NotFoundError(`Ingestion job ${id} not found`));
    try {
      const next = applyJobUpdate(job, update, new Date());
      this.jobs.set(id, next);
      return Promise.resolve({ ...next });
    } catch (err) {
      return Promise.reject(err);
    }
  }
}

export class MemoryFeedbackStore implements IFeedbackStore {
  private readonly entries: Feedback[] = [];

  appendFeedback(input: NewFeedback): Promise<Feedback> {
    const entry: Feedback = {
      id: randomUUID(),
      tenant: input.tenant,
      query: input.query,
      documentId: input.documentId ?? null,
      rating: input.rating,
      comment: input.comment ?? null,
      createdAt: new Date(),
    };
    this.entries.push(entry);
    return Promise.resolve({ ...entry });
  }

  listFeedback(tenant: string, window: TimeWindow): Promise<Feedback[]> {
    return Promise.resolve(
      this.entries.filter((e) => e.tenant === tenant && inWindow(e.createdAt, window)).map((e) => ({ ...e })),
    );
  }

  async summarizeFeedback(tenant: string, window: TimeWindow): Promise<FeedbackSummary> {
    const entries = await this.listFeedback(tenant, window);
    return summarizeFeedbackRatings(entries.map((e) => e.rating));
  }
}

export class MemoryMetricsStore implements IMetricsStore {
  private readonly events: MetricEvent[] = [];

  recordMetric(input: NewMetricEvent): Promise<MetricEvent> {
    const event: MetricEvent = {
      id: randomUUID(),
      tenant: input.tenant,
      name: input.name,
      value: input.value,
      tags: input.tags ?? {},
      createdAt: new Date(),
    };
    this.events.push(event);
    return Promise.resolve({ ...event });
  }

  listMetrics(tenant: string, window: TimeWindow, name?: MetricName): Promise<MetricEvent[]> {
    return Promise.resolve(
      this.events
        .filter((e) => e.tenant === tenant && inWindow(e.createdAt, window) && (!name || e.name === name))
        .map((e) => ({ ...e })),
    );
  }

  async summarizeMetrics(tenant: string, window: TimeWindow): Promise<MetricSummary[]> {
    return summarizeMetricEvents(await this.listMetrics(tenant, window));
  }
}
