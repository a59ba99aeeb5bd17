import {
  and,
  asc,
  cosineDistance,
  count,
  desc,
  eq,
  gte,
  ilike,
  inArray,
  isNotNull,
  isNull,
  lte,
  or,
  sql,
} from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import type { AnyPgColumn } from "drizzle-orm/pg-core";
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
import { NotFoundError, ProcessingError } from "@docsift/errors";
import type { DbClient } from "./client.js";
import { chunks, documents, feedback, ingestionJobs, ragMetrics } from "./schema/index.js";
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
import { applyJobUpdate, summarizeFeedbackRatings } from "./scoring.js";

const INSERT_BATCH_SIZE = 500;

type DocumentRow = typeof documents.$inferSelect;
type ChunkRow = typeof chunks.$inferSelect;
type JobRow = typeof ingestionJobs.$inferSelect;
type FeedbackRow = typeof feedback.$inferSelect;
type MetricRow = typeof ragMetrics.$inferSelect;

function toDocument(row: DocumentRow): Document {
  return {
    id: row.id,
    tenant: row.tenant,
    title: row.title,
    source: row.source,
    metadata: row.metadata,
    createdAt: row.createdAt,
  };
}

function toChunk(row: ChunkRow): Chunk {
  return {
    id: row.id,
    documentId: row.documentId,
    tenant: row.tenant,
    ordinal: row.ordinal,
    content: row.content,
    embedding: row.embedding,
    meta: row.meta,
    createdAt: row.createdAt,
  };
}

function toJob(row: JobRow): IngestionJob {
  return {
    id: row.id,
    tenant: row.tenant,
    status: row.status,
    progress: row.progress,
    result: row.result,
    error: row.error,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toFeedback(row: FeedbackRow): Feedback {
  return { ...row };
}

function toMetric(row: MetricRow): MetricEvent {
  return { ...row };
}

/** `%value%` with LIKE wildcards in the value escaped. */
export function containsPattern(value: string): string {
  return `%${value.replace(/[\\%_]/g, "\\$&")}%`;
}

function chunkScope(tenant: string, documentIds?: string[]): SQL | undefined {
  return and(
    eq(chunks.tenant, tenant),
    documentIds && documentIds.length > 0 ? inArray(chunks.documentId, documentIds) : undefined,
  );
}

export class PostgresDocumentStore implements IDocumentStore {
  private readonly db: DbClient;

  constructor(db: DbClient) {
    this.db = db;
  }

  async createDocument(input: NewDocument): Promise<Document> {
    const [row] = await this.db.insert(documents).values(input).returning();
    if (!row) throw new ProcessingError("Document insert returned no row", "document_created");
    return toDocument(row);
  }

  async getDocument(tenant: string, id: string): Promise<Document | null> {
    const [row] = await this.db
      .select()
      .from(documents)
      .where(and(eq(documents.tenant, tenant), eq(documents.id, id)))
      .limit(1);
    return row ? toDocument(row) : null;
  }

  async latestDocument(tenant: string): Promise<Document | null> {
    const [row] = await this.db
      .select()
      .from(documents)
      .where(eq(documents.tenant, tenant))
      .orderBy(desc(documents.createdAt))
      .limit(1);
    return row ? toDocument(row) : null;
  }

  async updateMetadata(tenant: string, id: string, patch: DocumentMetadata): Promise<Document | null> {
    const [row] = await this.db
      .update(documents)
      .set({ metadata: sql`${documents.metadata} || ${JSON.stringify(patch)}::jsonb` })
      .where(and(eq(documents.tenant, tenant), eq(documents.id, id)))
      .returning();
    return row ? toDocument(row) : null;
  }

  async deleteDocument(tenant: string, id: string): Promise<boolean> {
    return this.db.transaction(async (tx) => {
      await tx.delete(chunks).where(and(eq(chunks.tenant, tenant), eq(chunks.documentId, id)));
      const deleted = await tx
        .delete(documents)
        .where(and(eq(documents.tenant, tenant), eq(documents.id, id)))
        .returning({ id: documents.id });
      return deleted.length > 0;
    });
  }

  async insertChunks(tenant: string, documentId: string, newChunks: NewChunk[]): Promise<number> {
    if (newChunks.length === 0) return 0;

    return this.db.transaction(async (tx) => {
      const [owner] = await tx
        .select({ id: documents.id })
        .from(documents)
        .where(and(eq(documents.tenant, tenant), eq(documents.id, documentId)))
        .for("update");
      if (!owner) throw new NotFoundError(`Document ${documentId} not found`);

      for (let i = 0; i < newChunks.length; i += INSERT_BATCH_SIZE) {
        const batch = newChunks.slice(i, i + INSERT_BATCH_SIZE);
        await tx.insert(chunks).values(
          batch.map((chunk) => ({
            documentId,
            tenant,
            ordinal: chunk.ordinal,
            content: chunk.content,
            embedding: chunk.embedding,
            meta: chunk.meta,
          })),
        );
      }
      return newChunks.length;
    });
  }

  async listChunks(tenant: string, documentId: string, page?: ChunkPage): Promise<Chunk[]> {
    const query = this.db
      .select()
      .from(chunks)
      .where(and(eq(chunks.tenant, tenant), eq(chunks.documentId, documentId)))
      .orderBy(asc(chunks.ordinal))
      .$dynamic();
    const rows = page ? await query.limit(page.limit).offset(page.offset) : await query;
    return rows.map(toChunk);
  }

  async countChunks(tenant: string, documentId: string): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(chunks)
      .where(and(eq(chunks.tenant, tenant), eq(chunks.documentId, documentId)));
    return row?.value ?? 0;
  }

  async countEmbeddedChunks(tenant: string, documentIds?: string[]): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(chunks)
      .where(and(chunkScope(tenant, documentIds), isNotNull(chunks.embedding)));
    return row?.value ?? 0;
  }

  async listChunksMissingEmbeddings(tenant: string, limit: number, documentId?: string): Promise<Chunk[]> {
    const rows = await this.db
      .select()
      .from(chunks)
      .where(and(chunkScope(tenant, documentId ? [documentId] : undefined), isNull(chunks.embedding)))
      .orderBy(asc(chunks.createdAt), asc(chunks.ordinal))
      .limit(limit);
    return rows.map(toChunk);
  }

  async setChunkEmbeddings(tenant: string, embeddings: ChunkEmbedding[]): Promise<number> {
    if (embeddings.length === 0) return 0;

    return this.db.transaction(async (tx) => {
      let updated = 0;
      for (const { chunkId, embedding } of embeddings) {
        const rows = await tx
          .update(chunks)
          .set({ embedding })
          .where(and(eq(chunks.tenant, tenant), eq(chunks.id, chunkId)))
          .returning({ id: chunks.id });
        updated += rows.length;
      }
      return updated;
    });
  }

  async searchByVector(query: VectorSearchQuery): Promise<ScoredChunk[]> {
    const distance = cosineDistance(chunks.embedding, query.embedding);
    const similarity = sql<number>`1 - (${distance})`.mapWith(Number);

    const rows = await this.db
      .select({ chunk: chunks, similarity })
      .from(chunks)
      .where(
        and(
          chunkScope(query.tenant, query.documentIds),
          isNotNull(chunks.embedding),
          gte(sql`1 - (${distance})`, query.minSimilarity),
        ),
      )
      .orderBy(distance, asc(chunks.ordinal))
      .limit(query.limit);

    return rows.map((row) => ({ chunk: toChunk(row.chunk), score: row.similarity }));
  }

  async searchByKeyword(query: KeywordSearchQuery): Promise<ScoredChunk[]> {
    const phrase = query.phrase.trim();
    const matchers = [phrase, ...query.terms].filter((value) => value.length > 0);
    if (matchers.length === 0) return [];

    const termHits =
      query.terms.length > 0
        ? sql.join(
            query.terms.map((term) => sql`(${chunks.content} ILIKE ${containsPattern(term)})::int`),
            sql` + `,
          )
        : sql`0`;
    const phraseHit = phrase ? sql`${chunks.content} ILIKE ${containsPattern(phrase)}` : sql`false`;
    const divisor = Math.max(1, query.terms.length);
    const score = sql<number>`CASE WHEN ${phraseHit} THEN 1.0 ELSE 0.8 * (${termHits})::float8 / ${divisor} END`.mapWith(
      Number,
    );

    const rows = await this.db
      .select({ chunk: chunks, score })
      .from(chunks)
      .where(
        and(
          chunkScope(query.tenant, query.documentIds),
          or(...matchers.map((value) => ilike(chunks.content, containsPattern(value)))),
        ),
      )
      .orderBy(desc(score), asc(chunks.ordinal))
      .limit(query.limit);

    return rows.map((row) => ({ chunk: toChunk(row.chunk), score: row.score }));
  }
}

export class PostgresJobStore implements IJobStore {
  private readonly db: DbClient;

  constructor(db: DbClient) {
    this.db = db;
  }

  async createJob(tenant: string): Promise<IngestionJob> {
    const [row] = await this.db.insert(ingestionJobs).values({ tenant }).returning();
    if (!row) throw new ProcessingError("Job insert returned no row", "job");
    return toJob(row);
  }

  async getJob(tenant: string, id: string): Promise<IngestionJob | null> {
    const [row] = await this.db
      .select()
      .from(ingestionJobs)
      .where(and(eq(ingestionJobs.tenant, tenant), eq(ingestionJobs.id, id)))
      .limit(1);
    return row ? toJob(row) : null;
  }

  async updateJob(id: string, update: JobUpdate): Promise<IngestionJob> {
    return this.db.transaction(async (tx) => {
      const [current] = await tx.select().from(ingestionJobs).where(eq(ingestionJobs.id, id)).for("update");
      if (!current) throw new NotFoundError(`Ingestion job ${id} not found`);

      const next = applyJobUpdate(toJob(current), update, new Date());
      const [row] = await tx
        .update(ingestionJobs)
        .set({
          status: next.status,
          progress: next.progress,
          result: next.result,
          error: next.error,
          updatedAt: next.updatedAt,
        })
        .where(eq(ingestionJobs.id, id))
        .returning();
      if (!row) throw new NotFoundError(`Ingestion job ${id} not found`);
      return toJob(row);
    });
  }
}

function windowScope(
  tenantColumn: AnyPgColumn,
  createdAtColumn: AnyPgColumn,
  tenant: string,
  window: TimeWindow,
): SQL | undefined {
  return and(eq(tenantColumn, tenant), gte(createdAtColumn, window.from), lte(createdAtColumn, window.to));
}

export class PostgresFeedbackStore implements IFeedbackStore {
  private readonly db: DbClient;

  constructor(db: DbClient) {
    this.db = db;
  }

  async appendFeedback(input: NewFeedback): Promise<Feedback> {
    const [row] = await this.db
      .insert(feedback)
      .values({
        tenant: input.tenant,
        query: input.query,
        documentId: input.documentId ?? null,
        rating: input.rating,
        comment: input.comment ?? null,
      })
      .returning();
    if (!row) throw new ProcessingError("Feedback insert returned no row", "feedback");
    return toFeedback(row);
  }

  async listFeedback(tenant: string, window: TimeWindow): Promise<Feedback[]> {
    const rows = await this.db
      .select()
      .from(feedback)
      .where(windowScope(feedback.tenant, feedback.createdAt, tenant, window))
      .orderBy(asc(feedback.createdAt));
    return rows.map(toFeedback);
  }

  async summarizeFeedback(tenant: string, window: TimeWindow): Promise<FeedbackSummary> {
    const rows = await this.db
      .select({ rating: feedback.rating })
      .from(feedback)
      .where(windowScope(feedback.tenant, feedback.createdAt, tenant, window));
    return summarizeFeedbackRatings(rows.map((row) => row.rating));
  }
}

export class PostgresMetricsStore implements IMetricsStore {
  private readonly db: DbClient;

  constructor(db: DbClient) {
    this.db = db;
  }

  async recordMetric(input: NewMetricEvent): Promise<MetricEvent> {
    const [row] = await this.db
      .insert(ragMetrics)
      .values({ tenant: input.tenant, name: input.name, value: input.value, tags: input.tags ?? {} })
      .returning();
    if (!row) throw new ProcessingError("Metric insert returned no row", "metrics");
    return toMetric(row);
  }

  async listMetrics(tenant: string, window: TimeWindow, name?: MetricName): Promise<MetricEvent[]> {
    const rows = await this.db
      .select()
      .from(ragMetrics)
      .where(
        and(
          windowScope(ragMetrics.tenant, ragMetrics.createdAt, tenant, window),
          name ? eq(ragMetrics.name, name) : undefined,
        ),
      )
      .orderBy(asc(ragMetrics.createdAt));
    return rows.map(toMetric);
  }

  async summarizeMetrics(tenant: string, window: TimeWindow): Promise<MetricSummary[]> {
    return this.db
      .select({
        name: ragMetrics.name,
        count: count(),
        avg: sql<number>`avg(${ragMetrics.value})`.mapWith(Number),
        min: sql<number>`min(${ragMetrics.value})`.mapWith(Number),
        max: sql<number>`max(${ragMetrics.value})`.mapWith(Number),
      })
      .from(ragMetrics)
      .where(windowScope(ragMetrics.tenant, ragMetrics.createdAt, tenant, window))
      .groupBy(ragMetrics.name)
      .orderBy(asc(ragMetrics.name));
  }
}
