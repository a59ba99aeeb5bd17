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

export interface ScoredChunk {
  chunk: Chunk;
  score: number;
}

export interface VectorSearchQuery {
  tenant: string;
  embedding: number[];
  documentIds?: string[];
  limit: number;
  /** Cosine similarity floor; weaker matches are never returned. */
  minSimilarity: number;
}

export interface KeywordSearchQuery {
  tenant: string;
  /** Whole cleaned query; an exact (case-insensitive) occurrence scores highest. */
  phrase: string;
  terms: string[];
  documentIds?: string[];
  limit: number;
}

export interface ChunkPage {
  offset: number;
  limit: number;
}

export interface IDocumentStore {
  createDocument(input: NewDocument): Promise<Document>;
  getDocument(tenant: string, id: string): Promise<Document | null>;
  latestDocument(tenant: string): Promise<Document | null>;
  /** Shallow-merges `patch` into the stored metadata. */
  updateMetadata(tenant: string, id: string, patch: DocumentMetadata): Promise<Document | null>;
  /** Removes the document and, in the same transaction, all of its chunks. */
  deleteDocument(tenant: string, id: string): Promise<boolean>;

  /** All chunks or none; ordinals must be unique per document. */
  insertChunks(tenant: string, documentId: string, chunks: NewChunk[]): Promise<number>;
  listChunks(tenant: string, documentId: string, page?: ChunkPage): Promise<Chunk[]>;
  countChunks(tenant: string, documentId: string): Promise<number>;
  countEmbeddedChunks(tenant: string, documentIds?: string[]): Promise<number>;
  listChunksMissingEmbeddings(tenant: string, limit: number, documentId?: string): Promise<Chunk[]>;
  setChunkEmbeddings(tenant: string, embeddings: ChunkEmbedding[]): Promise<number>;

  searchByVector(query: VectorSearchQuery): Promise<ScoredChunk[]>;
  searchByKeyword(query: KeywordSearchQuery): Promise<ScoredChunk[]>;
}

export interface IJobStore {
  createJob(tenant: string): Promise<IngestionJob>;
  getJob(tenant: string, id: string): Promise<IngestionJob | null>;
  /** Rejects status regressions and any change to a finished job. */
  updateJob(id: string, update: JobUpdate): Promise<IngestionJob>;
}

export interface IFeedbackStore {
  appendFeedback(input: NewFeedback): Promise<Feedback>;
  listFeedback(tenant: string, window: TimeWindow): Promise<Feedback[]>;
  summarizeFeedback(tenant: string, window: TimeWindow): Promise<FeedbackSummary>;
}

export interface IMetricsStore {
  recordMetric(input: NewMetricEvent): Promise<MetricEvent>;
  listMetrics(tenant: string, window: TimeWindow, name?: MetricName): Promise<MetricEvent[]>;
  summarizeMetrics(tenant: string, window: TimeWindow): Promise<MetricSummary[]>;
}
