export * from "./schema/index.js";
export {
  createDbClient,
  closeDbClient,
  type DbClient,
  type DbClientOptions,
  type DbRole,
} from "./client.js";
export { getSetupSql, applySetupSql } from "./setup-sql.js";
export type {
  IDocumentStore,
  IJobStore,
  IFeedbackStore,
  IMetricsStore,
  ScoredChunk,
  VectorSearchQuery,
  KeywordSearchQuery,
  ChunkPage,
} from "./store.interface.js";
export {
  scoreKeywordMatch,
  cosineSimilarity,
  applyJobUpdate,
  summarizeFeedbackRatings,
  summarizeMetricEvents,
} from "./scoring.js";
export { MemoryDocumentStore, MemoryJobStore, MemoryFeedbackStore, MemoryMetricsStore } from "./memory-stores.js";
export {
  PostgresDocumentStore,
  PostgresJobStore,
  PostgresFeedbackStore,
  PostgresMetricsStore,
  containsPattern,
} from "./postgres-stores.js";
