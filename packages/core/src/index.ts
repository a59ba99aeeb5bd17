export {
  IngestionPipeline,
  INGESTION_PROGRESS,
  EMERGENCY_CHUNK_CHARS,
  dedupChunks,
} from "./ingestion-pipeline.js";
export type { IngestionDependencies, ProgressReporter } from "./ingestion-pipeline.js";

export { IngestionJobService, InProcessDispatcher } from "./ingestion-jobs.js";
export type { IngestionJobServiceDependencies } from "./ingestion-jobs.js";

export { resolveSource } from "./source-resolver.js";
export type { BinarySource, TextSource, ResolvedSource, ResolveSourceOptions } from "./source-resolver.js";

export { LocalFileStorage } from "./file-storage.js";
export type { IFileStorage } from "./file-storage.js";

export {
  HybridRetriever,
  RRF_K,
  DEFAULT_SEARCH_LIMIT,
  DEFAULT_CANDIDATE_LIMIT,
  DEFAULT_MAX_PER_DOCUMENT,
  prepareKeywordQuery,
  diversifyByDocument,
} from "./hybrid-retriever.js";
export type { HybridRetrieverDependencies, KeywordQuery } from "./hybrid-retriever.js";

export { searchWithFallbacks, firstChunkHits, CASCADE_EXHAUSTED_LEVEL } from "./fallback-cascade.js";
export type { CascadeDependencies } from "./fallback-cascade.js";
export { expandQuery, simplifyQuery } from "./query-rewriter.js";
export { validateSearchOptions } from "./filter-validator.js";

export {
  AnswerGenerator,
  INSUFFICIENT_CONTEXT_ANSWER,
  FALLBACK_PREFIX,
  extractiveSummary,
} from "./answer-generator.js";
export type { AnswerGeneratorDependencies } from "./answer-generator.js";
export {
  detectAnswerMode,
  hasSummaryIntent,
  isAnswerMode,
  normalizeLength,
  normalizeFormat,
  clampCitations,
  clampTopK,
} from "./answer-modes.js";
export { buildAnswerPrompt, maxTokensForLength, GROUNDING_INSTRUCTIONS } from "./answer-prompt.js";
export type { AnswerPromptOptions } from "./answer-prompt.js";
export { assembleContext } from "./context-assembler.js";

export { QuestionSuggester, questionsFor } from "./question-suggester.js";
export type { QuestionSuggestions } from "./question-suggester.js";

export { DocumentService, MAX_CHUNK_PAGE_SIZE } from "./document-service.js";
export type {
  DocumentServiceDependencies,
  ChunkListing,
  DeletionReport,
  IEmbeddingInvalidator,
} from "./document-service.js";

export { EmbeddingBackfill, DEFAULT_BACKFILL_BATCH_SIZE } from "./embedding-backfill.js";
export type { BackfillOptions, BackfillReport } from "./embedding-backfill.js";

export { FeedbackService } from "./feedback-service.js";
export type { FeedbackServiceDependencies } from "./feedback-service.js";
export { MetricsRecorder, assertWindow } from "./metrics-recorder.js";
export type { MetricTags } from "./metrics-recorder.js";
