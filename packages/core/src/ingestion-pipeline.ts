import { createHash } from "node:crypto";
import type {
  AppConfig,
  BatchIngestionOutcome,
  ChunkDraft,
  ChunkingSummary,
  Document,
  DocumentFormat,
  DocumentMetadata,
  DocumentSource,
  IngestionFailure,
  IngestionOptions,
  IngestionOutcome,
  IngestionProfile,
  IngestionSource,
  IngestionStage,
  IngestionSuccess,
  NewChunk,
  StructuredData,
} from "@docsift/types";
import type { IDocumentStore } from "@docsift/db";
import type { EmbeddingCache, IEmbeddingProvider } from "@docsift/embeddings";
import type { ExtractionServices } from "@docsift/extractor";
import { detectLanguage, scoreQuality } from "@docsift/extractor";
import { chunkDocument, emergencyChunk, resolveChunkingOptions } from "@docsift/chunker";
import { resolveIngestionProfile } from "@docsift/config";
import { AppError, ExtractionError, ProcessingError, ValidationError, errorMessage } from "@docsift/errors";
import { createChildLogger, createSilentLogger, type Logger } from "@docsift/logger";
import type { IFileStorage } from "./file-storage.js";
import type { MetricsRecorder } from "./metrics-recorder.js";
import type { QuestionSuggester } from "./question-suggester.js";
import { resolveSource, type ResolvedSource } from "./source-resolver.js";

/** Progress written at each milestone; completion (100) belongs to the job. */
export const INGESTION_PROGRESS = {
  validated: 10,
  documentCreated: 30,
  chunksStored: 90,
} as const;

/** Longest text kept by the single emergency chunk. */
export const EMERGENCY_CHUNK_CHARS = 8000;

export type ProgressReporter = (percent: number) => Promise<void>;

export interface IngestionDependencies {
  extraction: ExtractionServices;
  documents: IDocumentStore;
  embeddings: IEmbeddingProvider;
  config: Pick<AppConfig, "ingestion">;
  files?: IFileStorage;
  suggester?: QuestionSuggester;
  metrics?: MetricsRecorder;
  /** Cache behind `embeddings`, whose hit rate is recorded after each ingestion. */
  embeddingCache?: Pick<EmbeddingCache, "stats">;
  fetch?: typeof fetch;
  logger?: Logger;
  /** Chunking step; `chunkDocument` unless replaced. */
  chunk?: typeof chunkDocument;
  /** Runs before chunks are stored; a throw fails that attempt. */
  onChunked?: (documentId: string, chunks: ChunkDraft[]) => Promise<void>;
  /** Runs after a successful ingestion; a throw is logged only. */
  onStored?: (outcome: IngestionSuccess) => Promise<void>;
}

interface ExtractedContent {
  content: string;
  method: string;
  qualityScore: number;
  format: DocumentFormat;
  fileSize: number;
  language?: string;
  pageCount?: number;
  structuredData?: StructuredData;
}

interface StoredChunks {
  chunksCreated: number;
  chunksEmbedded: number;
  emergency: boolean;
  warnings: string[];
}

/**
 * Drops chunks whose trimmed content repeats an earlier one (SHA-256) and
 * renumbers the rest from 0.
 */
export function dedupChunks(chunks: ChunkDraft[]): ChunkDraft[] {
  const seen = new Set<string>();
  const kept: ChunkDraft[] = [];
  for (const chunk of chunks) {
    const hash = createHash("sha256").update(chunk.content.trim()).digest("hex");
    if (seen.has(hash)) continue;
    seen.add(hash);
    kept.push({ ...chunk, ordinal: kept.length });
  }
  return kept;
}

function describeError(err: unknown, fallbackCode: string): { errorCode: string; error: string } {
  return { errorCode: AppError.isAppError(err) ? err.code : fallbackCode, error: errorMessage(err) };
}

/**
 * Ingestion: validate -> extract -> create document -> chunk, embed, store
 *
 * Nothing is written before validation and extraction succeed. Once the
 * document row exists, a failed chunk/store attempt is retried once with the
 * degraded profile; if that fails too the document and stored file are
 * removed. Every outcome says whether a document row exists.
 */
export class IngestionPipeline {
  private readonly deps: IngestionDependencies;
  private readonly logger: Logger;
  private readonly pending = new Set<Promise<void>>();

  constructor(deps: IngestionDependencies) {
    this.deps = deps;
    this.logger = createChildLogger(deps.logger ?? createSilentLogger(), { component: "ingestion-pipeline" });
  }

  ingest(
    tenant: string,
    source: IngestionSource,
    options: IngestionOptions = {},
    progress?: ProgressReporter,
  ): Promise<IngestionOutcome> {
    return this.run(tenant, source, options, progress);
  }

  /** One source after another; a failed item does not stop the rest. */
  async ingestBatch(
    tenant: string,
    sources: IngestionSource[],
    options: IngestionOptions = {},
  ): Promise<BatchIngestionOutcome> {
    const results: IngestionOutcome[] = [];
    for (const source of sources) {
      results.push(await this.run(tenant, source, options, undefined, "batch"));
    }
    const succeeded = results.filter((result) => result.success).length;
    return { succeeded, failed: results.length - succeeded, results };
  }

  /** Resolves once background side tasks (suggested questions) have settled. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private async run(
    tenant: string,
    input: IngestionSource,
    options: IngestionOptions,
    progress: ProgressReporter | undefined,
    defaultSource?: DocumentSource,
  ): Promise<IngestionOutcome> {
    const startedAt = Date.now();
    const log = createChildLogger(this.logger, { tenant, sourceKind: input.kind });
    const stages: IngestionStage[] = ["received"];
    const profile = resolveIngestionProfile(options.profile, options);

    let source: ResolvedSource;
    try {
      if (tenant.trim().length === 0) {
        throw new ValidationError("Tenant is required", { tenant: "must not be empty" });
      }
      source = await resolveSource(input, {
        ...(this.deps.fetch ? { fetch: this.deps.fetch } : {}),
        defaultSource,
        maxBytes: this.deps.config.ingestion.maxFileSizeBytes,
      });
      await this.validate(source, profile);
    } catch (err) {
      stages.push("rejected");
      return this.failed(tenant, startedAt, log, {
        success: false,
        documentState: "none",
        failedStage: "validation",
        ...describeError(err, "VALIDATION_ERROR"),
        attempted: [],
        stages,
      });
    }
    stages.push("validated");
    await this.report(progress, INGESTION_PROGRESS.validated, log);

    let extracted: ExtractedContent;
    try {
      extracted = await this.extract(source);
    } catch (err) {
      stages.push("failed");
      return this.failed(tenant, startedAt, log, {
        success: false,
        documentState: "none",
        failedStage: "extraction",
        ...describeError(err, "EXTRACTION_FAILED"),
        attempted: err instanceof ExtractionError ? err.attempted : [],
        stages,
      });
    }
    stages.push("extracted");

    const warnings: string[] = [];
    const storedPath = await this.storeOriginal(tenant, source, profile, warnings, log);

    let document: Document;
    try {
      document = await this.deps.documents.createDocument({
        tenant,
        title: source.title,
        source: source.source,
        metadata: this.documentMetadata(source, extracted, storedPath),
      });
    } catch (err) {
      await this.removeFile(storedPath, log);
      stages.push("failed");
      return this.failed(tenant, startedAt, log, {
        success: false,
        documentState: "none",
        failedStage: "processing",
        ...describeError(err, "PROCESSING_FAILED"),
        attempted: [],
        stages,
      });
    }
    stages.push("document_created");
    await this.report(progress, INGESTION_PROGRESS.documentCreated, log);

    const docLog = createChildLogger(log, { documentId: document.id });
    const retryProfile = resolveIngestionProfile("degraded");
    let usedProfile = profile;
    let stored: StoredChunks;
    try {
      stored = await this.chunkAndStore(document, extracted, profile, docLog);
    } catch (primaryErr) {
      docLog.warn({ err: errorMessage(primaryErr), profile: profile.name }, "chunk storage failed, retrying degraded");
      try {
        stored = await this.chunkAndStore(document, extracted, retryProfile, docLog);
        usedProfile = retryProfile;
      } catch (retryErr) {
        stages.push("failed");
        const rolledBack = await this.rollback(tenant, document.id, storedPath, docLog);
        if (rolledBack) stages.push("rolled_back");
        return this.failed(tenant, startedAt, docLog, {
          success: false,
          documentState: rolledBack ? "none" : "incomplete",
          ...(rolledBack ? {} : { documentId: document.id }),
          failedStage: "processing",
          ...describeError(primaryErr, "PROCESSING_FAILED"),
          retryError: errorMessage(retryErr),
          attempted: [`chunk:${profile.name}`, `chunk:${retryProfile.name}`],
          stages,
        });
      }
    }

    stages.push("chunked_and_stored");
    if (stored.chunksEmbedded > 0) stages.push("embedded");
    stages.push("done");
    await this.report(progress, INGESTION_PROGRESS.chunksStored, docLog);

    const outcome: IngestionSuccess = {
      success: true,
      documentId: document.id,
      chunksCreated: stored.chunksCreated,
      chunksEmbedded: stored.chunksEmbedded,
      degraded: usedProfile.name === "degraded",
      emergency: stored.emergency,
      stages,
      warnings: [...warnings, ...stored.warnings],
    };

    const durationMs = Date.now() - startedAt;
    docLog.info(
      { chunks: outcome.chunksCreated, embedded: outcome.chunksEmbedded, degraded: outcome.degraded, durationMs },
      "ingestion complete",
    );
    await this.deps.metrics?.record(tenant, "ingestion_duration_ms", durationMs, {
      success: true,
      degraded: outcome.degraded,
    });
    await this.deps.metrics?.record(tenant, "ingestion_chunks", outcome.chunksCreated);
    if (this.deps.embeddingCache && outcome.chunksEmbedded > 0) {
      await this.deps.metrics?.recordCacheStats(tenant, this.deps.embeddingCache.stats());
    }

    const { suggester } = this.deps;
    if (usedProfile.suggestQuestions && suggester) {
      this.background(docLog, "suggested questions", () => suggester.suggest(tenant, document.id));
    }
    if (this.deps.onStored) {
      try {
        await this.deps.onStored(outcome);
      } catch (err) {
        docLog.warn({ err: errorMessage(err) }, "onStored hook failed");
      }
    }

    return outcome;
  }

  private async validate(source: ResolvedSource, profile: IngestionProfile): Promise<void> {
    const { maxFileSizeBytes } = this.deps.config.ingestion;
    const data = source.kind === "binary" ? source.data : Buffer.from(source.text, "utf8");
    if (data.byteLength > maxFileSizeBytes) {
      throw new ValidationError(
        `File is ${String(data.byteLength)} bytes, above the ${String(maxFileSizeBytes)} byte limit`,
        { file: "too large" },
      );
    }

    if (profile.chunkSize !== undefined || profile.overlap !== undefined) {
      resolveChunkingOptions(undefined, {
        ...(profile.chunkSize !== undefined ? { windowSize: profile.chunkSize } : {}),
        ...(profile.overlap !== undefined ? { overlap: profile.overlap } : {}),
      });
    }

    await this.deps.extraction.pageLimitValidator.assertWithinLimit(
      data,
      source.kind === "binary" ? source.extension : "txt",
    );
  }

  private async extract(source: ResolvedSource): Promise<ExtractedContent> {
    if (source.kind === "text") {
      const language = detectLanguage(source.text);
      return {
        content: source.text,
        method: "text",
        qualityScore: scoreQuality(source.text),
        format: "text",
        fileSize: Buffer.byteLength(source.text, "utf8"),
        ...(language !== "unknown" ? { language } : {}),
      };
    }

    const result = await this.deps.extraction.extractor.extract(source.data, source.extension);
    if (!result.success) {
      throw new ExtractionError(
        result.error,
        result.attempts.map((attempt) => attempt.method),
        result.supportedFormats,
      );
    }

    const { metadata } = result;
    return {
      content: result.content,
      method: result.method,
      qualityScore: result.qualityScore,
      format: metadata.format,
      fileSize: metadata.fileSize,
      ...(metadata.language !== undefined ? { language: metadata.language } : {}),
      ...(metadata.pageCount !== undefined ? { pageCount: metadata.pageCount } : {}),
      ...(metadata.structuredData ? { structuredData: metadata.structuredData } : {}),
    };
  }

  private async chunkAndStore(
    document: Document,
    extracted: ExtractedContent,
    profile: IngestionProfile,
    log: Logger,
  ): Promise<StoredChunks> {
    const warnings: string[] = [];
    let drafts: ChunkDraft[];
    let summary: ChunkingSummary;
    let emergency = false;

    try {
      const result = (this.deps.chunk ?? chunkDocument)(
        {
          text: extracted.content,
          format: extracted.format,
          ...(profile.structureAware && extracted.structuredData ? { structuredData: extracted.structuredData } : {}),
        },
        {
          ...(profile.chunkSize !== undefined ? { windowSize: profile.chunkSize } : {}),
          ...(profile.overlap !== undefined ? { overlap: profile.overlap } : {}),
          minLength: this.deps.config.ingestion.minChunkLength,
          byteThreshold: this.deps.config.ingestion.byteChunkingThreshold,
          structureAware: profile.structureAware,
        },
      );
      if (result.chunks.length === 0) {
        throw new ProcessingError("Chunking produced no chunks", "chunking");
      }
      drafts = result.chunks;
      summary = {
        strategy: result.strategy,
        windowSize: result.windowSize,
        overlap: result.overlap,
        profile: profile.name,
        degraded: profile.name === "degraded",
      };
    } catch (err) {
      // A stored document always has at least one chunk.
      drafts = [emergencyChunk(extracted.content, EMERGENCY_CHUNK_CHARS)];
      summary = {
        strategy: "emergency",
        windowSize: EMERGENCY_CHUNK_CHARS,
        overlap: 0,
        profile: profile.name,
        degraded: profile.name === "degraded",
      };
      emergency = true;
      warnings.push(`Chunking failed (${errorMessage(err)}); stored a single emergency chunk`);
      log.warn({ err: errorMessage(err) }, "chunking failed, using emergency chunk");
    }

    if (this.deps.onChunked) await this.deps.onChunked(document.id, drafts);
    if (profile.dedup && !emergency) drafts = dedupChunks(drafts);

    const vectors = profile.embed ? await this.embed(drafts, warnings, log) : [];
    const language = extracted.language;
    const chunks: NewChunk[] = drafts.map((draft, i) => ({
      ...draft,
      meta: language !== undefined ? { ...draft.meta, language } : draft.meta,
      embedding: vectors[i] ?? null,
    }));

    const chunksCreated = await this.deps.documents.insertChunks(document.tenant, document.id, chunks);

    try {
      await this.deps.documents.updateMetadata(document.tenant, document.id, { chunking: summary });
    } catch (err) {
      log.warn({ err: errorMessage(err) }, "chunking summary not saved");
    }

    return {
      chunksCreated,
      chunksEmbedded: chunks.filter((chunk) => chunk.embedding !== null).length,
      emergency,
      warnings,
    };
  }

  /**
   * Vectors for the drafts, or an empty list when the model is unavailable;
   * chunks then stay keyword-searchable until backfilled.
   */
  private async embed(drafts: ChunkDraft[], warnings: string[], log: Logger): Promise<number[][]> {
    try {
      const { embeddings } = await this.deps.embeddings.batchEmbed(
        drafts.map((draft) => draft.content),
        "document",
      );
      if (embeddings.length !== drafts.length) {
        throw new ProcessingError(
          `Expected ${String(drafts.length)} embeddings, got ${String(embeddings.length)}`,
          "embedding",
        );
      }
      return embeddings;
    } catch (err) {
      warnings.push(`Embeddings unavailable (${errorMessage(err)}); chunks stored without vectors`);
      log.warn({ err: errorMessage(err) }, "embedding failed, storing chunks without vectors");
      return [];
    }
  }

  private documentMetadata(
    source: ResolvedSource,
    extracted: ExtractedContent,
    storedPath: string | undefined,
  ): DocumentMetadata {
    const metadata: DocumentMetadata = {
      ...(source.kind === "text" ? source.metadata : {}),
      extractionMethod: extracted.method,
      qualityScore: extracted.qualityScore,
      format: extracted.format,
      fileSize: extracted.fileSize,
    };
    if (extracted.language !== undefined) metadata.language = extracted.language;
    if (extracted.pageCount !== undefined) metadata.pageCount = extracted.pageCount;
    if (extracted.structuredData) metadata.structuredData = extracted.structuredData;
    if (source.kind === "binary") {
      metadata.fileName = source.fileName;
      if (source.mimeType !== undefined) metadata.mimeType = source.mimeType;
      if (source.sourceUrl !== undefined) metadata.sourceUrl = source.sourceUrl;
    }
    if (storedPath !== undefined) metadata.storedPath = storedPath;
    return metadata;
  }

  private async storeOriginal(
    tenant: string,
    source: ResolvedSource,
    profile: IngestionProfile,
    warnings: string[],
    log: Logger,
  ): Promise<string | undefined> {
    if (!profile.storeFile || !this.deps.files || source.kind !== "binary") return undefined;
    try {
      return await this.deps.files.save(tenant, source.fileName, source.data);
    } catch (err) {
      warnings.push(`Original file not stored (${errorMessage(err)})`);
      log.warn({ err: errorMessage(err) }, "original file not stored");
      return undefined;
    }
  }

  /** True when the document row is gone afterwards. */
  private async rollback(
    tenant: string,
    documentId: string,
    storedPath: string | undefined,
    log: Logger,
  ): Promise<boolean> {
    try {
      await this.deps.documents.deleteDocument(tenant, documentId);
    } catch (err) {
      log.error({ err: errorMessage(err) }, "rollback failed, document left incomplete");
      return false;
    }
    await this.removeFile(storedPath, log);
    log.warn("ingestion rolled back");
    return true;
  }

  private async removeFile(path: string | undefined, log: Logger): Promise<void> {
    if (path === undefined || !this.deps.files) return;
    try {
      await this.deps.files.remove(path);
    } catch (err) {
      log.warn({ path, err: errorMessage(err) }, "stored file not removed");
    }
  }

  private async report(progress: ProgressReporter | undefined, percent: number, log: Logger): Promise<void> {
    if (!progress) return;
    try {
      await progress(percent);
    } catch (err) {
      log.warn({ percent, err: errorMessage(err) }, "progress update failed");
    }
  }

  private background(log: Logger, label: string, task: () => Promise<unknown>): void {
    const run: Promise<void> = task()
      .then(
        () => undefined,
        (err: unknown) => {
          log.warn({ err: errorMessage(err) }, `${label} failed`);
        },
      )
      .finally(() => {
        this.pending.delete(run);
      });
    this.pending.add(run);
  }

  private async failed(
    tenant: string,
    startedAt: number,
    log: Logger,
    failure: IngestionFailure,
  ): Promise<IngestionFailure> {
    const durationMs = Date.now() - startedAt;
    log.warn(
      {
        failedStage: failure.failedStage,
        errorCode: failure.errorCode,
        err: failure.error,
        retryError: failure.retryError,
        documentState: failure.documentState,
        durationMs,
      },
      "ingestion failed",
    );
    await this.deps.metrics?.record(tenant, "ingestion_duration_ms", durationMs, {
      success: false,
      failedStage: failure.failedStage,
    });
    return failure;
  }
}
