import type {
  AnswerPath,
  AnswerRequest,
  AnswerResult,
  AnswerSource,
  AppConfig,
  Document,
  ResolvedAnswerMode,
  SearchHit,
  SearchOptions,
} from "@docsift/types";
import type { IDocumentStore } from "@docsift/db";
import type { GenerateOptions, GenerationResult, IGenerationClient } from "@docsift/generation";
import {
  ValidationError,
  createCircuitBreaker,
  errorMessage,
  type Breaker,
  type CircuitBreakerOptions,
} from "@docsift/errors";
import { createChildLogger, createSilentLogger, type Logger } from "@docsift/logger";
import { buildAnswerPrompt, GROUNDING_INSTRUCTIONS, maxTokensForLength } from "./answer-prompt.js";
import {
  clampCitations,
  clampTopK,
  detectAnswerMode,
  hasSummaryIntent,
  normalizeFormat,
  normalizeLength,
} from "./answer-modes.js";
import { assembleContext } from "./context-assembler.js";
import { searchWithFallbacks } from "./fallback-cascade.js";
import { validateSearchOptions } from "./filter-validator.js";
import type { HybridRetriever } from "./hybrid-retriever.js";
import type { MetricsRecorder } from "./metrics-recorder.js";

export const INSUFFICIENT_CONTEXT_ANSWER =
  "There is not enough information in the available documents to answer this question.";
export const FALLBACK_PREFIX = "Summary (fallback, no LLM):";

const FALLBACK_CONTEXTS = 6;
const EXCERPT_CHARS = 240;
const CONFIDENCE_HITS = 3;

export interface AnswerGeneratorDependencies {
  retriever: HybridRetriever;
  documents: IDocumentStore;
  generation: IGenerationClient;
  config: Pick<AppConfig, "generation">;
  metrics?: MetricsRecorder;
  logger?: Logger;
  /** Breaker tuning; the call timeout always comes from `config.generation.timeoutMs`. */
  breaker?: Omit<CircuitBreakerOptions, "timeout" | "logger">;
}

interface GatheredContext {
  path: AnswerPath;
  hits: SearchHit[];
  fallbackLevel: number;
}

type ModelOutcome = { ok: true; text: string } | { ok: false; reason: string };

/**
 * Leading chunk texts joined and cut to `maxChars`, for when the model
 * cannot be used.
 */
export function extractiveSummary(contents: string[], maxChars: number): string {
  const body = contents
    .slice(0, FALLBACK_CONTEXTS)
    .map((content) => content.trim())
    .filter((content) => content.length > 0)
    .join("\n\n")
    .slice(0, maxChars);
  return `${FALLBACK_PREFIX}\n${body}`;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function toSource(hit: SearchHit): AnswerSource {
  return {
    documentId: hit.chunk.documentId,
    chunkId: hit.chunk.id,
    ordinal: hit.chunk.ordinal,
    score: round2(hit.score),
    excerpt: hit.chunk.content.slice(0, EXCERPT_CHARS),
  };
}

/**
 * Answers a question from retrieved chunks. The model call runs behind a
 * circuit breaker; when it fails or answers with nothing, an extractive
 * summary of the context is returned instead.
 */
export class AnswerGenerator {
  private readonly retriever: HybridRetriever;
  private readonly documents: IDocumentStore;
  private readonly generation: IGenerationClient;
  private readonly config: Pick<AppConfig, "generation">;
  private readonly metrics?: MetricsRecorder;
  private readonly logger: Logger;
  private readonly breaker: Breaker<[string, string[], GenerateOptions], GenerationResult>;

  constructor(deps: AnswerGeneratorDependencies) {
    this.retriever = deps.retriever;
    this.documents = deps.documents;
    this.generation = deps.generation;
    this.config = deps.config;
    this.metrics = deps.metrics;
    this.logger = createChildLogger(deps.logger ?? createSilentLogger(), { component: "answer-generator" });
    this.breaker = createCircuitBreaker(
      "generation",
      (prompt: string, contextParts: string[], options: GenerateOptions) =>
        this.generation.generate(prompt, contextParts, options),
      { ...deps.breaker, timeout: deps.config.generation.timeoutMs, logger: this.logger },
    );
  }

  async generateAnswer(request: AnswerRequest): Promise<AnswerResult> {
    const startedAt = Date.now();
    const query = request.query.trim();
    if (query.length === 0) {
      throw new ValidationError("Query is required", { query: "must not be empty" });
    }

    const search = validateSearchOptions(request.search);
    const generation = request.generation ?? {};
    const mode = detectAnswerMode(query, generation.mode);
    const length = normalizeLength(generation.length);
    const topK = clampTopK(generation.topK ?? search.limit);

    const context = await this.gatherContext(
      request.tenant,
      query,
      mode,
      search,
      topK,
      generation.fallbackCascade !== false,
    );

    const finish = async (
      answer: string,
      confidence: number,
      usedFallback: boolean,
      fallbackReason?: string,
    ): Promise<AnswerResult> => {
      const generationTime = Date.now() - startedAt;
      await this.metrics?.record(request.tenant, "answer_latency_ms", generationTime, {
        path: context.path,
        usedFallback,
      });
      return {
        answer,
        confidence,
        sources: context.hits.map(toSource),
        generationTime,
        mode,
        path: context.path,
        usedFallback,
        ...(fallbackReason !== undefined ? { fallbackReason } : {}),
        retrievalFallbackLevel: context.fallbackLevel,
      };
    };

    if (context.hits.length === 0) {
      this.logger.info({ tenant: request.tenant }, "no context found for query");
      return finish(INSUFFICIENT_CONTEXT_ANSWER, 0, false, "no_context");
    }

    const prompt = buildAnswerPrompt(query, {
      mode,
      length,
      format: normalizeFormat(generation.format),
      citations: clampCitations(generation.citations),
    });
    const outcome = await this.callModel(prompt, [assembleContext(context.hits, generation.contextFormat)], {
      systemPrompt: GROUNDING_INSTRUCTIONS,
      temperature: generation.temperature,
      maxTokens: generation.maxTokens ?? maxTokensForLength(length),
    });

    const confidence = this.confidence(context);
    if (outcome.ok) {
      return finish(outcome.text, confidence, false);
    }

    const summary = extractiveSummary(
      context.hits.map((hit) => hit.chunk.content),
      this.config.generation.fallbackSummaryChars,
    );
    return finish(summary, round2(confidence * 0.5), true, outcome.reason);
  }

  private async gatherContext(
    tenant: string,
    query: string,
    mode: ResolvedAnswerMode,
    search: SearchOptions,
    topK: number,
    cascade: boolean,
  ): Promise<GatheredContext> {
    const summaryIntent = mode === "summary" || hasSummaryIntent(query);
    if (summaryIntent || mode === "document_full") {
      const scoped = await this.scopedDocuments(tenant, search);

      // Retrieval breaks up a transcript's narrative; summaries read it whole.
      const transcript = summaryIntent ? scoped.find((document) => document.source === "video") : undefined;
      if (transcript) {
        return { path: "transcript", hits: await this.fullText(tenant, [transcript.id]), fallbackLevel: 0 };
      }
      if (mode === "document_full" && scoped.length > 0) {
        const ids = scoped.map((document) => document.id);
        return { path: "document_full", hits: await this.fullText(tenant, ids), fallbackLevel: 0 };
      }
    }

    const options: SearchOptions = { ...search, limit: topK };
    if (!cascade) {
      return { path: "retrieval", hits: await this.retriever.search(tenant, query, options), fallbackLevel: 0 };
    }
    const result = await searchWithFallbacks(
      { retriever: this.retriever, documents: this.documents, logger: this.logger },
      tenant,
      query,
      options,
    );
    return { path: "retrieval", hits: result.hits, fallbackLevel: result.fallbackLevel };
  }

  private async scopedDocuments(tenant: string, search: SearchOptions): Promise<Document[]> {
    const ids = (await this.retriever.resolveScope(tenant, search)) ?? [];
    const documents = await Promise.all(ids.map((id) => this.documents.getDocument(tenant, id)));
    return documents.filter((document): document is Document => document !== null);
  }

  /**
   * Chunks of the documents in order, cut at the transcript budget. The
   * chunk that crosses the budget is truncated.
   */
  private async fullText(tenant: string, documentIds: string[]): Promise<SearchHit[]> {
    let remaining = this.config.generation.transcriptCharBudget;
    const hits: SearchHit[] = [];

    for (const documentId of documentIds) {
      for (const chunk of await this.documents.listChunks(tenant, documentId)) {
        if (remaining <= 0) return hits;
        const content = chunk.content.slice(0, remaining);
        remaining -= content.length;
        hits.push({ chunk: { ...chunk, content }, score: 1, source: "fallback" });
      }
    }
    return hits;
  }

  private async callModel(prompt: string, contextParts: string[], options: GenerateOptions): Promise<ModelOutcome> {
    try {
      const result = await this.breaker.fire(prompt, contextParts, options);
      const text = result.text.trim();
      if (text.length === 0) {
        this.logger.warn({ model: this.generation.model }, "model returned an empty answer");
        return { ok: false, reason: "empty_response" };
      }
      return { ok: true, text };
    } catch (err) {
      this.logger.warn({ model: this.generation.model, err: errorMessage(err) }, "generation failed, using extractive fallback");
      return { ok: false, reason: errorMessage(err) };
    }
  }

  private confidence(context: GatheredContext): number {
    if (context.path !== "retrieval") return 1;
    const top = context.hits.slice(0, CONFIDENCE_HITS);
    return round2(top.reduce((sum, hit) => sum + hit.score, 0) / top.length);
  }
}
