import type {
  AppConfig,
  Chunk,
  HitSource,
  RetrieverStats,
  SearchHit,
  SearchOptions,
} from "@docsift/types";
import type { IDocumentStore, ScoredChunk } from "@docsift/db";
import type { IEmbeddingProvider } from "@docsift/embeddings";
import { ValidationError, errorMessage } from "@docsift/errors";
import { createChildLogger, createSilentLogger, type Logger } from "@docsift/logger";
import { validateSearchOptions } from "./filter-validator.js";
import type { MetricsRecorder } from "./metrics-recorder.js";

/** Reciprocal-rank-fusion constant. */
export const RRF_K = 60;

export const DEFAULT_SEARCH_LIMIT = 10;
export const DEFAULT_CANDIDATE_LIMIT = 50;
export const DEFAULT_MAX_PER_DOCUMENT = 3;

export interface HybridRetrieverDependencies {
  documents: IDocumentStore;
  embeddings: IEmbeddingProvider;
  config: Pick<AppConfig, "search">;
  metrics?: MetricsRecorder;
  logger?: Logger;
}

export interface KeywordQuery {
  phrase: string;
  terms: string[];
}

/**
 * Punctuation becomes whitespace, whitespace collapses, and terms are the
 * distinct lower-cased words of two or more characters.
 */
export function prepareKeywordQuery(query: string): KeywordQuery {
  const phrase = query
    .replace(/[^\p{L}\p{N}\s]+/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
  const terms = [...new Set(phrase.toLowerCase().split(" "))].filter((word) => word.length >= 2);
  return { phrase, terms };
}

interface FusedCandidate {
  chunk: Chunk;
  combined: number;
  vectorScore?: number;
  keywordScore?: number;
  vectorRank?: number;
  keywordRank?: number;
}

function emptyStats(): RetrieverStats {
  return {
    searches: 0,
    vectorSearches: 0,
    keywordSearches: 0,
    vectorHits: 0,
    keywordHits: 0,
    fusions: 0,
    errors: 0,
    vectorSearchErrors: 0,
    keywordSearchErrors: 0,
  };
}

function hitSource(candidate: FusedCandidate): HitSource {
  if (candidate.vectorRank !== undefined && candidate.keywordRank !== undefined) return "hybrid";
  return candidate.vectorRank !== undefined ? "vector" : "keyword";
}

// Equal scores fall back to position in the document, then to ids.
function byCombinedThenOrdinal(a: FusedCandidate, b: FusedCandidate): number {
  return (
    b.combined - a.combined ||
    a.chunk.ordinal - b.chunk.ordinal ||
    a.chunk.documentId.localeCompare(b.chunk.documentId) ||
    a.chunk.id.localeCompare(b.chunk.id)
  );
}

/**
 * Round-robin across documents in order of each document's best hit, with
 * at most `maxPerDocument` hits from any one document.
 */
export function diversifyByDocument<T extends { chunk: Chunk }>(ranked: T[], maxPerDocument: number): T[] {
  const groups = new Map<string, T[]>();
  for (const item of ranked) {
    const group = groups.get(item.chunk.documentId);
    if (group) group.push(item);
    else groups.set(item.chunk.documentId, [item]);
  }

  const result: T[] = [];
  for (let round = 0; round < maxPerDocument; round++) {
    for (const group of groups.values()) {
      const item = group[round];
      if (item) result.push(item);
    }
  }
  return result;
}

/**
 * Vector similarity and keyword matching over one tenant's chunks, merged
 * with weighted reciprocal-rank fusion.
 */
export class HybridRetriever {
  private readonly documents: IDocumentStore;
  private readonly embeddings: IEmbeddingProvider;
  private readonly config: Pick<AppConfig, "search">;
  private readonly metrics?: MetricsRecorder;
  private readonly logger: Logger;
  private stats = emptyStats();

  constructor(deps: HybridRetrieverDependencies) {
    this.documents = deps.documents;
    this.embeddings = deps.embeddings;
    this.config = deps.config;
    this.metrics = deps.metrics;
    this.logger = createChildLogger(deps.logger ?? createSilentLogger(), { component: "hybrid-retriever" });
  }

  /**
   * Document ids the search is restricted to. `undefined` means the whole
   * tenant; an empty list means there is nothing in scope.
   */
  async resolveScope(tenant: string, options: SearchOptions): Promise<string[] | undefined> {
    if (options.documentIds && options.documentIds.length > 0) return options.documentIds;
    if (options.scope !== "latest") return undefined;
    const latest = await this.documents.latestDocument(tenant);
    return latest ? [latest.id] : [];
  }

  async search(tenant: string, query: string, rawOptions?: SearchOptions): Promise<SearchHit[]> {
    const startedAt = Date.now();
    const options = validateSearchOptions(rawOptions);
    const trimmed = query.trim();
    if (trimmed.length === 0) {
      throw new ValidationError("Query is required", { query: "must not be empty" });
    }

    const vectorWeight = options.vectorWeight ?? this.config.search.vectorWeight;
    const keywordWeight = options.keywordWeight ?? this.config.search.keywordWeight;
    const weightSum = vectorWeight + keywordWeight;
    if (weightSum <= 0) {
      throw new ValidationError("At least one of vectorWeight and keywordWeight must be positive", {
        vectorWeight: "sum is zero",
        keywordWeight: "sum is zero",
      });
    }

    this.stats.searches++;
    const documentIds = await this.resolveScope(tenant, options);
    if (documentIds?.length === 0) return [];

    const [vectorResults, keywordResults] = await Promise.all([
      this.vectorSearch(tenant, trimmed, documentIds, options),
      this.keywordSearch(tenant, trimmed, documentIds, options),
    ]);
    this.stats.vectorHits += vectorResults.length;
    this.stats.keywordHits += keywordResults.length;

    const candidates = this.fuse(vectorResults, keywordResults, vectorWeight / weightSum, keywordWeight / weightSum);
    const ranked = options.rerank === false ? candidates : [...candidates].sort(byCombinedThenOrdinal);
    const spread = options.diversify
      ? diversifyByDocument(ranked, options.maxPerDocument ?? DEFAULT_MAX_PER_DOCUMENT)
      : ranked;

    const best = Math.max(0, ...candidates.map((c) => c.combined));
    const hits = spread.slice(0, options.limit ?? DEFAULT_SEARCH_LIMIT).map(
      (candidate): SearchHit => ({
        chunk: candidate.chunk,
        score: best > 0 ? candidate.combined / best : 0,
        source: hitSource(candidate),
        ...(candidate.vectorScore !== undefined
          ? { vectorScore: candidate.vectorScore, vectorRank: candidate.vectorRank }
          : {}),
        ...(candidate.keywordScore !== undefined
          ? { keywordScore: candidate.keywordScore, keywordRank: candidate.keywordRank }
          : {}),
      }),
    );

    const latencyMs = Date.now() - startedAt;
    this.logger.debug(
      { tenant, vector: vectorResults.length, keyword: keywordResults.length, hits: hits.length, latencyMs },
      "hybrid search complete",
    );
    await this.metrics?.record(tenant, "query_latency_ms", latencyMs, { hits: hits.length });
    return hits;
  }

  getStats(): RetrieverStats {
    return { ...this.stats };
  }

  resetStats(): void {
    this.stats = emptyStats();
  }

  private async vectorSearch(
    tenant: string,
    query: string,
    documentIds: string[] | undefined,
    options: SearchOptions,
  ): Promise<ScoredChunk[]> {
    try {
      // Skip the model call entirely when nothing in scope has a vector.
      if ((await this.documents.countEmbeddedChunks(tenant, documentIds)) === 0) return [];

      this.stats.vectorSearches++;
      const { embeddings } = await this.embeddings.embed(query, "query");
      const embedding = embeddings[0];
      if (!embedding) throw new Error("Embedding provider returned no vector for the query");

      return await this.documents.searchByVector({
        tenant,
        embedding,
        ...(documentIds ? { documentIds } : {}),
        limit: options.vectorLimit ?? DEFAULT_CANDIDATE_LIMIT,
        minSimilarity: options.similarityThreshold ?? this.config.search.similarityThreshold,
      });
    } catch (err) {
      this.stats.errors++;
      this.stats.vectorSearchErrors++;
      this.logger.warn({ tenant, err: errorMessage(err) }, "vector search failed, keyword results only");
      return [];
    }
  }

  private async keywordSearch(
    tenant: string,
    query: string,
    documentIds: string[] | undefined,
    options: SearchOptions,
  ): Promise<ScoredChunk[]> {
    const { phrase, terms } = prepareKeywordQuery(query);
    if (phrase.length === 0) return [];

    try {
      this.stats.keywordSearches++;
      return await this.documents.searchByKeyword({
        tenant,
        phrase,
        terms,
        ...(documentIds ? { documentIds } : {}),
        limit: options.keywordLimit ?? DEFAULT_CANDIDATE_LIMIT,
      });
    } catch (err) {
      this.stats.errors++;
      this.stats.keywordSearchErrors++;
      this.logger.warn({ tenant, err: errorMessage(err) }, "keyword search failed");
      return [];
    }
  }

  private fuse(
    vectorResults: ScoredChunk[],
    keywordResults: ScoredChunk[],
    vectorWeight: number,
    keywordWeight: number,
  ): FusedCandidate[] {
    const byChunk = new Map<string, FusedCandidate>();
    const candidate = (chunk: Chunk): FusedCandidate => {
      let entry = byChunk.get(chunk.id);
      if (!entry) {
        entry = { chunk, combined: 0 };
        byChunk.set(chunk.id, entry);
      }
      return entry;
    };

    vectorResults.forEach(({ chunk, score }, rank) => {
      const entry = candidate(chunk);
      entry.vectorScore = score;
      entry.vectorRank = rank;
      entry.combined += vectorWeight / (RRF_K + rank + 1);
    });

    keywordResults.forEach(({ chunk, score }, rank) => {
      const entry = candidate(chunk);
      if (entry.vectorRank !== undefined) this.stats.fusions++;
      entry.keywordScore = score;
      entry.keywordRank = rank;
      entry.combined += keywordWeight / (RRF_K + rank + 1);
    });

    return [...byChunk.values()];
  }
}
