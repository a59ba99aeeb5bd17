import type { Chunk } from "./chunk.js";

export type ScopePolicy = "explicit" | "latest";

export interface SearchOptions {
  limit?: number;
  documentIds?: string[];
  vectorWeight?: number;
  keywordWeight?: number;
  similarityThreshold?: number;
  rerank?: boolean;
  diversify?: boolean;
  maxPerDocument?: number;
  vectorLimit?: number;
  keywordLimit?: number;
  scope?: ScopePolicy;
}

// Allowed option fields; anything else is rejected
export const SEARCH_OPTION_ALLOWLIST = [
  "limit",
  "documentIds",
  "vectorWeight",
  "keywordWeight",
  "similarityThreshold",
  "rerank",
  "diversify",
  "maxPerDocument",
  "vectorLimit",
  "keywordLimit",
  "scope",
] as const;

export type HitSource = "vector" | "keyword" | "hybrid" | "fallback";

export interface SearchHit {
  chunk: Chunk;
  /** Fused score normalized to (0, 1] against the best hit. */
  score: number;
  source: HitSource;
  vectorScore?: number;
  keywordScore?: number;
  vectorRank?: number;
  keywordRank?: number;
}

export type FallbackStrategy = "original" | "expanded_query" | "simplified_query" | "first_chunks";

export interface CascadeResult {
  hits: SearchHit[];
  fallbackLevel: number;
  strategy: FallbackStrategy | "none";
  query: string;
}

export interface RetrieverStats {
  searches: number;
  vectorSearches: number;
  keywordSearches: number;
  vectorHits: number;
  keywordHits: number;
  fusions: number;
  errors: number;
  vectorSearchErrors: number;
  keywordSearchErrors: number;
}
