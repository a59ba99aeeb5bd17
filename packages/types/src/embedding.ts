/** Width of the stored vector column; changing it needs a migration. */
export const EMBEDDING_COLUMN_DIMENSIONS = 1024;

/** Cohere and BGE-M3 embed queries and documents differently. */
export type EmbeddingInputType = "document" | "query";

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface EmbeddingCacheStats {
  hits: number;
  misses: number;
  puts: number;
  deletions: number;
  /** Entries dropped for capacity or TTL. */
  evictions: number;
  /** hits / (hits + misses), 0 before any lookup. */
  hitRate: number;
  size: number;
  maxEntries: number;
  ttlMs: number;
}
