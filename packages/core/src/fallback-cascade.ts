import type { CascadeResult, Chunk, FallbackStrategy, SearchHit, SearchOptions } from "@docsift/types";
import type { IDocumentStore } from "@docsift/db";
import type { Logger } from "@docsift/logger";
import { DEFAULT_SEARCH_LIMIT, type HybridRetriever } from "./hybrid-retriever.js";
import { expandQuery, simplifyQuery } from "./query-rewriter.js";

export interface CascadeDependencies {
  retriever: HybridRetriever;
  documents: IDocumentStore;
  logger?: Logger;
}

/** Level reported when every strategy came back empty. */
export const CASCADE_EXHAUSTED_LEVEL = 4;

const LEVELS: readonly FallbackStrategy[] = ["original", "expanded_query", "simplified_query", "first_chunks"];

/**
 * Leading chunks of the scoped documents in ordinal order, scored by
 * position so the first chunk ranks highest.
 */
export async function firstChunkHits(
  documents: IDocumentStore,
  tenant: string,
  documentIds: string[],
  limit: number,
): Promise<SearchHit[]> {
  const chunks: Chunk[] = [];
  for (const documentId of documentIds) {
    if (chunks.length >= limit) break;
    chunks.push(...(await documents.listChunks(tenant, documentId, { offset: 0, limit: limit - chunks.length })));
  }
  return chunks.map((chunk, index): SearchHit => ({
    chunk,
    score: (chunks.length - index) / chunks.length,
    source: "fallback",
  }));
}

/**
 * Original query, then synonym expansion, then bare keywords, then the
 * first chunks of the scoped documents. Stops at the first level with hits.
 */
export async function searchWithFallbacks(
  deps: CascadeDependencies,
  tenant: string,
  query: string,
  options: SearchOptions = {},
): Promise<CascadeResult> {
  const tried = new Set<string>();

  for (const [level, strategy] of LEVELS.entries()) {
    if (strategy === "first_chunks") {
      // Only an explicit scope qualifies; an unscoped query never reads an arbitrary document.
      const scoped = await deps.retriever.resolveScope(tenant, options);
      if (scoped === undefined) continue;
      const hits = await firstChunkHits(deps.documents, tenant, scoped, options.limit ?? DEFAULT_SEARCH_LIMIT);
      if (hits.length > 0) {
        deps.logger?.info({ tenant, level }, "retrieval fell back to first chunks");
        return { hits, fallbackLevel: level, strategy, query };
      }
      continue;
    }

    const rewritten =
      strategy === "original" ? query : strategy === "expanded_query" ? expandQuery(query) : simplifyQuery(query);
    if (tried.has(rewritten)) continue;
    tried.add(rewritten);

    const hits = await deps.retriever.search(tenant, rewritten, options);
    if (hits.length > 0) {
      if (level > 0) deps.logger?.info({ tenant, level, strategy, query: rewritten }, "retrieval fallback used");
      return { hits, fallbackLevel: level, strategy, query: rewritten };
    }
  }

  return { hits: [], fallbackLevel: CASCADE_EXHAUSTED_LEVEL, strategy: "none", query };
}
