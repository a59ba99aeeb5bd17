import { createHash } from "node:crypto";
import { LRUCache } from "lru-cache";
import type { EmbeddingCacheStats } from "@docsift/types";
import { ProcessingError } from "@docsift/errors";

export interface EmbeddingCacheOptions {
  maxEntries: number;
  ttlMs: number;
}

/** Whitespace runs collapse so reflowed copies of a text share a key. */
export function normalizeForKey(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function contentHash(text: string): string {
  return createHash("sha256").update(normalizeForKey(text)).digest("hex");
}

/**
 * Vectors keyed by `<namespace>:<sha256 of normalized content>`, bounded by
 * entry count (least recently used goes first) and by TTL. The namespace
 * separates models and input types; identical content across documents
 * shares one entry. Callers get copies, never the stored arrays.
 */
export class EmbeddingCache {
  private readonly cache: LRUCache<string, number[]>;
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private hits = 0;
  private misses = 0;
  private puts = 0;
  private deletions = 0;
  private evictions = 0;

  constructor(options: EmbeddingCacheOptions) {
    this.maxEntries = options.maxEntries;
    this.ttlMs = options.ttlMs;
    this.cache = new LRUCache<string, number[]>({
      max: options.maxEntries,
      ttl: options.ttlMs,
      dispose: (_vector, _key, reason) => {
        if (reason === "evict" || reason === "expire") this.evictions++;
      },
    });
  }

  static key(namespace: string, text: string): string {
    return `${namespace}:${contentHash(text)}`;
  }

  get(namespace: string, text: string): number[] | undefined {
    const vector = this.cache.get(EmbeddingCache.key(namespace, text));
    if (vector) {
      this.hits++;
    } else {
      this.misses++;
    }
    return vector?.slice();
  }

  set(namespace: string, text: string, vector: number[]): void {
    this.cache.set(EmbeddingCache.key(namespace, text), vector.slice());
    this.puts++;
  }

  async getOrCompute(
    namespace: string,
    text: string,
    compute: (text: string) => Promise<number[]>,
  ): Promise<number[]> {
    const cached = this.get(namespace, text);
    if (cached) return cached;

    const vector = await compute(text);
    this.set(namespace, text, vector);
    return vector;
  }

  /**
   * Vectors for every text in input order. Misses are computed in one call,
   * with duplicate contents sent once.
   */
  async getOrComputeMany(
    namespace: string,
    texts: string[],
    compute: (missing: string[]) => Promise<number[][]>,
  ): Promise<number[][]> {
    const found = new Map<string, number[]>();
    const missing = new Map<string, string>();

    for (const text of texts) {
      const key = EmbeddingCache.key(namespace, text);
      if (found.has(key) || missing.has(key)) continue;
      const cached = this.get(namespace, text);
      if (cached) {
        found.set(key, cached);
      } else {
        missing.set(key, text);
      }
    }

    if (missing.size > 0) {
      const pending = [...missing.entries()];
      const vectors = await compute(pending.map(([, text]) => text));
      if (vectors.length !== pending.length) {
        throw new ProcessingError(
          `Expected ${String(pending.length)} embeddings, received ${String(vectors.length)}`,
          "embedding",
        );
      }
      pending.forEach(([key, text], index) => {
        const vector = vectors[index];
        if (!vector) return;
        this.set(namespace, text, vector);
        found.set(key, vector);
      });
    }

    return texts.map((text) => {
      const vector = found.get(EmbeddingCache.key(namespace, text));
      if (!vector) {
        throw new ProcessingError("Embedding missing after computation", "embedding");
      }
      return vector.slice();
    });
  }

  forget(namespace: string, text: string): boolean {
    const removed = this.cache.delete(EmbeddingCache.key(namespace, text));
    if (removed) this.deletions++;
    return removed;
  }

  /** Drop every entry, or only those of one namespace. Returns the count removed. */
  flush(namespace?: string): number {
    if (namespace === undefined) {
      const size = this.cache.size;
      this.cache.clear();
      this.deletions += size;
      return size;
    }

    const prefix = `${namespace}:`;
    let removed = 0;
    for (const key of [...this.cache.keys()]) {
      if (key.startsWith(prefix) && this.cache.delete(key)) removed++;
    }
    this.deletions += removed;
    return removed;
  }

  stats(): EmbeddingCacheStats {
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      puts: this.puts,
      deletions: this.deletions,
      evictions: this.evictions,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
      size: this.cache.size,
      maxEntries: this.maxEntries,
      ttlMs: this.ttlMs,
    };
  }

  resetStats(): void {
    this.hits = 0;
    this.misses = 0;
    this.puts = 0;
    this.deletions = 0;
    this.evictions = 0;
  }
}
