import type { EmbeddingInputType, EmbeddingResult } from "@docsift/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import type { EmbeddingCache } from "./embedding-cache.js";

/**
 * Provider decorator that serves repeated content from the cache and only
 * sends misses to the model. `tokensUsed` covers the misses only.
 */
export class CachedEmbeddingProvider implements IEmbeddingProvider {
  readonly name: string;
  readonly model: string;
  readonly dimensions: number;
  readonly cache: EmbeddingCache;
  private readonly inner: IEmbeddingProvider;

  constructor(inner: IEmbeddingProvider, cache: EmbeddingCache) {
    this.inner = inner;
    this.cache = cache;
    this.name = inner.name;
    this.model = inner.model;
    this.dimensions = inner.dimensions;
  }

  namespace(inputType: EmbeddingInputType): string {
    return `${this.name}:${this.model}:${inputType}`;
  }

  embed(text: string, inputType: EmbeddingInputType = "query"): Promise<EmbeddingResult> {
    return this.batchEmbed([text], inputType);
  }

  async batchEmbed(texts: string[], inputType: EmbeddingInputType = "document"): Promise<EmbeddingResult> {
    let tokensUsed = 0;
    const embeddings = await this.cache.getOrComputeMany(this.namespace(inputType), texts, async (missing) => {
      const result = await this.inner.batchEmbed(missing, inputType);
      tokensUsed += result.tokensUsed;
      return result.embeddings;
    });

    return { embeddings, model: this.model, tokensUsed, dimensions: this.dimensions };
  }

  /** Drop cached document vectors for these contents. */
  forget(texts: string[], inputType: EmbeddingInputType = "document"): number {
    const namespace = this.namespace(inputType);
    return texts.reduce((removed, text) => (this.cache.forget(namespace, text) ? removed + 1 : removed), 0);
  }

  healthCheck(): Promise<boolean> {
    return this.inner.healthCheck();
  }
}
