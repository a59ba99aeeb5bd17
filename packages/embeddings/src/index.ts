export type { IEmbeddingProvider } from "./embedding-provider.interface.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
export { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";
export type { BgeM3ProviderConfig } from "./bge-m3-provider.js";
export { EmbeddingCache, contentHash, normalizeForKey } from "./embedding-cache.js";
export type { EmbeddingCacheOptions } from "./embedding-cache.js";
export { CachedEmbeddingProvider } from "./cached-provider.js";
export { createEmbeddingProvider, createCachedEmbeddingProvider } from "./factory.js";
export type { EmbeddingFactoryConfig, EmbeddingProviderType } from "./factory.js";
