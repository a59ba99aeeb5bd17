import type { EmbeddingInputType, EmbeddingResult } from "@docsift/types";

export interface IEmbeddingProvider {
  readonly name: string;
  readonly model: string;
  readonly dimensions: number;
  embed(text: string, inputType?: EmbeddingInputType): Promise<EmbeddingResult>;
  batchEmbed(texts: string[], inputType?: EmbeddingInputType): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
